import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../../utils/logger.js';

const log = logger('Allowlist');

/**
 * Strip the IPv4-mapped IPv6 prefix, e.g. "::ffff:127.0.0.1" -> "127.0.0.1"
 */
export function normalizeAddress(address: string): string {
  return address.startsWith('::ffff:') ? address.slice('::ffff:'.length) : address;
}

/**
 * Reject any caller whose socket address is not listed. The socket address is
 * used, never X-Forwarded-For.
 */
export function ipAllowlist(allowed: readonly string[]): RequestHandler {
  const permitted = new Set(allowed.map(normalizeAddress));

  return (req: Request, res: Response, next: NextFunction) => {
    const remote = req.socket.remoteAddress;
    const address = remote ? normalizeAddress(remote) : null;

    if (address && permitted.has(address)) {
      next();
      return;
    }

    log.warn('Rejected request from address outside the allowlist', {
      address,
      method: req.method,
      path: req.path,
    });
    res.status(403).json({ error: 'Forbidden' });
  };
}
