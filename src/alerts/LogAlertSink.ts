import type { Alert, AlertSink } from './types.js';
import { logger, type Logger } from '../utils/logger.js';
import { alertsSent } from '../utils/metrics.js';

/**
 * Writes alerts to the log; used when no chat transport is configured
 */
export class LogAlertSink implements AlertSink {
  readonly name = 'log';
  private log: Logger;

  constructor() {
    this.log = logger('Alerts');
  }

  async send(alert: Alert): Promise<void> {
    const level = alert.kind === 'panic_failed' || alert.kind === 'reset_failed' ? 'error' : 'warn';
    this.log[level](alert.text, { kind: alert.kind });
    alertsSent.labels(alert.kind, 'success').inc();
  }
}
