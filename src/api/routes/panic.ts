import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { PANIC_STATES } from '../../config/constants.js';
import type { PanicOrchestrator } from '../../panic/PanicOrchestrator.js';
import { isTerminal } from '../../panic/transitions.js';
import { ResetNotPermittedError, ResetPreconditionFailedError } from '../../utils/errors.js';
import { logger, errorMessage } from '../../utils/logger.js';

const log = logger('PanicAPI');

const TriggerBodySchema = z.object({
  reason: z.string().trim().min(1).max(200).optional(),
});

export function createPanicRouter(orchestrator: PanicOrchestrator): Router {
  const router = Router();

  /**
   * POST /panic
   * Start the emergency stop, or join the run in flight
   * Body: { reason?: string }
   * Query params:
   * - wait: 'false' to respond 202 as soon as the run is claimed
   */
  router.post('/', async (req: Request, res: Response) => {
    const body = TriggerBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({
        error: 'Invalid request body',
        issues: body.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return;
    }

    const reason = body.data.reason ?? 'manual trigger via control API';
    const wait = req.query['wait'] !== 'false';

    try {
      const handle = orchestrator.begin(reason);

      if (!handle.accepted && isTerminal(orchestrator.getState())) {
        res.status(409).json({
          error: 'Panic lock is armed; reset required before another run',
          state: orchestrator.getState(),
          report: await handle.completion,
        });
        return;
      }

      if (!wait) {
        res.status(202).json({ accepted: handle.accepted, status: await orchestrator.getStatus() });
        return;
      }

      const report = await handle.completion;
      if (!report) {
        res.status(500).json({ error: 'Panic run produced no report', state: orchestrator.getState() });
        return;
      }

      const statusCode = report.finalState === PANIC_STATES.LOCKED ? 200 : 500;
      res.status(statusCode).json({ accepted: handle.accepted, report });
    } catch (error) {
      log.error('Panic trigger failed', { error: errorMessage(error) });
      res.status(500).json({ error: 'Panic trigger failed', message: errorMessage(error) });
    }
  });

  /**
   * POST /panic/reset
   * Clear the lock once the account is verified flat
   */
  router.post('/reset', async (_req: Request, res: Response) => {
    try {
      const result = await orchestrator.reset();
      res.json(result);
    } catch (error) {
      if (error instanceof ResetNotPermittedError) {
        res.status(409).json({ error: error.message, code: error.code, state: orchestrator.getState() });
        return;
      }
      if (error instanceof ResetPreconditionFailedError) {
        res.status(412).json({
          error: error.message,
          code: error.code,
          positionsRemaining: error.positionsRemaining,
          ordersRemaining: error.ordersRemaining,
        });
        return;
      }
      log.error('Panic reset failed', { error: errorMessage(error) });
      res.status(500).json({ error: 'Panic reset failed', message: errorMessage(error) });
    }
  });

  /**
   * GET /panic/status
   */
  router.get('/status', async (_req: Request, res: Response) => {
    try {
      res.json(await orchestrator.getStatus());
    } catch (error) {
      log.error('Failed to read panic status', { error: errorMessage(error) });
      res.status(500).json({
        error: 'Failed to read panic status',
        state: orchestrator.getState(),
        message: errorMessage(error),
      });
    }
  });

  return router;
}
