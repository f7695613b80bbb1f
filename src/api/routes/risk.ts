import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { CommandStore } from '../../state/CommandStore.js';
import { riskCommandCodec } from '../../state/records.js';
import type { TradingGate } from '../../risk/TradingGate.js';
import type { DailyLossBreaker } from '../../risk/DailyLossBreaker.js';
import { logger, errorMessage } from '../../utils/logger.js';

const log = logger('RiskAPI');

export interface RiskRouterDependencies {
  commands: CommandStore;
  gate: TradingGate;
  breaker: DailyLossBreaker;
}

const RealizedPnlBodySchema = z.object({
  realizedPnlUsd: z.number().finite(),
});

export function createRiskRouter(deps: RiskRouterDependencies): Router {
  const router = Router();

  /**
   * GET /risk/command
   * Latest command record as consumers read it, and the gate decision on top of it
   */
  router.get('/command', async (_req: Request, res: Response) => {
    try {
      const now = Date.now();
      const [latest, decision] = await Promise.all([deps.commands.readLatest(now), deps.gate.evaluate(now)]);

      res.json({
        command: latest
          ? {
              ...riskCommandCodec.encode(latest.command),
              version: latest.version,
              written_at: latest.writtenAt,
            }
          : null,
        ageMs: latest && Number.isFinite(latest.ageMs) ? latest.ageMs : null,
        gate: {
          allowNewEntries: decision.allowNewEntries,
          reasons: decision.reasons,
          stale: decision.stale,
          panicArmed: decision.panicArmed,
          tradingDisabled: decision.tradingDisabled,
        },
      });
    } catch (error) {
      log.error('Failed to read risk command', { error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to read risk command', message: errorMessage(error) });
    }
  });

  /**
   * GET /risk/daily
   * Today's realized PnL and breaker status
   */
  router.get('/daily', async (_req: Request, res: Response) => {
    try {
      res.json(await deps.breaker.getDailyStats());
    } catch (error) {
      log.error('Failed to read daily stats', { error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to read daily stats', message: errorMessage(error) });
    }
  });

  /**
   * POST /risk/daily/pnl
   * Record one closed trade
   * Body: { realizedPnlUsd: number }
   */
  router.post('/daily/pnl', async (req: Request, res: Response) => {
    const body = RealizedPnlBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({
        error: 'Invalid request body',
        issues: body.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return;
    }

    try {
      res.json(await deps.breaker.recordRealizedPnl(body.data.realizedPnlUsd));
    } catch (error) {
      log.error('Failed to record realized PnL', { error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to record realized PnL', message: errorMessage(error) });
    }
  });

  return router;
}
