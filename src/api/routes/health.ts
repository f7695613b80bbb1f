import { Router, type Request, type Response } from 'express';
import type { IExchangeGateway } from '../../clients/shared/interfaces.js';
import type { LockStore } from '../../state/LockStore.js';
import type { PanicOrchestrator } from '../../panic/PanicOrchestrator.js';
import type { RiskMonitor } from '../../risk/RiskMonitor.js';
import { withTimeout } from '../../utils/retry.js';
import { errorMessage } from '../../utils/logger.js';

export interface HealthCheckDependencies {
  gateway: IExchangeGateway;
  locks: LockStore;
  orchestrator: PanicOrchestrator;
  riskMonitor?: RiskMonitor | null;
  pingTimeoutMs?: number;
}

export function createHealthRouter(deps: HealthCheckDependencies): Router {
  const router = Router();
  const pingTimeoutMs = deps.pingTimeoutMs ?? 5000;

  /**
   * GET /healthz
   * Liveness plus component status
   */
  router.get('/', async (_req: Request, res: Response) => {
    const health: {
      status: 'healthy' | 'degraded' | 'unhealthy';
      timestamp: string;
      components: Record<string, unknown>;
    } = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      components: {},
    };

    // Check exchange reachability
    try {
      const latencyMs = await withTimeout(deps.gateway.ping(), pingTimeoutMs, 'ping');
      health.components['exchange'] = { status: 'reachable', id: deps.gateway.exchange, latencyMs };
    } catch (error) {
      health.components['exchange'] = { status: 'unreachable', id: deps.gateway.exchange, error: errorMessage(error) };
      health.status = 'degraded';
    }

    // Check panic lock
    try {
      const lock = await deps.locks.readLock();
      health.components['panic'] = {
        status: lock.armed ? 'locked' : 'unlocked',
        state: deps.orchestrator.getState(),
        armedAt: lock.armedAt,
        reason: lock.reason,
      };
      if (lock.armed && health.status === 'healthy') {
        health.status = 'degraded';
      }
    } catch (error) {
      health.components['panic'] = { status: 'unreadable', state: deps.orchestrator.getState(), error: errorMessage(error) };
      health.status = 'unhealthy';
    }

    // Check risk monitor
    if (deps.riskMonitor) {
      const monitor = deps.riskMonitor.getStatus();
      health.components['riskMonitor'] = {
        status: monitor.running ? 'running' : 'stopped',
        mode: monitor.lastCommand?.mode ?? null,
        utilization: monitor.lastUtilization,
        consecutiveFailures: monitor.consecutiveFailures,
      };
    }

    const statusCode = health.status === 'unhealthy' ? 503 : 200;
    res.status(statusCode).json(health);
  });

  return router;
}
