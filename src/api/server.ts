import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import type { Server } from 'http';
import type { IExchangeGateway } from '../clients/shared/interfaces.js';
import type { StateStores } from '../state/index.js';
import type { PanicOrchestrator } from '../panic/PanicOrchestrator.js';
import type { RiskMonitor } from '../risk/RiskMonitor.js';
import type { TradingGate } from '../risk/TradingGate.js';
import type { DailyLossBreaker } from '../risk/DailyLossBreaker.js';
import { ipAllowlist } from './middleware/allowlist.js';
import { createPanicRouter } from './routes/panic.js';
import { createHealthRouter } from './routes/health.js';
import { createRiskRouter } from './routes/risk.js';
import { getMetrics, getContentType } from '../utils/metrics.js';
import { logger, errorMessage } from '../utils/logger.js';

const log = logger('ControlServer');

export interface ControlServerDependencies {
  gateway: IExchangeGateway;
  stores: StateStores;
  orchestrator: PanicOrchestrator;
  gate: TradingGate;
  breaker: DailyLossBreaker;
  riskMonitor?: RiskMonitor | null;
  allowlist: readonly string[];
  enableMetrics?: boolean;
}

/**
 * Build the control surface
 */
export function createControlApp(deps: ControlServerDependencies): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(ipAllowlist(deps.allowlist));
  app.use(express.json({ limit: '16kb' }));

  if (deps.enableMetrics) {
    app.get('/metrics', async (_req, res) => {
      try {
        const metrics = await getMetrics();
        res.set('Content-Type', getContentType());
        res.send(metrics);
      } catch (error) {
        log.error('Error collecting metrics', { error: errorMessage(error) });
        res.status(500).send('Error collecting metrics');
      }
    });
  }

  app.use('/healthz', createHealthRouter({
    gateway: deps.gateway,
    locks: deps.stores.locks,
    orchestrator: deps.orchestrator,
    riskMonitor: deps.riskMonitor ?? null,
  }));
  app.use('/panic', createPanicRouter(deps.orchestrator));
  app.use('/risk', createRiskRouter({
    commands: deps.stores.commands,
    gate: deps.gate,
    breaker: deps.breaker,
  }));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Malformed JSON bodies and anything a route let escape
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status =
      typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
        ? error.status
        : 500;
    if (status >= 500) {
      log.error('Unhandled control API error', { error: errorMessage(error) });
    }
    res.status(status).json({ error: status >= 500 ? 'Internal error' : 'Bad request', message: errorMessage(error) });
  });

  return app;
}

/**
 * Listen on host:port; port 0 picks a free one
 */
export function startControlServer(app: Express, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => {
      const address = server.address();
      const bound = typeof address === 'object' && address !== null ? address.port : port;
      log.info(`Control API listening on ${host}:${bound}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function stopControlServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
