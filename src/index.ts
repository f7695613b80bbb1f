import type { Server } from 'http';
import { getConfig, isLiveExchange } from './config/index.js';
import type { Config } from './config/schema.js';
import { logger, errorMessage } from './utils/logger.js';
import type { IExchangeGateway } from './clients/shared/interfaces.js';
import { BybitGateway } from './clients/bybit/BybitGateway.js';
import { PaperExchange } from './clients/paper/PaperExchange.js';
import { createFileStores } from './state/index.js';
import { createAlertSink, riskModeChangedAlert, dailyBreakerAlert, type Alert, type AlertSink } from './alerts/index.js';
import { PanicOrchestrator } from './panic/index.js';
import { RiskMonitor, TradingGate, DailyLossBreaker, type ModeChange, type DailyStats } from './risk/index.js';
import { createControlApp, startControlServer, stopControlServer } from './api/server.js';

const log = logger('Main');

function createGateway(config: Config): IExchangeGateway {
  if (config.exchange.id === 'bybit') {
    return new BybitGateway(config.exchange);
  }
  return new PaperExchange({ equity: config.exchange.paperEquity });
}

function notify(alerts: AlertSink, alert: Alert): void {
  void alerts.send(alert).catch((error: unknown) => {
    log.error('Alert delivery failed', { kind: alert.kind, error: errorMessage(error) });
  });
}

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  log.info('Starting margin-sentinel');

  // Load and validate configuration
  const config = getConfig();
  log.info('Configuration loaded', {
    env: config.env,
    exchange: config.exchange.id,
    testnet: config.exchange.testnet,
    stateDir: config.state.directory,
    features: config.features,
  });

  const gateway = createGateway(config);
  const stores = createFileStores(config.state.directory);
  const alerts = createAlertSink(config.alerts);
  log.info('Alert sink ready', { sink: alerts.name });

  const breaker = new DailyLossBreaker(stores.dailyPnl, stores.locks, config.risk);
  breaker.on('tripped', (stats: DailyStats) => {
    notify(alerts, dailyBreakerAlert(config.alerts.botName, stats.tripReason ?? 'daily limit reached'));
  });

  // Panic orchestrator first: a lock left by a previous process must be in force before anything else runs
  const orchestrator = new PanicOrchestrator(
    { gateway, locks: stores.locks, reports: stores.reports, alerts, dailyTrips: breaker },
    { ...config.panic, botName: config.alerts.botName }
  );
  await orchestrator.initialize();
  log.info('Panic orchestrator initialized', { state: orchestrator.getState() });

  const gate = new TradingGate(stores.commands, stores.locks, config.risk.maxCommandAgeMs);

  let riskMonitor: RiskMonitor | null = null;
  if (config.features.enableRiskMonitor) {
    riskMonitor = new RiskMonitor(gateway, stores.commands, config.risk);
    riskMonitor.on('modeChange', (change: ModeChange) => {
      notify(alerts, riskModeChangedAlert(config.alerts.botName, change.from, change.command));
    });
    await riskMonitor.initialize();
    riskMonitor.start();
  } else {
    log.warn('Risk monitor disabled; consumers will see the command go stale');
  }

  let server: Server | null = null;
  if (config.features.enableControlServer) {
    const app = createControlApp({
      gateway,
      stores,
      orchestrator,
      gate,
      breaker,
      riskMonitor,
      allowlist: config.http.allowlist,
      enableMetrics: config.features.enableMetrics,
    });
    server = await startControlServer(app, config.http.host, config.http.port);
  }

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`Received ${signal}, shutting down...`);

    try {
      if (riskMonitor) {
        await riskMonitor.stop();
      }
      if (server) {
        await stopControlServer(server);
      }
      log.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      log.error('Error during shutdown', { error: errorMessage(error) });
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  log.info('margin-sentinel started', { panicState: orchestrator.getState() });
  if (isLiveExchange()) {
    log.warn(`LIVE exchange (${config.exchange.testnet ? 'testnet' : 'MAINNET'}): panic closes real positions`);
  }

  log.info('Control endpoints available:', {
    panic: 'POST /panic',
    reset: 'POST /panic/reset',
    status: 'GET /panic/status',
    health: 'GET /healthz',
    riskCommand: 'GET /risk/command',
    daily: 'GET /risk/daily',
    recordPnl: 'POST /risk/daily/pnl',
    metrics: config.features.enableMetrics ? 'GET /metrics' : 'disabled',
  });
}

main().catch((error: unknown) => {
  log.error('Fatal error', { error: errorMessage(error) });
  process.exit(1);
});
