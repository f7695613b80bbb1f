import client, { Counter, Gauge, Histogram, Registry } from 'prom-client';

// Create a custom registry
const registry = new Registry();

// Add default metrics (CPU, memory, etc.)
client.collectDefaultMetrics({ register: registry });

// ============================================
// Risk Monitor Metrics
// ============================================

export const marginUtilization = new Gauge({
  name: 'risk_margin_utilization_ratio',
  help: 'Last observed initial-margin utilization (0..1)',
  registers: [registry],
});

export const riskMode = new Gauge({
  name: 'risk_mode',
  help: 'Current risk mode (1 for the active mode, 0 otherwise)',
  labelNames: ['mode'] as const,
  registers: [registry],
});

export const riskPolls = new Counter({
  name: 'risk_polls_total',
  help: 'Total number of risk monitor polls',
  labelNames: ['result'] as const,
  registers: [registry],
});

export const riskConsecutiveFailures = new Gauge({
  name: 'risk_consecutive_failures',
  help: 'Consecutive failed polls since the last success',
  registers: [registry],
});

export const riskCommandsPublished = new Counter({
  name: 'risk_commands_published_total',
  help: 'Total number of risk commands published',
  labelNames: ['mode', 'failsafe'] as const,
  registers: [registry],
});

export const riskPollLatency = new Histogram({
  name: 'risk_poll_latency_ms',
  help: 'Risk monitor poll latency in milliseconds',
  buckets: [10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000],
  registers: [registry],
});

// ============================================
// Panic Metrics
// ============================================

export const panicState = new Gauge({
  name: 'panic_state',
  help: 'Current panic orchestrator state (1 for the active state, 0 otherwise)',
  labelNames: ['state'] as const,
  registers: [registry],
});

export const panicRuns = new Counter({
  name: 'panic_runs_total',
  help: 'Total number of panic runs by outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const panicDuration = new Histogram({
  name: 'panic_duration_ms',
  help: 'Panic run duration in milliseconds',
  buckets: [100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000, 120000],
  registers: [registry],
});

export const panicOrdersCancelled = new Counter({
  name: 'panic_orders_cancelled_total',
  help: 'Total number of orders cancelled by panic runs',
  registers: [registry],
});

export const panicPositionsClosed = new Counter({
  name: 'panic_positions_closed_total',
  help: 'Total number of reduce-only closes submitted by panic runs',
  registers: [registry],
});

// ============================================
// Gateway Metrics
// ============================================

export const apiRequests = new Counter({
  name: 'api_requests_total',
  help: 'Total number of API requests',
  labelNames: ['exchange', 'endpoint', 'status'] as const,
  registers: [registry],
});

export const apiLatency = new Histogram({
  name: 'api_latency_ms',
  help: 'API request latency in milliseconds',
  labelNames: ['exchange', 'endpoint'] as const,
  buckets: [10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000],
  registers: [registry],
});

export const apiErrors = new Counter({
  name: 'api_errors_total',
  help: 'Total number of API errors',
  labelNames: ['exchange', 'error_type'] as const,
  registers: [registry],
});

export const rateLimitWaits = new Histogram({
  name: 'rate_limit_wait_ms',
  help: 'Time spent waiting for rate limit tokens in milliseconds',
  labelNames: ['limiter'] as const,
  buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000],
  registers: [registry],
});

// ============================================
// Alerts & Daily Loss
// ============================================

export const alertsSent = new Counter({
  name: 'alerts_sent_total',
  help: 'Total number of operator alerts by delivery result',
  labelNames: ['kind', 'result'] as const,
  registers: [registry],
});

export const dailyRealizedPnl = new Gauge({
  name: 'daily_realized_pnl_usd',
  help: 'Realized P&L for the current UTC day in USD',
  registers: [registry],
});

export const tradingDisabled = new Gauge({
  name: 'trading_disabled',
  help: '1 while the trading-disabled flag is set',
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Get all metrics as string for Prometheus scraping
 */
export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

/**
 * Get content type for metrics response
 */
export function getContentType(): string {
  return registry.contentType;
}

/**
 * Reset all metrics (useful for testing)
 */
export function resetMetrics(): void {
  registry.resetMetrics();
}

/**
 * Timer utility for measuring duration
 */
export function startTimer(): () => number {
  const start = process.hrtime.bigint();
  return () => {
    const end = process.hrtime.bigint();
    return Number(end - start) / 1_000_000; // Convert to milliseconds
  };
}

/**
 * Helper to observe API latency
 */
export function observeApiLatency(exchange: string, endpoint: string, durationMs: number): void {
  apiLatency.labels(exchange, endpoint).observe(durationMs);
}

/**
 * Helper to record API request
 */
export function recordApiRequest(exchange: string, endpoint: string, status: 'success' | 'error'): void {
  apiRequests.labels(exchange, endpoint, status).inc();
}

/**
 * Mark the active risk mode; the others read 0
 */
export function updateRiskMode(modes: readonly string[], active: string): void {
  for (const mode of modes) {
    riskMode.labels(mode).set(mode === active ? 1 : 0);
  }
}

export function updatePanicState(states: readonly string[], active: string): void {
  for (const state of states) {
    panicState.labels(state).set(state === active ? 1 : 0);
  }
}
