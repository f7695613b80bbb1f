import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigSchema, type Config } from './schema.js';

// Load environment variables
dotenv.config();

/**
 * Parse boolean from environment variable
 */
function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return value.toLowerCase() === 'true' || value === '1' || value.toLowerCase() === 'yes';
}

/**
 * Parse number from environment variable
 */
function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = Number(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse an optional number; undefined when unset or not numeric
 */
function parseOptionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Parse a comma separated list, e.g. "BTCUSDT, ETHUSDT"
 */
function parseList(value: string | undefined, defaultValue: string[]): string[] {
  if (value === undefined || value.trim() === '') return defaultValue;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Build configuration object from environment variables
 */
function buildConfigFromEnv(): unknown {
  const env = process.env;

  return {
    env: env['NODE_ENV'] || 'development',
    logLevel: env['LOG_LEVEL'] || 'info',

    exchange: {
      id: env['EXCHANGE'] || 'paper',
      apiKey: env['BYBIT_API_KEY'] || undefined,
      apiSecret: env['BYBIT_API_SECRET'] || undefined,
      testnet: parseBoolean(env['BYBIT_TESTNET'], true),
      host: env['BYBIT_HOST'] || undefined,
      recvWindowMs: parseNumber(env['BYBIT_RECV_WINDOW_MS'], 5000),
      settleCoin: env['SETTLE_COIN'] || 'USDT',
      requestTimeoutMs: parseNumber(env['EXCHANGE_REQUEST_TIMEOUT_MS'], 8000),
      requestRetryAttempts: parseNumber(env['EXCHANGE_REQUEST_RETRY_ATTEMPTS'], 2),
      paperEquity: parseNumber(env['PAPER_EQUITY_USD'], 1000),
    },

    state: {
      directory: env['STATE_DIR'] || './state',
    },

    risk: {
      thresholds: {
        alert: parseNumber(env['RISK_ALERT_AT'], 0.6),
        derisk: parseNumber(env['RISK_DERISK_AT'], 0.7),
        emergency: parseNumber(env['RISK_EMERGENCY_AT'], 0.8),
        halt: parseNumber(env['RISK_HALT_AT'], 0.9),
      },
      targetAfterDerisk: parseNumber(env['RISK_TARGET_AFTER_DERISK'], 0.6),
      targetAfterEmergency: parseNumber(env['RISK_TARGET_AFTER_EMERGENCY'], 0.58),
      pollIntervalMs: parseNumber(env['RISK_POLL_INTERVAL_MS'], 60000),
      requestTimeoutMs: parseNumber(env['RISK_REQUEST_TIMEOUT_MS'], 10000),
      failsafeAfterFailures: parseNumber(env['RISK_FAILSAFE_AFTER_FAILURES'], 3),
      backoffInitialMs: parseNumber(env['RISK_BACKOFF_INITIAL_MS'], 5000),
      backoffMaxMs: parseNumber(env['RISK_BACKOFF_MAX_MS'], 300000),
      backoffMultiplier: parseNumber(env['RISK_BACKOFF_MULTIPLIER'], 2),
      maxCommandAgeMs: parseNumber(env['MAX_COMMAND_AGE_MS'], 180000),
      maxDailyLossUsd: parseNumber(env['MAX_DAILY_LOSS_USD'], 50),
      dailyProfitTargetPct: parseOptionalNumber(env['DAILY_PROFIT_TARGET_PCT']),
      referenceEquityUsd: parseNumber(env['REFERENCE_EQUITY_USD'], 1000),
    },

    panic: {
      verifyPollMs: parseNumber(env['PANIC_VERIFY_POLL_MS'], 200),
      verifyTimeoutMs: parseNumber(env['PANIC_VERIFY_TIMEOUT_MS'], 120000),
      retryAttempts: parseNumber(env['PANIC_RETRY_ATTEMPTS'], 3),
      retryInitialDelayMs: parseNumber(env['PANIC_RETRY_INITIAL_DELAY_MS'], 250),
      retryMaxDelayMs: parseNumber(env['PANIC_RETRY_MAX_DELAY_MS'], 4000),
      concurrency: parseNumber(env['PANIC_CONCURRENCY'], 4),
    },

    http: {
      host: env['HTTP_HOST'] || '127.0.0.1',
      port: parseNumber(env['HTTP_PORT'], 8787),
      allowlist: parseList(env['HTTP_ALLOWLIST'], ['127.0.0.1', '::1']),
    },

    alerts: {
      telegramBotToken: env['TELEGRAM_BOT_TOKEN'] || undefined,
      telegramChatId: env['TELEGRAM_CHAT_ID'] || undefined,
      botName: env['BOT_NAME'] || 'margin-sentinel',
    },

    features: {
      enableRiskMonitor: parseBoolean(env['ENABLE_RISK_MONITOR'], true),
      enableControlServer: parseBoolean(env['ENABLE_CONTROL_SERVER'], true),
      enableMetrics: parseBoolean(env['ENABLE_METRICS'], true),
    },
  };
}

/**
 * Validate and load configuration
 */
function loadConfig(): Config {
  const rawConfig = buildConfigFromEnv();

  try {
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
      throw new Error(`Configuration validation failed:\n${issues}`);
    }
    throw error;
  }
}

// Singleton config instance
let configInstance: Config | null = null;

/**
 * Get the configuration instance (lazy loaded)
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reload configuration from environment (useful for testing)
 */
export function reloadConfig(): Config {
  configInstance = loadConfig();
  return configInstance;
}

/**
 * Check whether real exchange credentials are in use
 */
export function isLiveExchange(): boolean {
  return getConfig().exchange.id === 'bybit';
}

/**
 * Check if a feature is enabled
 */
export function isFeatureEnabled(feature: keyof Config['features']): boolean {
  return getConfig().features[feature];
}

// Re-export types and constants
export * from './schema.js';
export * from './constants.js';
