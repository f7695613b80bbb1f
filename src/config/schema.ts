import { z } from 'zod';
import { DEFAULTS } from './constants.js';

// Exchange configuration schema
const ExchangeConfigSchema = z.object({
  id: z.enum(['paper', 'bybit']).default('paper'),
  apiKey: z.string().optional(),
  apiSecret: z.string().optional(),
  testnet: z.boolean().default(true),
  host: z.string().optional(),
  recvWindowMs: z.number().int().positive().default(5000),
  settleCoin: z.string().default('USDT'),
  requestTimeoutMs: z.number().positive().default(8000),
  requestRetryAttempts: z.number().int().min(1).max(5).default(2),
  paperEquity: z.number().positive().default(1000),
});

// State directory and record files
const StateConfigSchema = z.object({
  directory: z.string().default('./state'),
});

// Risk monitor configuration schema
const RiskConfigSchema = z.object({
  thresholds: z
    .object({
      alert: z.number().min(0).max(1).default(DEFAULTS.RISK_THRESHOLDS.alert),
      derisk: z.number().min(0).max(1).default(DEFAULTS.RISK_THRESHOLDS.derisk),
      emergency: z.number().min(0).max(1).default(DEFAULTS.RISK_THRESHOLDS.emergency),
      halt: z.number().min(0).max(1).default(DEFAULTS.RISK_THRESHOLDS.halt),
    })
    .refine((t) => t.alert < t.derisk && t.derisk < t.emergency && t.emergency < t.halt, {
      message: 'Risk thresholds must be strictly ascending (alert < derisk < emergency < halt)',
    }),
  targetAfterDerisk: z.number().min(0).max(1).default(DEFAULTS.RISK_TARGETS.afterDerisk),
  targetAfterEmergency: z.number().min(0).max(1).default(DEFAULTS.RISK_TARGETS.afterEmergency),
  pollIntervalMs: z.number().positive().default(DEFAULTS.RISK_POLL_INTERVAL_MS),
  requestTimeoutMs: z.number().positive().default(DEFAULTS.RISK_REQUEST_TIMEOUT_MS),
  failsafeAfterFailures: z.number().int().min(1).default(DEFAULTS.FAILSAFE_AFTER_FAILURES),
  backoffInitialMs: z.number().positive().default(5000),
  backoffMaxMs: z.number().positive().default(300000),
  backoffMultiplier: z.number().min(1).default(2),
  maxCommandAgeMs: z.number().positive().default(DEFAULTS.MAX_COMMAND_AGE_MS),
  maxDailyLossUsd: z.number().positive().default(50),
  dailyProfitTargetPct: z.number().positive().optional(),
  referenceEquityUsd: z.number().positive().default(1000),
});

// Panic orchestrator configuration schema
const PanicConfigSchema = z.object({
  verifyPollMs: z.number().positive().default(DEFAULTS.PANIC_VERIFY_POLL_MS),
  verifyTimeoutMs: z.number().positive().default(DEFAULTS.PANIC_VERIFY_TIMEOUT_MS),
  retryAttempts: z.number().int().min(1).max(10).default(3),
  retryInitialDelayMs: z.number().positive().default(250),
  retryMaxDelayMs: z.number().positive().default(4000),
  concurrency: z.number().int().min(1).max(32).default(DEFAULTS.PANIC_CONCURRENCY),
});

// Control surface configuration schema
const HttpConfigSchema = z.object({
  host: z.string().default('127.0.0.1'),
  port: z.number().min(1).max(65535).default(DEFAULTS.HTTP_PORT),
  allowlist: z.array(z.string()).default(['127.0.0.1', '::1']),
});

// Alert configuration schema
const AlertsConfigSchema = z.object({
  telegramBotToken: z.string().optional(),
  telegramChatId: z.string().optional(),
  botName: z.string().default('margin-sentinel'),
});

// Feature flags schema
const FeatureFlagsSchema = z.object({
  enableRiskMonitor: z.boolean().default(true),
  enableControlServer: z.boolean().default(true),
  enableMetrics: z.boolean().default(true),
});

// Main configuration schema
export const ConfigSchema = z
  .object({
    env: z.enum(['development', 'staging', 'production', 'test']).default('development'),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

    exchange: ExchangeConfigSchema,
    state: StateConfigSchema,
    risk: RiskConfigSchema,
    panic: PanicConfigSchema,
    http: HttpConfigSchema,
    alerts: AlertsConfigSchema,
    features: FeatureFlagsSchema,
  })
  .refine((config) => config.risk.requestTimeoutMs < config.risk.pollIntervalMs, {
    message: 'risk.requestTimeoutMs must be shorter than risk.pollIntervalMs so polls never overlap',
    path: ['risk', 'requestTimeoutMs'],
  })
  .refine((config) => config.exchange.id !== 'bybit' || (!!config.exchange.apiKey && !!config.exchange.apiSecret), {
    message: 'BYBIT_API_KEY and BYBIT_API_SECRET are required when EXCHANGE=bybit',
    path: ['exchange', 'apiKey'],
  });

// Export types
export type Config = z.infer<typeof ConfigSchema>;
export type ExchangeConfig = z.infer<typeof ExchangeConfigSchema>;
export type StateConfig = z.infer<typeof StateConfigSchema>;
export type RiskConfig = z.infer<typeof RiskConfigSchema>;
export type PanicConfig = z.infer<typeof PanicConfigSchema>;
export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type AlertsConfig = z.infer<typeof AlertsConfigSchema>;
export type FeatureFlags = z.infer<typeof FeatureFlagsSchema>;
