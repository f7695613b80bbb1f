// Exchange identifiers
export const EXCHANGES = {
  PAPER: 'paper',
  BYBIT: 'bybit',
} as const;

export type ExchangeId = (typeof EXCHANGES)[keyof typeof EXCHANGES];

// Bybit V5 REST endpoints
export const BYBIT_ENDPOINTS = {
  MAINNET: 'https://api.bybit.com',
  TESTNET: 'https://api-testnet.bybit.com',
} as const;

export const TELEGRAM_API_HOST = 'https://api.telegram.org';

// Order sides
export const ORDER_SIDES = {
  BUY: 'buy',
  SELL: 'sell',
} as const;

export type OrderSide = (typeof ORDER_SIDES)[keyof typeof ORDER_SIDES];

// Position sides
export const POSITION_SIDES = {
  LONG: 'long',
  SHORT: 'short',
} as const;

export type PositionSide = (typeof POSITION_SIDES)[keyof typeof POSITION_SIDES];

// Risk modes, ordered from most permissive to most restrictive
export const RISK_MODES = {
  NORMAL: 'NORMAL',
  ALERT: 'ALERT',
  DERISK: 'DERISK',
  EMERGENCY: 'EMERGENCY',
  HALT: 'HALT',
} as const;

export type RiskMode = (typeof RISK_MODES)[keyof typeof RISK_MODES];

export const RISK_MODE_ORDER: readonly RiskMode[] = [
  RISK_MODES.NORMAL,
  RISK_MODES.ALERT,
  RISK_MODES.DERISK,
  RISK_MODES.EMERGENCY,
  RISK_MODES.HALT,
];

// Command priorities, one per risk mode
export const COMMAND_PRIORITIES = {
  NONE: 'NONE',
  LOW: 'LOW',
  MEDIUM: 'MEDIUM',
  HIGH: 'HIGH',
  IMMEDIATE: 'IMMEDIATE',
} as const;

export type CommandPriority = (typeof COMMAND_PRIORITIES)[keyof typeof COMMAND_PRIORITIES];

// Panic orchestrator states
export const PANIC_STATES = {
  IDLE: 'IDLE',
  DISABLING: 'DISABLING',
  CANCELING: 'CANCELING',
  FLATTENING: 'FLATTENING',
  VERIFYING: 'VERIFYING',
  LOCKED: 'LOCKED',
  FAILED_PARTIAL: 'FAILED_PARTIAL',
} as const;

export type PanicState = (typeof PANIC_STATES)[keyof typeof PANIC_STATES];

// Panic run phases as they appear in the phase trail
export const PANIC_PHASES = {
  DISABLE_TRADING: 'disable_trading',
  CANCEL_ORDERS: 'cancel_orders',
  FLATTEN_POSITIONS: 'flatten_positions',
  VERIFY_FLAT: 'verify_flat',
  ARM_LOCK: 'arm_lock',
  NOTIFY: 'notify',
} as const;

export type PanicPhase = (typeof PANIC_PHASES)[keyof typeof PANIC_PHASES];

// Who disabled trading
export const DISABLE_SOURCES = {
  PANIC: 'panic',
  DAILY_LOSS: 'daily_loss',
  MANUAL: 'manual',
} as const;

export type DisableSource = (typeof DISABLE_SOURCES)[keyof typeof DISABLE_SOURCES];

// Durable record file names inside the state directory
export const STATE_FILES = {
  RISK_COMMAND: 'risk_commands.json',
  PANIC_LOCK: 'panic.lock',
  TRADING_DISABLED: 'trading_disabled.json',
  PANIC_REPORT: 'panic_report.json',
  DAILY_PNL: 'daily_pnl.json',
} as const;

// Defaults
export const DEFAULTS = {
  RISK_THRESHOLDS: {
    alert: 0.6,
    derisk: 0.7,
    emergency: 0.8,
    halt: 0.9,
  },
  RISK_TARGETS: {
    afterDerisk: 0.6,
    afterEmergency: 0.58,
  },
  CLOSE_FRACTIONS: {
    derisk: 0.25,
    emergency: 0.33,
    halt: 1,
  },
  RISK_POLL_INTERVAL_MS: 60000,
  RISK_REQUEST_TIMEOUT_MS: 10000,
  FAILSAFE_AFTER_FAILURES: 3,
  MAX_COMMAND_AGE_MS: 180000,
  PANIC_VERIFY_POLL_MS: 200,
  PANIC_VERIFY_TIMEOUT_MS: 120000,
  PANIC_CONCURRENCY: 4,
  HTTP_PORT: 8787,
} as const;
