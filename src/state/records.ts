import { z } from 'zod';
import {
  RISK_MODES,
  COMMAND_PRIORITIES,
  DISABLE_SOURCES,
  PANIC_STATES,
  PANIC_PHASES,
  type RiskMode,
  type CommandPriority,
  type DisableSource,
} from '../config/constants.js';

/**
 * Translates a value to and from its on-disk JSON object.
 * `decode` throws on a record that does not match.
 */
export interface RecordCodec<T> {
  encode(value: T): Record<string, unknown>;
  decode(raw: unknown): T;
}

// ============================================
// Risk command
// ============================================

export interface RiskCommand {
  mode: RiskMode;
  utilization: number;
  allowNewEntries: boolean;
  cancelAllOrders: boolean;
  closePositions: boolean;
  closeFraction: number;
  targetUtilization: number | null;
  priority: CommandPriority;
  message: string;
  timestamp: string;
}

// Unknown fields are stripped, so newer writers stay readable
export const RiskCommandWireSchema = z.object({
  mode: z.nativeEnum(RISK_MODES),
  utilization: z.number(),
  allow_new_entries: z.boolean(),
  cancel_all_orders: z.boolean(),
  close_positions: z.boolean(),
  close_fraction: z.number(),
  target_utilization: z.number().nullable(),
  priority: z.nativeEnum(COMMAND_PRIORITIES),
  message: z.string(),
  timestamp: z.string(),
});

export const riskCommandCodec: RecordCodec<RiskCommand> = {
  encode: (command) => ({
    mode: command.mode,
    utilization: command.utilization,
    allow_new_entries: command.allowNewEntries,
    cancel_all_orders: command.cancelAllOrders,
    close_positions: command.closePositions,
    close_fraction: command.closeFraction,
    target_utilization: command.targetUtilization,
    priority: command.priority,
    message: command.message,
    timestamp: command.timestamp,
  }),
  decode: (raw) => {
    const wire = RiskCommandWireSchema.parse(raw);
    return {
      mode: wire.mode,
      utilization: wire.utilization,
      allowNewEntries: wire.allow_new_entries,
      cancelAllOrders: wire.cancel_all_orders,
      closePositions: wire.close_positions,
      closeFraction: wire.close_fraction,
      targetUtilization: wire.target_utilization,
      priority: wire.priority,
      message: wire.message,
      timestamp: wire.timestamp,
    };
  },
};

// ============================================
// Panic lock & trading-disabled flag
// ============================================

export interface PanicLock {
  armed: boolean;
  armedAt: string | null;
  reason: string | null;
}

export const UNARMED_LOCK: PanicLock = { armed: false, armedAt: null, reason: null };

const PanicLockWireSchema = z.object({
  armed: z.boolean(),
  armed_at: z.string().nullable(),
  reason: z.string().nullable(),
});

export const panicLockCodec: RecordCodec<PanicLock> = {
  encode: (lock) => ({ armed: lock.armed, armed_at: lock.armedAt, reason: lock.reason }),
  decode: (raw) => {
    const wire = PanicLockWireSchema.parse(raw);
    return { armed: wire.armed, armedAt: wire.armed_at, reason: wire.reason };
  },
};

export interface TradingDisabledFlag {
  disabled: boolean;
  source: DisableSource | null;
  reason: string | null;
  updatedAt: string | null;
}

export const TRADING_ENABLED: TradingDisabledFlag = { disabled: false, source: null, reason: null, updatedAt: null };

const TradingDisabledWireSchema = z.object({
  disabled: z.boolean(),
  source: z.nativeEnum(DISABLE_SOURCES).nullable(),
  reason: z.string().nullable(),
  updated_at: z.string().nullable(),
});

export const tradingDisabledCodec: RecordCodec<TradingDisabledFlag> = {
  encode: (flag) => ({ disabled: flag.disabled, source: flag.source, reason: flag.reason, updated_at: flag.updatedAt }),
  decode: (raw) => {
    const wire = TradingDisabledWireSchema.parse(raw);
    return { disabled: wire.disabled, source: wire.source, reason: wire.reason, updatedAt: wire.updated_at };
  },
};

// ============================================
// Panic execution report
// ============================================

export const PhaseTimingSchema = z.object({
  phase: z.nativeEnum(PANIC_PHASES),
  durationMs: z.number(),
  success: z.boolean(),
});

export type PhaseTiming = z.infer<typeof PhaseTimingSchema>;

export const PanicExecutionReportSchema = z.object({
  runId: z.string(),
  reason: z.string(),
  startedAt: z.string(),
  /** null while the run is in flight */
  endedAt: z.string().nullable(),
  success: z.boolean(),
  ordersCanceled: z.number().int(),
  positionsClosed: z.number().int(),
  symbolsTouched: z.array(z.string()),
  phaseTimings: z.array(PhaseTimingSchema),
  warnings: z.array(z.string()),
  locked: z.boolean(),
  finalState: z.enum([PANIC_STATES.LOCKED, PANIC_STATES.FAILED_PARTIAL]).nullable(),
  remainingPositions: z.array(z.string()),
  remainingOrders: z.array(z.string()),
  durationMs: z.number(),
});

export type PanicExecutionReport = z.infer<typeof PanicExecutionReportSchema>;

export const panicReportCodec: RecordCodec<PanicExecutionReport> = {
  encode: (report) => ({ ...report }),
  decode: (raw) => PanicExecutionReportSchema.parse(raw),
};

// ============================================
// Daily realized PnL
// ============================================

export const DailyPnlSchema = z.object({
  /** UTC day, YYYY-MM-DD */
  day: z.string(),
  realizedPnl: z.number(),
  trades: z.number().int(),
  wins: z.number().int(),
  losses: z.number().int(),
  lossStreak: z.number().int(),
  trippedAt: z.string().nullable(),
  tripReason: z.string().nullable(),
});

export type DailyPnl = z.infer<typeof DailyPnlSchema>;

export const dailyPnlCodec: RecordCodec<DailyPnl> = {
  encode: (record) => ({ ...record }),
  decode: (raw) => DailyPnlSchema.parse(raw),
};
