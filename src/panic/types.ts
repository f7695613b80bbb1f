import type { PanicState } from '../config/constants.js';
import type { PanicConfig } from '../config/schema.js';
import type { IExchangeGateway } from '../clients/shared/interfaces.js';
import type { LockStore } from '../state/LockStore.js';
import type { ReportStore } from '../state/ReportStore.js';
import type { PanicExecutionReport, PanicLock, TradingDisabledFlag } from '../state/records.js';
import type { AlertSink } from '../alerts/types.js';

export interface PanicOrchestratorDeps {
  gateway: IExchangeGateway;
  locks: LockStore;
  reports: ReportStore;
  alerts: AlertSink;
  /** Same-day trading stop that a reset must leave in force */
  dailyTrips?: DailyTripSource;
}

export interface DailyTripSource {
  /** Trip reason when trading is stopped for the rest of today, else null */
  activeTrip(): Promise<string | null>;
}

export interface PanicOrchestratorOptions extends PanicConfig {
  botName: string;
}

/**
 * Result of a trigger. `accepted` is false when a run was already in flight
 * or the lock was already armed; `report` is then that run's report.
 */
export interface TriggerResult {
  accepted: boolean;
  report: PanicExecutionReport | null;
}

/**
 * Synchronous half of a trigger, for callers that do not wait for the run
 */
export interface TriggerHandle {
  accepted: boolean;
  completion: Promise<PanicExecutionReport | null>;
}

export interface PanicStatus {
  state: PanicState;
  running: boolean;
  lock: PanicLock;
  tradingDisabled: TradingDisabledFlag;
  lastReport: PanicExecutionReport | null;
}

export interface ResetResult {
  state: PanicState;
  resetAt: string;
  /** False when a daily breaker trip keeps trading disabled after the lock is cleared */
  tradingEnabled: boolean;
}

export interface StateChange {
  from: PanicState;
  to: PanicState;
}
