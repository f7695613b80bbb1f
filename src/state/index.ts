import * as path from 'path';
import { STATE_FILES } from '../config/constants.js';
import { FileRecordStore, MemoryRecordStore } from './RecordStore.js';
import { CommandStore } from './CommandStore.js';
import { LockStore } from './LockStore.js';
import { ReportStore } from './ReportStore.js';
import {
  riskCommandCodec,
  panicLockCodec,
  tradingDisabledCodec,
  panicReportCodec,
  dailyPnlCodec,
  type DailyPnl,
} from './records.js';
import type { DurableRecordStore } from './RecordStore.js';

export interface StateStores {
  commands: CommandStore;
  locks: LockStore;
  reports: ReportStore;
  dailyPnl: DurableRecordStore<DailyPnl>;
}

/**
 * Stores backed by JSON files in one state directory
 */
export function createFileStores(directory: string): StateStores {
  const file = (name: string): string => path.join(directory, name);
  return {
    commands: new CommandStore(new FileRecordStore(file(STATE_FILES.RISK_COMMAND), riskCommandCodec)),
    locks: new LockStore(
      new FileRecordStore(file(STATE_FILES.PANIC_LOCK), panicLockCodec),
      new FileRecordStore(file(STATE_FILES.TRADING_DISABLED), tradingDisabledCodec)
    ),
    reports: new ReportStore(new FileRecordStore(file(STATE_FILES.PANIC_REPORT), panicReportCodec)),
    dailyPnl: new FileRecordStore(file(STATE_FILES.DAILY_PNL), dailyPnlCodec),
  };
}

/**
 * Process-local stores (paper mode and tests)
 */
export function createMemoryStores(): StateStores {
  return {
    commands: new CommandStore(new MemoryRecordStore(STATE_FILES.RISK_COMMAND, riskCommandCodec)),
    locks: new LockStore(
      new MemoryRecordStore(STATE_FILES.PANIC_LOCK, panicLockCodec),
      new MemoryRecordStore(STATE_FILES.TRADING_DISABLED, tradingDisabledCodec)
    ),
    reports: new ReportStore(new MemoryRecordStore(STATE_FILES.PANIC_REPORT, panicReportCodec)),
    dailyPnl: new MemoryRecordStore(STATE_FILES.DAILY_PNL, dailyPnlCodec),
  };
}

export * from './records.js';
export * from './RecordStore.js';
export { CommandStore, type LatestCommand } from './CommandStore.js';
export { LockStore } from './LockStore.js';
export { ReportStore } from './ReportStore.js';
