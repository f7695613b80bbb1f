import type { DurableRecordStore } from './RecordStore.js';
import {
  UNARMED_LOCK,
  TRADING_ENABLED,
  type PanicLock,
  type TradingDisabledFlag,
} from './records.js';
import type { DisableSource } from '../config/constants.js';
import { logger, type Logger } from '../utils/logger.js';
import { tradingDisabled } from '../utils/metrics.js';

/**
 * Panic lock and the independent trading-disabled flag.
 * An armed lock always comes with the flag set; the flag may be set alone.
 */
export class LockStore {
  private lock: DurableRecordStore<PanicLock>;
  private flag: DurableRecordStore<TradingDisabledFlag>;
  private log: Logger;

  constructor(lock: DurableRecordStore<PanicLock>, flag: DurableRecordStore<TradingDisabledFlag>) {
    this.lock = lock;
    this.flag = flag;
    this.log = logger('LockStore');
  }

  async readLock(): Promise<PanicLock> {
    const record = await this.lock.read();
    return record?.value ?? UNARMED_LOCK;
  }

  async readTradingDisabled(): Promise<TradingDisabledFlag> {
    const record = await this.flag.read();
    return record?.value ?? TRADING_ENABLED;
  }

  async armLock(reason: string): Promise<PanicLock> {
    const lock: PanicLock = { armed: true, armedAt: new Date().toISOString(), reason };
    await this.lock.write(lock);
    this.log.warn('Panic lock armed', { reason });
    return lock;
  }

  async clearLock(): Promise<void> {
    await this.lock.write(UNARMED_LOCK);
    this.log.info('Panic lock cleared');
  }

  async setTradingDisabled(source: DisableSource, reason: string): Promise<TradingDisabledFlag> {
    const flag: TradingDisabledFlag = { disabled: true, source, reason, updatedAt: new Date().toISOString() };
    await this.flag.write(flag);
    tradingDisabled.set(1);
    this.log.warn('Trading disabled', { source, reason });
    return flag;
  }

  async clearTradingDisabled(): Promise<void> {
    await this.flag.write({ ...TRADING_ENABLED, updatedAt: new Date().toISOString() });
    tradingDisabled.set(0);
    this.log.info('Trading re-enabled');
  }
}
