import { EventEmitter } from 'events';
import { DISABLE_SOURCES } from '../config/constants.js';
import type { RiskConfig } from '../config/schema.js';
import type { DurableRecordStore } from '../state/RecordStore.js';
import type { LockStore } from '../state/LockStore.js';
import type { DailyPnl } from '../state/records.js';
import type { DailyTripSource } from '../panic/types.js';
import { logger, type Logger } from '../utils/logger.js';
import { roundTo } from '../utils/math.js';
import { utcDayKey } from '../utils/time.js';
import { dailyRealizedPnl } from '../utils/metrics.js';

export type DailyLossBreakerOptions = Pick<RiskConfig, 'maxDailyLossUsd' | 'dailyProfitTargetPct' | 'referenceEquityUsd'>;

export interface DailyStats extends DailyPnl {
  /** Profit target in USD, when one is configured */
  targetUsd: number | null;
  stopped: boolean;
}

function emptyDay(day: string): DailyPnl {
  return { day, realizedPnl: 0, trades: 0, wins: 0, losses: 0, lossStreak: 0, trippedAt: null, tripReason: null };
}

/**
 * Daily-loss circuit breaker
 * Tracks realized PnL per UTC day and disables trading (without arming the
 * panic lock) once the loss limit or the optional profit target is hit.
 *
 * Events: `tripped` (DailyStats)
 */
export class DailyLossBreaker extends EventEmitter implements DailyTripSource {
  private log: Logger;
  private store: DurableRecordStore<DailyPnl>;
  private locks: LockStore;
  private options: DailyLossBreakerOptions;
  private now: () => number;

  constructor(
    store: DurableRecordStore<DailyPnl>,
    locks: LockStore,
    options: DailyLossBreakerOptions,
    now: () => number = Date.now
  ) {
    super();
    this.log = logger('DailyLossBreaker');
    this.store = store;
    this.locks = locks;
    this.options = options;
    this.now = now;
  }

  /**
   * Record one closed trade's realized PnL (positive profit, negative loss)
   */
  async recordRealizedPnl(deltaUsd: number): Promise<DailyStats> {
    if (!Number.isFinite(deltaUsd)) {
      throw new Error(`Realized PnL must be a finite number, got ${deltaUsd}`);
    }

    const today = await this.loadToday();
    const updated: DailyPnl = {
      ...today,
      realizedPnl: roundTo(today.realizedPnl + deltaUsd, 6),
      trades: today.trades + 1,
      wins: deltaUsd > 0 ? today.wins + 1 : today.wins,
      losses: deltaUsd < 0 ? today.losses + 1 : today.losses,
      lossStreak: deltaUsd < 0 ? today.lossStreak + 1 : 0,
    };

    this.log.info(`Trade #${updated.trades}: ${deltaUsd.toFixed(2)} USD`, {
      realizedPnl: updated.realizedPnl,
      lossStreak: updated.lossStreak,
    });

    const tripReason = updated.trippedAt ? null : this.tripReason(updated.realizedPnl);
    if (tripReason) {
      updated.trippedAt = new Date(this.now()).toISOString();
      updated.tripReason = tripReason;
    }

    await this.store.write(updated);
    dailyRealizedPnl.set(updated.realizedPnl);

    const stats = this.toStats(updated);
    if (tripReason) {
      await this.locks.setTradingDisabled(DISABLE_SOURCES.DAILY_LOSS, tripReason);
      this.log.warn('Daily breaker tripped, trading disabled for the rest of the UTC day', { reason: tripReason });
      this.emit('tripped', stats);
    }
    return stats;
  }

  async getDailyStats(): Promise<DailyStats> {
    return this.toStats(await this.loadToday());
  }

  /**
   * Reason today's trip still holds, or null when trading is not stopped for the day
   */
  async activeTrip(): Promise<string | null> {
    const record = await this.store.read();
    if (!record || record.value.day !== utcDayKey(this.now()) || !record.value.trippedAt) {
      return null;
    }
    return record.value.tripReason ?? 'Daily breaker tripped';
  }

  private targetUsd(): number | null {
    const pct = this.options.dailyProfitTargetPct;
    return pct === undefined ? null : (this.options.referenceEquityUsd * pct) / 100;
  }

  private tripReason(realizedPnl: number): string | null {
    if (realizedPnl < -this.options.maxDailyLossUsd) {
      return `Daily loss limit exceeded: ${realizedPnl.toFixed(2)} < -${this.options.maxDailyLossUsd}`;
    }
    const target = this.targetUsd();
    if (target !== null && realizedPnl >= target) {
      return `Daily profit target reached: ${realizedPnl.toFixed(2)} >= ${target.toFixed(2)}`;
    }
    return null;
  }

  private toStats(day: DailyPnl): DailyStats {
    return { ...day, targetUsd: this.targetUsd(), stopped: day.trippedAt !== null };
  }

  /**
   * Today's record; a new UTC day starts clean and lifts a breaker trip from the day before
   */
  private async loadToday(): Promise<DailyPnl> {
    const day = utcDayKey(this.now());
    const record = await this.store.read();
    if (record && record.value.day === day) {
      return record.value;
    }

    if (record?.value.trippedAt) {
      const flag = await this.locks.readTradingDisabled();
      const lock = await this.locks.readLock();
      if (flag.disabled && flag.source === DISABLE_SOURCES.DAILY_LOSS && !lock.armed) {
        await this.locks.clearTradingDisabled();
        this.log.info('New trading day, daily breaker lifted', { previousDay: record.value.day, day });
      }
    }

    this.log.info('New trading day started', { day });
    return emptyDay(day);
  }
}
