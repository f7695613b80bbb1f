import { describe, it, expect, beforeEach } from 'vitest';
import { DailyLossBreaker, type DailyStats } from '../../src/risk/DailyLossBreaker.js';
import { createMemoryStores, type StateStores } from '../../src/state/index.js';

const DAY_ONE = Date.parse('2026-03-01T10:00:00.000Z');
const ONE_DAY_MS = 24 * 60 * 60 * 1000;

describe('DailyLossBreaker', () => {
  let stores: StateStores;
  let clock: number;
  let breaker: DailyLossBreaker;
  let tripped: DailyStats[];

  beforeEach(() => {
    stores = createMemoryStores();
    clock = DAY_ONE;
    breaker = new DailyLossBreaker(
      stores.dailyPnl,
      stores.locks,
      { maxDailyLossUsd: 50, referenceEquityUsd: 1000 },
      () => clock
    );
    tripped = [];
    breaker.on('tripped', (stats: DailyStats) => tripped.push(stats));
  });

  it('should accumulate trades for the UTC day', async () => {
    await breaker.recordRealizedPnl(-20);
    const stats = await breaker.recordRealizedPnl(5);

    expect(stats.day).toBe('2026-03-01');
    expect(stats.realizedPnl).toBe(-15);
    expect(stats.trades).toBe(2);
    expect(stats.wins).toBe(1);
    expect(stats.losses).toBe(1);
    expect(stats.lossStreak).toBe(0);
    expect(stats.stopped).toBe(false);
    expect(stats.targetUsd).toBeNull();
  });

  it('should count consecutive losses', async () => {
    await breaker.recordRealizedPnl(-1);
    await breaker.recordRealizedPnl(-2);
    const stats = await breaker.recordRealizedPnl(-3);

    expect(stats.lossStreak).toBe(3);
  });

  it('should keep realized PnL free of float noise', async () => {
    await breaker.recordRealizedPnl(0.1);
    const stats = await breaker.recordRealizedPnl(0.2);

    expect(stats.realizedPnl).toBe(0.3);
  });

  it('should not trip at exactly the loss limit', async () => {
    const stats = await breaker.recordRealizedPnl(-50);

    expect(stats.stopped).toBe(false);
    expect((await stores.locks.readTradingDisabled()).disabled).toBe(false);
  });

  it('should disable trading without arming the panic lock once the limit is exceeded', async () => {
    await breaker.recordRealizedPnl(-30);
    const stats = await breaker.recordRealizedPnl(-25);

    expect(stats.stopped).toBe(true);
    expect(stats.tripReason).toBe('Daily loss limit exceeded: -55.00 < -50');

    const flag = await stores.locks.readTradingDisabled();
    expect(flag.disabled).toBe(true);
    expect(flag.source).toBe('daily_loss');
    expect((await stores.locks.readLock()).armed).toBe(false);
    expect(tripped).toHaveLength(1);
  });

  it('should trip only once per day', async () => {
    await breaker.recordRealizedPnl(-60);
    await breaker.recordRealizedPnl(-10);

    expect(tripped).toHaveLength(1);
    expect((await breaker.getDailyStats()).realizedPnl).toBe(-70);
  });

  it('should trip on the daily profit target when configured', async () => {
    breaker = new DailyLossBreaker(
      stores.dailyPnl,
      stores.locks,
      { maxDailyLossUsd: 50, dailyProfitTargetPct: 5, referenceEquityUsd: 1000 },
      () => clock
    );

    const stats = await breaker.recordRealizedPnl(50);

    expect(stats.targetUsd).toBe(50);
    expect(stats.stopped).toBe(true);
    expect(stats.tripReason).toBe('Daily profit target reached: 50.00 >= 50.00');
  });

  it('should start a new UTC day clean and lift its own trip', async () => {
    await breaker.recordRealizedPnl(-60);
    clock = DAY_ONE + ONE_DAY_MS;

    const stats = await breaker.getDailyStats();

    expect(stats.day).toBe('2026-03-02');
    expect(stats.realizedPnl).toBe(0);
    expect(stats.stopped).toBe(false);
    expect((await stores.locks.readTradingDisabled()).disabled).toBe(false);
  });

  it('should leave trading disabled on a new day while the panic lock is armed', async () => {
    await breaker.recordRealizedPnl(-60);
    await stores.locks.armLock('test');
    clock = DAY_ONE + ONE_DAY_MS;

    await breaker.getDailyStats();

    expect((await stores.locks.readTradingDisabled()).disabled).toBe(true);
  });

  it('should reject a non-finite amount', async () => {
    await expect(breaker.recordRealizedPnl(NaN)).rejects.toThrow('Realized PnL must be a finite number, got NaN');
  });
});
