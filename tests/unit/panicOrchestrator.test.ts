import { describe, it, expect, beforeEach } from 'vitest';
import { PanicOrchestrator } from '../../src/panic/PanicOrchestrator.js';
import type { PanicOrchestratorOptions, StateChange } from '../../src/panic/types.js';
import { createMemoryStores, type StateStores } from '../../src/state/index.js';
import { LockStore } from '../../src/state/LockStore.js';
import { ReportStore } from '../../src/state/ReportStore.js';
import { MemoryRecordStore } from '../../src/state/RecordStore.js';
import {
  panicLockCodec,
  panicReportCodec,
  tradingDisabledCodec,
  type PanicExecutionReport,
  type TradingDisabledFlag,
} from '../../src/state/records.js';
import { PANIC_STATES, STATE_FILES } from '../../src/config/constants.js';
import {
  GatewayRejectedError,
  PrecisionError,
  ResetNotPermittedError,
  ResetPreconditionFailedError,
  StateStoreError,
  TransientGatewayError,
} from '../../src/utils/errors.js';
import { sleep } from '../../src/utils/time.js';
import { assertTransition, canTransition, isRunning, isTerminal } from '../../src/panic/transitions.js';
import { ScriptedExchange } from '../mocks/scriptedExchange.js';
import { RecordingAlertSink } from '../mocks/alerts.js';
import { FlakyRecordStore } from '../mocks/stores.js';
import { DailyLossBreaker } from '../../src/risk/DailyLossBreaker.js';

const OPTIONS: PanicOrchestratorOptions = {
  botName: 'test-bot',
  verifyPollMs: 5,
  verifyTimeoutMs: 100,
  retryAttempts: 3,
  retryInitialDelayMs: 1,
  retryMaxDelayMs: 5,
  concurrency: 4,
};

function seedScenarioAccount(exchange: ScriptedExchange): void {
  exchange.openPosition('BTCUSDT', 'long', 0.01, 60000);
  exchange.openPosition('ETHUSDT', 'short', 0.5, 3000);
  exchange.addOpenOrder({ symbol: 'BTCUSDT', side: 'buy', qty: 0.01, price: 58000 });
  exchange.addOpenOrder({ symbol: 'BTCUSDT', side: 'sell', qty: 0.01, price: 62000, reduceOnly: true });
  exchange.addOpenOrder({ symbol: 'ETHUSDT', side: 'buy', qty: 0.5, price: 2900, reduceOnly: true });
}

function inFlightReport(runId: string): PanicExecutionReport {
  return {
    runId,
    reason: 'manual',
    startedAt: '2026-03-01T10:00:00.000Z',
    endedAt: null,
    success: false,
    ordersCanceled: 2,
    positionsClosed: 0,
    symbolsTouched: ['BTCUSDT'],
    phaseTimings: [{ phase: 'disable_trading', durationMs: 3, success: true }],
    warnings: [],
    locked: false,
    finalState: null,
    remainingPositions: [],
    remainingOrders: [],
    durationMs: 0,
  };
}

describe('PanicOrchestrator', () => {
  let exchange: ScriptedExchange;
  let stores: StateStores;
  let alerts: RecordingAlertSink;
  let orchestrator: PanicOrchestrator;

  beforeEach(() => {
    exchange = new ScriptedExchange();
    stores = createMemoryStores();
    alerts = new RecordingAlertSink();
    orchestrator = new PanicOrchestrator(
      { gateway: exchange, locks: stores.locks, reports: stores.reports, alerts },
      OPTIONS
    );
  });

  describe('successful run', () => {
    it('should cancel, flatten, verify and lock', async () => {
      seedScenarioAccount(exchange);

      const result = await orchestrator.trigger('test');

      expect(result.accepted).toBe(true);
      const report = result.report;
      expect(report?.ordersCanceled).toBe(3);
      expect(report?.positionsClosed).toBe(2);
      expect(report?.symbolsTouched).toEqual(['BTCUSDT', 'ETHUSDT']);
      expect(report?.finalState).toBe(PANIC_STATES.LOCKED);
      expect(report?.success).toBe(true);
      expect(report?.locked).toBe(true);
      expect(report?.warnings).toEqual([]);
      expect(report?.endedAt).not.toBeNull();
      expect(orchestrator.getState()).toBe(PANIC_STATES.LOCKED);

      expect(await exchange.listPositions()).toEqual([]);
      expect(await exchange.listOpenOrders()).toEqual([]);
    });

    it('should close each position on the opposite side with a stable client order id', async () => {
      seedScenarioAccount(exchange);

      const result = await orchestrator.trigger('test');
      const runTag = result.report?.runId.slice(0, 8) ?? '';

      const closes = exchange.callsTo('placeReduceOnlyMarket').map((call) => call.args);
      expect(closes).toHaveLength(2);
      expect(closes).toContainEqual(['BTCUSDT', 'sell', 0.01, `pn-${runTag}-BTCUSDT-1`]);
      expect(closes).toContainEqual(['ETHUSDT', 'buy', 0.5, `pn-${runTag}-ETHUSDT-1`]);
    });

    it('should record every phase in order', async () => {
      seedScenarioAccount(exchange);

      const result = await orchestrator.trigger('test');

      expect(result.report?.phaseTimings.map((timing) => timing.phase)).toEqual([
        'disable_trading',
        'cancel_orders',
        'flatten_positions',
        'verify_flat',
        'arm_lock',
        'notify',
      ]);
      expect(result.report?.phaseTimings.every((timing) => timing.success)).toBe(true);
    });

    it('should walk the state machine and emit each change', async () => {
      const changes: StateChange[] = [];
      orchestrator.on('stateChange', (change: StateChange) => changes.push(change));

      await orchestrator.trigger('test');

      expect(changes.map((change) => change.to)).toEqual([
        PANIC_STATES.DISABLING,
        PANIC_STATES.CANCELING,
        PANIC_STATES.FLATTENING,
        PANIC_STATES.VERIFYING,
        PANIC_STATES.LOCKED,
      ]);
    });

    it('should arm the lock and keep trading disabled', async () => {
      seedScenarioAccount(exchange);

      await orchestrator.trigger('operator request');

      const lock = await stores.locks.readLock();
      const flag = await stores.locks.readTradingDisabled();
      expect(lock.armed).toBe(true);
      expect(lock.reason).toBe('operator request');
      expect(flag.disabled).toBe(true);
      expect(flag.source).toBe('panic');
    });

    it('should send start and completion alerts', async () => {
      await orchestrator.trigger('test');

      expect(alerts.kinds()).toEqual(['panic_started', 'panic_succeeded']);
      expect(alerts.sent[0]?.text).toContain('Reason: test');
    });

    it('should persist the final report', async () => {
      seedScenarioAccount(exchange);

      const result = await orchestrator.trigger('test');
      const stored = await stores.reports.latest();

      expect(stored?.runId).toBe(result.report?.runId);
      expect(stored?.finalState).toBe(PANIC_STATES.LOCKED);
      expect(stored?.endedAt).not.toBeNull();
    });

    it('should lock an account that was already flat', async () => {
      const result = await orchestrator.trigger('test');

      expect(result.report?.ordersCanceled).toBe(0);
      expect(result.report?.positionsClosed).toBe(0);
      expect(result.report?.symbolsTouched).toEqual([]);
      expect(orchestrator.getState()).toBe(PANIC_STATES.LOCKED);
    });
  });

  describe('crash safety', () => {
    it('should persist the trading-disabled flag and an in-flight report before touching the exchange', async () => {
      seedScenarioAccount(exchange);
      exchange.delay('listOpenOrders', 100);

      const handle = orchestrator.begin('test');
      await sleep(20);

      expect(exchange.callsTo('cancelAllOrders')).toHaveLength(0);
      expect((await stores.locks.readTradingDisabled()).disabled).toBe(true);
      const inFlight = await stores.reports.latest();
      expect(inFlight?.endedAt).toBeNull();

      const report = await handle.completion;
      expect(inFlight?.runId).toBe(report?.runId);
    });

    it('should abort without exchange calls when the flag cannot be written', async () => {
      const flag = new FlakyRecordStore<TradingDisabledFlag>(STATE_FILES.TRADING_DISABLED, tradingDisabledCodec);
      flag.failWrites = new StateStoreError('disk full');
      const locks = new LockStore(new MemoryRecordStore(STATE_FILES.PANIC_LOCK, panicLockCodec), flag);
      const reports = new ReportStore(new MemoryRecordStore(STATE_FILES.PANIC_REPORT, panicReportCodec));
      orchestrator = new PanicOrchestrator({ gateway: exchange, locks, reports, alerts }, OPTIONS);
      seedScenarioAccount(exchange);

      const result = await orchestrator.trigger('test');

      expect(exchange.calls).toHaveLength(0);
      expect(result.report?.finalState).toBe(PANIC_STATES.FAILED_PARTIAL);
      expect(result.report?.warnings).toContain('Failed to disable trading: disk full');
      expect(result.report?.locked).toBe(true);
      expect((await locks.readLock()).armed).toBe(true);
      expect(orchestrator.getState()).toBe(PANIC_STATES.FAILED_PARTIAL);
      expect(alerts.kinds()).toEqual(['panic_failed']);
    });
  });

  describe('partial failure', () => {
    it('should end FAILED_PARTIAL and name the symbol that would not close', async () => {
      seedScenarioAccount(exchange);
      exchange.rejectClosesFor('ETHUSDT', new TransientGatewayError('rate limited'));

      const result = await orchestrator.trigger('test');
      const report = result.report;

      expect(report?.finalState).toBe(PANIC_STATES.FAILED_PARTIAL);
      expect(report?.success).toBe(false);
      expect(report?.locked).toBe(true);
      expect(report?.positionsClosed).toBe(1);
      expect(report?.ordersCanceled).toBe(3);
      expect(report?.remainingPositions).toEqual(['ETHUSDT short 0.5']);
      expect(report?.remainingOrders).toEqual([]);
      expect(report?.warnings).toContain('Close failed for ETHUSDT: rate limited');
      expect(report?.warnings.some((warning) => warning.includes('open positions: ETHUSDT short 0.5'))).toBe(true);
      expect(orchestrator.getState()).toBe(PANIC_STATES.FAILED_PARTIAL);
    });

    it('should retry a transient close failure up to the attempt limit', async () => {
      exchange.openPosition('ETHUSDT', 'short', 0.5);
      exchange.rejectClosesFor('ETHUSDT', new TransientGatewayError('rate limited'));

      await orchestrator.trigger('test');

      expect(exchange.callsTo('placeReduceOnlyMarket')).toHaveLength(3);
    });

    it('should not retry a rejected close', async () => {
      exchange.openPosition('ETHUSDT', 'short', 0.5);
      exchange.rejectClosesFor('ETHUSDT', new GatewayRejectedError('position is zero', 110017));

      const result = await orchestrator.trigger('test');

      expect(exchange.callsTo('placeReduceOnlyMarket')).toHaveLength(1);
      expect(result.report?.warnings).toContain('Close failed for ETHUSDT: position is zero');
    });

    it('should keep the lock and the flag set after a failed run', async () => {
      seedScenarioAccount(exchange);
      exchange.rejectClosesFor('BTCUSDT', new GatewayRejectedError('rejected'));

      await orchestrator.trigger('test');

      expect((await stores.locks.readLock()).armed).toBe(true);
      expect((await stores.locks.readTradingDisabled()).disabled).toBe(true);
      expect(alerts.kinds()).toEqual(['panic_started', 'panic_failed']);
    });

    it('should still close other symbols when one cancel fails', async () => {
      seedScenarioAccount(exchange);
      exchange.failNext('cancelAllOrders', new GatewayRejectedError('cancel rejected'));

      const result = await orchestrator.trigger('test');

      expect(result.report?.warnings).toContain('Cancel failed for BTCUSDT: cancel rejected');
      expect(result.report?.ordersCanceled).toBe(1);
      expect(result.report?.positionsClosed).toBe(2);
      expect(result.report?.remainingOrders).toHaveLength(2);
      expect(result.report?.finalState).toBe(PANIC_STATES.FAILED_PARTIAL);
    });

    it('should fail locked when the exchange is unreachable', async () => {
      seedScenarioAccount(exchange);
      exchange.failAlways('listOpenOrders', new TransientGatewayError('ECONNREFUSED'));

      const result = await orchestrator.trigger('test');
      const report = result.report;

      expect(report?.finalState).toBe(PANIC_STATES.FAILED_PARTIAL);
      expect(report?.locked).toBe(true);
      expect(report?.warnings).toContain('Fatal error during CANCELING: ECONNREFUSED');
      expect(report?.warnings).toContain('Open positions and orders unknown: ECONNREFUSED');
      expect(report?.phaseTimings.find((timing) => timing.phase === 'cancel_orders')?.success).toBe(false);
      expect(exchange.callsTo('placeReduceOnlyMarket')).toHaveLength(0);
      expect((await stores.locks.readLock()).armed).toBe(true);
    });

    it('should record a failed alert delivery as a warning without failing the run', async () => {
      alerts.failWith = new Error('chat unreachable');

      const result = await orchestrator.trigger('test');

      expect(result.report?.finalState).toBe(PANIC_STATES.LOCKED);
      expect(result.report?.warnings).toContain('Alert delivery failed (panic_started): chat unreachable');
      expect(result.report?.warnings).toContain('Alert delivery failed (panic_succeeded): chat unreachable');
    });
  });

  describe('precision handling', () => {
    it('should refresh rules and retry once with the live size floored to the step', async () => {
      exchange.openPosition('BTCUSDT', 'long', 0.01);
      exchange.failNext('placeReduceOnlyMarket', new PrecisionError('Order quantity has too many decimals'));

      const result = await orchestrator.trigger('test');
      const runTag = result.report?.runId.slice(0, 8) ?? '';

      const ids = exchange.callsTo('placeReduceOnlyMarket').map((call) => call.args[3]);
      expect(ids).toEqual([`pn-${runTag}-BTCUSDT-1`, `pn-${runTag}-BTCUSDT-2`]);
      expect(exchange.callsTo('getInstrumentRules').map((call) => call.args[1])).toEqual([false, true]);
      expect(result.report?.positionsClosed).toBe(1);
      expect(result.report?.finalState).toBe(PANIC_STATES.LOCKED);
    });

    it('should skip a position below the minimum quantity with a warning', async () => {
      exchange.setInstrumentRules('SOLUSDT', { qtyStep: 0.1, minQty: 0.1 });
      exchange.openPosition('SOLUSDT', 'long', 0.04);

      const result = await orchestrator.trigger('test');

      expect(exchange.callsTo('placeReduceOnlyMarket')).toHaveLength(0);
      expect(result.report?.warnings).toContain('Close skipped for SOLUSDT: size 0.04 rounds to zero at step 0.1');
      expect(result.report?.finalState).toBe(PANIC_STATES.FAILED_PARTIAL);
    });
  });

  describe('concurrent triggers', () => {
    it('should join the run in flight instead of starting another', async () => {
      seedScenarioAccount(exchange);

      const first = orchestrator.begin('first');
      const second = orchestrator.begin('second');

      expect(first.accepted).toBe(true);
      expect(second.accepted).toBe(false);

      const [a, b] = await Promise.all([first.completion, second.completion]);
      expect(b?.runId).toBe(a?.runId);
      expect(exchange.callsTo('cancelAllOrders')).toHaveLength(2);
      expect(exchange.callsTo('placeReduceOnlyMarket')).toHaveLength(2);
    });

    it('should return the last report when triggered while locked', async () => {
      const first = await orchestrator.trigger('first');
      const again = await orchestrator.trigger('again');

      expect(again.accepted).toBe(false);
      expect(again.report?.runId).toBe(first.report?.runId);
      expect(exchange.callsTo('listPositions')).toHaveLength(2);
    });

    it('should report the run in flight from getStatus', async () => {
      exchange.delay('listOpenOrders', 50);

      const handle = orchestrator.begin('test');
      await sleep(10);
      const status = await orchestrator.getStatus();

      expect(status.running).toBe(true);
      expect(status.lastReport?.endedAt).toBeNull();
      await handle.completion;
    });
  });

  it('should bound a hanging verification poll by the verification timeout', async () => {
    orchestrator.on('stateChange', (change: StateChange) => {
      if (change.to === PANIC_STATES.VERIFYING) {
        exchange.delay('listPositions', 2000);
      }
    });

    const { report } = await orchestrator.trigger('test');

    expect(report?.finalState).toBe(PANIC_STATES.FAILED_PARTIAL);
    expect(report?.durationMs).toBeLessThan(1000);
    expect(report?.warnings.some((w) => w.includes('without a successful poll'))).toBe(true);
    expect((await stores.locks.readLock()).armed).toBe(true);
  });

  describe('reset', () => {
    it('should clear the lock and the flag on a flat account', async () => {
      seedScenarioAccount(exchange);
      await orchestrator.trigger('test');

      const result = await orchestrator.reset();

      expect(result.state).toBe(PANIC_STATES.IDLE);
      expect(result.tradingEnabled).toBe(true);
      expect(orchestrator.getState()).toBe(PANIC_STATES.IDLE);
      expect((await stores.locks.readLock()).armed).toBe(false);
      expect((await stores.locks.readTradingDisabled()).disabled).toBe(false);
      expect(alerts.kinds()).toContain('reset_succeeded');
    });

    it('should leave a same-day daily breaker trip in force', async () => {
      const breaker = new DailyLossBreaker(stores.dailyPnl, stores.locks, {
        maxDailyLossUsd: 50,
        referenceEquityUsd: 1000,
      });
      const guarded = new PanicOrchestrator(
        { gateway: exchange, locks: stores.locks, reports: stores.reports, alerts, dailyTrips: breaker },
        OPTIONS
      );
      await breaker.recordRealizedPnl(-80);
      await guarded.trigger('test');

      const result = await guarded.reset();

      expect(result.state).toBe(PANIC_STATES.IDLE);
      expect(result.tradingEnabled).toBe(false);
      expect((await stores.locks.readLock()).armed).toBe(false);
      expect(await stores.locks.readTradingDisabled()).toMatchObject({
        disabled: true,
        source: 'daily_loss',
        reason: 'Daily loss limit exceeded: -80.00 < -50',
      });
      expect(alerts.sent.at(-1)?.text).toContain('⛔ Trading: DISABLED (Daily loss limit exceeded: -80.00 < -50)');

      await breaker.recordRealizedPnl(-10);
      expect((await stores.locks.readTradingDisabled()).disabled).toBe(true);
    });

    it('should re-enable trading when the daily breaker has not tripped', async () => {
      const breaker = new DailyLossBreaker(stores.dailyPnl, stores.locks, {
        maxDailyLossUsd: 50,
        referenceEquityUsd: 1000,
      });
      const guarded = new PanicOrchestrator(
        { gateway: exchange, locks: stores.locks, reports: stores.reports, alerts, dailyTrips: breaker },
        OPTIONS
      );
      await breaker.recordRealizedPnl(-20);
      await guarded.trigger('test');

      const result = await guarded.reset();

      expect(result.tradingEnabled).toBe(true);
      expect((await stores.locks.readTradingDisabled()).disabled).toBe(false);
    });

    it('should accept a new trigger after reset', async () => {
      await orchestrator.trigger('first');
      await orchestrator.reset();

      const second = await orchestrator.trigger('second');

      expect(second.accepted).toBe(true);
      expect(second.report?.reason).toBe('second');
    });

    it('should refuse and change nothing while positions remain', async () => {
      seedScenarioAccount(exchange);
      exchange.rejectClosesFor('ETHUSDT', new GatewayRejectedError('rejected'));
      await orchestrator.trigger('test');

      const error = await orchestrator.reset().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ResetPreconditionFailedError);
      if (error instanceof ResetPreconditionFailedError) {
        expect(error.positionsRemaining).toBe(1);
        expect(error.ordersRemaining).toBe(0);
      }
      expect(orchestrator.getState()).toBe(PANIC_STATES.FAILED_PARTIAL);
      expect((await stores.locks.readLock()).armed).toBe(true);
      expect((await stores.locks.readTradingDisabled()).disabled).toBe(true);
      expect(alerts.kinds()).toContain('reset_failed');
    });

    it('should refuse when the account cannot be checked', async () => {
      await orchestrator.trigger('test');
      exchange.failAlways('listPositions', new TransientGatewayError('ECONNRESET'));

      const error = await orchestrator.reset().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ResetPreconditionFailedError);
      if (error instanceof ResetPreconditionFailedError) {
        expect(error.positionsRemaining).toBeNull();
      }
      expect((await stores.locks.readLock()).armed).toBe(true);
    });

    it('should refuse when nothing is locked', async () => {
      await expect(orchestrator.reset()).rejects.toBeInstanceOf(ResetNotPermittedError);
    });

    it('should refuse while a run is in flight', async () => {
      exchange.delay('listOpenOrders', 30);
      const handle = orchestrator.begin('test');

      await expect(orchestrator.reset()).rejects.toBeInstanceOf(ResetNotPermittedError);
      await handle.completion;
    });
  });

  describe('initialize', () => {
    it('should stay IDLE with no lock', async () => {
      await orchestrator.initialize();

      expect(orchestrator.getState()).toBe(PANIC_STATES.IDLE);
    });

    it('should restore LOCKED from an armed lock', async () => {
      await stores.locks.armLock('previous process');
      await stores.locks.setTradingDisabled('panic', 'previous process');

      await orchestrator.initialize();

      expect(orchestrator.getState()).toBe(PANIC_STATES.LOCKED);
      expect((await orchestrator.trigger('again')).accepted).toBe(false);
    });

    it('should restore FAILED_PARTIAL from the last report', async () => {
      await stores.locks.armLock('previous process');
      await stores.reports.save({
        ...inFlightReport('11111111-aaaa-bbbb-cccc-000000000000'),
        endedAt: '2026-03-01T10:02:00.000Z',
        finalState: PANIC_STATES.FAILED_PARTIAL,
        locked: true,
      });

      await orchestrator.initialize();

      expect(orchestrator.getState()).toBe(PANIC_STATES.FAILED_PARTIAL);
    });

    it('should close out an interrupted run as failed and arm the lock', async () => {
      await stores.reports.save(inFlightReport('22222222-aaaa-bbbb-cccc-000000000000'));

      await orchestrator.initialize();

      expect(orchestrator.getState()).toBe(PANIC_STATES.FAILED_PARTIAL);
      expect((await stores.locks.readLock()).armed).toBe(true);
      expect((await stores.locks.readTradingDisabled()).disabled).toBe(true);

      const report = await stores.reports.latest();
      expect(report?.runId).toBe('22222222-aaaa-bbbb-cccc-000000000000');
      expect(report?.finalState).toBe(PANIC_STATES.FAILED_PARTIAL);
      expect(report?.endedAt).not.toBeNull();
      expect(report?.warnings).toContain(
        'Run interrupted before completion; account state after the crash is unverified'
      );
      expect(alerts.kinds()).toEqual(['panic_failed']);
    });
  });
});

describe('Panic transitions', () => {
  it('should follow the phase order', () => {
    expect(canTransition(PANIC_STATES.IDLE, PANIC_STATES.DISABLING)).toBe(true);
    expect(canTransition(PANIC_STATES.VERIFYING, PANIC_STATES.LOCKED)).toBe(true);
    expect(canTransition(PANIC_STATES.CANCELING, PANIC_STATES.FAILED_PARTIAL)).toBe(true);
    expect(canTransition(PANIC_STATES.LOCKED, PANIC_STATES.IDLE)).toBe(true);
  });

  it('should refuse skipped phases', () => {
    expect(canTransition(PANIC_STATES.DISABLING, PANIC_STATES.FLATTENING)).toBe(false);
    expect(canTransition(PANIC_STATES.LOCKED, PANIC_STATES.DISABLING)).toBe(false);
    expect(() => assertTransition(PANIC_STATES.CANCELING, PANIC_STATES.LOCKED)).toThrow(
      'Illegal panic state transition CANCELING -> LOCKED'
    );
  });

  it('should classify running and terminal states', () => {
    expect(isRunning(PANIC_STATES.FLATTENING)).toBe(true);
    expect(isRunning(PANIC_STATES.IDLE)).toBe(false);
    expect(isTerminal(PANIC_STATES.FAILED_PARTIAL)).toBe(true);
    expect(isTerminal(PANIC_STATES.VERIFYING)).toBe(false);
  });
});
