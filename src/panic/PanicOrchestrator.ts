import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import {
  PANIC_STATES,
  PANIC_PHASES,
  DISABLE_SOURCES,
  type PanicState,
  type PanicPhase,
} from '../config/constants.js';
import { closingSide, type OpenOrder, type Position } from '../clients/shared/interfaces.js';
import { PanicExecutionReportSchema, type PanicExecutionReport, type PanicLock } from '../state/records.js';
import {
  panicStartedAlert,
  panicSucceededAlert,
  panicFailedAlert,
  resetSucceededAlert,
  resetFailedAlert,
} from '../alerts/messages.js';
import type { Alert } from '../alerts/types.js';
import { assertTransition, isRunning, isTerminal } from './transitions.js';
import type {
  PanicOrchestratorDeps,
  PanicOrchestratorOptions,
  TriggerHandle,
  TriggerResult,
  PanicStatus,
  ResetResult,
  StateChange,
} from './types.js';
import { logger, errorMessage, type Logger } from '../utils/logger.js';
import { retry, withTimeout } from '../utils/retry.js';
import { sleep, formatDuration } from '../utils/time.js';
import { roundToStep } from '../utils/math.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import {
  isTransientError,
  PartialFailureError,
  PrecisionError,
  ResetNotPermittedError,
  ResetPreconditionFailedError,
} from '../utils/errors.js';
import {
  panicRuns,
  panicDuration,
  panicOrdersCancelled,
  panicPositionsClosed,
  startTimer,
  updatePanicState,
} from '../utils/metrics.js';

const { IDLE, DISABLING, CANCELING, FLATTENING, VERIFYING, LOCKED, FAILED_PARTIAL } = PANIC_STATES;

interface CloseOutcome {
  closed: boolean;
  warning?: string;
}

function describePosition(position: Position): string {
  return `${position.symbol} ${position.side} ${position.size}`;
}

function describeOrder(order: OpenOrder): string {
  return `${order.symbol} ${order.side} ${order.qty} #${order.orderId}`;
}

function createReport(runId: string, reason: string): PanicExecutionReport {
  return {
    runId,
    reason,
    startedAt: new Date().toISOString(),
    endedAt: null,
    success: false,
    ordersCanceled: 0,
    positionsClosed: 0,
    symbolsTouched: [],
    phaseTimings: [],
    warnings: [],
    locked: false,
    finalState: null,
    remainingPositions: [],
    remainingOrders: [],
    durationMs: 0,
  };
}

function touch(report: PanicExecutionReport, symbol: string): void {
  if (!report.symbolsTouched.includes(symbol)) {
    report.symbolsTouched.push(symbol);
    report.symbolsTouched.sort();
  }
}

/**
 * Panic Orchestrator
 *
 * Singleton emergency stop: disable trading, cancel every open order, flatten
 * every position, verify the account is flat, then arm the lock. A run always
 * ends with the lock armed, whether it succeeded or not; only `reset()` on a
 * verified-flat account returns the machine to IDLE.
 *
 * Events: `stateChange` (StateChange), `completed` (PanicExecutionReport)
 */
export class PanicOrchestrator extends EventEmitter {
  private log: Logger;
  private deps: PanicOrchestratorDeps;
  private options: PanicOrchestratorOptions;

  private state: PanicState = IDLE;
  private current: Promise<PanicExecutionReport> | null = null;
  private activeReport: PanicExecutionReport | null = null;
  private lastReport: PanicExecutionReport | null = null;
  private resetting = false;

  constructor(deps: PanicOrchestratorDeps, options: PanicOrchestratorOptions) {
    super();
    this.log = logger('PanicOrchestrator');
    this.deps = deps;
    this.options = options;
    updatePanicState(Object.values(PANIC_STATES), this.state);
  }

  getState(): PanicState {
    return this.state;
  }

  // ============================================
  // Startup
  // ============================================

  /**
   * Restore state from the stores. A report persisted without an end time
   * belongs to a run the process never finished: it is closed out as failed
   * and the lock is armed.
   */
  async initialize(): Promise<void> {
    if (this.state !== IDLE || this.current) {
      throw new Error('initialize() must run before the first trigger');
    }

    let lock: PanicLock;
    try {
      lock = await this.deps.locks.readLock();
    } catch (error) {
      this.log.error('Panic lock unreadable, starting locked', { error: errorMessage(error) });
      lock = { armed: true, armedAt: null, reason: 'unreadable lock record' };
    }

    let report: PanicExecutionReport | null = null;
    try {
      report = await this.deps.reports.latest();
    } catch (error) {
      this.log.error('Last panic report unreadable', { error: errorMessage(error) });
    }

    if (report && report.endedAt === null) {
      await this.recoverInterrupted(report);
      return;
    }

    this.lastReport = report;
    if (lock.armed) {
      this.transition(report?.finalState ?? LOCKED);
      this.log.warn('Panic lock is armed; trading stays disabled until reset', {
        state: this.state,
        armedAt: lock.armedAt,
        reason: lock.reason,
      });
    }
  }

  private async recoverInterrupted(report: PanicExecutionReport): Promise<void> {
    this.log.error('Found a panic run that never finished, arming lock', { runId: report.runId });
    report.warnings.push('Run interrupted before completion; account state after the crash is unverified');

    try {
      await this.withRetry('setTradingDisabled', () =>
        this.deps.locks.setTradingDisabled(DISABLE_SOURCES.PANIC, `Interrupted panic run: ${report.reason}`)
      );
    } catch (error) {
      report.warnings.push(`Failed to disable trading: ${errorMessage(error)}`);
    }

    try {
      await this.withRetry('armLock', () => this.deps.locks.armLock(report.reason));
      report.locked = true;
    } catch (error) {
      report.warnings.push(`Failed to arm panic lock: ${errorMessage(error)}`);
    }

    const startedAt = Date.parse(report.startedAt);
    report.success = false;
    report.finalState = FAILED_PARTIAL;
    report.endedAt = new Date().toISOString();
    report.durationMs = Number.isNaN(startedAt) ? 0 : Date.now() - startedAt;

    await this.persist(report);
    this.lastReport = this.snapshot(report);
    this.transition(FAILED_PARTIAL);

    const warning = await this.sendAlert(panicFailedAlert(this.options.botName, report));
    if (warning) {
      this.log.warn(warning);
    }
  }

  // ============================================
  // Trigger
  // ============================================

  /**
   * Claim and start a run without waiting for it. Only IDLE accepts; any other
   * state hands back the run in flight, or the last report.
   */
  begin(reason: string = 'manual'): TriggerHandle {
    if (this.state !== IDLE || this.resetting) {
      this.log.warn('Panic trigger ignored', { state: this.state, resetting: this.resetting });
      return { accepted: false, completion: this.current ?? Promise.resolve(this.lastReport) };
    }

    // Claimed before the first await, so a concurrent caller sees DISABLING
    this.transition(DISABLING);
    const report = createReport(uuidv4(), reason);
    this.activeReport = report;

    this.log.error('PANIC TRIGGERED', { runId: report.runId, reason });

    const run = this.execute(report).finally(() => {
      this.current = null;
      this.activeReport = null;
    });
    this.current = run;
    // Fire-and-forget callers never await the run
    void run.catch((error: unknown) => {
      this.log.error('Panic run crashed', { runId: report.runId, error: errorMessage(error) });
    });
    return { accepted: true, completion: run };
  }

  /**
   * Start a run (or join the one in flight) and wait for its report
   */
  async trigger(reason: string = 'manual'): Promise<TriggerResult> {
    const handle = this.begin(reason);
    return { accepted: handle.accepted, report: await handle.completion };
  }

  private async execute(report: PanicExecutionReport): Promise<PanicExecutionReport> {
    const timer = startTimer();
    let flagSet = false;
    let verified = false;
    let fatal: string | null = null;
    let startAlert: Promise<string | null> | null = null;

    try {
      flagSet = await this.runPhase(report, PANIC_PHASES.DISABLE_TRADING, () => this.disableTrading(report));

      if (!flagSet) {
        fatal = 'Trading-disabled flag could not be persisted; no exchange calls were made';
      } else {
        startAlert = this.sendAlert(panicStartedAlert(this.options.botName, report.reason, report.startedAt));

        this.transition(CANCELING);
        await this.runPhase(report, PANIC_PHASES.CANCEL_ORDERS, () => this.cancelOrders(report));

        this.transition(FLATTENING);
        await this.runPhase(report, PANIC_PHASES.FLATTEN_POSITIONS, () => this.flattenPositions(report));

        this.transition(VERIFYING);
        verified = await this.runPhase(report, PANIC_PHASES.VERIFY_FLAT, () => this.verifyFlat(report));
      }
    } catch (error) {
      fatal = `Fatal error during ${this.state}: ${errorMessage(error)}`;
      this.log.error('Panic run hit a fatal error', { state: this.state, error: errorMessage(error) });
    }

    if (fatal) {
      report.warnings.push(fatal);
      if (flagSet) {
        await this.captureRemaining(report);
      }
    }

    return this.finish(report, { verified, fatal, flagSet, startAlert, timer });
  }

  private async finish(
    report: PanicExecutionReport,
    outcome: {
      verified: boolean;
      fatal: string | null;
      flagSet: boolean;
      startAlert: Promise<string | null> | null;
      timer: () => number;
    }
  ): Promise<PanicExecutionReport> {
    const armed = await this.runPhase(report, PANIC_PHASES.ARM_LOCK, () => this.armLock(report, outcome.flagSet));

    const success = outcome.verified && outcome.fatal === null && armed;
    const finalState = success ? LOCKED : FAILED_PARTIAL;
    report.success = success;
    report.finalState = finalState;
    report.endedAt = new Date().toISOString();
    report.durationMs = outcome.timer();
    await this.persist(report);

    await this.runPhase(report, PANIC_PHASES.NOTIFY, async () => {
      const alert = success
        ? panicSucceededAlert(this.options.botName, report)
        : panicFailedAlert(this.options.botName, report);
      const warnings = await Promise.all([outcome.startAlert ?? Promise.resolve(null), this.sendAlert(alert)]);
      let delivered = true;
      for (const warning of warnings) {
        if (warning) {
          report.warnings.push(warning);
          delivered = false;
        }
      }
      return delivered;
    });

    report.durationMs = outcome.timer();
    await this.persist(report);

    this.lastReport = this.snapshot(report);
    this.transition(finalState);

    panicRuns.labels(success ? 'locked' : 'failed_partial').inc();
    panicDuration.observe(report.durationMs);

    const summary = {
      runId: report.runId,
      ordersCanceled: report.ordersCanceled,
      positionsClosed: report.positionsClosed,
      symbols: report.symbolsTouched,
      warnings: report.warnings.length,
      duration: formatDuration(report.durationMs),
    };
    if (success) {
      this.log.warn('Panic run complete, account flat and locked', summary);
    } else {
      this.log.error('Panic run ended FAILED_PARTIAL, manual intervention required', {
        ...summary,
        remainingPositions: report.remainingPositions,
        remainingOrders: report.remainingOrders,
      });
    }

    const completed = this.snapshot(report);
    this.emit('completed', completed);
    return completed;
  }

  // ============================================
  // Phases
  // ============================================

  /**
   * Time one phase and append it to the trail. A throw is recorded as a failed phase and rethrown.
   */
  private async runPhase(
    report: PanicExecutionReport,
    phase: PanicPhase,
    fn: () => Promise<boolean>
  ): Promise<boolean> {
    const timer = startTimer();
    try {
      const success = await fn();
      report.phaseTimings.push({ phase, durationMs: timer(), success });
      return success;
    } catch (error) {
      report.phaseTimings.push({ phase, durationMs: timer(), success: false });
      throw error;
    }
  }

  private async disableTrading(report: PanicExecutionReport): Promise<boolean> {
    try {
      await this.withRetry('setTradingDisabled', () =>
        this.deps.locks.setTradingDisabled(DISABLE_SOURCES.PANIC, `Panic: ${report.reason}`)
      );
    } catch (error) {
      report.warnings.push(`Failed to disable trading: ${errorMessage(error)}`);
      this.log.error('Could not persist trading-disabled flag, aborting before any exchange call', {
        error: errorMessage(error),
      });
      return false;
    }

    // In-flight marker for crash recovery
    await this.persist(report);
    return true;
  }

  private async cancelOrders(report: PanicExecutionReport): Promise<boolean> {
    const orders = await this.withRetry('listOpenOrders', () => this.deps.gateway.listOpenOrders());
    const symbols = [...new Set(orders.map((order) => order.symbol))].sort();
    symbols.forEach((symbol) => touch(report, symbol));

    const results = await mapWithConcurrency(symbols, this.options.concurrency, (symbol) =>
      this.withRetry(`cancelAllOrders(${symbol})`, () => this.deps.gateway.cancelAllOrders(symbol))
    );

    let allCancelled = true;
    symbols.forEach((symbol, index) => {
      const result = results[index];
      if (!result) return;
      if (result.ok) {
        report.ordersCanceled += result.value;
        panicOrdersCancelled.inc(result.value);
      } else {
        allCancelled = false;
        report.warnings.push(`Cancel failed for ${symbol}: ${errorMessage(result.error)}`);
      }
    });

    this.log.info('Orders cancelled', { count: report.ordersCanceled, symbols });
    return allCancelled;
  }

  private async flattenPositions(report: PanicExecutionReport): Promise<boolean> {
    // Always the live sizes; nothing cached survives into a close
    const positions = await this.withRetry('listPositions', () => this.deps.gateway.listPositions());
    positions.forEach((position) => touch(report, position.symbol));

    const results = await mapWithConcurrency(positions, this.options.concurrency, (position) =>
      this.closePosition(report.runId, position)
    );

    let allClosed = true;
    positions.forEach((position, index) => {
      const result = results[index];
      if (!result) return;
      const outcome: CloseOutcome = result.ok
        ? result.value
        : { closed: false, warning: `Close failed for ${position.symbol}: ${errorMessage(result.error)}` };

      if (outcome.closed) {
        report.positionsClosed++;
        panicPositionsClosed.inc();
      } else {
        allClosed = false;
      }
      if (outcome.warning) {
        report.warnings.push(outcome.warning);
      }
    });

    this.log.info('Positions flattened', { closed: report.positionsClosed, total: positions.length });
    return allClosed;
  }

  /**
   * Reduce-only market close on the opposite side. One precision retry with
   * refreshed rules and live size floored to the step.
   */
  private async closePosition(runId: string, position: Position): Promise<CloseOutcome> {
    const { symbol } = position;
    const side = closingSide(position.side);
    const runTag = runId.slice(0, 8);
    const gateway = this.deps.gateway;

    const rules = await this.withRetry(`getInstrumentRules(${symbol})`, () => gateway.getInstrumentRules(symbol));
    const qty = roundToStep(position.size, rules.qtyStep);
    if (!(qty > 0)) {
      return { closed: false, warning: `Close skipped for ${symbol}: size ${position.size} rounds to zero at step ${rules.qtyStep}` };
    }

    try {
      // Same client order id on every retry, so a lost response cannot double-close
      const clientOrderId = `pn-${runTag}-${symbol}-1`;
      await this.withRetry(`close(${symbol})`, () =>
        gateway.placeReduceOnlyMarket(symbol, side, qty, { clientOrderId })
      );
      this.log.info('Close submitted', { symbol, side, qty });
      return { closed: true };
    } catch (error) {
      if (!(error instanceof PrecisionError)) {
        return { closed: false, warning: `Close failed for ${symbol}: ${errorMessage(error)}` };
      }
      this.log.warn('Precision rejection, refreshing instrument rules', { symbol, qty, error: error.message });
    }

    try {
      const fresh = await this.withRetry(`getInstrumentRules(${symbol})`, () =>
        gateway.getInstrumentRules(symbol, { refresh: true })
      );
      const live = (await this.withRetry('listPositions', () => gateway.listPositions())).find(
        (candidate) => candidate.symbol === symbol && candidate.side === position.side
      );
      if (!live) {
        this.log.info('Position gone before precision retry', { symbol });
        return { closed: false };
      }

      const adjusted = roundToStep(live.size, fresh.qtyStep, 'down');
      if (!(adjusted > 0) || adjusted < fresh.minQty) {
        return {
          closed: false,
          warning: `Close skipped for ${symbol}: size ${live.size} is below the minimum ${fresh.minQty} after precision adjustment`,
        };
      }

      const clientOrderId = `pn-${runTag}-${symbol}-2`;
      await this.withRetry(`close(${symbol})`, () =>
        gateway.placeReduceOnlyMarket(symbol, side, adjusted, { clientOrderId })
      );
      this.log.info('Close submitted after precision adjustment', { symbol, side, qty: adjusted });
      return { closed: true };
    } catch (error) {
      return { closed: false, warning: `Close failed for ${symbol} after precision adjustment: ${errorMessage(error)}` };
    }
  }

  /**
   * Poll until no positions and no orders remain, or the timeout passes.
   * Each poll is bounded by the time left; a failed poll is logged and polling continues.
   */
  private async verifyFlat(report: PanicExecutionReport): Promise<boolean> {
    const startedAt = Date.now();
    const deadline = startedAt + this.options.verifyTimeoutMs;
    let lastPositions: Position[] | null = null;
    let lastOrders: OpenOrder[] | null = null;

    for (;;) {
      try {
        const [positions, orders] = await withTimeout(
          Promise.all([this.deps.gateway.listPositions(), this.deps.gateway.listOpenOrders()]),
          Math.max(deadline - Date.now(), this.options.verifyPollMs),
          'Verification poll'
        );
        lastPositions = positions;
        lastOrders = orders;
        if (positions.length === 0 && orders.length === 0) {
          report.remainingPositions = [];
          report.remainingOrders = [];
          return true;
        }
      } catch (error) {
        this.log.warn('Verification poll failed', { error: errorMessage(error) });
      }

      const remainingMs = deadline - Date.now();
      if (remainingMs <= 0) break;
      await sleep(Math.min(this.options.verifyPollMs, remainingMs));
    }

    const elapsed = formatDuration(Date.now() - startedAt);
    if (!lastPositions || !lastOrders) {
      report.warnings.push(`Verification timed out after ${elapsed} without a successful poll; open positions and orders are unknown`);
      return false;
    }

    this.recordRemaining(report, lastPositions, lastOrders, `Verification timed out after ${elapsed}`);
    return false;
  }

  /**
   * One best-effort look at what is still open after a fatal error
   */
  private async captureRemaining(report: PanicExecutionReport): Promise<void> {
    try {
      const [positions, orders] = await Promise.all([
        this.deps.gateway.listPositions(),
        this.deps.gateway.listOpenOrders(),
      ]);
      this.recordRemaining(report, positions, orders, 'Run aborted');
    } catch (error) {
      report.warnings.push(`Open positions and orders unknown: ${errorMessage(error)}`);
    }
  }

  private recordRemaining(report: PanicExecutionReport, positions: Position[], orders: OpenOrder[], prefix: string): void {
    report.remainingPositions = positions.map(describePosition);
    report.remainingOrders = orders.map(describeOrder);

    const parts: string[] = [];
    if (positions.length > 0) parts.push(`open positions: ${report.remainingPositions.join(', ')}`);
    if (orders.length > 0) parts.push(`open orders: ${report.remainingOrders.join(', ')}`);
    if (parts.length > 0) {
      const symbols = [...new Set([...positions, ...orders].map((item) => item.symbol))].sort();
      const failure = new PartialFailureError(`${prefix} with ${parts.join('; ')}`, symbols);
      report.warnings.push(failure.message);
      this.log.error(failure.message, { code: failure.code, remainingSymbols: failure.remainingSymbols });
    }
  }

  private async armLock(report: PanicExecutionReport, flagSet: boolean): Promise<boolean> {
    if (!flagSet) {
      try {
        await this.withRetry('setTradingDisabled', () =>
          this.deps.locks.setTradingDisabled(DISABLE_SOURCES.PANIC, `Panic: ${report.reason}`)
        );
      } catch (error) {
        this.log.error('Trading-disabled flag still not persisted', { error: errorMessage(error) });
      }
    }

    try {
      await this.withRetry('armLock', () => this.deps.locks.armLock(report.reason));
      report.locked = true;
      return true;
    } catch (error) {
      report.warnings.push(`Failed to arm panic lock: ${errorMessage(error)}`);
      this.log.error('PANIC LOCK NOT ARMED', { error: errorMessage(error) });
      return false;
    }
  }

  // ============================================
  // Reset
  // ============================================

  /**
   * Clear the lock and the trading-disabled flag, only on a freshly verified flat account
   */
  async reset(): Promise<ResetResult> {
    if (this.current || isRunning(this.state)) {
      throw new ResetNotPermittedError('A panic run is in progress', { state: this.state });
    }
    if (this.resetting) {
      throw new ResetNotPermittedError('A reset is already in progress', { state: this.state });
    }

    this.resetting = true;
    try {
      let armed: boolean;
      try {
        armed = (await this.deps.locks.readLock()).armed;
      } catch (error) {
        this.log.warn('Panic lock unreadable during reset, treating as armed', { error: errorMessage(error) });
        armed = true;
      }
      if (!armed && !isTerminal(this.state)) {
        throw new ResetNotPermittedError('Panic lock is not armed', { state: this.state });
      }

      let positions: Position[];
      let orders: OpenOrder[];
      try {
        [positions, orders] = await Promise.all([
          this.withRetry('listPositions', () => this.deps.gateway.listPositions()),
          this.withRetry('listOpenOrders', () => this.deps.gateway.listOpenOrders()),
        ]);
      } catch (error) {
        throw await this.refuseReset(
          new ResetPreconditionFailedError(`Unable to verify the account is flat: ${errorMessage(error)}`, null, null)
        );
      }

      if (positions.length > 0 || orders.length > 0) {
        throw await this.refuseReset(
          new ResetPreconditionFailedError(
            `Account not flat: ${positions.length} positions and ${orders.length} open orders remaining`,
            positions.length,
            orders.length
          )
        );
      }

      const dailyTrip = this.deps.dailyTrips ? await this.deps.dailyTrips.activeTrip() : null;

      // Lock first: a crash between the two writes leaves trading still disabled
      await this.deps.locks.clearLock();
      if (dailyTrip) {
        await this.deps.locks.setTradingDisabled(DISABLE_SOURCES.DAILY_LOSS, dailyTrip);
      } else {
        await this.deps.locks.clearTradingDisabled();
      }

      if (this.state !== IDLE) {
        this.transition(IDLE);
      }

      const resetAt = new Date().toISOString();
      if (dailyTrip) {
        this.log.warn('Panic lock reset, trading stays disabled by the daily breaker', { resetAt, reason: dailyTrip });
      } else {
        this.log.warn('Panic lock reset, trading re-enabled', { resetAt });
      }

      const warning = await this.sendAlert(resetSucceededAlert(this.options.botName, resetAt, dailyTrip));
      if (warning) {
        this.log.warn(warning);
      }
      return { state: this.state, resetAt, tradingEnabled: dailyTrip === null };
    } finally {
      this.resetting = false;
    }
  }

  private async refuseReset(error: ResetPreconditionFailedError): Promise<ResetPreconditionFailedError> {
    this.log.warn('Reset refused', { error: error.message });
    const warning = await this.sendAlert(
      resetFailedAlert(this.options.botName, new Date().toISOString(), error.message)
    );
    if (warning) {
      this.log.warn(warning);
    }
    return error;
  }

  // ============================================
  // Status
  // ============================================

  async getStatus(): Promise<PanicStatus> {
    const [lock, tradingDisabled] = await Promise.all([
      this.deps.locks.readLock(),
      this.deps.locks.readTradingDisabled(),
    ]);

    return {
      state: this.state,
      running: isRunning(this.state),
      lock,
      tradingDisabled,
      lastReport: this.activeReport ? this.snapshot(this.activeReport) : this.lastReport,
    };
  }

  // ============================================
  // Helpers
  // ============================================

  private transition(to: PanicState): void {
    const from = this.state;
    assertTransition(from, to);
    this.state = to;
    updatePanicState(Object.values(PANIC_STATES), to);
    this.log.info(`State ${from} → ${to}`);
    const change: StateChange = { from, to };
    this.emit('stateChange', change);
  }

  private withRetry<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return retry(fn, {
      maxAttempts: this.options.retryAttempts,
      initialDelayMs: this.options.retryInitialDelayMs,
      maxDelayMs: this.options.retryMaxDelayMs,
      multiplier: 2,
      jitter: 0.1,
      retryOn: isTransientError,
      onRetry: (attempt, error, delayMs) => {
        this.log.warn(`${label} failed, retrying`, { attempt, delayMs, error: errorMessage(error) });
      },
    });
  }

  private async persist(report: PanicExecutionReport): Promise<void> {
    try {
      await this.deps.reports.save(report);
    } catch (error) {
      this.log.error('Failed to persist panic report', { runId: report.runId, error: errorMessage(error) });
      const warning = `Report could not be persisted: ${errorMessage(error)}`;
      if (!report.warnings.includes(warning)) {
        report.warnings.push(warning);
      }
    }
  }

  /**
   * Deliver an alert; resolves to a warning instead of rejecting
   */
  private async sendAlert(alert: Alert): Promise<string | null> {
    try {
      await this.deps.alerts.send(alert);
      return null;
    } catch (error) {
      this.log.error('Alert delivery failed', { kind: alert.kind, error: errorMessage(error) });
      return `Alert delivery failed (${alert.kind}): ${errorMessage(error)}`;
    }
  }

  private snapshot(report: PanicExecutionReport): PanicExecutionReport {
    return PanicExecutionReportSchema.parse(report);
  }
}
