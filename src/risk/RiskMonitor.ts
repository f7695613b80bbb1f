import { EventEmitter } from 'events';
import { RISK_MODE_ORDER, type RiskMode } from '../config/constants.js';
import type { RiskConfig } from '../config/schema.js';
import type { IExchangeGateway } from '../clients/shared/interfaces.js';
import type { CommandStore } from '../state/CommandStore.js';
import type { RiskCommand } from '../state/records.js';
import { computeMarginState, determineRiskMode, buildRiskCommand, buildFailsafeCommand, isStricter } from './riskModes.js';
import { logger, errorMessage, type Logger } from '../utils/logger.js';
import { calculateDelay, withTimeout } from '../utils/retry.js';
import { formatPercent } from '../utils/math.js';
import {
  marginUtilization,
  riskPolls,
  riskConsecutiveFailures,
  riskCommandsPublished,
  riskPollLatency,
  startTimer,
  updateRiskMode,
} from '../utils/metrics.js';

export type RiskMonitorOptions = Pick<
  RiskConfig,
  | 'thresholds'
  | 'targetAfterDerisk'
  | 'targetAfterEmergency'
  | 'pollIntervalMs'
  | 'requestTimeoutMs'
  | 'failsafeAfterFailures'
  | 'backoffInitialMs'
  | 'backoffMaxMs'
  | 'backoffMultiplier'
>;

/**
 * Outcome of one poll
 */
export interface PollResult {
  ok: boolean;
  /** Command in force after the poll (the last published one on failure) */
  command: RiskCommand | null;
  published: boolean;
  failsafe: boolean;
  utilization?: number;
  error?: string;
}

export interface ModeChange {
  from: RiskMode | null;
  to: RiskMode;
  command: RiskCommand;
}

/**
 * Risk Monitor
 * Polls margin utilization and publishes the derived risk command.
 * Never cancels or closes anything itself.
 *
 * Events: `command` (RiskCommand), `modeChange` (ModeChange), `pollFailed` (Error)
 */
export class RiskMonitor extends EventEmitter {
  private log: Logger;
  private gateway: IExchangeGateway;
  private commands: CommandStore;
  private options: RiskMonitorOptions;

  private lastCommand: RiskCommand | null = null;
  private lastUtilization: number | null = null;
  private consecutiveFailures = 0;
  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<PollResult> | null = null;

  constructor(gateway: IExchangeGateway, commands: CommandStore, options: RiskMonitorOptions) {
    super();
    if (options.requestTimeoutMs >= options.pollIntervalMs) {
      throw new Error('Risk monitor request timeout must be shorter than the poll interval');
    }

    this.log = logger('RiskMonitor');
    this.gateway = gateway;
    this.commands = commands;
    this.options = options;
  }

  /**
   * Adopt the command already in the store, so a restart never relaxes it on a failed first poll
   */
  async initialize(): Promise<void> {
    const latest = await this.commands.readLatest();
    if (latest) {
      this.lastCommand = latest.command;
      this.log.info('Resumed from stored risk command', { mode: latest.command.mode, ageMs: latest.ageMs });
    }
  }

  /**
   * Measure, derive and publish once. Concurrent calls share the poll in flight.
   */
  poll(): Promise<PollResult> {
    if (!this.inFlight) {
      this.inFlight = this.runPoll().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async runPoll(): Promise<PollResult> {
    const timer = startTimer();

    try {
      const balances = await withTimeout(
        this.gateway.getMarginBalances(),
        this.options.requestTimeoutMs,
        'getMarginBalances'
      );
      const state = computeMarginState(balances);
      const mode = determineRiskMode(state.utilization, this.options.thresholds);
      const command = buildRiskCommand(mode, state.utilization, this.options);

      await this.publish(command, false);

      this.consecutiveFailures = 0;
      this.lastUtilization = state.utilization;

      riskPolls.labels('success').inc();
      riskConsecutiveFailures.set(0);
      marginUtilization.set(state.utilization);
      riskPollLatency.observe(timer());

      this.log.debug('Risk poll', {
        equity: state.totalEquity,
        usedIM: state.usedInitialMargin,
        free: state.freeMargin,
        utilization: formatPercent(state.utilization),
        mode,
      });

      return { ok: true, command, published: true, failsafe: false, utilization: state.utilization };
    } catch (error) {
      return this.handleFailure(error, timer());
    }
  }

  private async handleFailure(error: unknown, durationMs: number): Promise<PollResult> {
    this.consecutiveFailures++;
    riskPolls.labels('failure').inc();
    riskConsecutiveFailures.set(this.consecutiveFailures);
    riskPollLatency.observe(durationMs);

    const message = errorMessage(error);
    this.log.error('Risk poll failed, keeping last command', {
      error: message,
      consecutiveFailures: this.consecutiveFailures,
      lastMode: this.lastCommand?.mode ?? null,
    });
    this.emit('pollFailed', error instanceof Error ? error : new Error(message));

    if (this.consecutiveFailures < this.options.failsafeAfterFailures) {
      return { ok: false, command: this.lastCommand, published: false, failsafe: false, error: message };
    }

    const failsafe = buildFailsafeCommand(this.consecutiveFailures, this.lastUtilization, this.lastCommand);
    if (!isStricter(failsafe, this.lastCommand)) {
      return { ok: false, command: this.lastCommand, published: false, failsafe: false, error: message };
    }

    try {
      await this.publish(failsafe, true);
      this.log.error('Fail-safe command published', { consecutiveFailures: this.consecutiveFailures });
      return { ok: false, command: failsafe, published: true, failsafe: true, error: message };
    } catch (publishError) {
      this.log.error('Failed to publish fail-safe command', { error: errorMessage(publishError) });
      return { ok: false, command: this.lastCommand, published: false, failsafe: false, error: message };
    }
  }

  private async publish(command: RiskCommand, failsafe: boolean): Promise<void> {
    await this.commands.publish(command);

    const previous = this.lastCommand;
    this.lastCommand = command;

    riskCommandsPublished.labels(command.mode, String(failsafe)).inc();
    updateRiskMode(RISK_MODE_ORDER, command.mode);
    this.emit('command', command);

    if (previous?.mode !== command.mode) {
      this.log.warn(`Risk mode change ${previous?.mode ?? 'NONE'} → ${command.mode}: ${command.message}`);
      const change: ModeChange = { from: previous?.mode ?? null, to: command.mode, command };
      this.emit('modeChange', change);
    }
  }

  /**
   * Delay before the next poll: the interval, or exponential backoff after failures
   */
  nextDelayMs(): number {
    if (this.consecutiveFailures === 0) {
      return this.options.pollIntervalMs;
    }
    return calculateDelay(this.consecutiveFailures - 1, {
      initialDelayMs: this.options.backoffInitialMs,
      maxDelayMs: this.options.backoffMaxMs,
      multiplier: this.options.backoffMultiplier,
    });
  }

  /**
   * Start the polling loop; the first poll runs immediately
   */
  start(): void {
    if (this.running) {
      this.log.warn('Risk monitor already running');
      return;
    }

    this.running = true;
    this.schedule(0);
    this.log.info('Risk monitor started', {
      pollIntervalMs: this.options.pollIntervalMs,
      requestTimeoutMs: this.options.requestTimeoutMs,
    });
  }

  /**
   * Stop the loop and wait for a poll in flight
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }

    this.log.info('Risk monitor stopped');
  }

  private schedule(delayMs: number): void {
    if (!this.running) return;

    // Next poll is scheduled only after the previous one settles, so polls never overlap
    this.timer = setTimeout(() => {
      this.timer = null;
      this.poll()
        .then(() => this.schedule(this.nextDelayMs()))
        .catch((error: unknown) => {
          this.log.error('Risk monitor cycle failed', { error: errorMessage(error) });
          this.schedule(this.nextDelayMs());
        });
    }, delayMs);
  }

  isRunning(): boolean {
    return this.running;
  }

  getStatus(): {
    running: boolean;
    lastCommand: RiskCommand | null;
    lastUtilization: number | null;
    consecutiveFailures: number;
  } {
    return {
      running: this.running,
      lastCommand: this.lastCommand,
      lastUtilization: this.lastUtilization,
      consecutiveFailures: this.consecutiveFailures,
    };
  }
}
