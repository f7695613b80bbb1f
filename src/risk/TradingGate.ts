import type { CommandStore } from '../state/CommandStore.js';
import type { LockStore } from '../state/LockStore.js';
import type { RiskCommand } from '../state/records.js';
import { logger, errorMessage, type Logger } from '../utils/logger.js';

export interface GateDecision {
  allowNewEntries: boolean;
  /** Why entries are denied; empty when allowed */
  reasons: string[];
  command: RiskCommand | null;
  commandAgeMs: number | null;
  stale: boolean;
  panicArmed: boolean;
  tradingDisabled: boolean;
}

/**
 * Read-side check a trade-entry process runs before every order-affecting decision.
 * Anything absent, stale or unreadable denies new entries.
 */
export class TradingGate {
  private log: Logger;
  private commands: CommandStore;
  private locks: LockStore;
  private maxCommandAgeMs: number;

  constructor(commands: CommandStore, locks: LockStore, maxCommandAgeMs: number) {
    this.log = logger('TradingGate');
    this.commands = commands;
    this.locks = locks;
    this.maxCommandAgeMs = maxCommandAgeMs;
  }

  async evaluate(now: number = Date.now()): Promise<GateDecision> {
    const reasons: string[] = [];

    const latest = await this.commands.readLatest(now);
    const stale = !latest || latest.ageMs > this.maxCommandAgeMs;
    if (!latest) {
      reasons.push('no risk command available');
    } else if (stale) {
      reasons.push(`risk command is stale (${Math.round(latest.ageMs)}ms old, limit ${this.maxCommandAgeMs}ms)`);
    } else if (!latest.command.allowNewEntries) {
      reasons.push(`risk mode ${latest.command.mode}: ${latest.command.message}`);
    }

    let panicArmed = true;
    try {
      const lock = await this.locks.readLock();
      panicArmed = lock.armed;
      if (lock.armed) {
        reasons.push(`panic lock armed${lock.reason ? `: ${lock.reason}` : ''}`);
      }
    } catch (error) {
      reasons.push('panic lock unreadable');
      this.log.warn('Panic lock unreadable, denying entries', { error: errorMessage(error) });
    }

    let tradingDisabled = true;
    try {
      const flag = await this.locks.readTradingDisabled();
      tradingDisabled = flag.disabled;
      if (flag.disabled) {
        reasons.push(`trading disabled by ${flag.source ?? 'unknown'}${flag.reason ? `: ${flag.reason}` : ''}`);
      }
    } catch (error) {
      reasons.push('trading-disabled flag unreadable');
      this.log.warn('Trading-disabled flag unreadable, denying entries', { error: errorMessage(error) });
    }

    return {
      allowNewEntries: reasons.length === 0,
      reasons,
      command: latest?.command ?? null,
      commandAgeMs: latest?.ageMs ?? null,
      stale,
      panicArmed,
      tradingDisabled,
    };
  }

  async isEntryAllowed(now: number = Date.now()): Promise<boolean> {
    const decision = await this.evaluate(now);
    return decision.allowNewEntries;
  }
}
