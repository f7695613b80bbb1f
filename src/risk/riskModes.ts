import { RISK_MODES, RISK_MODE_ORDER, COMMAND_PRIORITIES, DEFAULTS, type RiskMode, type CommandPriority } from '../config/constants.js';
import type { RiskConfig } from '../config/schema.js';
import type { MarginBalances, AccountMarginState } from '../clients/shared/interfaces.js';
import type { RiskCommand } from '../state/records.js';
import { clamp } from '../utils/math.js';
import { InvalidMarginDataError } from '../utils/errors.js';

export type RiskThresholds = RiskConfig['thresholds'];

export type CommandSettings = Pick<RiskConfig, 'thresholds' | 'targetAfterDerisk' | 'targetAfterEmergency'>;

const PRIORITY_BY_MODE: Record<RiskMode, CommandPriority> = {
  NORMAL: COMMAND_PRIORITIES.NONE,
  ALERT: COMMAND_PRIORITIES.LOW,
  DERISK: COMMAND_PRIORITIES.MEDIUM,
  EMERGENCY: COMMAND_PRIORITIES.HIGH,
  HALT: COMMAND_PRIORITIES.IMMEDIATE,
};

/**
 * Derive utilization from raw balances. Equity must be a positive finite number.
 */
export function computeMarginState(balances: MarginBalances, measuredAt: number = Date.now()): AccountMarginState {
  const { totalEquity, usedInitialMargin } = balances;

  if (!Number.isFinite(totalEquity) || totalEquity <= 0) {
    throw new InvalidMarginDataError(`Total equity must be positive, got ${totalEquity}`, { totalEquity });
  }
  if (!Number.isFinite(usedInitialMargin) || usedInitialMargin < 0) {
    throw new InvalidMarginDataError(`Used initial margin must be non-negative, got ${usedInitialMargin}`, {
      usedInitialMargin,
    });
  }

  return {
    ...balances,
    utilization: clamp(usedInitialMargin / totalEquity, 0, 1),
    measuredAt,
  };
}

/**
 * Threshold bucket for a utilization; each threshold is inclusive at its lower bound
 */
export function determineRiskMode(utilization: number, thresholds: RiskThresholds = DEFAULTS.RISK_THRESHOLDS): RiskMode {
  if (utilization >= thresholds.halt) return RISK_MODES.HALT;
  if (utilization >= thresholds.emergency) return RISK_MODES.EMERGENCY;
  if (utilization >= thresholds.derisk) return RISK_MODES.DERISK;
  if (utilization >= thresholds.alert) return RISK_MODES.ALERT;
  return RISK_MODES.NORMAL;
}

export function modeRank(mode: RiskMode): number {
  return RISK_MODE_ORDER.indexOf(mode);
}

/**
 * True when `candidate` restricts more than `current`: no looser on any
 * instruction and tighter on at least one. No current command counts as the laxest.
 */
export function isStricter(candidate: RiskCommand, current: RiskCommand | null): boolean {
  if (!current) return true;

  const noLooser =
    modeRank(candidate.mode) >= modeRank(current.mode) &&
    (!candidate.allowNewEntries || current.allowNewEntries) &&
    (candidate.cancelAllOrders || !current.cancelAllOrders) &&
    (candidate.closePositions || !current.closePositions) &&
    candidate.closeFraction >= current.closeFraction;

  const tighter =
    modeRank(candidate.mode) > modeRank(current.mode) ||
    (!candidate.allowNewEntries && current.allowNewEntries) ||
    (candidate.cancelAllOrders && !current.cancelAllOrders) ||
    (candidate.closePositions && !current.closePositions) ||
    candidate.closeFraction > current.closeFraction;

  return noLooser && tighter;
}

const pct = (ratio: number): string => `${Math.round(ratio * 100)}%`;
const band = (low: number, high: number): string => `${Math.round(low * 100)}-${Math.round(high * 100)}%`;

/**
 * Build the command consumers act on for a mode
 */
export function buildRiskCommand(
  mode: RiskMode,
  utilization: number,
  settings: CommandSettings,
  timestamp: string = new Date().toISOString()
): RiskCommand {
  const { thresholds } = settings;
  const base = { mode, utilization, priority: PRIORITY_BY_MODE[mode], timestamp };

  switch (mode) {
    case RISK_MODES.HALT:
      return {
        ...base,
        allowNewEntries: false,
        cancelAllOrders: true,
        closePositions: true,
        closeFraction: DEFAULTS.CLOSE_FRACTIONS.halt,
        targetUtilization: null,
        message: `≥${pct(thresholds.halt)} IM - EMERGENCY SHUTDOWN`,
      };
    case RISK_MODES.EMERGENCY:
      return {
        ...base,
        allowNewEntries: false,
        cancelAllOrders: true,
        closePositions: true,
        closeFraction: DEFAULTS.CLOSE_FRACTIONS.emergency,
        targetUtilization: settings.targetAfterEmergency,
        message: `${band(thresholds.emergency, thresholds.halt)} IM - Emergency deleverage to ${pct(settings.targetAfterEmergency)}`,
      };
    case RISK_MODES.DERISK:
      return {
        ...base,
        allowNewEntries: false,
        cancelAllOrders: true,
        closePositions: true,
        closeFraction: DEFAULTS.CLOSE_FRACTIONS.derisk,
        targetUtilization: settings.targetAfterDerisk,
        message: `${band(thresholds.derisk, thresholds.emergency)} IM - Active deleverage to ${pct(settings.targetAfterDerisk)}`,
      };
    case RISK_MODES.ALERT:
      return {
        ...base,
        allowNewEntries: true,
        cancelAllOrders: false,
        closePositions: false,
        closeFraction: 0,
        targetUtilization: null,
        message: `${band(thresholds.alert, thresholds.derisk)} IM - Recommend reducing order sizes`,
      };
    case RISK_MODES.NORMAL:
      return {
        ...base,
        allowNewEntries: true,
        cancelAllOrders: false,
        closePositions: false,
        closeFraction: 0,
        targetUtilization: null,
        message: 'Normal trading - All systems operational',
      };
  }
}

/**
 * Command published after repeated poll failures: halt entries and cancel
 * orders. Closes nothing on unread data, but carries over the close
 * instruction of the command it replaces.
 */
export function buildFailsafeCommand(
  consecutiveFailures: number,
  lastUtilization: number | null,
  previous: RiskCommand | null = null,
  timestamp: string = new Date().toISOString()
): RiskCommand {
  const closePositions = previous?.closePositions ?? false;

  return {
    mode: RISK_MODES.HALT,
    utilization: lastUtilization ?? 1,
    allowNewEntries: false,
    cancelAllOrders: true,
    closePositions,
    closeFraction: closePositions && previous ? Math.max(previous.closeFraction, 0) : 0,
    targetUtilization: closePositions && previous ? previous.targetUtilization : null,
    priority: COMMAND_PRIORITIES.IMMEDIATE,
    message: `API failures - emergency halt after ${consecutiveFailures} errors`,
    timestamp,
  };
}
