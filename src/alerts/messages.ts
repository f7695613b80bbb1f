import type { PanicExecutionReport, PhaseTiming, RiskCommand } from '../state/records.js';
import type { Alert } from './types.js';
import { formatDuration } from '../utils/time.js';
import { formatPercent } from '../utils/math.js';

const RULE = '─────────────────';

// Long symbol lists collapse to a count
function formatSymbols(symbols: string[]): string {
  if (symbols.length === 0) return 'None';
  const joined = symbols.join(', ');
  return joined.length > 50 ? `${symbols.length} symbols` : joined;
}

function phaseName(phase: string): string {
  return phase
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export function formatPhaseTimings(timings: PhaseTiming[]): string {
  if (timings.length === 0) return 'No timing data';
  return timings
    .map((timing) => `${timing.success ? '✅' : '❌'} ${phaseName(timing.phase)}: ${formatDuration(timing.durationMs)}`)
    .join('\n');
}

export function panicStartedAlert(botName: string, reason: string, startedAt: string): Alert {
  return {
    kind: 'panic_started',
    text: [
      '🚨 PANIC BUTTON ACTIVATED',
      `Bot: ${botName}`,
      `Time: ${startedAt}`,
      `Reason: ${reason}`,
      RULE,
      '⚠️ Trading: DISABLED',
      '🔄 Executing emergency procedures...',
    ].join('\n'),
  };
}

export function panicSucceededAlert(botName: string, report: PanicExecutionReport): Alert {
  return {
    kind: 'panic_succeeded',
    text: [
      '✅ PANIC BUTTON COMPLETED',
      `Bot: ${botName}`,
      `Time: ${report.endedAt ?? report.startedAt}`,
      RULE,
      '✅ Trading: DISABLED',
      `✅ Orders canceled: ${report.ordersCanceled}`,
      `✅ Positions closed: ${report.positionsClosed}`,
      `✅ Symbols: ${formatSymbols(report.symbolsTouched)}`,
      `⏱️ Duration: ${formatDuration(report.durationMs)}`,
      '🔒 Status: LOCKED',
      '',
      'Phase Timings:',
      formatPhaseTimings(report.phaseTimings),
      '',
      'Use /panic/reset to unlock after verification.',
    ].join('\n'),
  };
}

export function panicFailedAlert(botName: string, report: PanicExecutionReport): Alert {
  const lines = [
    '❌ PANIC BUTTON FAILED',
    `Bot: ${botName}`,
    `Time: ${report.endedAt ?? report.startedAt}`,
    RULE,
    `🔄 Orders canceled: ${report.ordersCanceled}`,
    `🔄 Positions closed: ${report.positionsClosed}`,
    `📊 Symbols touched: ${formatSymbols(report.symbolsTouched)}`,
    `⏱️ Duration: ${formatDuration(report.durationMs)}`,
  ];
  if (report.remainingPositions.length > 0) {
    lines.push(`❗ Positions still open: ${report.remainingPositions.join(', ')}`);
  }
  if (report.remainingOrders.length > 0) {
    lines.push(`❗ Orders still open: ${report.remainingOrders.join(', ')}`);
  }
  if (report.warnings.length > 0) {
    lines.push(`⚠️ Warnings: ${report.warnings.length}`);
  }
  lines.push('🔒 Status: LOCKED', '', '🚨 MANUAL INTERVENTION REQUIRED', 'Check positions and orders manually!');

  return { kind: 'panic_failed', text: lines.join('\n') };
}

export function resetSucceededAlert(botName: string, at: string, dailyTrip: string | null = null): Alert {
  return {
    kind: 'reset_succeeded',
    text: [
      '🔓 PANIC RESET SUCCESSFUL',
      `Bot: ${botName}`,
      `Time: ${at}`,
      RULE,
      '✅ Lock removed',
      dailyTrip ? `⛔ Trading: DISABLED (${dailyTrip})` : '✅ Trading: ENABLED',
    ].join('\n'),
  };
}

export function resetFailedAlert(botName: string, at: string, error: string): Alert {
  return {
    kind: 'reset_failed',
    text: [
      '❌ PANIC RESET FAILED',
      `Bot: ${botName}`,
      `Time: ${at}`,
      RULE,
      `❌ Error: ${error}`,
      '🔒 Status: Still LOCKED',
      '',
      'Manual intervention required.',
    ].join('\n'),
  };
}

export function riskModeChangedAlert(botName: string, from: string | null, command: RiskCommand): Alert {
  return {
    kind: 'risk_mode_changed',
    text: [
      `⚠️ RISK MODE ${from ?? 'NONE'} → ${command.mode}`,
      `Bot: ${botName}`,
      `Utilization: ${formatPercent(command.utilization)}`,
      command.message,
    ].join('\n'),
  };
}

export function dailyBreakerAlert(botName: string, reason: string): Alert {
  return {
    kind: 'daily_breaker_tripped',
    text: ['🛑 DAILY BREAKER TRIPPED', `Bot: ${botName}`, reason, 'Trading disabled for the rest of the UTC day.'].join(
      '\n'
    ),
  };
}
