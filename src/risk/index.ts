export {
  computeMarginState,
  determineRiskMode,
  modeRank,
  isStricter,
  buildRiskCommand,
  buildFailsafeCommand,
  type RiskThresholds,
  type CommandSettings,
} from './riskModes.js';

export { RiskMonitor, type RiskMonitorOptions, type PollResult, type ModeChange } from './RiskMonitor.js';

export { TradingGate, type GateDecision } from './TradingGate.js';

export { DailyLossBreaker, type DailyLossBreakerOptions, type DailyStats } from './DailyLossBreaker.js';
