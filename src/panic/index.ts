export { PanicOrchestrator } from './PanicOrchestrator.js';
export { PANIC_TRANSITIONS, canTransition, assertTransition, isRunning, isTerminal } from './transitions.js';
export type {
  PanicOrchestratorDeps,
  DailyTripSource,
  PanicOrchestratorOptions,
  TriggerResult,
  TriggerHandle,
  PanicStatus,
  ResetResult,
  StateChange,
} from './types.js';
