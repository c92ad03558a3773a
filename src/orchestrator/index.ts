export {
  executeRun,
  defaultDependencies,
  type RunDependencies,
  type ExecuteRunOptions,
} from './run-executor.js';
export {
  RunStateMachine,
  InvalidTransitionError,
  STATE_TRANSITIONS,
  TERMINAL_STATES,
  isTerminalState,
  canTransition,
} from './state-machine.js';
