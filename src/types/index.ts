// Configuration Types
export { EditorTarget, type RunConfiguration } from './config.js';

// Workspace Types
export { type Workspace, type ExtractedSourceTree } from './workspace.js';

// Run Types
export {
  RunState,
  RunEvent,
  type StateTransition,
  type RunOutcome,
} from './run.js';

// Error Types
export {
  RunStage,
  KernelConfigError,
  ConfigurationError,
  WorkspaceError,
  FetchError,
  ExtractionError,
  NotFoundError,
  ConfigFileError,
  EditorFailure,
  RunCanceledError,
} from './errors.js';
