// Run States
export const RunState = {
  IDLE: 'idle',
  WORKSPACE_ACQUIRED: 'workspace_acquired',
  SOURCE_FETCHED: 'source_fetched',
  CONFIG_SEEDED: 'config_seeded',
  EDITOR_RUNNING: 'editor_running',
  EDITOR_SUCCEEDED: 'editor_succeeded',
  EDITOR_FAILED: 'editor_failed',
  CONFIG_PERSISTED: 'config_persisted',
  DONE: 'done',
  ABORTED: 'aborted',
} as const;

export type RunState = (typeof RunState)[keyof typeof RunState];

// Run Events
export const RunEvent = {
  WORKSPACE_ACQUIRED: 'workspace_acquired',
  SOURCE_FETCHED: 'source_fetched',
  CONFIG_SEEDED: 'config_seeded',
  EDITOR_STARTED: 'editor_started',
  EDITOR_SUCCEEDED: 'editor_succeeded',
  EDITOR_FAILED: 'editor_failed',
  CONFIG_PERSISTED: 'config_persisted',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const;

export type RunEvent = (typeof RunEvent)[keyof typeof RunEvent];

/**
 * Record of a single state transition.
 */
export interface StateTransition {
  readonly from: RunState;
  readonly to: RunState;
  readonly event: RunEvent;
  readonly timestamp: Date;
}

/**
 * What a finished run reports back to the caller.
 */
export interface RunOutcome {
  runId: string;
  state: RunState;
  /** Baseline file that was overwritten */
  baselinePath: string;
  /** Workspace the run used; already removed when this is returned */
  workspacePath: string;
  workspaceReleased: boolean;
  history: readonly StateTransition[];
  durationMs: number;
}
