import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { RunState, RunEvent, type StateTransition } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

/**
 * Valid transitions per state. Any failure before Done leads to Aborted.
 */
export const STATE_TRANSITIONS: Record<RunState, Partial<Record<RunEvent, RunState>>> = {
  [RunState.IDLE]: {
    [RunEvent.WORKSPACE_ACQUIRED]: RunState.WORKSPACE_ACQUIRED,
    [RunEvent.FAILED]: RunState.ABORTED,
  },
  [RunState.WORKSPACE_ACQUIRED]: {
    [RunEvent.SOURCE_FETCHED]: RunState.SOURCE_FETCHED,
    [RunEvent.FAILED]: RunState.ABORTED,
  },
  [RunState.SOURCE_FETCHED]: {
    [RunEvent.CONFIG_SEEDED]: RunState.CONFIG_SEEDED,
    [RunEvent.FAILED]: RunState.ABORTED,
  },
  [RunState.CONFIG_SEEDED]: {
    [RunEvent.EDITOR_STARTED]: RunState.EDITOR_RUNNING,
    [RunEvent.FAILED]: RunState.ABORTED,
  },
  [RunState.EDITOR_RUNNING]: {
    [RunEvent.EDITOR_SUCCEEDED]: RunState.EDITOR_SUCCEEDED,
    [RunEvent.EDITOR_FAILED]: RunState.EDITOR_FAILED,
    // Failures around the editor itself, not reported by it
    [RunEvent.FAILED]: RunState.ABORTED,
  },
  [RunState.EDITOR_SUCCEEDED]: {
    [RunEvent.CONFIG_PERSISTED]: RunState.CONFIG_PERSISTED,
    [RunEvent.FAILED]: RunState.ABORTED,
  },
  [RunState.EDITOR_FAILED]: {
    [RunEvent.FAILED]: RunState.ABORTED,
  },
  [RunState.CONFIG_PERSISTED]: {
    [RunEvent.COMPLETED]: RunState.DONE,
    // Workspace removal can still fail after the baseline was written
    [RunEvent.FAILED]: RunState.ABORTED,
  },
  [RunState.DONE]: {},
  [RunState.ABORTED]: {},
};

/**
 * Terminal states (no further transitions possible).
 */
export const TERMINAL_STATES: readonly RunState[] = [RunState.DONE, RunState.ABORTED];

export function isTerminalState(state: RunState): boolean {
  return TERMINAL_STATES.includes(state);
}

export function canTransition(state: RunState, event: RunEvent): boolean {
  return event in STATE_TRANSITIONS[state];
}

/**
 * Error thrown when an invalid state transition is attempted.
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly runId: string,
    public readonly fromState: RunState,
    public readonly event: RunEvent
  ) {
    super(`Invalid transition: cannot apply '${event}' to run ${runId} in state '${fromState}'`);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Tracks one run through its states with an audit trail.
 * Emits 'state-changed' with each StateTransition.
 */
export class RunStateMachine extends EventEmitter {
  private readonly logger: Logger;
  private _currentState: RunState = RunState.IDLE;
  private readonly _history: StateTransition[] = [];

  constructor(private readonly runId: string) {
    super();
    this.logger = createLogger(`run:${runId}`);
  }

  get currentState(): RunState {
    return this._currentState;
  }

  get history(): readonly StateTransition[] {
    return this._history;
  }

  get isTerminal(): boolean {
    return isTerminalState(this._currentState);
  }

  /**
   * Apply an event. Throws InvalidTransitionError if the table has no edge.
   */
  transition(event: RunEvent): RunState {
    const nextState = STATE_TRANSITIONS[this._currentState][event];

    if (!nextState) {
      throw new InvalidTransitionError(this.runId, this._currentState, event);
    }

    const transition: StateTransition = {
      from: this._currentState,
      to: nextState,
      event,
      timestamp: new Date(),
    };

    this._currentState = nextState;
    this._history.push(transition);

    this.logger.debug({ from: transition.from, to: nextState, event }, 'State transition');
    this.emit('state-changed', transition);

    return nextState;
  }
}
