/**
 * Run State Machine Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  RunStateMachine,
  InvalidTransitionError,
  STATE_TRANSITIONS,
  canTransition,
  isTerminalState,
} from '../src/orchestrator/index.js';
import { RunEvent, RunState, type StateTransition } from '../src/types/index.js';

describe('STATE_TRANSITIONS', () => {
  it('should let every non-terminal state fail to aborted', () => {
    for (const state of Object.values(RunState)) {
      if (isTerminalState(state)) {
        continue;
      }
      expect(STATE_TRANSITIONS[state][RunEvent.FAILED]).toBe(RunState.ABORTED);
    }
  });

  it('should leave editor_running only through the editor outcome or a failure', () => {
    expect(Object.keys(STATE_TRANSITIONS[RunState.EDITOR_RUNNING]).sort()).toEqual([
      RunEvent.EDITOR_FAILED,
      RunEvent.EDITOR_SUCCEEDED,
      RunEvent.FAILED,
    ]);
  });

  it('should only persist after the editor succeeded', () => {
    expect(canTransition(RunState.EDITOR_SUCCEEDED, RunEvent.CONFIG_PERSISTED)).toBe(true);
    expect(canTransition(RunState.EDITOR_FAILED, RunEvent.CONFIG_PERSISTED)).toBe(false);
    expect(canTransition(RunState.CONFIG_SEEDED, RunEvent.CONFIG_PERSISTED)).toBe(false);
  });

  it('should have no transitions out of terminal states', () => {
    expect(STATE_TRANSITIONS[RunState.DONE]).toEqual({});
    expect(STATE_TRANSITIONS[RunState.ABORTED]).toEqual({});
    expect(isTerminalState(RunState.DONE)).toBe(true);
    expect(isTerminalState(RunState.ABORTED)).toBe(true);
    expect(isTerminalState(RunState.CONFIG_PERSISTED)).toBe(false);
  });
});

describe('RunStateMachine', () => {
  const happyPath = [
    RunEvent.WORKSPACE_ACQUIRED,
    RunEvent.SOURCE_FETCHED,
    RunEvent.CONFIG_SEEDED,
    RunEvent.EDITOR_STARTED,
    RunEvent.EDITOR_SUCCEEDED,
    RunEvent.CONFIG_PERSISTED,
    RunEvent.COMPLETED,
  ];

  it('should start idle', () => {
    const machine = new RunStateMachine('run-1');
    expect(machine.currentState).toBe(RunState.IDLE);
    expect(machine.history).toEqual([]);
    expect(machine.isTerminal).toBe(false);
  });

  it('should reach done along the happy path', () => {
    const machine = new RunStateMachine('run-1');
    for (const event of happyPath) {
      machine.transition(event);
    }

    expect(machine.currentState).toBe(RunState.DONE);
    expect(machine.isTerminal).toBe(true);
    expect(machine.history.map((t) => t.event)).toEqual(happyPath);
    expect(machine.history[0]).toMatchObject({
      from: RunState.IDLE,
      to: RunState.WORKSPACE_ACQUIRED,
    });
  });

  it('should abort after an editor failure', () => {
    const machine = new RunStateMachine('run-2');
    machine.transition(RunEvent.WORKSPACE_ACQUIRED);
    machine.transition(RunEvent.SOURCE_FETCHED);
    machine.transition(RunEvent.CONFIG_SEEDED);
    machine.transition(RunEvent.EDITOR_STARTED);
    machine.transition(RunEvent.EDITOR_FAILED);

    expect(machine.transition(RunEvent.FAILED)).toBe(RunState.ABORTED);
  });

  it('should reject an edge the table does not have', () => {
    const machine = new RunStateMachine('run-3');

    expect(() => machine.transition(RunEvent.CONFIG_PERSISTED)).toThrow(InvalidTransitionError);
    expect(() => machine.transition(RunEvent.CONFIG_PERSISTED)).toThrow(
      "Invalid transition: cannot apply 'config_persisted' to run run-3 in state 'idle'"
    );
    expect(machine.currentState).toBe(RunState.IDLE);
  });

  it('should reject any event once terminal', () => {
    const machine = new RunStateMachine('run-4');
    machine.transition(RunEvent.FAILED);

    expect(() => machine.transition(RunEvent.FAILED)).toThrow(InvalidTransitionError);
  });

  it('should emit state-changed for each transition', () => {
    const machine = new RunStateMachine('run-5');
    const listener = vi.fn<(transition: StateTransition) => void>();
    machine.on('state-changed', listener);

    machine.transition(RunEvent.WORKSPACE_ACQUIRED);
    machine.transition(RunEvent.FAILED);

    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener.mock.calls[1]?.[0]).toMatchObject({
      from: RunState.WORKSPACE_ACQUIRED,
      to: RunState.ABORTED,
      event: RunEvent.FAILED,
    });
  });
});
