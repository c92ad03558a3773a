/**
 * Run Executor
 *
 * Drives one capture run: preflight, workspace, fetch, seed, edit, persist.
 * The workspace is scoped to the run and released on every exit path;
 * the baseline is only written after the editor exits cleanly.
 */

import { nanoid } from 'nanoid';
import {
  KernelConfigError,
  RunEvent,
  RunStage,
  RunState,
  RunCanceledError,
  type ExtractedSourceTree,
  type RunConfiguration,
  type RunOutcome,
  type StateTransition,
  type Workspace,
} from '../types/index.js';
import {
  assertBaselineExists,
  fetchSource,
  launchEditor,
  persistConfig,
  seedConfig,
  type FetchSourceOptions,
  type LaunchEditorOptions,
} from '../kernel/index.js';
import { WorkspaceManager, withWorkspace } from '../workspace/index.js';
import { createLogger } from '../utils/logger.js';
import { RunStateMachine } from './state-machine.js';

const log = createLogger('run-executor');

/**
 * The components a run is assembled from. Tests swap these out.
 */
export interface RunDependencies {
  createWorkspaceManager: (tmpRoot: string) => WorkspaceManager;
  assertBaselineExists: (config: RunConfiguration) => Promise<string>;
  fetchSource: (
    config: RunConfiguration,
    workspace: Workspace,
    options: FetchSourceOptions
  ) => Promise<ExtractedSourceTree>;
  seedConfig: (config: RunConfiguration, tree: ExtractedSourceTree) => Promise<void>;
  launchEditor: (tree: ExtractedSourceTree, options: LaunchEditorOptions) => Promise<void>;
  persistConfig: (config: RunConfiguration, tree: ExtractedSourceTree) => Promise<string>;
}

export const defaultDependencies: RunDependencies = {
  createWorkspaceManager: (tmpRoot) => new WorkspaceManager(tmpRoot),
  assertBaselineExists,
  fetchSource,
  seedConfig,
  launchEditor,
  persistConfig,
};

export interface ExecuteRunOptions {
  /** Aborting cancels the step in flight and fails the run */
  signal?: AbortSignal;
  onStateChange?: (transition: StateTransition) => void;
  deps?: Partial<RunDependencies>;
}

function cancelReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason.message;
  }
  return typeof reason === 'string' ? reason : 'aborted';
}

function throwIfCanceled(signal: AbortSignal | undefined, stage: RunStage): void {
  if (signal?.aborted) {
    throw new RunCanceledError(stage, cancelReason(signal));
  }
}

/**
 * Execute one capture run.
 *
 * @throws KernelConfigError subclasses naming the failed stage
 */
export async function executeRun(
  config: RunConfiguration,
  options: ExecuteRunOptions = {}
): Promise<RunOutcome> {
  const deps: RunDependencies = { ...defaultDependencies, ...options.deps };
  const { signal } = options;
  const runId = nanoid(10);
  const startedAt = Date.now();
  const machine = new RunStateMachine(runId);
  if (options.onStateChange) {
    machine.on('state-changed', options.onStateChange);
  }

  const manager = deps.createWorkspaceManager(config.tmpRoot);
  let stage: RunStage = RunStage.SEED;

  log.info(
    { runId, version: config.pinnedVersion, configFile: config.configFileName },
    'Run started'
  );

  try {
    // Checked up front so a missing baseline never costs a download
    throwIfCanceled(signal, stage);
    await deps.assertBaselineExists(config);

    stage = RunStage.WORKSPACE;
    throwIfCanceled(signal, stage);

    const baselinePath = await withWorkspace(manager, async (workspace) => {
      machine.transition(RunEvent.WORKSPACE_ACQUIRED);

      stage = RunStage.FETCH;
      throwIfCanceled(signal, stage);
      const tree = await deps.fetchSource(config, workspace, { signal });
      machine.transition(RunEvent.SOURCE_FETCHED);

      stage = RunStage.SEED;
      throwIfCanceled(signal, stage);
      await deps.seedConfig(config, tree);
      machine.transition(RunEvent.CONFIG_SEEDED);

      stage = RunStage.EDIT;
      throwIfCanceled(signal, stage);
      machine.transition(RunEvent.EDITOR_STARTED);
      try {
        await deps.launchEditor(tree, {
          command: config.editorCommand,
          args: [config.editorTarget],
          signal,
        });
      } catch (error) {
        machine.transition(RunEvent.EDITOR_FAILED);
        throw error;
      }
      machine.transition(RunEvent.EDITOR_SUCCEEDED);

      // The editor succeeded, so the result is kept even if a cancel arrives now
      stage = RunStage.PERSIST;
      const target = await deps.persistConfig(config, tree);
      machine.transition(RunEvent.CONFIG_PERSISTED);
      return target;
    });

    machine.transition(RunEvent.COMPLETED);

    const outcome: RunOutcome = {
      runId,
      state: machine.currentState,
      baselinePath,
      workspacePath: manager.current?.path ?? '',
      workspaceReleased: manager.released,
      history: machine.history,
      durationMs: Date.now() - startedAt,
    };

    log.info(
      { runId, baselinePath, durationMs: outcome.durationMs, workspaceReleased: outcome.workspaceReleased },
      'Run completed'
    );
    return outcome;
  } catch (error) {
    const baselineSaved = machine.history.some((t) => t.to === RunState.CONFIG_PERSISTED);
    if (!machine.isTerminal) {
      machine.transition(RunEvent.FAILED);
    }

    log.error(
      {
        runId,
        stage,
        state: machine.currentState,
        workspaceReleased: manager.released,
        baselineSaved,
        error: error instanceof Error ? error.message : String(error),
      },
      'Run aborted'
    );

    const failure =
      signal?.aborted && !(error instanceof RunCanceledError)
        ? new RunCanceledError(stage, cancelReason(signal), { cause: error })
        : error;
    if (baselineSaved && failure instanceof KernelConfigError) {
      failure.baselineSaved = true;
    }
    throw failure;
  }
}
