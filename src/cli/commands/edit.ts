import { Command } from 'commander';
import { resolveRunConfiguration } from '../../config/index.js';
import { executeRun, type RunDependencies } from '../../orchestrator/index.js';
import {
  KernelConfigError,
  RunStage,
  WorkspaceError,
  type StateTransition,
} from '../../types/index.js';
import { addConfigOptions, configOptionsSchema, toConfigOverrides } from '../options.js';
import {
  dim,
  formatError,
  formatRunOutcome,
  formatSuccess,
  formatWarning,
  print,
  printError,
} from '../formatter.js';

/**
 * Signals that cancel a run. Each one still releases the workspace.
 */
const CANCEL_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/**
 * Create the edit command.
 */
export function createEditCommand(): Command {
  return addConfigOptions(
    new Command('edit').description(
      'Download the pinned kernel, edit the baseline config interactively, and save it back'
    )
  ).action(async (options: Record<string, unknown>) => {
    process.exitCode = await runEdit(options);
  });
}

function reportFailure(error: unknown): number {
  if (error instanceof KernelConfigError) {
    printError(formatError(`Failed at stage '${error.stage}': ${error.message}`));
    if (error.baselineSaved) {
      printError(dim('The edited config was saved to the baseline.'));
      if (error instanceof WorkspaceError) {
        printError(dim("Remove the leftover workspace with 'kconfig-capture clean'."));
      }
    } else if (error.stage !== RunStage.CONFIGURATION) {
      printError(dim('The baseline config was left unchanged.'));
    }
    return error.exitCode;
  }

  printError(formatError(error instanceof Error ? error.message : String(error)));
  return 1;
}

/**
 * Run one capture and return the process exit code.
 */
export async function runEdit(
  options: Record<string, unknown>,
  deps?: Partial<RunDependencies>
): Promise<number> {
  const parsed = configOptionsSchema.safeParse(options);
  if (!parsed.success) {
    printError(formatError(`Invalid options: ${parsed.error.message}`));
    return 2;
  }

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    printError(formatWarning(`Received ${signal}, cleaning up...`));
    controller.abort(`received ${signal}`);
  };

  for (const signal of CANCEL_SIGNALS) {
    process.on(signal, onSignal);
  }

  try {
    const config = resolveRunConfiguration(toConfigOverrides(parsed.data));
    print(
      `Editing ${config.configFileName} against linux-${config.pinnedVersion} ` +
        dim(`(${config.editorCommand} ${config.editorTarget})`)
    );

    const outcome = await executeRun(config, {
      signal: controller.signal,
      onStateChange: (transition: StateTransition) => {
        print(dim(`  ${transition.from} -> ${transition.to}`));
      },
      ...(deps ? { deps } : {}),
    });

    print(formatSuccess(`Saved ${outcome.baselinePath}`));
    print(formatRunOutcome(outcome));
    return 0;
  } catch (error) {
    return reportFailure(error);
  } finally {
    for (const signal of CANCEL_SIGNALS) {
      process.off(signal, onSignal);
    }
  }
}
