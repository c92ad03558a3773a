import { access } from 'node:fs/promises';
import { Command } from 'commander';
import { resolveRunConfiguration } from '../../config/index.js';
import { archiveUrl, baselinePath } from '../../kernel/index.js';
import { KernelConfigError, type RunConfiguration } from '../../types/index.js';
import { addConfigOptions, configOptionsSchema, toConfigOverrides } from '../options.js';
import {
  formatError,
  formatFields,
  formatJson,
  green,
  print,
  printError,
  red,
} from '../formatter.js';

/**
 * What a run would use, without doing any of it.
 */
export interface ResolvedRun {
  pinnedVersion: string;
  configFileName: string;
  baselinePath: string;
  baselineExists: boolean;
  archiveUrl: string;
  editor: string;
  tmpRoot: string;
}

export async function describeRun(config: RunConfiguration): Promise<ResolvedRun> {
  const path = baselinePath(config);
  const baselineExists = await access(path).then(
    () => true,
    () => false
  );

  return {
    pinnedVersion: config.pinnedVersion,
    configFileName: config.configFileName,
    baselinePath: path,
    baselineExists,
    archiveUrl: archiveUrl(config.pinnedVersion, config.mirrorUrl),
    editor: `${config.editorCommand} ${config.editorTarget}`,
    tmpRoot: config.tmpRoot,
  };
}

/**
 * Create the resolve command.
 */
export function createResolveCommand(): Command {
  return addConfigOptions(
    new Command('resolve').description('Show the settings a run would use without running it')
  )
    .option('--json', 'Output as JSON', false)
    .action(async (options: Record<string, unknown>) => {
      process.exitCode = await runResolve(options);
    });
}

export async function runResolve(options: Record<string, unknown>): Promise<number> {
  const parsed = configOptionsSchema.safeParse(options);
  if (!parsed.success) {
    printError(formatError(`Invalid options: ${parsed.error.message}`));
    return 2;
  }

  let resolved: ResolvedRun;
  try {
    resolved = await describeRun(resolveRunConfiguration(toConfigOverrides(parsed.data)));
  } catch (error) {
    if (error instanceof KernelConfigError) {
      printError(formatError(error.message));
      return error.exitCode;
    }
    throw error;
  }

  if (options['json'] === true) {
    print(formatJson(resolved));
  } else {
    print(
      formatFields([
        ['Kernel', resolved.pinnedVersion],
        ['Config', resolved.configFileName],
        ['Baseline', `${resolved.baselinePath} ${resolved.baselineExists ? green('(exists)') : red('(missing)')}`],
        ['Archive', resolved.archiveUrl],
        ['Editor', resolved.editor],
        ['Workspace root', resolved.tmpRoot],
      ])
    );
  }

  return resolved.baselineExists ? 0 : 1;
}
