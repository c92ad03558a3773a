import { Command } from 'commander';
import { createEditCommand } from './commands/edit.js';
import { createResolveCommand } from './commands/resolve.js';
import { createCleanCommand } from './commands/clean.js';

const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('kconfig-capture')
    .description('Edit a tracked kernel config against a pinned upstream kernel release')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createEditCommand(), { isDefault: true });
  program.addCommand(createResolveCommand());
  program.addCommand(createCleanCommand());

  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws on --help and --version
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.version' ||
        error.code === 'commander.help')
    ) {
      return;
    }

    throw error;
  }
}

export { runEdit } from './commands/edit.js';
export { runResolve, describeRun, type ResolvedRun } from './commands/resolve.js';
export { runClean } from './commands/clean.js';
