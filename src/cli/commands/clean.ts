import { Command } from 'commander';
import { z } from 'zod';
import { resolveTmpRoot } from '../../config/index.js';
import { cleanupStaleWorkspaces } from '../../workspace/index.js';
import { dim, formatError, formatSuccess, print, printError } from '../formatter.js';

const cleanOptionsSchema = z.object({
  tmpDir: z.string().optional(),
  maxAge: z.coerce.number().int().min(0, 'max age must not be negative').default(60),
});

/**
 * Create the clean command.
 */
export function createCleanCommand(): Command {
  return new Command('clean')
    .description('Remove workspaces left behind by runs that were killed')
    .option('--tmp-dir <dir>', 'Parent directory of run workspaces (KCONFIG_TMP_DIR)')
    .option('--max-age <minutes>', 'Only remove workspaces older than this', '60')
    .action(async (options: Record<string, unknown>) => {
      process.exitCode = await runClean(options);
    });
}

export async function runClean(options: Record<string, unknown>): Promise<number> {
  const parsed = cleanOptionsSchema.safeParse(options);
  if (!parsed.success) {
    printError(formatError(`Invalid options: ${parsed.error.errors.map((e) => e.message).join('; ')}`));
    return 2;
  }

  const tmpRoot = resolveTmpRoot(parsed.data.tmpDir);
  const removed = await cleanupStaleWorkspaces(tmpRoot, parsed.data.maxAge * 60_000);

  for (const path of removed) {
    print(dim(`  removed ${path}`));
  }
  print(formatSuccess(`Removed ${removed.length} stale workspace${removed.length === 1 ? '' : 's'}`));
  return 0;
}
