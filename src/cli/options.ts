import { Command } from 'commander';
import { z } from 'zod';
import { EditorTarget } from '../types/index.js';
import type { ConfigOverrides } from '../config/index.js';

/**
 * Options shared by every command that resolves a run configuration.
 */
export const configOptionsSchema = z.object({
  kernelVersion: z.string().optional(),
  configFile: z.string().optional(),
  configDir: z.string().optional(),
  mirror: z.string().optional(),
  editorCommand: z.string().optional(),
  target: z.string().optional(),
  tmpDir: z.string().optional(),
});

export type ConfigOptions = z.infer<typeof configOptionsSchema>;

export function addConfigOptions(command: Command): Command {
  return command
    .option('-k, --kernel-version <version>', 'Pinned upstream kernel release (KCONFIG_KERNEL_VERSION)')
    .option('-c, --config-file <name>', 'Baseline config file name (KCONFIG_CONFIG_FILE)')
    .option('--config-dir <dir>', 'Directory holding baseline configs (KCONFIG_CONFIG_DIR)')
    .option('--mirror <url>', 'Kernel archive mirror (KCONFIG_MIRROR_URL)')
    .option('--editor-command <command>', 'Program that runs the editor target (KCONFIG_EDITOR_COMMAND)')
    .option(
      '-t, --target <target>',
      `Editor target (${Object.values(EditorTarget).join(', ')}) (KCONFIG_EDITOR_TARGET)`
    )
    .option('--tmp-dir <dir>', 'Parent directory for the run workspace (KCONFIG_TMP_DIR)');
}

export function toConfigOverrides(options: ConfigOptions): ConfigOverrides {
  return {
    pinnedVersion: options.kernelVersion,
    configFileName: options.configFile,
    configDir: options.configDir,
    mirrorUrl: options.mirror,
    editorCommand: options.editorCommand,
    editorTarget: options.target,
    tmpRoot: options.tmpDir,
  };
}
