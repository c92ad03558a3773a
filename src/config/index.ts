/**
 * Run Configuration Module
 *
 * Resolves the settings for one capture run from environment variables
 * (a .env file is loaded by the entry point) and command-line overrides,
 * validates them, and returns a frozen RunConfiguration.
 */

import { tmpdir } from 'node:os';
import { resolve } from 'node:path';
import { z } from 'zod';
import { EditorTarget, ConfigurationError, type RunConfiguration } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

export const DEFAULT_CONFIG_DIR = 'kernel/config';
export const DEFAULT_MIRROR_URL = 'https://cdn.kernel.org/pub/linux/kernel';
export const DEFAULT_EDITOR_COMMAND = 'make';

/**
 * Environment variable backing each setting.
 */
export const ENV_KEYS = {
  pinnedVersion: 'KCONFIG_KERNEL_VERSION',
  configFileName: 'KCONFIG_CONFIG_FILE',
  configDir: 'KCONFIG_CONFIG_DIR',
  mirrorUrl: 'KCONFIG_MIRROR_URL',
  editorCommand: 'KCONFIG_EDITOR_COMMAND',
  editorTarget: 'KCONFIG_EDITOR_TARGET',
  tmpRoot: 'KCONFIG_TMP_DIR',
} as const satisfies Record<keyof RunConfiguration, string>;

/**
 * Upstream release names: 6.6, 6.6.30, 6.9-rc3
 */
const KERNEL_VERSION_PATTERN = /^\d+\.\d+(\.\d+)?(-rc\d+)?$/;

const runConfigSchema = z.object({
  pinnedVersion: z
    .string({
      required_error: `kernel version is required (${ENV_KEYS.pinnedVersion} or --kernel-version)`,
    })
    .regex(KERNEL_VERSION_PATTERN, 'kernel version must look like 6.6, 6.6.30 or 6.9-rc3'),
  configFileName: z
    .string({
      required_error: `config file name is required (${ENV_KEYS.configFileName} or --config-file)`,
    })
    .refine(
      (name) => !/[\\/]/.test(name) && name !== '.' && name !== '..',
      'config file must be a bare file name, not a path'
    ),
  configDir: z.string().default(DEFAULT_CONFIG_DIR),
  mirrorUrl: z
    .string()
    .url('mirror must be a URL')
    .refine((url) => /^https?:\/\//i.test(url), 'mirror must use http or https')
    .default(DEFAULT_MIRROR_URL),
  editorCommand: z.string().default(DEFAULT_EDITOR_COMMAND),
  editorTarget: z
    .nativeEnum(EditorTarget, {
      errorMap: () => ({
        message: `editor target must be one of ${Object.values(EditorTarget).join(', ')}`,
      }),
    })
    .default(EditorTarget.MENUCONFIG),
  tmpRoot: z.string().optional(),
});

/**
 * Values given on the command line. They win over the environment.
 */
export type ConfigOverrides = Partial<Record<keyof RunConfiguration, string>>;

/**
 * First candidate that is set and not blank, trimmed.
 */
function pick(...candidates: (string | undefined)[]): string | undefined {
  for (const candidate of candidates) {
    if (candidate !== undefined && candidate.trim() !== '') {
      return candidate.trim();
    }
  }
  return undefined;
}

/**
 * Resolve and validate the run configuration.
 *
 * @throws ConfigurationError listing every invalid or missing setting
 */
export function resolveRunConfiguration(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): RunConfiguration {
  const raw = {
    pinnedVersion: pick(overrides.pinnedVersion, env[ENV_KEYS.pinnedVersion]),
    configFileName: pick(overrides.configFileName, env[ENV_KEYS.configFileName]),
    configDir: pick(overrides.configDir, env[ENV_KEYS.configDir]),
    mirrorUrl: pick(overrides.mirrorUrl, env[ENV_KEYS.mirrorUrl]),
    editorCommand: pick(overrides.editorCommand, env[ENV_KEYS.editorCommand]),
    editorTarget: pick(overrides.editorTarget, env[ENV_KEYS.editorTarget]),
    tmpRoot: pick(overrides.tmpRoot, env[ENV_KEYS.tmpRoot]),
  };

  const result = runConfigSchema.safeParse(raw);

  if (!result.success) {
    const problems = result.error.errors.map((issue) => issue.message);
    log.error({ problems }, 'Invalid configuration');
    throw new ConfigurationError(problems);
  }

  const data = result.data;
  const config: RunConfiguration = Object.freeze({
    pinnedVersion: data.pinnedVersion,
    configFileName: data.configFileName,
    configDir: resolve(cwd, data.configDir),
    mirrorUrl: data.mirrorUrl.replace(/\/+$/, ''),
    editorCommand: data.editorCommand,
    editorTarget: data.editorTarget,
    tmpRoot: resolve(cwd, data.tmpRoot ?? tmpdir()),
  });

  log.debug(
    {
      pinnedVersion: config.pinnedVersion,
      configFileName: config.configFileName,
      configDir: config.configDir,
    },
    'Configuration resolved'
  );

  return config;
}

/**
 * Workspace parent directory on its own, for commands that need no version.
 */
export function resolveTmpRoot(
  override?: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): string {
  return resolve(cwd, pick(override, env[ENV_KEYS.tmpRoot]) ?? tmpdir());
}
