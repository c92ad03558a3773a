import { access, copyFile, rename, rm } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { nanoid } from 'nanoid';
import {
  ConfigFileError,
  NotFoundError,
  RunStage,
  type ExtractedSourceTree,
  type RunConfiguration,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { isMissing } from '../utils/temp.js';

const log = createLogger('config-files');

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Permanent location of the tracked baseline config
 */
export function baselinePath(config: RunConfiguration): string {
  return join(config.configDir, config.configFileName);
}

/**
 * Fail before any network work if there is nothing to seed from.
 */
export async function assertBaselineExists(config: RunConfiguration): Promise<string> {
  const path = baselinePath(config);
  try {
    await access(path);
  } catch (error) {
    throw new NotFoundError(
      `Baseline config ${path} does not exist; create it before editing`,
      path,
      RunStage.SEED,
      { cause: error }
    );
  }
  return path;
}

/**
 * Copy the baseline into the source tree as .config.
 */
export async function seedConfig(
  config: RunConfiguration,
  tree: ExtractedSourceTree
): Promise<void> {
  const source = baselinePath(config);

  try {
    await copyFile(source, tree.configPath);
  } catch (error) {
    if (isMissing(error)) {
      throw new NotFoundError(`Baseline config ${source} does not exist`, source, RunStage.SEED, {
        cause: error,
      });
    }
    throw new ConfigFileError(
      `Cannot copy ${source} to ${tree.configPath}: ${errorMessage(error)}`,
      source,
      RunStage.SEED,
      { cause: error }
    );
  }

  log.info({ from: source, to: tree.configPath }, 'Seeded kernel config');
}

/**
 * Copy the edited .config back over the baseline.
 *
 * Writes a sibling file first and renames it into place, so the baseline is
 * either the old bytes or the new ones.
 */
export async function persistConfig(
  config: RunConfiguration,
  tree: ExtractedSourceTree
): Promise<string> {
  const target = baselinePath(config);
  const staging = join(dirname(target), `.${basename(target)}.${nanoid(6)}.tmp`);

  try {
    await copyFile(tree.configPath, staging);
  } catch (error) {
    if (isMissing(error)) {
      throw new NotFoundError(
        `Edited config ${tree.configPath} is missing; the editor did not leave one behind`,
        tree.configPath,
        RunStage.PERSIST,
        { cause: error }
      );
    }
    await rm(staging, { force: true });
    throw new ConfigFileError(
      `Cannot copy ${tree.configPath} to ${staging}: ${errorMessage(error)}`,
      target,
      RunStage.PERSIST,
      { cause: error }
    );
  }

  try {
    await rename(staging, target);
  } catch (error) {
    await rm(staging, { force: true });
    throw new ConfigFileError(`Cannot replace ${target}: ${errorMessage(error)}`, target, RunStage.PERSIST, {
      cause: error,
    });
  }

  log.info({ from: tree.configPath, to: target }, 'Persisted kernel config');
  return target;
}
