import { mkdir, rm, readdir, stat } from 'node:fs/promises';
import { join, resolve, sep } from 'node:path';
import { nanoid } from 'nanoid';
import { createLogger } from './logger.js';

const log = createLogger('temp');

/**
 * Create a new, uniquely named directory `<root>/<prefix>-<id>`.
 * Fails rather than reuse a directory that already exists.
 */
export async function createTempDir(
  root: string,
  prefix: string
): Promise<{ id: string; path: string }> {
  await mkdir(root, { recursive: true });

  const id = nanoid(10);
  const dirPath = join(resolve(root), `${prefix}-${id}`);
  await mkdir(dirPath);

  log.debug({ dirPath }, 'Created temp directory');
  return { id, path: dirPath };
}

/**
 * Recursively remove a directory under root. Missing directories are fine.
 */
export async function removeTempDir(root: string, path: string): Promise<void> {
  const tmpRoot = resolve(root);

  // Safety check: only remove directories under root
  if (!resolve(path).startsWith(tmpRoot + sep)) {
    throw new Error(`Refusing to remove directory outside ${tmpRoot}: ${path}`);
  }

  await rm(path, { recursive: true, force: true });
  log.debug({ path }, 'Removed temp directory');
}

export async function listTempDirs(root: string, prefix: string): Promise<string[]> {
  try {
    const entries = await readdir(root, { withFileTypes: true });
    return entries
      .filter((e) => e.isDirectory() && e.name.startsWith(`${prefix}-`))
      .map((e) => join(resolve(root), e.name));
  } catch (error) {
    if (isMissing(error)) {
      return [];
    }
    throw error;
  }
}

export async function cleanupStaleTempDirs(
  root: string,
  prefix: string,
  maxAgeMs: number,
  now: number = Date.now()
): Promise<string[]> {
  const dirs = await listTempDirs(root, prefix);
  const removed: string[] = [];

  for (const dir of dirs) {
    try {
      const stats = await stat(dir);
      const age = now - stats.mtimeMs;

      if (age > maxAgeMs) {
        await removeTempDir(root, dir);
        removed.push(dir);
      }
    } catch (error) {
      log.warn({ dir, error }, 'Error checking temp directory age');
    }
  }

  if (removed.length > 0) {
    log.info({ cleaned: removed.length }, 'Cleaned up stale temp directories');
  }

  return removed;
}

export function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
