import { WorkspaceError, type Workspace } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import {
  createTempDir,
  removeTempDir,
  listTempDirs,
  cleanupStaleTempDirs,
} from '../utils/temp.js';

const log = createLogger('workspace-manager');

/**
 * Directory name prefix for run workspaces
 */
export const WORKSPACE_PREFIX = 'kconfig';

/**
 * Owns the single temporary directory of one run.
 *
 * The directory exists from `acquire()` until `release()`. Release is
 * idempotent: the removal runs once and every later call awaits the same
 * result.
 */
export class WorkspaceManager {
  private workspace: Workspace | null = null;
  private releasing: Promise<void> | null = null;

  constructor(private readonly tmpRoot: string) {}

  /**
   * The acquired workspace, or null before acquire()
   */
  get current(): Workspace | null {
    return this.workspace;
  }

  get released(): boolean {
    return this.releasing !== null;
  }

  /**
   * Create the run's workspace directory.
   *
   * @throws WorkspaceError if called twice or the directory cannot be created
   */
  async acquire(): Promise<Workspace> {
    if (this.workspace || this.releasing) {
      throw new WorkspaceError('A workspace has already been acquired for this run');
    }

    let workspace: Workspace;
    try {
      const { id, path } = await createTempDir(this.tmpRoot, WORKSPACE_PREFIX);
      workspace = { id, path, createdAt: new Date() };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new WorkspaceError(
        `Cannot create workspace under ${this.tmpRoot}: ${message}`,
        { cause: error }
      );
    }

    this.workspace = workspace;
    log.info({ id: workspace.id, path: workspace.path }, 'Workspace acquired');
    return workspace;
  }

  /**
   * Remove the workspace and everything under it.
   */
  release(): Promise<void> {
    if (this.releasing) {
      return this.releasing;
    }

    const workspace = this.workspace;
    if (!workspace) {
      this.releasing = Promise.resolve();
      return this.releasing;
    }

    this.releasing = removeTempDir(this.tmpRoot, workspace.path).then(
      () => {
        log.info({ id: workspace.id, path: workspace.path }, 'Workspace released');
      },
      (error: unknown) => {
        log.error({ id: workspace.id, path: workspace.path, error }, 'Failed to release workspace');
        throw new WorkspaceError(`Failed to remove workspace ${workspace.path}`, {
          cause: error,
        });
      }
    );
    return this.releasing;
  }
}

/**
 * Run `fn` with a freshly acquired workspace, releasing it on every exit
 * path.
 *
 * If `fn` throws, that error is the one rethrown; a failed release is only
 * logged. A failed release after `fn` succeeded surfaces as WorkspaceError.
 */
export async function withWorkspace<T>(
  manager: WorkspaceManager,
  fn: (workspace: Workspace) => Promise<T>
): Promise<T> {
  const workspace = await manager.acquire();

  let result: T;
  try {
    result = await fn(workspace);
  } catch (error) {
    await manager.release().catch((releaseError: unknown) => {
      log.warn(
        { path: workspace.path, error: releaseError },
        'Workspace left behind after a failed run'
      );
    });
    throw error;
  }

  await manager.release();
  return result;
}

/**
 * Workspaces left under tmpRoot, e.g. by a process killed with SIGKILL
 */
export function listWorkspaces(tmpRoot: string): Promise<string[]> {
  return listTempDirs(tmpRoot, WORKSPACE_PREFIX);
}

/**
 * Remove leftover workspaces older than maxAgeMs. Returns removed paths.
 */
export function cleanupStaleWorkspaces(
  tmpRoot: string,
  maxAgeMs: number,
  now?: number
): Promise<string[]> {
  return cleanupStaleTempDirs(tmpRoot, WORKSPACE_PREFIX, maxAgeMs, now);
}
