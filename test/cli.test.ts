/**
 * CLI Command Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { createProgram, runClean, runEdit, runResolve } from '../src/cli/index.js';
import { archiveUrl, fetchSource, type FetchFn } from '../src/kernel/index.js';
import { WorkspaceManager, listWorkspaces } from '../src/workspace/index.js';
import { EditorFailure, RunCanceledError, RunStage, WorkspaceError } from '../src/types/index.js';
import type { RunDependencies } from '../src/orchestrator/index.js';
import { buildSourceArchive, fakeMirror, type FakeMirror } from './helpers/fixtures.js';

const MIRROR = 'https://mirror.test/linux';
const BASELINE = 'CONFIG_64BIT=y\n';

function printed(spy: MockInstance<typeof console.log>): string[] {
  return spy.mock.calls.map((call) => String(call[0]));
}

describe('CLI', () => {
  let dir: string;
  let configDir: string;
  let tmpRoot: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.log>;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'kconfig-cli-test-'));
    configDir = path.join(dir, 'config');
    tmpRoot = path.join(dir, 'tmp');
    await fs.mkdir(configDir);
    await fs.writeFile(path.join(configDir, 'x86_64.config'), BASELINE);

    vi.stubEnv('NO_COLOR', '1');
    vi.stubEnv('KCONFIG_KERNEL_VERSION', '');
    vi.stubEnv('KCONFIG_CONFIG_FILE', '');
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    error = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    await fs.rm(dir, { recursive: true, force: true });
  });

  const options = (extra: Record<string, unknown> = {}): Record<string, unknown> => ({
    kernelVersion: '6.6.1',
    configFile: 'x86_64.config',
    configDir,
    mirror: MIRROR,
    tmpDir: tmpRoot,
    ...extra,
  });

  describe('createProgram', () => {
    it('should register the commands', () => {
      const program = createProgram();
      expect(program.name()).toBe('kconfig-capture');
      expect(program.commands.map((c) => c.name())).toEqual(['edit', 'resolve', 'clean']);
    });
  });

  describe('runEdit', () => {
    let mirror: FakeMirror;

    beforeEach(async () => {
      const archive = await buildSourceArchive(dir, '6.6.1');
      mirror = fakeMirror({ [archiveUrl('6.6.1', MIRROR)]: archive });
    });

    function deps(launch: RunDependencies['launchEditor']): Partial<RunDependencies> {
      return {
        fetchSource: (config, workspace, opts) =>
          fetchSource(config, workspace, { ...opts, fetch: mirror.fetch }),
        launchEditor: launch,
      };
    }

    it('should save the edited config and exit 0', async () => {
      const code = await runEdit(
        options(),
        deps(async (tree) => {
          await fs.writeFile(tree.configPath, 'CONFIG_64BIT=y\nCONFIG_NET=y\n');
        })
      );

      expect(code).toBe(0);
      expect(await fs.readFile(path.join(configDir, 'x86_64.config'), 'utf-8')).toBe(
        'CONFIG_64BIT=y\nCONFIG_NET=y\n'
      );
      expect(printed(log)).toContain(`✓ Saved ${path.join(configDir, 'x86_64.config')}`);
      expect(printed(log)).toContain('  idle -> workspace_acquired');
    });

    it('should exit 1 and name the stage when the editor fails', async () => {
      const code = await runEdit(
        options(),
        deps(async () => {
          throw new EditorFailure('make menuconfig exited with code 2', { exitCode: 2 });
        })
      );

      expect(code).toBe(1);
      expect(printed(error)).toEqual([
        "✗ Failed at stage 'edit': make menuconfig exited with code 2",
        'The baseline config was left unchanged.',
      ]);
      expect(await fs.readFile(path.join(configDir, 'x86_64.config'), 'utf-8')).toBe(BASELINE);
      expect(await listWorkspaces(tmpRoot)).toEqual([]);
    });

    it('should exit 130 when the run was canceled', async () => {
      const code = await runEdit(
        options(),
        deps(async () => {
          throw new RunCanceledError(RunStage.EDIT, 'received SIGINT');
        })
      );

      expect(code).toBe(130);
    });

    it('should cancel on a signal, release the workspace and exit 130', async () => {
      let fetchStarted: () => void = () => {};
      const started = new Promise<void>((resolve) => {
        fetchStarted = resolve;
      });
      const stalledFetch: FetchFn = (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (!signal) {
            reject(new Error('fetch was not given an abort signal'));
            return;
          }
          signal.addEventListener('abort', () => reject(new Error(String(signal.reason))));
          fetchStarted();
        });

      const pending = runEdit(options(), {
        fetchSource: (config, workspace, opts) =>
          fetchSource(config, workspace, { ...opts, fetch: stalledFetch }),
        launchEditor: async () => {},
      });
      await started;
      process.emit('SIGHUP', 'SIGHUP');
      const code = await pending;

      expect(code).toBe(130);
      expect(await listWorkspaces(tmpRoot)).toEqual([]);
      expect(await fs.readFile(path.join(configDir, 'x86_64.config'), 'utf-8')).toBe(BASELINE);
      expect(printed(error)).toEqual([
        '! Received SIGHUP, cleaning up...',
        "✗ Failed at stage 'fetch': Run canceled during fetch: received SIGHUP",
        'The baseline config was left unchanged.',
      ]);
    });

    it('should say the config was saved when only the workspace removal failed', async () => {
      class FailingReleaseManager extends WorkspaceManager {
        override async release(): Promise<void> {
          await super.release();
          throw new WorkspaceError('Failed to remove workspace');
        }
      }

      const code = await runEdit(options(), {
        ...deps(async (tree) => {
          await fs.writeFile(tree.configPath, 'CONFIG_NEW=y\n');
        }),
        createWorkspaceManager: (root) => new FailingReleaseManager(root),
      });

      expect(code).toBe(1);
      expect(await fs.readFile(path.join(configDir, 'x86_64.config'), 'utf-8')).toBe('CONFIG_NEW=y\n');
      expect(printed(error)).toEqual([
        "✗ Failed at stage 'workspace': Failed to remove workspace",
        'The edited config was saved to the baseline.',
        "Remove the leftover workspace with 'kconfig-capture clean'.",
      ]);
    });

    it('should exit 2 without touching the mirror when the version is missing', async () => {
      const code = await runEdit(options({ kernelVersion: undefined }), deps(async () => {}));

      expect(code).toBe(2);
      expect(mirror.requests).toEqual([]);
      expect(printed(error)).toEqual([
        "✗ Failed at stage 'configuration': Invalid configuration: kernel version is required (KCONFIG_KERNEL_VERSION or --kernel-version)",
      ]);
    });

    it('should remove its signal handlers when done', async () => {
      const before = process.listenerCount('SIGINT');
      await runEdit(options(), deps(async () => {}));
      expect(process.listenerCount('SIGINT')).toBe(before);
    });
  });

  describe('runResolve', () => {
    it('should print the resolved run as JSON', async () => {
      const code = await runResolve(options({ json: true }));

      expect(code).toBe(0);
      expect(JSON.parse(printed(log)[0] ?? '')).toEqual({
        pinnedVersion: '6.6.1',
        configFileName: 'x86_64.config',
        baselinePath: path.join(configDir, 'x86_64.config'),
        baselineExists: true,
        archiveUrl: 'https://mirror.test/linux/v6.x/linux-6.6.1.tar.xz',
        editor: 'make menuconfig',
        tmpRoot,
      });
    });

    it('should exit 1 when the baseline is missing', async () => {
      const code = await runResolve(options({ configFile: 'arm64.config' }));

      expect(code).toBe(1);
      expect(printed(log)[0]).toContain('(missing)');
    });

    it('should exit 2 for an unknown editor target', async () => {
      const code = await runResolve(options({ target: 'vimconfig' }));

      expect(code).toBe(2);
      expect(printed(error)).toEqual([
        '✗ Invalid configuration: editor target must be one of config, menuconfig, nconfig, xconfig, gconfig',
      ]);
    });
  });

  describe('runClean', () => {
    it('should remove workspaces older than the max age', async () => {
      const stale = path.join(tmpRoot, 'kconfig-stale');
      const fresh = path.join(tmpRoot, 'kconfig-fresh');
      await fs.mkdir(stale, { recursive: true });
      await fs.mkdir(fresh);
      const twoHoursAgo = new Date(Date.now() - 2 * 60 * 60 * 1000);
      await fs.utimes(stale, twoHoursAgo, twoHoursAgo);

      const code = await runClean({ tmpDir: tmpRoot, maxAge: '60' });

      expect(code).toBe(0);
      expect(await listWorkspaces(tmpRoot)).toEqual([fresh]);
      expect(printed(log)).toEqual([`  removed ${stale}`, '✓ Removed 1 stale workspace']);
    });

    it('should exit 2 for a negative max age', async () => {
      const code = await runClean({ tmpDir: tmpRoot, maxAge: '-5' });

      expect(code).toBe(2);
      expect(printed(error)).toEqual(['✗ Invalid options: max age must not be negative']);
    });
  });
});
