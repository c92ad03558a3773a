/**
 * Shared fixtures: a tiny kernel source archive and a fake mirror.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { execa } from 'execa';
import type { FetchFn } from '../../src/kernel/index.js';
import { EditorTarget, type RunConfiguration } from '../../src/types/index.js';

/**
 * Build `linux-<version>.tar` containing `linux-<version>/Makefile`.
 */
export async function buildSourceArchive(dir: string, version: string): Promise<Uint8Array> {
  const stage = path.join(dir, 'archive-stage');
  const tree = path.join(stage, `linux-${version}`);
  await fs.mkdir(tree, { recursive: true });
  await fs.writeFile(path.join(tree, 'Makefile'), 'menuconfig:\n\t@true\n');

  const archive = path.join(dir, `linux-${version}.tar`);
  await execa('tar', ['-cf', archive, '-C', stage, `linux-${version}`]);
  const bytes = new Uint8Array(await fs.readFile(archive));

  await fs.rm(stage, { recursive: true, force: true });
  await fs.rm(archive, { force: true });
  return bytes;
}

export interface FakeMirror {
  fetch: FetchFn;
  requests: string[];
}

/**
 * A fetch that serves the given archives by URL and 404s everything else.
 */
export function fakeMirror(archives: Record<string, Uint8Array>): FakeMirror {
  const requests: string[] = [];
  const fetchImpl: FetchFn = async (input) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    requests.push(url);

    const body = archives[url];
    if (!body) {
      return new Response('not found', { status: 404 });
    }
    return new Response(body, {
      status: 200,
      headers: { 'content-length': String(body.byteLength) },
    });
  };
  return { fetch: fetchImpl, requests };
}

export function testConfig(
  overrides: Partial<RunConfiguration> & { configDir: string; tmpRoot: string }
): RunConfiguration {
  return Object.freeze({
    pinnedVersion: '6.6.1',
    configFileName: 'test.config',
    mirrorUrl: 'https://mirror.test/linux',
    editorCommand: 'make',
    editorTarget: EditorTarget.MENUCONFIG,
    ...overrides,
  });
}
