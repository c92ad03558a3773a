/**
 * Kernel source download and extraction.
 *
 * Fetches `linux-<version>.tar.xz` from a kernel.org-style mirror into the
 * run workspace and unpacks it with the system tar, producing the tree at
 * `<workspace>/linux-<version>`.
 */

import { createWriteStream } from 'node:fs';
import { access, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { execa } from 'execa';
import {
  ExtractionError,
  FetchError,
  type ExtractedSourceTree,
  type RunConfiguration,
  type Workspace,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('source-fetcher');

export type FetchFn = typeof fetch;

/**
 * Unpacks an archive into a directory.
 */
export type Extractor = (
  archivePath: string,
  destDir: string,
  signal?: AbortSignal
) => Promise<void>;

export interface FetchSourceOptions {
  signal?: AbortSignal;
  fetch?: FetchFn;
  extract?: Extractor;
}

/**
 * Archive file name for a release
 */
export function archiveName(version: string): string {
  return `linux-${version}.tar.xz`;
}

/**
 * Mirror URL of the release archive: `<mirror>/v<major>.x/linux-<version>.tar.xz`
 */
export function archiveUrl(version: string, mirrorUrl: string): string {
  const major = version.split('.')[0] ?? version;
  return `${mirrorUrl.replace(/\/+$/, '')}/v${major}.x/${archiveName(version)}`;
}

/**
 * Where the extracted tree lives inside a workspace
 */
export function sourceTreePath(workspace: Workspace, version: string): string {
  return join(workspace.path, `linux-${version}`);
}

/**
 * Extract with the system tar. tar detects the compression itself.
 */
export const extractArchive: Extractor = async (archivePath, destDir, signal) => {
  await execa('tar', ['-xf', archivePath, '-C', destDir], {
    cancelSignal: signal,
  });
};

/**
 * Stream the archive for `version` to `archivePath`.
 *
 * @throws FetchError on network failure, a non-2xx answer, or a short body
 */
async function download(
  url: string,
  version: string,
  archivePath: string,
  fetchImpl: FetchFn,
  signal?: AbortSignal
): Promise<number> {
  let response: Response;
  try {
    response = await fetchImpl(url, { signal });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new FetchError(`Download of ${url} failed: ${message}`, url, null, { cause: error });
  }

  if (response.status === 404 || response.status === 410) {
    throw new FetchError(
      `No source archive for kernel ${version} at ${url} (HTTP ${response.status})`,
      url,
      response.status
    );
  }

  if (!response.ok) {
    throw new FetchError(
      `Download of ${url} failed with HTTP ${response.status}`,
      url,
      response.status
    );
  }

  if (!response.body) {
    throw new FetchError(`Download of ${url} returned no body`, url, response.status);
  }

  // Content-Length counts encoded bytes, so only compare when nothing was decoded
  const lengthHeader = response.headers.get('content-length');
  const expectedBytes =
    lengthHeader !== null && response.headers.get('content-encoding') === null
      ? Number(lengthHeader)
      : null;

  try {
    await pipeline(Readable.fromWeb(response.body), createWriteStream(archivePath), { signal });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new FetchError(`Transfer of ${url} was interrupted: ${message}`, url, response.status, {
      cause: error,
    });
  }

  const { size } = await stat(archivePath);
  if (expectedBytes !== null && Number.isFinite(expectedBytes) && size !== expectedBytes) {
    throw new FetchError(
      `Incomplete transfer of ${url}: received ${size} of ${expectedBytes} bytes`,
      url,
      response.status
    );
  }

  return size;
}

/**
 * Download and extract the pinned kernel release into the workspace.
 */
export async function fetchSource(
  config: RunConfiguration,
  workspace: Workspace,
  options: FetchSourceOptions = {}
): Promise<ExtractedSourceTree> {
  const { signal, fetch: fetchImpl = fetch, extract = extractArchive } = options;
  const version = config.pinnedVersion;
  const url = archiveUrl(version, config.mirrorUrl);
  const archivePath = join(workspace.path, archiveName(version));
  const rootPath = sourceTreePath(workspace, version);

  log.info({ version, url }, 'Downloading kernel source');
  const bytes = await download(url, version, archivePath, fetchImpl, signal);
  log.info({ version, bytes, archivePath }, 'Kernel source downloaded');

  log.info({ archivePath }, 'Extracting kernel source');
  try {
    await extract(archivePath, workspace.path, signal);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ExtractionError(`Extraction of ${archivePath} failed: ${message}`, archivePath, {
      cause: error,
    });
  }

  try {
    await access(rootPath);
  } catch (error) {
    throw new ExtractionError(
      `Archive ${archivePath} did not contain linux-${version}/`,
      archivePath,
      { cause: error }
    );
  }

  await rm(archivePath, { force: true });
  log.info({ rootPath }, 'Kernel source extracted');

  return {
    version,
    rootPath,
    configPath: join(rootPath, '.config'),
  };
}
