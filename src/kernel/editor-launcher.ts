import { execa } from 'execa';
import { EditorFailure, type ExtractedSourceTree } from '../types/index.js';
import { createLogger, flushLogs } from '../utils/logger.js';

const log = createLogger('editor-launcher');

export interface LaunchEditorOptions {
  /** Program to run, normally make */
  command: string;
  /** Arguments, normally the kconfig target such as menuconfig */
  args: string[];
  signal?: AbortSignal;
}

/**
 * Run the interactive editor in the source tree and wait for it to exit.
 *
 * The child inherits the terminal. Anything other than a clean zero exit
 * (non-zero code, a signal, a spawn failure, cancellation) is an
 * EditorFailure.
 */
export async function launchEditor(
  tree: ExtractedSourceTree,
  options: LaunchEditorOptions
): Promise<void> {
  const { command, args, signal } = options;

  log.info({ command, args, cwd: tree.rootPath }, 'Starting interactive editor');
  await flushLogs();

  const result = await execa(command, args, {
    cwd: tree.rootPath,
    stdio: 'inherit',
    reject: false,
    cancelSignal: signal,
  });

  if (!result.failed && result.exitCode === 0) {
    log.info({ command }, 'Editor exited successfully');
    return;
  }

  const exitCode = result.exitCode ?? null;
  const signalName = result.signal ?? null;
  log.warn({ command, exitCode, signal: signalName, canceled: result.isCanceled }, 'Editor failed');

  if (result.isCanceled) {
    throw new EditorFailure(`${command} ${args.join(' ')} was canceled`, {
      exitCode,
      signal: signalName,
    });
  }

  if (signalName !== null) {
    throw new EditorFailure(`${command} ${args.join(' ')} was killed by ${signalName}`, {
      exitCode,
      signal: signalName,
    });
  }

  if (exitCode === null) {
    throw new EditorFailure(`${command} ${args.join(' ')} could not be started; is ${command} installed?`, {
      exitCode,
      signal: signalName,
    });
  }

  throw new EditorFailure(`${command} ${args.join(' ')} exited with code ${exitCode}`, {
    exitCode,
    signal: signalName,
  });
}
