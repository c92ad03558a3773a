/**
 * Error types for a capture run.
 *
 * Every error carries the stage it came from and the exit code the CLI
 * reports for it. None of them are retried.
 */

export const RunStage = {
  CONFIGURATION: 'configuration',
  WORKSPACE: 'workspace',
  FETCH: 'fetch',
  EXTRACT: 'extract',
  SEED: 'seed',
  EDIT: 'edit',
  PERSIST: 'persist',
} as const;

export type RunStage = (typeof RunStage)[keyof typeof RunStage];

/**
 * Base class for all run failures.
 */
export class KernelConfigError extends Error {
  override readonly name: string = 'KernelConfigError';
  /** Set when the run had already written the baseline before failing */
  baselineSaved = false;

  constructor(
    message: string,
    public readonly stage: RunStage,
    public readonly exitCode: number = 1,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    Object.setPrototypeOf(this, KernelConfigError.prototype);
  }
}

/**
 * A required setting is missing, empty, or malformed.
 */
export class ConfigurationError extends KernelConfigError {
  override readonly name = 'ConfigurationError';
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`, RunStage.CONFIGURATION, 2);
    this.problems = problems;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * The temporary workspace could not be created or used.
 */
export class WorkspaceError extends KernelConfigError {
  override readonly name = 'WorkspaceError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, RunStage.WORKSPACE, 1, options);
    Object.setPrototypeOf(this, WorkspaceError.prototype);
  }
}

/**
 * The source archive could not be downloaded in full.
 */
export class FetchError extends KernelConfigError {
  override readonly name = 'FetchError';
  readonly url: string;
  readonly statusCode: number | null;

  constructor(
    message: string,
    url: string,
    statusCode: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, RunStage.FETCH, 1, options);
    this.url = url;
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, FetchError.prototype);
  }
}

/**
 * The downloaded archive is corrupt or extraction did not finish.
 */
export class ExtractionError extends KernelConfigError {
  override readonly name = 'ExtractionError';
  readonly archivePath: string;

  constructor(message: string, archivePath: string, options?: { cause?: unknown }) {
    super(message, RunStage.EXTRACT, 1, options);
    this.archivePath = archivePath;
    Object.setPrototypeOf(this, ExtractionError.prototype);
  }
}

/**
 * A config file the run depends on does not exist.
 */
export class NotFoundError extends KernelConfigError {
  override readonly name = 'NotFoundError';
  readonly path: string;

  constructor(
    message: string,
    path: string,
    stage: typeof RunStage.SEED | typeof RunStage.PERSIST = RunStage.SEED,
    options?: { cause?: unknown }
  ) {
    super(message, stage, 1, options);
    this.path = path;
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * A config file exists but could not be read or written.
 */
export class ConfigFileError extends KernelConfigError {
  override readonly name = 'ConfigFileError';
  readonly path: string;

  constructor(
    message: string,
    path: string,
    stage: typeof RunStage.SEED | typeof RunStage.PERSIST,
    options?: { cause?: unknown }
  ) {
    super(message, stage, 1, options);
    this.path = path;
    Object.setPrototypeOf(this, ConfigFileError.prototype);
  }
}

/**
 * The interactive editor exited non-zero, was killed, or never started.
 */
export class EditorFailure extends KernelConfigError {
  override readonly name = 'EditorFailure';
  readonly editorExitCode: number | null;
  readonly signal: string | null;

  constructor(
    message: string,
    details: { exitCode?: number | null; signal?: string | null } = {},
    options?: { cause?: unknown }
  ) {
    super(message, RunStage.EDIT, 1, options);
    this.editorExitCode = details.exitCode ?? null;
    this.signal = details.signal ?? null;
    Object.setPrototypeOf(this, EditorFailure.prototype);
  }
}

/**
 * The operator interrupted the run.
 */
export class RunCanceledError extends KernelConfigError {
  override readonly name = 'RunCanceledError';
  readonly reason: string;

  constructor(stage: RunStage, reason: string, options?: { cause?: unknown }) {
    super(`Run canceled during ${stage}: ${reason}`, stage, 130, options);
    this.reason = reason;
    Object.setPrototypeOf(this, RunCanceledError.prototype);
  }
}
