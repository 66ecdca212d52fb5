/**
 * Error codes used throughout adapterlab.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Run artifacts
  | 'NotFound'
  | 'InvalidFormat'
  | 'MissingStage'
  | 'UnknownDataset'
  | 'ValidationFailed'
  | 'NoManifest'
  | 'NoCompletedRuns'
  // Adapter conversion
  | 'SourceNotFound'
  | 'ConversionError'
  | 'PostValidationFailed'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all adapterlab errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('InvalidFormat', 'Manifest field "runId" must be a string', {
 *   details: { path: '/runs/security-lora-1/run-manifest.json', field: 'runId' },
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * A manifest file or run directory does not exist.
 */
export class NotFoundError extends AppError {
  public readonly path: string;

  constructor(message: string, path: string, options: AppErrorOptions = {}) {
    super('NotFound', message, { ...options, details: options.details ?? { path } });
    this.path = path;
  }
}

/**
 * A manifest (or other structured artifact) could not be parsed, or is missing
 * a field its layout requires.
 */
export class InvalidFormatError extends AppError {
  public readonly path: string;
  /** Dotted path of the offending field, when one can be named */
  public readonly field?: string;

  constructor(
    message: string,
    path: string,
    options: AppErrorOptions & { field?: string } = {},
  ) {
    super('InvalidFormat', message, {
      ...options,
      details: options.details ?? { path, ...(options.field ? { field: options.field } : {}) },
    });
    this.path = path;
    this.field = options.field;
  }
}

/**
 * The manifest does not declare the requested stage (or the optional path
 * within it).
 */
export class MissingStageError extends AppError {
  public readonly stage: string;

  constructor(stage: string, message?: string, options: AppErrorOptions = {}) {
    super('MissingStage', message ?? `Stage "${stage}" is not declared in the run manifest`, {
      ...options,
      details: options.details ?? { stage },
    });
    this.stage = stage;
  }
}

/**
 * A named training dataset is not declared for the stage.
 */
export class UnknownDatasetError extends AppError {
  public readonly dataset: string;
  public readonly declared: string[];

  constructor(stage: string, dataset: string, declared: string[], options: AppErrorOptions = {}) {
    const available = declared.length > 0 ? declared.join(', ') : '(none)';
    super(
      'UnknownDataset',
      `Dataset "${dataset}" is not declared for ${stage}. Available: ${available}`,
      { ...options, details: options.details ?? { stage, dataset, declared } },
    );
    this.dataset = dataset;
    this.declared = declared;
  }
}

/**
 * A declared artifact directory does not satisfy its required-file set.
 */
export class ValidationFailedError extends AppError {
  public readonly directory: string;
  public readonly kind: string;
  public readonly missing: string[];
  public readonly empty: string[];

  constructor(
    directory: string,
    kind: string,
    missing: string[],
    empty: string[],
    options: AppErrorOptions = {},
  ) {
    const parts: string[] = [];
    if (missing.length > 0) parts.push(`missing ${missing.join(', ')}`);
    if (empty.length > 0) parts.push(`empty ${empty.join(', ')}`);
    super('ValidationFailed', `Invalid ${kind} artifact at ${directory}: ${parts.join('; ')}`, {
      ...options,
      details: options.details ?? { directory, kind, missing, empty },
    });
    this.directory = directory;
    this.kind = kind;
    this.missing = missing;
    this.empty = empty;
  }
}

/**
 * A save was requested before any manifest was created or loaded.
 */
export class NoManifestError extends AppError {
  constructor(runDir: string, options: AppErrorOptions = {}) {
    super('NoManifest', `No manifest to save for ${runDir}: create or load one first`, {
      ...options,
      details: options.details ?? { runDir },
    });
  }
}

/**
 * Discovery found no run whose final model weights exist.
 */
export class NoCompletedRunsError extends AppError {
  constructor(runsDir: string, options: AppErrorOptions = {}) {
    super('NoCompletedRuns', `No completed training runs found in ${runsDir}`, {
      ...options,
      details: options.details ?? { runsDir },
    });
  }
}

/**
 * A converter input file is absent.
 */
export class SourceNotFoundError extends AppError {
  public readonly path: string;

  constructor(message: string, path: string, options: AppErrorOptions = {}) {
    super('SourceNotFound', message, { ...options, details: options.details ?? { path } });
    this.path = path;
  }
}

/**
 * Wraps any lower-level failure while converting an adapter.
 */
export class ConversionError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConversionError', message, options);
  }
}

/**
 * The converted output failed its own structure check after being written.
 */
export class PostValidationFailedError extends AppError {
  public readonly directory: string;
  public readonly missing: string[];
  public readonly empty: string[];

  constructor(directory: string, missing: string[], empty: string[], options: AppErrorOptions = {}) {
    const parts: string[] = [];
    if (missing.length > 0) parts.push(`missing ${missing.join(', ')}`);
    if (empty.length > 0) parts.push(`empty ${empty.join(', ')}`);
    super(
      'PostValidationFailed',
      `Converted adapter at ${directory} failed validation: ${parts.join('; ')}`,
      { ...options, details: options.details ?? { directory, missing, empty } },
    );
    this.directory = directory;
    this.missing = missing;
    this.empty = empty;
  }
}

/**
 * Node's errno-style error, e.g. ENOENT from fs calls.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
