/**
 * Shared error hierarchy for consistent error handling.
 */

export type ErrorCode =
  | 'CLI_INVALID_ARGUMENT'
  | 'CLI_UNKNOWN_OPTION'
  | 'CLI_PARSE_ERROR'
  | 'CLI_INVALID_PATH'
  | 'PROCESS_SPAWN_FAILED'
  | 'PROCESS_TIMEOUT'
  | 'FS_REMOVE_FAILED'
  | 'FS_CREATE_FAILED'
  | 'FS_READ_FAILED'
  | 'FS_WRITE_FAILED'
  | 'SCRATCH_DIRECTORY_STALE'
  | 'SOURCE_DIRECTORY_MISSING'
  | 'SOURCE_FILE_INVALID'
  | 'MANIFEST_NOT_FOUND'
  | 'MANIFEST_INVALID'
  | 'DEPENDENCY_NOT_FOUND'
  | 'DEPENDENCY_CYCLE'
  | 'DEPENDENCY_RETRIEVAL_FAILED'
  | 'COMPILATION_FAILED'
  | 'COMPILER_NOT_FOUND'
  | 'PROGRAM_ID_INVALID'
  | 'UNEXPECTED_ERROR';

export interface ErrorDetails {
  readonly [key: string]: unknown;
}

/**
 * Base class for every structured failure raised by the lint pass and its CLI.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly details?: ErrorDetails;
  public override cause?: unknown;

  constructor(
    code: ErrorCode,
    message: string,
    options?: { cause?: unknown; details?: ErrorDetails },
  ) {
    super(message);
    this.code = code;
    if (options?.details !== undefined) {
      this.details = options.details;
    }
    // Chain stack traces when cause is an Error for better debugging
    if (options?.cause instanceof Error) {
      this.cause = options.cause;
      const currentStack = this.stack;
      const causeStack = options.cause.stack;
      if (
        (currentStack === undefined || currentStack === '') &&
        causeStack !== undefined &&
        causeStack !== ''
      ) {
        this.stack = String(causeStack);
      }
    } else if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    this.name = this.constructor.name;
  }
}

export class CliError extends AppError {}
export class ProcessError extends AppError {}

/** Missing, unwritable or undeletable paths. */
export class FileSystemError extends AppError {}
/** Manifest lookup, local closure walk or network fetch failures. */
export class DependencyError extends AppError {}
/** A source file that the compiler rejected, or a compiler that could not run. */
export class CompilationError extends AppError {}
/** A malformed `name.aleo` identifier. */
export class ProgramIdError extends AppError {}

/**
 * Every failure the lint pass itself can surface to its caller.
 */
export type LintError = FileSystemError | DependencyError | CompilationError | ProgramIdError;

/**
 * Format an arbitrary error into a concise string for logging or display.
 *
 * @param {unknown} error - The error value to format (may be an Error, AppError, or other).
 * @returns {string} A short string representation of the error.
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof AppError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Narrow an unknown value to an AppError.
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Narrow an unknown value to one of the lint pass failures.
 */
export function isLintError(error: unknown): error is LintError {
  return (
    error instanceof FileSystemError ||
    error instanceof DependencyError ||
    error instanceof CompilationError ||
    error instanceof ProgramIdError
  );
}

/**
 * Check whether an unknown value has the given property name.
 * Useful before accessing properties on caught errors.
 */
export function hasErrorProperty<T extends string>(
  error: unknown,
  prop: T,
): error is Record<T, unknown> {
  return typeof error === 'object' && error !== null && Reflect.has(error, prop);
}

/**
 * Read the `code` of a Node.js system error (`ENOENT`, `EACCES`, ...), if any.
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (hasErrorProperty(error, 'code') && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
