/**
 * Leo Lint - Main Entry Point
 *
 * Compiles every program a Leo package depends on, then rewrites each
 * program's sources into canonical layout.
 */

import { getPackageVersion } from './cli/core/version/version.ts';

export const VERSION: string = getPackageVersion();

export {
  AppError,
  CliError,
  CompilationError,
  DependencyError,
  FileSystemError,
  formatErrorMessage,
  type LintError,
  ProcessError,
  ProgramIdError,
} from './errors/errors.ts';
export * from './lint/index.ts';
export * from './cli/modules/index.ts';
export { main, runEntrypoint } from './cli/index.ts';
