/**
 * Leo Lint CLI
 *
 * Role:
 *   Command-line surface over the lint pass: argument handling, run
 *   configuration, per-dependency logs and the progress dashboard.
 *
 * Authority:
 *   - This CLI orchestrates only.
 *   - Compilation is delegated to the external compiler binary.
 *   - Formatting rules live in the source normalizer.
 *
 * Principles:
 *   - Fail fast on invalid input
 *   - Dependencies are processed one at a time, root last
 *   - Sources are only rewritten after a program compiles
 */

// Config re-exports
export {
  type ConfigSources,
  DEFAULT_ENDPOINT,
  ENV_KEYS,
  type LintConfig,
  readProgramId,
  resolveLintConfig,
} from '../config/index.ts';
// Execution re-exports
export {
  calculateSummary,
  createLinterDeps,
  executeWithArgs,
  type LintSummary,
  type MainDeps,
  type MainResult,
} from '../execution/index.ts';
// Input handling re-exports
export {
  type CLIArgs,
  ensureSafeDirectoryPath,
  parseCliArgs,
  validateEndpoint,
  validateNetwork,
} from '../input/index.ts';
// Observability re-exports
export { DependencyLogs, getLogPath, type LogOptions } from '../observability/index.ts';
// Output re-exports
export { type DashboardHandle, renderDashboard } from '../output/index.ts';
// Entrypoint
export { type EntrypointDeps, main, runEntrypoint } from './entrypoint/entrypoint.ts';
export { showHelp, showVersion } from './help/help.ts';
