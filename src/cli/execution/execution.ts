/**
 * CLI Main Execution
 *
 * Role:
 *   Run one lint pass with the default collaborators and report it.
 *
 * Responsibilities:
 *   - Resolve configuration and the root program id
 *   - Wire the process-backed collaborators and per-dependency logs
 *   - Drive the dashboard from the pass's progress events
 *   - Calculate the summary and determine the exit code
 */

import { Console } from 'node:console';
import { mkdir } from 'node:fs/promises';
import os from 'node:os';

import { formatErrorMessage } from '../../errors/errors.ts';
import { type LinterDeps, lint } from '../../lint/linter.ts';
import { formatProgramId, type DependencySymbol } from '../../lint/program-id.ts';
import type { DependencyStatus, LintEvents } from '../../lint/types.ts';
import { type LintConfig, readProgramId, resolveLintConfig } from '../config/config.ts';
import type { CLIArgs } from '../input/args.ts';
import { createProcessCompilerFactory } from '../modules/compiler/compiler.ts';
import { directoryHelpers, sourceFileIo } from '../modules/file-system/file-system.ts';
import { createManifestRetrieverFactory } from '../modules/retriever/retriever.ts';
import { packageScaffold } from '../modules/scaffold/scaffold.ts';
import { DependencyLogs } from '../observability/logger.ts';
import { renderDashboard } from '../output/ui.tsx';
import { calculateSummary, type LintSummary } from './summary.ts';

/**
 * Dependency overrides supplied when invoking `executeWithArgs`.
 *
 * Allows callers (tests or alternative entrypoints) to supply fakes for the
 * lint pass, its collaborators, or dashboard rendering.
 */
export interface MainDeps {
  readonly argv?: readonly string[];
  readonly mkdirFn?: (dir: string, options: { readonly recursive: true }) => Promise<unknown>;
  readonly renderDashboardFn?: typeof renderDashboard;
  readonly lintFn?: typeof lint;
  readonly createLinterDepsFn?: typeof createLinterDeps;
  readonly cwd?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly homedir?: string;
  readonly console?: Pick<typeof console, 'log' | 'error'>;
}

/**
 * Result returned from `executeWithArgs`.
 */
export interface MainResult {
  readonly exitCode: number;
  readonly summary?: LintSummary;
}

/**
 * Process-backed collaborators for a run, with compiler output and lint events
 * written to each dependency's log.
 */
export function createLinterDeps(
  config: LintConfig,
  logs: DependencyLogs,
  events: LintEvents = {},
): LinterDeps {
  return {
    retrieverFactory: createManifestRetrieverFactory(),
    compilerFactory: createProcessCompilerFactory({
      binary: config.compiler,
      timeoutMs: config.compilerTimeoutMs,
      sinkFor: (dependency) => (output) => logs.stream(dependency, output),
    }),
    scaffold: packageScaffold,
    directories: directoryHelpers,
    files: sourceFileIo,
    log: (symbol, message) => logs.append(symbol, message),
    ...events,
  };
}

/**
 * Execute the CLI with provided args and optional dependency overrides.
 */
export async function executeWithArgs(
  args: CLIArgs,
  deps: Partial<MainDeps> = {},
): Promise<MainResult> {
  const {
    mkdirFn = mkdir,
    renderDashboardFn = renderDashboard,
    lintFn = lint,
    createLinterDepsFn = createLinterDeps,
    cwd = process.cwd(),
    env = process.env,
    homedir = os.homedir(),
    console: injectedConsole,
  } = deps;

  const stdout = process.stdout;
  const stderr = process.stderr;
  const scopedConsole = injectedConsole ?? new Console({ stdout, stderr });
  const log = scopedConsole.log.bind(scopedConsole);
  const error = scopedConsole.error.bind(scopedConsole);

  try {
    const config = resolveLintConfig(args, { env, cwd, homedir });
    const programId = await readProgramId(config.packagePath);
    const program = formatProgramId(programId);

    // Fail early before side effects
    await mkdirFn(config.logDir, { recursive: true });

    log('🚀 Leo Lint\n');
    log(`Program: ${program}`);
    log(`Package: ${config.packagePath}`);
    log(`Log directory: ${config.logDir}`);
    if (config.verbose) {
      log(`Network: ${config.network}`);
      log(`Endpoint: ${config.endpoint}`);
      log(`Compiler: ${config.compiler} (timeout ${config.compilerTimeoutMs}ms)`);
      log(`Home: ${config.homePath}`);
    }
    log('');

    const logs = new DependencyLogs({
      logDir: config.logDir,
      raw: config.rawLogs,
      structured: config.structuredLogs,
    });
    const dashboard = renderDashboardFn(config.logDir, {
      stdout,
      stderr,
      subtitle: `${program} on ${config.network}`,
    });
    const statuses = new Map<DependencySymbol, DependencyStatus>();
    const startTime = Date.now();

    let failure: { readonly error: unknown } | undefined;
    try {
      await lintFn(
        {
          programId,
          endpoint: config.endpoint,
          packagePath: config.packagePath,
          homePath: config.homePath,
          network: config.network,
        },
        createLinterDepsFn(config, logs, {
          onDependenciesResolved: (symbols) => {
            for (const symbol of symbols) {
              statuses.set(symbol, 'PENDING');
            }
            dashboard.setDependencies(symbols);
          },
          onStatusChange: (symbol, status) => {
            statuses.set(symbol, status);
            dashboard.updateStatus(symbol, status);
          },
          onLogError: (symbol, logError) => {
            error(`\nWARN: failed to write the ${symbol} log: ${formatErrorMessage(logError)}`);
          },
        }),
      );
    } catch (lintError) {
      failure = { error: lintError };
    }

    await dashboard.waitForExit();

    const summary = calculateSummary(statuses.values(), Date.now() - startTime);

    if (failure !== undefined) {
      error(`\n❌ Linting failed: ${formatErrorMessage(failure.error)}`);
      process.exitCode = 1;
      return { exitCode: 1, summary };
    }

    log(`\n✅ ${summary.formatted} of ${summary.total} programs formatted`);
    process.exitCode = 0;
    return { exitCode: 0, summary };
  } catch (err) {
    error('\n❌ Fatal error:', err);
    process.exitCode = 1;
    return { exitCode: 1 };
  }
}
