/**
 * CLI Entrypoint
 *
 * Role:
 *   Handle process-level concerns (broken pipe, signals, uncaught errors).
 *
 * Responsibilities:
 *   - Set up EPIPE error handling
 *   - Map SIGINT/SIGTERM to their conventional exit codes
 *   - Wrap anything that escapes `main` as an UNEXPECTED_ERROR
 *   - Enable module self-execution detection
 */

import { pathToFileURL } from 'node:url';

import { AppError } from '../../../errors/errors.ts';
import { executeWithArgs, type MainDeps, type MainResult } from '../../execution/execution.ts';
import { parseCliArgs } from '../../input/args.ts';
import { showHelp, showVersion } from '../help/help.ts';

export interface EntrypointDeps {
  readonly mainFn?: () => Promise<{ exitCode: number }>;
  readonly console?: Pick<typeof console, 'error'>;
  /** Optional graceful shutdown handler invoked on SIGINT/SIGTERM */
  readonly onSignal?: (signal: 'SIGINT' | 'SIGTERM') => Promise<void> | void;
}

/**
 * Ignore EPIPE so output piped through `head` does not crash the run;
 * rethrow anything else.
 */
function handleBrokenPipe(err: NodeJS.ErrnoException): void {
  if (err.code === 'EPIPE') {
    return;
  }

  throw err;
}

function setupBrokenPipeHandlers(): void {
  process.stdout.on('error', handleBrokenPipe);
  process.stderr.on('error', handleBrokenPipe);
}

/**
 * Register SIGINT/SIGTERM handlers.
 *
 * @returns Cleanup function that unregisters the signal listeners.
 */
function setupSignalHandlers(
  deps: EntrypointDeps,
  errorConsole: Pick<typeof console, 'error'>,
): () => void {
  let handling = false;

  const createHandler = (signal: 'SIGINT' | 'SIGTERM') => () => {
    if (handling) {
      return;
    }
    handling = true;

    if (deps.onSignal) {
      try {
        const maybe = deps.onSignal(signal);
        if (maybe instanceof Promise) {
          maybe.catch((e: unknown) => errorConsole.error('\nWARN: signal handler failed:', e));
        }
      } catch (e) {
        errorConsole.error('\nWARN: signal handler failed:', e);
      }
    }

    // 128 + signal number
    process.exitCode = signal === 'SIGINT' ? 130 : 143;
  };

  const sigintHandler = createHandler('SIGINT');
  const sigtermHandler = createHandler('SIGTERM');

  process.on('SIGINT', sigintHandler);
  process.on('SIGTERM', sigtermHandler);

  return () => {
    process.off('SIGINT', sigintHandler);
    process.off('SIGTERM', sigtermHandler);
  };
}

/**
 * Scrub argv values for logging to avoid leaking secrets.
 *
 * @returns Flags kept, `--flag=value` values and positionals replaced by `<redacted>`.
 */
function sanitizeArgs(argv: readonly string[]): string[] {
  return argv.map((arg) => {
    if (arg.startsWith('--')) {
      const [key = arg, val] = arg.split('=', 2);
      return val === undefined ? key : `${key}=<redacted>`;
    }
    if (arg.startsWith('-')) {
      return arg;
    }
    return '<redacted>';
  });
}

/**
 * Parse args, answer `--help`/`--version`, and otherwise run the lint pass.
 *
 * @returns Execution result including exit code when the CLI finishes.
 */
export async function main(deps: MainDeps = {}): Promise<MainResult> {
  const { argv = process.argv.slice(2), console: injectedConsole, ...rest } = deps;
  const out = injectedConsole ?? console;
  const args = parseCliArgs(argv);

  if (args.help) {
    out.log(showHelp());
    return { exitCode: 0 };
  }

  if (args.version) {
    out.log(showVersion());
    return { exitCode: 0 };
  }

  return executeWithArgs(args, {
    ...(injectedConsole ? { console: injectedConsole } : {}),
    ...rest,
  });
}

/**
 * Execute the CLI, wiring up broken pipes, signal handling, and top-level
 * error reporting.
 */
export function runEntrypoint(deps: EntrypointDeps = {}): void {
  const { mainFn = () => main(), console: injectedConsole } = deps;
  const errorConsole = injectedConsole ?? console;

  setupBrokenPipeHandlers();
  const removeSignalHandlers = setupSignalHandlers(deps, errorConsole);

  void mainFn()
    .catch((error: unknown) => {
      const wrapped = new AppError(
        'UNEXPECTED_ERROR',
        error instanceof Error ? error.message : String(error),
        {
          cause: error,
          details: { context: { argv: sanitizeArgs(process.argv.slice(2)) } },
        },
      );
      errorConsole.error('\n❌ Fatal error:', wrapped);
      process.exitCode = 1;
    })
    .finally(removeSignalHandlers);
}

export const __test__ = {
  handleBrokenPipe,
  sanitizeArgs,
};

/* -------------------------------------------------------------------------- */
/* Module self-execution detection                                            */
/* -------------------------------------------------------------------------- */

const entryUrl = process.argv[1] === undefined ? null : pathToFileURL(process.argv[1]).href;

if (entryUrl !== null && import.meta.url === entryUrl) {
  runEntrypoint();
}
