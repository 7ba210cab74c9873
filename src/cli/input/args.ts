/**
 * CLI Argument Parsing
 *
 * Role:
 *   Handle all argument parsing, validation, and normalization.
 *
 * Responsibilities:
 *   - Parse raw argv into structured CLIArgs
 *   - Validate argument values
 *   - Map parse errors to descriptive CliErrors
 */

import { parseArgs } from 'node:util';

import { CliError, hasErrorProperty } from '../../errors/errors.ts';
import type { NetworkName } from '../../lint/types.ts';
import { validateNetwork } from './validation.ts';

/* -------------------------------------------------------------------------- */
/* CLI argument model                                                          */
/* -------------------------------------------------------------------------- */

/**
 * Parsed CLI arguments. Settings left unset fall back to the environment and
 * then to defaults when the run configuration is resolved.
 */
export interface CLIArgs {
  readonly path?: string;
  readonly home?: string;
  readonly endpoint?: string;
  readonly network?: NetworkName;
  readonly compiler?: string;
  readonly logDir: string;
  readonly structuredLogs: boolean;
  readonly rawLogs: boolean;
  readonly help: boolean;
  readonly version: boolean;
  readonly verbose: boolean;
}

const STRING_OPTIONS = ['path', 'home', 'endpoint', 'network', 'compiler', 'log-dir'] as const;

/* -------------------------------------------------------------------------- */
/* Argument parsing                                                            */
/* -------------------------------------------------------------------------- */

/**
 * Parse the raw argv array into structured CLI arguments.
 *
 * @param argv - Raw arguments (defaults to `process.argv.slice(2)`).
 * @throws {CliError} when parsing fails or validation rejects the inputs.
 */
export function parseCliArgs(argv: readonly string[] = process.argv.slice(2)): CLIArgs {
  let parsed: ReturnType<typeof parseWithOptions>;
  try {
    parsed = parseWithOptions(argv);
  } catch (error) {
    throw mapParseArgsError(error);
  }
  return normalizeCliArgs(parsed.values, parsed.positionals);
}

function parseWithOptions(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    strict: true,
    allowPositionals: true,
    options: {
      path: { type: 'string' },
      home: { type: 'string' },
      endpoint: { type: 'string' },
      network: { type: 'string' },
      compiler: { type: 'string' },
      'log-dir': { type: 'string', default: './logs' },
      'structured-logs': { type: 'boolean', default: false },
      'raw-logs': { type: 'boolean', default: false },
      verbose: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
    },
  });
}

type RawCliValues = ReturnType<typeof parseWithOptions>['values'];

/**
 * Normalize the `parseArgs` output into our CLI shape and enforce validation rules.
 */
function normalizeCliArgs(values: RawCliValues, positionals: readonly string[]): CLIArgs {
  if (positionals.length > 0) {
    throw new CliError('CLI_INVALID_ARGUMENT', `Unexpected argument: ${positionals[0]}`);
  }

  for (const option of STRING_OPTIONS) {
    const value = values[option];
    if (value !== undefined && value.trim().length === 0) {
      throw new CliError('CLI_INVALID_ARGUMENT', `--${option} requires a value`);
    }
  }

  const structuredLogs = values['structured-logs'] === true;
  const rawLogs = values['raw-logs'] === true;
  if (structuredLogs && rawLogs) {
    throw new CliError(
      'CLI_INVALID_ARGUMENT',
      '--structured-logs and --raw-logs cannot be combined',
    );
  }

  const network = values.network === undefined ? undefined : validateNetwork(values.network);

  return {
    ...(values.path === undefined ? {} : { path: values.path }),
    ...(values.home === undefined ? {} : { home: values.home }),
    ...(values.endpoint === undefined ? {} : { endpoint: values.endpoint }),
    ...(network === undefined ? {} : { network }),
    ...(values.compiler === undefined ? {} : { compiler: values.compiler }),
    logDir: values['log-dir'] ?? './logs',
    structuredLogs,
    rawLogs,
    help: values.help === true,
    version: values.version === true,
    verbose: values.verbose === true,
  };
}

/**
 * Translate `parseArgs` errors into `CliError` instances with user-friendly messages.
 */
function mapParseArgsError(error: unknown): Error {
  if (error instanceof Error && hasErrorProperty(error, 'code')) {
    const code = error.code;
    const option = /'(-[\w-]+)/.exec(error.message)?.[1];

    if (code === 'ERR_PARSE_ARGS_UNKNOWN_OPTION') {
      return new CliError('CLI_UNKNOWN_OPTION', `Unknown option: ${option ?? error.message}`, {
        cause: error,
      });
    }

    if (
      code === 'ERR_PARSE_ARGS_INVALID_OPTION_VALUE' &&
      option !== undefined &&
      error.message.includes('argument missing')
    ) {
      return new CliError('CLI_INVALID_ARGUMENT', `${option} requires a value`, {
        cause: error,
      });
    }
  }

  if (error instanceof Error) {
    return new CliError('CLI_PARSE_ERROR', error.message, { cause: error });
  }
  return new CliError('CLI_PARSE_ERROR', String(error));
}
