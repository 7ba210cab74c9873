/**
 * Run Configuration
 *
 * Role:
 *   Turn parsed CLI arguments and the environment into one resolved
 *   configuration for a lint run.
 *
 * Responsibilities:
 *   - Apply flag, then environment, then default for every setting
 *   - Validate paths, network, endpoint and timeout values
 *   - Read the root program id from the package manifest
 *
 * Non-goals:
 *   - No config files; the manifest is the only file consulted
 */

import os from 'node:os';
import path from 'node:path';

import { CliError } from '../../errors/errors.ts';
import { type ProgramId, parseProgramId } from '../../lint/program-id.ts';
import { DEFAULT_NETWORK, type NetworkName } from '../../lint/types.ts';
import type { CLIArgs } from '../input/args.ts';
import {
  ensureDirectory,
  ensureOutsideScratch,
  ensureSafeDirectoryPath,
  validateEndpoint,
  validateNetwork,
} from '../input/validation.ts';
import {
  DEFAULT_COMPILER_BINARY,
  DEFAULT_COMPILER_TIMEOUT_MS,
} from '../modules/compiler/compiler.ts';
import { readManifest } from '../modules/manifest/manifest.ts';

export const DEFAULT_ENDPOINT = 'https://api.explorer.aleo.org/v1';
/** Home directory name, relative to the user's home. */
export const DEFAULT_HOME_DIRECTORY = '.aleo';

/** Environment variables consulted when the matching flag is absent. */
export const ENV_KEYS = {
  endpoint: 'LEO_LINT_ENDPOINT',
  network: 'LEO_LINT_NETWORK',
  compiler: 'LEO_LINT_COMPILER',
  compilerTimeoutMs: 'LEO_LINT_COMPILER_TIMEOUT_MS',
} as const;

export interface LintConfig {
  readonly packagePath: string;
  readonly homePath: string;
  readonly endpoint: string;
  readonly network: NetworkName;
  readonly compiler: string;
  readonly compilerTimeoutMs: number;
  readonly logDir: string;
  readonly structuredLogs: boolean;
  readonly rawLogs: boolean;
  readonly verbose: boolean;
}

export interface ConfigSources {
  readonly env?: NodeJS.ProcessEnv;
  readonly cwd?: string;
  readonly homedir?: string;
}

function fromEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

function parseTimeout(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new CliError(
      'CLI_INVALID_ARGUMENT',
      `${ENV_KEYS.compilerTimeoutMs} must be a positive integer: ${value}`,
    );
  }
  return parsed;
}

/**
 * Resolve the run configuration.
 *
 * @throws {CliError} when a path, network, endpoint or timeout is invalid.
 */
export function resolveLintConfig(args: CLIArgs, sources: ConfigSources = {}): LintConfig {
  const { env = process.env, cwd = process.cwd(), homedir = os.homedir() } = sources;

  const packagePath = ensureDirectory(path.resolve(cwd, args.path ?? '.'), 'Package path');
  const homePath = path.resolve(cwd, args.home ?? path.join(homedir, DEFAULT_HOME_DIRECTORY));

  const envNetwork = fromEnv(env, ENV_KEYS.network);
  const network =
    args.network ?? (envNetwork === undefined ? DEFAULT_NETWORK : validateNetwork(envNetwork));

  const timeout = fromEnv(env, ENV_KEYS.compilerTimeoutMs);

  return {
    packagePath,
    homePath,
    endpoint: validateEndpoint(
      args.endpoint ?? fromEnv(env, ENV_KEYS.endpoint) ?? DEFAULT_ENDPOINT,
    ),
    network,
    compiler: args.compiler ?? fromEnv(env, ENV_KEYS.compiler) ?? DEFAULT_COMPILER_BINARY,
    compilerTimeoutMs: timeout === undefined ? DEFAULT_COMPILER_TIMEOUT_MS : parseTimeout(timeout),
    logDir: ensureOutsideScratch(
      packagePath,
      ensureSafeDirectoryPath(packagePath, args.logDir),
    ),
    structuredLogs: args.structuredLogs,
    rawLogs: args.rawLogs,
    verbose: args.verbose,
  };
}

/**
 * Program id of the package being linted, from its `program.json`.
 *
 * @throws {DependencyError} when the manifest is missing or invalid.
 * @throws {ProgramIdError} when the manifest names an invalid program.
 */
export async function readProgramId(packagePath: string): Promise<ProgramId> {
  const manifest = await readManifest(packagePath);
  return parseProgramId(manifest.program);
}
