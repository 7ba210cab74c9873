/**
 * CLI Validation
 *
 * Role:
 *   Validate option values and directory paths.
 *
 * Responsibilities:
 *   - Accept only known network names and http(s) endpoints
 *   - Ensure the package path is an existing directory
 *   - Ensure the log directory stays inside the package (no directory traversal)
 *   - Keep the log directory out of the scratch directories the pass deletes
 */

import fs from 'node:fs';
import path from 'node:path';

import { CliError } from '../../errors/errors.ts';
import { BUILD_DIRECTORY, OUTPUTS_DIRECTORY } from '../../lint/linter.ts';
import { NETWORK_NAMES, type NetworkName } from '../../lint/types.ts';

/**
 * @throws {CliError} when `value` is not a known network.
 */
export function validateNetwork(value: string): NetworkName {
  const network = NETWORK_NAMES.find((name) => name === value);
  if (network === undefined) {
    throw new CliError(
      'CLI_INVALID_ARGUMENT',
      `Invalid network: ${value} (expected one of ${NETWORK_NAMES.join(', ')})`,
    );
  }
  return network;
}

/**
 * @throws {CliError} when `value` is not an absolute http(s) URL.
 */
export function validateEndpoint(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch (error) {
    throw new CliError('CLI_INVALID_ARGUMENT', `Invalid endpoint: ${value}`, { cause: error });
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new CliError('CLI_INVALID_ARGUMENT', `Endpoint must use http or https: ${value}`);
  }
  return value;
}

/**
 * Resolve `inputPath` and require it to be an existing directory.
 */
export function ensureDirectory(inputPath: string, label: string): string {
  const resolved = path.resolve(inputPath);
  let isDirectory = false;
  try {
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is user input, checked here
    isDirectory = fs.statSync(resolved).isDirectory();
  } catch {
    isDirectory = false;
  }
  if (!isDirectory) {
    throw new CliError('CLI_INVALID_PATH', `${label} is not a directory: ${resolved}`, {
      details: { path: resolved },
    });
  }
  return resolved;
}

function isOutsideOf(base: string, candidate: string): boolean {
  const relative = path.relative(base, candidate);
  return relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative);
}

function realpathOrUndefined(target: string): string | undefined {
  try {
    // eslint-disable-next-line security/detect-non-literal-fs-filename
    return fs.realpathSync(target);
  } catch {
    return undefined;
  }
}

/**
 * Ensure that `inputPath` resolves to a directory that lives under `baseDir`.
 *
 * This protects against directory traversal and symlink tricks by checking
 * the resolved path (and realpath) relative to the base directory.
 *
 * @param baseDir - Path that all log directories must reside within.
 * @param inputPath - Candidate path provided via CLI args.
 * @returns Resolved, safe path string.
 * @throws {CliError} when the resolved path escapes the base directory.
 */
export function ensureSafeDirectoryPath(baseDir: string, inputPath: string): string {
  const resolvedBase = path.resolve(baseDir);
  const outside = (): CliError =>
    new CliError('CLI_INVALID_PATH', `Log directory must be within ${resolvedBase}`, {
      details: { resolvedBase, inputPath },
    });

  // Reject obvious Windows-style traversal attempts on non-Windows platforms
  if (path.sep !== '\\' && inputPath.includes('\\')) {
    throw outside();
  }

  const resolvedPath = path.resolve(resolvedBase, inputPath);
  if (isOutsideOf(resolvedBase, resolvedPath)) {
    throw outside();
  }

  // If the resolved path includes symlinks, resolve them to detect symlink traversal
  const realResolved = realpathOrUndefined(resolvedPath);
  if (realResolved !== undefined) {
    const realBase = realpathOrUndefined(resolvedBase) ?? resolvedBase;
    if (isOutsideOf(realBase, realResolved)) {
      throw outside();
    }
  }

  return resolvedPath;
}

/**
 * Reject a log directory inside the package's `build/` or `outputs/` scratch
 * directories, which the lint pass deletes.
 *
 * @throws {CliError} when `logDir` is one of them or lies beneath one.
 */
export function ensureOutsideScratch(packagePath: string, logDir: string): string {
  for (const name of [BUILD_DIRECTORY, OUTPUTS_DIRECTORY]) {
    const scratch = path.join(path.resolve(packagePath), name);
    if (!isOutsideOf(scratch, path.resolve(logDir))) {
      throw new CliError(
        'CLI_INVALID_PATH',
        `Log directory must not be inside ${scratch}: it is removed during the run`,
        { details: { logDir, scratch } },
      );
    }
  }
  return logDir;
}
