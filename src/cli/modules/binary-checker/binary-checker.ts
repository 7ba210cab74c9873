/**
 * Binary availability checks for the compiler executable.
 */

import { constants } from 'node:fs';
import { access, realpath, stat } from 'node:fs/promises';
import path from 'node:path';

import { CompilationError } from '../../../errors/errors.ts';

/** Known Windows directories to use when searching for binaries. */
const WINDOWS_BASE_DIRS = [String.raw`C:\Windows\System32`, String.raw`C:\Windows`] as const;
/** Known POSIX directories to include in the binary search path (plus PATH entries). */
const POSIX_BASE_DIRS = [
  '/usr/local/bin',
  '/opt/homebrew/bin',
  '/usr/bin',
  '/bin',
  '/usr/sbin',
  '/sbin',
] as const;

const WINDOWS_EXTENSIONS = ['.exe', '.cmd', '.bat', ''] as const;
const POSIX_EXTENSIONS = [''] as const;

/**
 * Enumerate directories used when searching for binaries.
 */
function getBaseDirs(isWindows: boolean, envPath: string | undefined): Set<string> {
  const entries: string[] = [];

  if (envPath !== undefined && envPath.length > 0) {
    for (const entry of envPath.split(path.delimiter)) {
      if (entry && path.isAbsolute(entry)) {
        entries.push(entry);
      }
    }
  }

  const defaults = isWindows ? WINDOWS_BASE_DIRS : POSIX_BASE_DIRS;
  entries.push(...defaults);

  return new Set(entries);
}

/**
 * Build candidate paths for a binary by combining base directories with extensions.
 */
function getCandidates(binary: string, isWindows: boolean, baseDirs: Set<string>): string[] {
  if (binary.includes('/') || binary.includes('\\')) {
    return [binary];
  }

  const extensions = isWindows ? WINDOWS_EXTENSIONS : POSIX_EXTENSIONS;
  const candidates: string[] = [];
  for (const dir of baseDirs) {
    for (const ext of extensions) {
      candidates.push(path.join(dir, `${binary}${ext}`));
    }
  }
  return candidates;
}

/**
 * Attempt to resolve a candidate path by ensuring it exists and is a file.
 */
async function resolveCandidate(candidate: string, mode: number): Promise<string | null> {
  try {
    await access(candidate, mode);
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- candidate is a computed search path
    const stats = await stat(candidate);
    if (!stats.isFile()) {
      return null;
    }
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- candidate is a computed search path
    return await realpath(candidate);
  } catch {
    return null;
  }
}

/**
 * Resolve a binary name to an absolute filesystem path by searching the
 * entries of `PATH` and common system directories. A name containing a path
 * separator is checked as given.
 *
 * Returns the fully-resolved path when found, or `null` if the binary
 * cannot be located.
 */
export async function resolveBinary(
  binary: string,
  envPath: string | undefined = process.env['PATH'],
): Promise<string | null> {
  const isWindows = process.platform === 'win32';
  const baseDirs = getBaseDirs(isWindows, envPath);
  const candidates = getCandidates(binary, isWindows, baseDirs);
  const mode = isWindows ? constants.F_OK : constants.X_OK;

  for (const candidate of candidates) {
    const resolved = await resolveCandidate(candidate, mode);
    if (resolved !== null) {
      return resolved;
    }
  }

  return null;
}

/**
 * Check whether the given binary is available on the host system.
 */
export async function checkBinaryExists(binary: string, envPath?: string): Promise<boolean> {
  return (await resolveBinary(binary, envPath)) !== null;
}

/**
 * Resolve the compiler executable or fail with `COMPILER_NOT_FOUND`.
 */
export async function requireCompiler(binary: string, envPath?: string): Promise<string> {
  const resolved = await resolveBinary(binary, envPath);
  if (resolved === null) {
    throw new CompilationError('COMPILER_NOT_FOUND', `Compiler binary not found: ${binary}`, {
      details: { binary },
    });
  }
  return resolved;
}
