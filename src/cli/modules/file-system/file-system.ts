/**
 * File system helpers for the lint pass: scratch directories, source
 * enumeration and source file I/O.
 */

import type { Dirent } from 'node:fs';
import { mkdir, readdir, readFile, realpath, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import picomatch from 'picomatch';

import { FileSystemError, formatErrorMessage, systemErrorCode } from '../../../errors/errors.ts';
import type {
  DirectoryHelpers,
  ScratchDirectoryName,
  SourceFileIo,
} from '../../../lint/types.ts';

/** Directory holding a package's `.leo` sources. */
export const SOURCE_DIRECTORY = 'src';
export const SOURCE_EXTENSION = '.leo';
const SOURCE_PATTERNS = [`**/*${SOURCE_EXTENSION}`] as const;

const IGNORED_DIRS = new Set(['.git', 'node_modules', 'build', 'outputs']);

// Default maximum recursion depth for source traversal. Can be overridden
// via the `LEO_LINT_MAX_DEPTH` environment variable.
export const DEFAULT_MAX_DEPTH = (() => {
  const v = process.env['LEO_LINT_MAX_DEPTH'];
  if (typeof v === 'string') {
    const n = Number.parseInt(v, 10);
    if (!Number.isNaN(n) && Number.isFinite(n) && n >= 0) {
      return n;
    }
  }
  return 10;
})();

/**
 * Determine whether the provided path exists and is a directory.
 */
export async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- Path comes from caller input.
    const stats = await stat(dirPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/* -------------------------------------------------------------------------- */
/* File-pattern expansion (glob-like)                                          */
/* -------------------------------------------------------------------------- */

const matcherCache = new Map<string, (input: string) => boolean>();

/**
 * Compile (and cache) picomatch matchers for the provided glob-like patterns.
 */
function getMatchers(patterns: readonly string[]): Array<(input: string) => boolean> {
  return patterns.map((pattern) => {
    const cached = matcherCache.get(pattern);
    if (cached) {
      return cached;
    }
    const compiled = picomatch(pattern, { dot: true });
    matcherCache.set(pattern, compiled);
    return compiled;
  });
}

/* eslint-disable sonarjs/cognitive-complexity -- Complex directory traversal logic is clearer when kept together */
/**
 * Expand glob-like `patterns` into a list of matching filesystem paths.
 *
 * - `baseDir` is the root directory for relative pattern matching.
 * - `maxDepth` limits recursive traversal depth.
 * - Symlinks are followed only while they stay inside `baseDir`.
 */
export async function expandFilePatterns(
  patterns: readonly string[] | undefined,
  baseDir = process.cwd(),
  maxDepth = DEFAULT_MAX_DEPTH,
): Promise<string[]> {
  if (!patterns || patterns.length === 0) {
    return [];
  }

  const matchers = getMatchers(patterns);
  const results: string[] = [];

  // eslint-disable-next-line security/detect-non-literal-fs-filename -- baseDir provided by caller
  const resolvedBase = await realpath(baseDir).catch(() => path.resolve(baseDir));

  async function walk(dir: string, depth: number): Promise<void> {
    if (depth <= 0) {
      return;
    }
    let entries: Dirent[];
    try {
      // eslint-disable-next-line security/detect-non-literal-fs-filename -- baseDir is provided by caller
      entries = await readdir(dir, { withFileTypes: true });
    } catch {
      return;
    }

    for (const entry of entries) {
      if (IGNORED_DIRS.has(entry.name)) {
        continue;
      }
      const fullPath = path.join(dir, entry.name);
      const rel = path.relative(baseDir, fullPath).split(path.sep).join('/');

      if (entry.isSymbolicLink()) {
        try {
          // eslint-disable-next-line security/detect-non-literal-fs-filename -- fullPath is derived from package paths
          const real = await realpath(fullPath);
          if (!real.startsWith(`${resolvedBase}${path.sep}`) && real !== resolvedBase) {
            continue;
          }
          // eslint-disable-next-line security/detect-non-literal-fs-filename -- fullPath is derived from package paths
          const stats = await stat(fullPath);
          if (stats.isDirectory()) {
            await walk(fullPath, depth - 1);
          } else if (stats.isFile() && matchers.some((m) => m(rel))) {
            results.push(fullPath);
          }
        } catch {
          // Dangling link
        }
        continue;
      }

      if (entry.isFile()) {
        if (matchers.some((m) => m(rel))) {
          results.push(fullPath);
        }
      } else if (entry.isDirectory()) {
        await walk(fullPath, depth - 1);
      }
    }
  }

  await walk(baseDir, maxDepth);
  return results;
}
/* eslint-enable sonarjs/cognitive-complexity */

/* -------------------------------------------------------------------------- */
/* Scratch directories                                                         */
/* -------------------------------------------------------------------------- */

async function listDirectory(dir: string): Promise<string[]> {
  try {
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- dir is derived from package paths
    return await readdir(dir);
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

/**
 * Create `<localPath>/<name>`. Left-over content from an earlier run is
 * rejected unless `reuse` is set.
 */
export async function createScratchDirectory(
  localPath: string,
  name: ScratchDirectoryName,
  options: { readonly reuse?: boolean } = {},
): Promise<string> {
  const dir = path.join(localPath, name);
  if (options.reuse !== true && (await listDirectory(dir)).length > 0) {
    throw new FileSystemError(
      'SCRATCH_DIRECTORY_STALE',
      `Scratch directory ${dir} already exists and is not empty`,
      { details: { path: dir } },
    );
  }
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- dir is derived from package paths
  await mkdir(dir, { recursive: true });
  return dir;
}

/**
 * Recursively delete a directory. A missing directory is not an error.
 */
export async function removeDirectory(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/* -------------------------------------------------------------------------- */
/* Sources                                                                     */
/* -------------------------------------------------------------------------- */

/**
 * All `.leo` files under `<localPath>/src`, sorted.
 */
export async function sourceFiles(
  localPath: string,
  maxDepth = DEFAULT_MAX_DEPTH,
): Promise<string[]> {
  const srcDir = path.join(localPath, SOURCE_DIRECTORY);
  if (!(await directoryExists(srcDir))) {
    throw new FileSystemError('SOURCE_DIRECTORY_MISSING', `No source directory at ${srcDir}`, {
      details: { path: srcDir },
    });
  }
  const files = await expandFilePatterns(SOURCE_PATTERNS, srcDir, maxDepth);
  return files.sort();
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Reject anything that is not a regular `.leo` file with UTF-8 content.
 */
export async function checkSourceFiles(paths: readonly string[]): Promise<void> {
  for (const filePath of paths) {
    if (path.extname(filePath) !== SOURCE_EXTENSION) {
      throw new FileSystemError('SOURCE_FILE_INVALID', `${filePath} is not a Leo source file`, {
        details: { path: filePath },
      });
    }
    let bytes: Buffer;
    try {
      // eslint-disable-next-line security/detect-non-literal-fs-filename -- filePath comes from source enumeration
      bytes = await readFile(filePath);
    } catch (error) {
      throw new FileSystemError(
        'SOURCE_FILE_INVALID',
        `${filePath} is not readable: ${formatErrorMessage(error)}`,
        { cause: error, details: { path: filePath } },
      );
    }
    try {
      utf8.decode(bytes);
    } catch (error) {
      throw new FileSystemError('SOURCE_FILE_INVALID', `${filePath} is not valid UTF-8`, {
        cause: error,
        details: { path: filePath },
      });
    }
  }
}

export const directoryHelpers: DirectoryHelpers = {
  createScratchDirectory,
  sourceFiles: (localPath) => sourceFiles(localPath),
  checkSourceFiles,
  removeDirectory,
};

export const sourceFileIo: SourceFileIo = {
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- filePath comes from source enumeration
  read: (filePath) => readFile(filePath, 'utf8'),
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- filePath comes from source enumeration
  write: (filePath, contents) => writeFile(filePath, contents, 'utf8'),
};
