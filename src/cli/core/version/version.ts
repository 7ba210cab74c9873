/**
 * Version Management
 *
 * Role:
 *   Load and cache package version information.
 *
 * Responsibilities:
 *   - Locate package.json beside the sources
 *   - Read and cache version on first access
 *   - Fall back to a sentinel when the file is unreadable
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { PKG_FILENAME, PKG_VERSION_FALLBACK } from '../../constants/paths.ts';

let cachedPkgVersion: string | undefined;

// Constant filename relative to this module; no user input reaches this path.
const pkgPath = fileURLToPath(new URL(`../../../../${PKG_FILENAME}`, import.meta.url));

function readVersion(text: string): string {
  const pkg: unknown = JSON.parse(text);
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
    return typeof pkg.version === 'string' ? pkg.version : PKG_VERSION_FALLBACK;
  }
  return PKG_VERSION_FALLBACK;
}

/**
 * Read and cache the package version from package.json, falling back to
 * `PKG_VERSION_FALLBACK` when the file cannot be read.
 */
function getPkgVersion(): string {
  if (cachedPkgVersion !== undefined) {
    return cachedPkgVersion;
  }
  try {
    // eslint-disable-next-line security/detect-non-literal-fs-filename
    cachedPkgVersion = readVersion(readFileSync(pkgPath, 'utf8'));
  } catch (error) {
    console.error(`[version] Failed to read ${PKG_FILENAME}: ${String(error)}`);
    cachedPkgVersion = PKG_VERSION_FALLBACK;
  }
  return cachedPkgVersion;
}

/**
 * Public accessor for the resolved package version. The file is read at most
 * once per process.
 */
export function getPackageVersion(): string {
  return getPkgVersion();
}

/**
 * Test-only helpers.
 */
export const __test__ = {
  getPkgVersion,
  readVersion,
  pkgPath,
};
