/**
 * Help & Version API
 *
 * Role:
 *   Re-export public API for help and version functions.
 */

import { getPackageVersion } from '../version/version.ts';
export { showHelp } from './formatter.ts';

/** Package name printed by `--version`. */
export const PACKAGE_NAME = 'leo-lint';

/**
 * Return the CLI version string for `--version` output, e.g. `leo-lint v1.2.3`.
 */
export function showVersion(): string {
  return `${PACKAGE_NAME} v${getPackageVersion()}`;
}
