/**
 * @packageDocumentation
 * File name constants for locating the CLI's own package metadata.
 */

/** Manifest read for `--version`. */
export const PKG_FILENAME = 'package.json';

/** Printed by `--version` when package.json cannot be read. */
export const PKG_VERSION_FALLBACK = 'unknown';
