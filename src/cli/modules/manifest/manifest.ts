/**
 * Package manifest (`program.json`) reading and validation.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';

import {
  DependencyError,
  formatErrorMessage,
  systemErrorCode,
} from '../../../errors/errors.ts';
import { formatProgramId, type ProgramId } from '../../../lint/program-id.ts';
import { NETWORK_NAMES, type NetworkName } from '../../../lint/types.ts';

export const MANIFEST_FILE = 'program.json';

export type DependencyLocation = 'local' | 'network';

export interface ManifestDependency {
  /** Full program identifier, e.g. `token.aleo`. */
  readonly name: string;
  readonly location: DependencyLocation;
  /** Package directory of a local dependency, relative to the declaring package. */
  readonly path?: string;
  readonly network?: NetworkName;
}

export interface Manifest {
  readonly program: string;
  readonly version: string;
  readonly description: string;
  readonly license: string;
  readonly dependencies?: readonly ManifestDependency[];
}

function invalid(source: string, reason: string): DependencyError {
  return new DependencyError('MANIFEST_INVALID', `Invalid manifest ${source}: ${reason}`, {
    details: { manifest: source },
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNetworkName(value: unknown): value is NetworkName {
  return NETWORK_NAMES.some((name) => name === value);
}

function readString(
  record: Record<string, unknown>,
  key: string,
  source: string,
  fallback?: string,
): string {
  const value = record[key];
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  throw invalid(source, `"${key}" must be a string`);
}

function parseDependency(value: unknown, index: number, source: string): ManifestDependency {
  if (!isRecord(value)) {
    throw invalid(source, `dependencies[${index}] must be an object`);
  }
  const name = readString(value, 'name', source);
  const location = value['location'];
  if (location !== 'local' && location !== 'network') {
    throw invalid(source, `dependencies[${index}].location must be "local" or "network"`);
  }
  const depPath = value['path'];
  if (depPath !== undefined && typeof depPath !== 'string') {
    throw invalid(source, `dependencies[${index}].path must be a string`);
  }
  if (location === 'local' && depPath === undefined) {
    throw invalid(source, `local dependency ${name} has no path`);
  }
  const network = value['network'];
  if (network !== undefined && !isNetworkName(network)) {
    const allowed = NETWORK_NAMES.join(', ');
    throw invalid(source, `dependencies[${index}].network must be one of ${allowed}`);
  }

  return {
    name,
    location,
    ...(depPath === undefined ? {} : { path: depPath }),
    ...(network === undefined ? {} : { network }),
  };
}

/**
 * Parse and validate manifest text.
 *
 * @param source - Where the text came from, for error messages.
 * @throws {DependencyError} `MANIFEST_INVALID`.
 */
export function parseManifest(text: string, source: string): Manifest {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw invalid(source, formatErrorMessage(error));
  }
  if (!isRecord(raw)) {
    throw invalid(source, 'expected a JSON object');
  }

  const dependencies = raw['dependencies'];
  if (dependencies !== undefined && dependencies !== null && !Array.isArray(dependencies)) {
    throw invalid(source, '"dependencies" must be an array');
  }

  return {
    program: readString(raw, 'program', source),
    version: readString(raw, 'version', source, '0.0.0'),
    description: readString(raw, 'description', source, ''),
    license: readString(raw, 'license', source, 'MIT'),
    ...(Array.isArray(dependencies)
      ? {
          dependencies: dependencies.map((dep: unknown, index) =>
            parseDependency(dep, index, source),
          ),
        }
      : {}),
  };
}

/**
 * Read `<packagePath>/program.json`.
 *
 * @throws {DependencyError} `MANIFEST_NOT_FOUND` or `MANIFEST_INVALID`.
 */
export async function readManifest(packagePath: string): Promise<Manifest> {
  const manifestPath = path.join(packagePath, MANIFEST_FILE);
  let text: string;
  try {
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- packagePath is validated by caller
    text = await readFile(manifestPath, 'utf8');
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT' || systemErrorCode(error) === 'ENOTDIR') {
      throw new DependencyError('MANIFEST_NOT_FOUND', `No ${MANIFEST_FILE} in ${packagePath}`, {
        cause: error,
        details: { packagePath },
      });
    }
    throw new DependencyError(
      'MANIFEST_INVALID',
      `Cannot read ${manifestPath}: ${formatErrorMessage(error)}`,
      { cause: error, details: { manifest: manifestPath } },
    );
  }
  return parseManifest(text, manifestPath);
}

/**
 * Minimal manifest for a freshly scaffolded program.
 */
export function manifestFor(programId: ProgramId): Manifest {
  return {
    program: formatProgramId(programId),
    version: '0.0.0',
    description: '',
    license: 'MIT',
  };
}
