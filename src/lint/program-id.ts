/**
 * Lint Engine — Program Identifiers
 *
 * A program is addressed as `<name>.<network>` where the network suffix is
 * always `aleo`. The bare name doubles as the dependency symbol.
 */

import { ProgramIdError } from '../errors/errors.ts';

export const PROGRAM_NETWORK_SUFFIX = 'aleo';

const PROGRAM_NAME_RE = /^[A-Za-z]\w*$/;

/** Name of a local dependency package (`token` for `token.aleo`). */
export type DependencySymbol = string;

export interface ProgramId {
  readonly name: DependencySymbol;
  readonly network: typeof PROGRAM_NETWORK_SUFFIX;
}

/**
 * Validate a bare program name for use as a dependency symbol.
 *
 * @throws {ProgramIdError} when the name does not start with a letter or holds
 *   characters other than ASCII letters, digits and `_`.
 */
export function toDependencySymbol(name: string): DependencySymbol {
  if (!PROGRAM_NAME_RE.test(name)) {
    throw new ProgramIdError('PROGRAM_ID_INVALID', `Invalid program name: "${name}"`, {
      details: { name },
    });
  }
  return name;
}

/**
 * Parse `name.aleo` into a structured identifier.
 */
export function parseProgramId(text: string): ProgramId {
  const dot = text.lastIndexOf('.');
  if (dot <= 0) {
    throw new ProgramIdError(
      'PROGRAM_ID_INVALID',
      `Program id must look like "name.aleo": "${text}"`,
      { details: { programId: text } },
    );
  }

  const network = text.slice(dot + 1);
  if (network !== PROGRAM_NETWORK_SUFFIX) {
    throw new ProgramIdError(
      'PROGRAM_ID_INVALID',
      `Program id must end with ".${PROGRAM_NETWORK_SUFFIX}": "${text}"`,
      { details: { programId: text } },
    );
  }

  return { name: toDependencySymbol(text.slice(0, dot)), network: PROGRAM_NETWORK_SUFFIX };
}

/**
 * Build the identifier for a dependency symbol.
 */
export function programIdFor(symbol: string): ProgramId {
  return parseProgramId(`${symbol}.${PROGRAM_NETWORK_SUFFIX}`);
}

export function formatProgramId(id: ProgramId): string {
  return `${id.name}.${id.network}`;
}
