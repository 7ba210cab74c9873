/**
 * Signature-only stubs of dependency programs.
 */

import { readFile } from 'node:fs/promises';

import { formatProgramId, programIdFor } from '../../../lint/program-id.ts';
import type { Stub } from '../../../lint/types.ts';

const LEO_DECLARATION =
  /\b(?:async\s+)?(?:transition|function|inline|struct|record)\s+[A-Za-z_]\w*[^{;]*/g;
const ALEO_DECLARATION = /^\s*(?:function|closure|struct|record|mapping)\s+[A-Za-z_]\w*/gm;

function collapse(text: string): string {
  return text.replaceAll(/\s+/g, ' ').trim();
}

/**
 * Declaration headers of Leo source text, bodies dropped.
 */
export function leoDeclarations(source: string): string[] {
  // Comments would otherwise leak keywords into the stub.
  const code = source.replaceAll(/\/\/[^\n]*/g, '');
  return Array.from(code.matchAll(LEO_DECLARATION), (match) => collapse(match[0]));
}

/**
 * Declaration names of compiled (`.aleo`) program text.
 */
export function aleoDeclarations(program: string): string[] {
  return Array.from(program.matchAll(ALEO_DECLARATION), (match) => collapse(match[0]));
}

/**
 * Stub of a local dependency built from its source files.
 */
export async function localStub(symbol: string, files: readonly string[]): Promise<Stub> {
  const declarations: string[] = [];
  for (const file of files) {
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- file comes from source enumeration
    declarations.push(...leoDeclarations(await readFile(file, 'utf8')));
  }
  return { program: formatProgramId(programIdFor(symbol)), declarations };
}

/**
 * Stub of a network dependency built from its published program text.
 */
export function networkStub(symbol: string, program: string): Stub {
  return {
    program: formatProgramId(programIdFor(symbol)),
    declarations: aleoDeclarations(program),
  };
}
