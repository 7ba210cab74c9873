/**
 * Build directory scaffolding for the root program.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { ProgramId } from '../../../lint/program-id.ts';
import type { PackageScaffold } from '../../../lint/types.ts';
import { MANIFEST_FILE, manifestFor } from '../manifest/manifest.ts';

/** Placeholder for the compiled program; the lint pass never fills it. */
export const MAIN_ARTIFACT = 'main.aleo';

/**
 * Create `buildPath` with a manifest for `programId` and an empty artifact.
 */
export async function createPackage(buildPath: string, programId: ProgramId): Promise<void> {
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- buildPath is derived from the package path
  await mkdir(buildPath, { recursive: true });
  await writeFile(
    path.join(buildPath, MANIFEST_FILE),
    `${JSON.stringify(manifestFor(programId), null, 2)}\n`,
  );
  await writeFile(path.join(buildPath, MAIN_ARTIFACT), '');
}

export const packageScaffold: PackageScaffold = { create: createPackage };
