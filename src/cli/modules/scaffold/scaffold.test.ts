/**
 * Tests for build directory scaffolding
 */

import { readFile, rm } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createTempDir } from '../../../__test-utils__/index.ts';
import { parseProgramId } from '../../../lint/program-id.ts';
import { parseManifest } from '../manifest/manifest.ts';
import { packageScaffold } from './scaffold.ts';

describe('Package Scaffold', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir('leo-lint-scaffold-');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('writes a manifest and an empty artifact into a new build directory', async () => {
    const buildPath = path.join(root, 'build');

    await packageScaffold.create(buildPath, parseProgramId('hello.aleo'));

    const manifestPath = path.join(buildPath, 'program.json');
    expect(parseManifest(await readFile(manifestPath, 'utf8'), manifestPath)).toEqual({
      program: 'hello.aleo',
      version: '0.0.0',
      description: '',
      license: 'MIT',
    });
    expect(await readFile(path.join(buildPath, 'main.aleo'), 'utf8')).toBe('');
  });
});
