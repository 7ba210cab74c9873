/**
 * Tests for run configuration resolution
 */

import { rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createTempDir } from '../../__test-utils__/index.ts';
import type { CLIArgs } from '../input/args.ts';
import { DEFAULT_ENDPOINT, readProgramId, resolveLintConfig } from './config.ts';

const BASE_ARGS: CLIArgs = {
  logDir: './logs',
  structuredLogs: false,
  rawLogs: false,
  help: false,
  version: false,
  verbose: false,
};

describe('resolveLintConfig', () => {
  let pkg: string;

  beforeEach(async () => {
    pkg = await createTempDir('leo-lint-config-');
  });

  afterEach(async () => {
    await rm(pkg, { recursive: true, force: true });
  });

  it('falls back to defaults', () => {
    const config = resolveLintConfig(BASE_ARGS, { env: {}, cwd: pkg, homedir: '/home/tester' });

    expect(config).toEqual({
      packagePath: path.resolve(pkg),
      homePath: '/home/tester/.aleo',
      endpoint: DEFAULT_ENDPOINT,
      network: 'testnet',
      compiler: 'leo',
      compilerTimeoutMs: 120_000,
      logDir: path.join(path.resolve(pkg), 'logs'),
      structuredLogs: false,
      rawLogs: false,
      verbose: false,
    });
  });

  it('reads the environment when flags are absent', () => {
    const config = resolveLintConfig(BASE_ARGS, {
      env: {
        LEO_LINT_ENDPOINT: 'http://localhost:3030',
        LEO_LINT_NETWORK: 'mainnet',
        LEO_LINT_COMPILER: '/opt/leo/bin/leo',
        LEO_LINT_COMPILER_TIMEOUT_MS: '5000',
      },
      cwd: pkg,
      homedir: '/home/tester',
    });

    expect(config).toMatchObject({
      endpoint: 'http://localhost:3030',
      network: 'mainnet',
      compiler: '/opt/leo/bin/leo',
      compilerTimeoutMs: 5000,
    });
  });

  it('prefers flags over the environment', () => {
    const config = resolveLintConfig(
      {
        ...BASE_ARGS,
        path: '.',
        home: './home',
        endpoint: 'https://registry.example.test/v1',
        network: 'canary',
        compiler: 'leo-nightly',
      },
      {
        env: {
          LEO_LINT_ENDPOINT: 'http://localhost:3030',
          LEO_LINT_NETWORK: 'mainnet',
          LEO_LINT_COMPILER: '/opt/leo/bin/leo',
        },
        cwd: pkg,
      },
    );

    expect(config).toMatchObject({
      homePath: path.join(path.resolve(pkg), 'home'),
      endpoint: 'https://registry.example.test/v1',
      network: 'canary',
      compiler: 'leo-nightly',
    });
  });

  it('treats blank environment values as unset', () => {
    const config = resolveLintConfig(BASE_ARGS, {
      env: { LEO_LINT_COMPILER: '  ', LEO_LINT_NETWORK: '' },
      cwd: pkg,
    });

    expect(config.compiler).toBe('leo');
    expect(config.network).toBe('testnet');
  });

  it('rejects invalid environment values', () => {
    expect(() =>
      resolveLintConfig(BASE_ARGS, { env: { LEO_LINT_NETWORK: 'devnet' }, cwd: pkg }),
    ).toThrow('Invalid network: devnet');
    expect(() =>
      resolveLintConfig(BASE_ARGS, { env: { LEO_LINT_COMPILER_TIMEOUT_MS: '-1' }, cwd: pkg }),
    ).toThrow('LEO_LINT_COMPILER_TIMEOUT_MS must be a positive integer: -1');
    expect(() =>
      resolveLintConfig(BASE_ARGS, { env: { LEO_LINT_ENDPOINT: 'ftp://x.test' }, cwd: pkg }),
    ).toThrow('Endpoint must use http or https: ftp://x.test');
  });

  it('rejects a missing package directory and log dirs outside it', () => {
    expect(() =>
      resolveLintConfig({ ...BASE_ARGS, path: 'missing' }, { env: {}, cwd: pkg }),
    ).toThrow(`Package path is not a directory: ${path.join(path.resolve(pkg), 'missing')}`);
    expect(() =>
      resolveLintConfig({ ...BASE_ARGS, logDir: '../logs' }, { env: {}, cwd: pkg }),
    ).toThrow(`Log directory must be within ${path.resolve(pkg)}`);
  });

  it('rejects log dirs inside the build directory the pass clears', () => {
    expect(() =>
      resolveLintConfig({ ...BASE_ARGS, logDir: 'build/logs' }, { env: {}, cwd: pkg }),
    ).toThrow(`Log directory must not be inside ${path.join(path.resolve(pkg), 'build')}`);
  });
});

describe('readProgramId', () => {
  let pkg: string;

  beforeEach(async () => {
    pkg = await createTempDir('leo-lint-program-');
  });

  afterEach(async () => {
    await rm(pkg, { recursive: true, force: true });
  });

  it('parses the manifest program', async () => {
    await writeFile(path.join(pkg, 'program.json'), JSON.stringify({ program: 'token.aleo' }));

    expect(await readProgramId(pkg)).toEqual({ name: 'token', network: 'aleo' });
  });

  it('rejects invalid program ids', async () => {
    await writeFile(path.join(pkg, 'program.json'), JSON.stringify({ program: 'token.eth' }));

    await expect(readProgramId(pkg)).rejects.toMatchObject({ code: 'PROGRAM_ID_INVALID' });
  });

  it('reports a missing manifest', async () => {
    await expect(readProgramId(pkg)).rejects.toMatchObject({ code: 'MANIFEST_NOT_FOUND' });
  });
});
