/**
 * Tests for the CLI `version` helper.
 *
 * The package version is read from `package.json` once and cached; when the
 * file cannot be read the module falls back to `PKG_VERSION_FALLBACK`.
 */
import path from 'node:path';

import { afterEach, describe, expect, it, vi } from 'vitest';

import { PKG_VERSION_FALLBACK } from '../../constants/paths.ts';

describe('version module', () => {
  afterEach(() => {
    vi.doUnmock('node:fs');
    vi.restoreAllMocks();
    vi.resetModules();
  });

  it('reads the package version once and caches it', async () => {
    const readFileSync = vi.fn(() => JSON.stringify({ version: '1.2.3' }));
    vi.doMock('node:fs', () => ({ readFileSync }));

    const mod = await import('./version.ts');

    expect(mod.getPackageVersion()).toBe('1.2.3');
    expect(mod.getPackageVersion()).toBe('1.2.3');
    expect(readFileSync).toHaveBeenCalledTimes(1);
  });

  it('falls back and logs when package.json cannot be read', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.doMock('node:fs', () => ({
      readFileSync: vi.fn(() => {
        throw new Error('boom');
      }),
    }));

    const mod = await import('./version.ts');

    expect(mod.getPackageVersion()).toBe(PKG_VERSION_FALLBACK);
    expect(errorSpy).toHaveBeenCalledWith('[version] Failed to read package.json: Error: boom');
  });

  it('resolves package.json at the repository root', async () => {
    const { __test__ } = await import('./version.ts');

    expect(path.basename(__test__.pkgPath)).toBe('package.json');
    expect(path.basename(path.dirname(__test__.pkgPath))).not.toBe('src');
  });

  it('ignores non-string versions', async () => {
    const { __test__ } = await import('./version.ts');

    expect(__test__.readVersion('{"version": 3}')).toBe(PKG_VERSION_FALLBACK);
    expect(__test__.readVersion('{}')).toBe(PKG_VERSION_FALLBACK);
    expect(__test__.readVersion('{"version": "0.4.0"}')).toBe('0.4.0');
  });
});
