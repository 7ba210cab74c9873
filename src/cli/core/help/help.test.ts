import { afterEach, describe, expect, it, vi } from 'vitest';

/**
 * Tests for `help.ts` helpers (`showHelp` / `showVersion`).
 */
describe('help.ts', () => {
  afterEach(() => {
    vi.doUnmock('../version/version.ts');
    vi.resetModules();
  });

  it('re-exports showHelp from formatter', async () => {
    const helpMod = await import('./help.ts');
    const formatterMod = await import('./formatter.ts');

    expect(helpMod.showHelp).toBe(formatterMod.showHelp);
  });

  it('builds showVersion from getPackageVersion', async () => {
    vi.resetModules();
    vi.doMock('../version/version.ts', () => ({
      getPackageVersion: () => '9.9.9',
    }));

    const { showVersion } = await import('./help.ts');

    expect(showVersion()).toBe('leo-lint v9.9.9');
  });
});
