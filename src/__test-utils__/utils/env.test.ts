/**
 * Tests for environment helpers.
 */

import { afterEach, describe, expect, it } from 'vitest';

import { withEnv } from './env.ts';

const KEY = 'LEO_LINT_ENV_HELPER_TEST';

afterEach(() => {
  delete process.env[KEY];
});

describe('withEnv', () => {
  it('applies updates for the callback and restores the previous value', async () => {
    process.env[KEY] = 'before';

    const seen = await withEnv({ [KEY]: 'during' }, () => process.env[KEY]);

    expect(seen).toBe('during');
    expect(process.env[KEY]).toBe('before');
  });

  it('unsets variables mapped to undefined and removes ones it introduced', async () => {
    process.env[KEY] = 'before';
    await withEnv({ [KEY]: undefined }, () => {
      expect(KEY in process.env).toBe(false);
    });
    expect(process.env[KEY]).toBe('before');

    delete process.env[KEY];
    await withEnv({ [KEY]: 'temp' }, () => undefined);
    expect(KEY in process.env).toBe(false);
  });

  it('restores the environment when the callback throws', async () => {
    await expect(
      withEnv({ [KEY]: 'temp' }, () => {
        throw new Error('fail');
      }),
    ).rejects.toThrow('fail');
    expect(KEY in process.env).toBe(false);
  });
});
