/**
 * Tests for the CLI entrypoint wiring (broken pipes, error handling, signals).
 */

import { afterEach, describe, expect, it, vi } from 'vitest';

import { fakeConsole } from '../../../__test-utils__/index.ts';
import { CliError } from '../../../errors/errors.ts';
import { __test__, main, runEntrypoint } from './entrypoint.ts';

const { handleBrokenPipe, sanitizeArgs } = __test__;

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

afterEach(() => {
  process.stdout.off('error', handleBrokenPipe);
  process.stderr.off('error', handleBrokenPipe);
  process.exitCode = undefined;
});

describe('handleBrokenPipe', () => {
  it('ignores EPIPE and rethrows anything else', () => {
    expect(() => handleBrokenPipe(Object.assign(new Error('EPIPE'), { code: 'EPIPE' }))).not.toThrow();
    expect(() => handleBrokenPipe(Object.assign(new Error('boom'), { code: 'EIO' }))).toThrow(
      'boom',
    );
  });

  it('is installed on stdout and stderr', () => {
    runEntrypoint({ mainFn: () => Promise.resolve({ exitCode: 0 }) });

    expect(process.stdout.listeners('error')).toContain(handleBrokenPipe);
    expect(process.stderr.listeners('error')).toContain(handleBrokenPipe);
  });
});

describe('sanitizeArgs', () => {
  it('keeps flags and redacts values and positionals', () => {
    expect(sanitizeArgs(['--endpoint=https://user:pw@host', '--verbose', '-h', 'pkg'])).toEqual([
      '--endpoint=<redacted>',
      '--verbose',
      '-h',
      '<redacted>',
    ]);
  });
});

describe('runEntrypoint', () => {
  it('wraps rejected main promises as UNEXPECTED_ERROR and sets exit code 1', async () => {
    const errorSpy = vi.fn();

    runEntrypoint({
      mainFn: () => Promise.reject(new Error('boom')),
      console: { error: errorSpy },
    });
    await flush();

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(
      '\n❌ Fatal error:',
      expect.objectContaining({ code: 'UNEXPECTED_ERROR', message: 'boom' }),
    );
    expect(process.exitCode).toBe(1);
  });

  it('maps SIGINT to exit code 130 and calls the shutdown hook once', async () => {
    const before = new Set(process.listeners('SIGINT'));
    const onSignal = vi.fn();
    let finish: (result: { exitCode: number }) => void = () => {};

    runEntrypoint({
      mainFn: () =>
        new Promise((resolve) => {
          finish = resolve;
        }),
      onSignal,
    });

    const added = process.listeners('SIGINT').filter((listener) => !before.has(listener));
    expect(added).toHaveLength(1);
    added[0]?.('SIGINT');
    added[0]?.('SIGINT');

    expect(onSignal).toHaveBeenCalledTimes(1);
    expect(onSignal).toHaveBeenCalledWith('SIGINT');
    expect(process.exitCode).toBe(130);

    finish({ exitCode: 0 });
    await flush();
    expect(process.listeners('SIGINT').filter((listener) => !before.has(listener))).toEqual([]);
  });

  it('maps SIGTERM to exit code 143 and reports failing hooks', async () => {
    const before = new Set(process.listeners('SIGTERM'));
    const errorSpy = vi.fn();
    let finish: (result: { exitCode: number }) => void = () => {};

    runEntrypoint({
      mainFn: () =>
        new Promise((resolve) => {
          finish = resolve;
        }),
      console: { error: errorSpy },
      onSignal: () => {
        throw new Error('hook failed');
      },
    });

    const added = process.listeners('SIGTERM').filter((listener) => !before.has(listener));
    added[0]?.('SIGTERM');

    expect(process.exitCode).toBe(143);
    expect(errorSpy).toHaveBeenCalledWith('\nWARN: signal handler failed:', expect.any(Error));

    finish({ exitCode: 0 });
    await flush();
  });
});

describe('main', () => {
  it('prints help without running the pass', async () => {
    const out = fakeConsole();
    const lintFn = vi.fn(async () => {});

    const result = await main({ argv: ['--help'], console: out, lintFn });

    expect(result).toEqual({ exitCode: 0 });
    expect(out.log).toHaveBeenCalledWith(expect.stringContaining('USAGE:\n  leo-lint [OPTIONS]'));
    expect(lintFn).not.toHaveBeenCalled();
  });

  it('prints the version', async () => {
    const out = fakeConsole();

    await main({ argv: ['-v'], console: out });

    expect(out.log).toHaveBeenCalledWith(expect.stringMatching(/^leo-lint v/));
  });

  it('rejects unknown options', async () => {
    await expect(main({ argv: ['--fix'], console: fakeConsole() })).rejects.toBeInstanceOf(
      CliError,
    );
  });
});
