/**
 * Tests for CLI argument parsing helpers.
 */

import { describe, expect, it } from 'vitest';

import { CliError } from '../../errors/errors.ts';
import { parseCliArgs } from './args.ts';

describe('input/args.ts', () => {
  it('parses defaults when no argv provided', () => {
    expect(parseCliArgs([])).toEqual({
      logDir: './logs',
      structuredLogs: false,
      rawLogs: false,
      help: false,
      version: false,
      verbose: false,
    });
  });

  it('parses every option', () => {
    const args = parseCliArgs([
      '--path',
      './app',
      '--home',
      '/home/test/.aleo',
      '--endpoint',
      'https://registry.example.test/v1',
      '--network',
      'canary',
      '--compiler',
      '/opt/leo',
      '--log-dir',
      './out/logs',
      '--structured-logs',
      '--verbose',
    ]);

    expect(args).toEqual({
      path: './app',
      home: '/home/test/.aleo',
      endpoint: 'https://registry.example.test/v1',
      network: 'canary',
      compiler: '/opt/leo',
      logDir: './out/logs',
      structuredLogs: true,
      rawLogs: false,
      help: false,
      version: false,
      verbose: true,
    });
  });

  it('accepts short help and version flags', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
    expect(parseCliArgs(['-v']).version).toBe(true);
  });

  it('throws when a string option is blank', () => {
    expect(() => parseCliArgs(['--log-dir', '   '])).toThrow('--log-dir requires a value');
  });

  it('throws when a string option is missing its value', () => {
    expect(() => parseCliArgs(['--path'])).toThrow('--path requires a value');
  });

  it('rejects unknown networks', () => {
    expect(() => parseCliArgs(['--network', 'devnet'])).toThrow(/Invalid network: devnet/);
  });

  it('rejects combining structured and raw logs', () => {
    expect(() => parseCliArgs(['--structured-logs', '--raw-logs'])).toThrow(
      '--structured-logs and --raw-logs cannot be combined',
    );
  });

  it('maps unknown options to CLI_UNKNOWN_OPTION', () => {
    let caught: unknown;
    try {
      parseCliArgs(['--linters', 'eslint']);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CliError);
    expect(caught).toMatchObject({
      code: 'CLI_UNKNOWN_OPTION',
      message: 'Unknown option: --linters',
    });
  });

  it('throws on unexpected positional arguments', () => {
    expect(() => parseCliArgs(['src/main.leo'])).toThrow('Unexpected argument: src/main.leo');
  });
});
