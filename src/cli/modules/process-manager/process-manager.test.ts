/**
 * Tests for process manager module
 *
 * Child processes are the current Node.js binary running inline scripts.
 */

import { describe, expect, it } from 'vitest';

import { ProcessError } from '../../../errors/errors.ts';
import { type OutputSink, runProcess } from './process-manager.ts';

const NODE = process.execPath;

function collectingSink(): { sink: OutputSink; text: () => string } {
  const chunks: Buffer[] = [];
  return {
    sink: async (stream) => {
      for await (const chunk of stream) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
      }
    },
    text: () => Buffer.concat(chunks).toString('utf8'),
  };
}

describe('Process Manager Module', () => {
  it('returns the exit code and captured stdout', async () => {
    const result = await runProcess({
      binary: NODE,
      args: ['-e', 'process.stdout.write("artifact"); process.exit(0)'],
      timeoutMs: 10_000,
    });

    expect(result).toEqual({ exitCode: 0, stdout: 'artifact' });
  });

  it('reports non-zero exit codes without throwing', async () => {
    const result = await runProcess({
      binary: NODE,
      args: ['-e', 'process.exit(3)'],
      timeoutMs: 10_000,
    });

    expect(result.exitCode).toBe(3);
  });

  it('streams stdout and stderr to the sink', async () => {
    const { sink, text } = collectingSink();

    await runProcess(
      {
        binary: NODE,
        args: ['-e', 'process.stderr.write("warn\\n")'],
        timeoutMs: 10_000,
      },
      sink,
    );

    expect(text()).toBe('warn\n');
  });

  it('fails with PROCESS_SPAWN_FAILED for a missing binary', async () => {
    const error = await runProcess({
      binary: '/nonexistent/leo-lint-compiler',
      args: [],
      timeoutMs: 10_000,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProcessError);
    expect(error).toMatchObject({ code: 'PROCESS_SPAWN_FAILED' });
  });

  it('kills the process and fails with PROCESS_TIMEOUT', async () => {
    const started = Date.now();

    const error = await runProcess({
      binary: NODE,
      args: ['-e', 'setTimeout(() => {}, 30000)'],
      timeoutMs: 200,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProcessError);
    expect(error).toMatchObject({ code: 'PROCESS_TIMEOUT', message: 'Timeout exceeded (200ms)' });
    expect(Date.now() - started).toBeLessThan(10_000);
  });

  it('runs in the requested working directory', async () => {
    const result = await runProcess({
      binary: NODE,
      args: ['-e', 'process.stdout.write(process.cwd())'],
      timeoutMs: 10_000,
      cwd: '/',
    });

    expect(result.stdout).toBe('/');
  });
});
