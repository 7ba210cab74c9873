/**
 * Process execution and management utilities.
 */

import { type ChildProcess, spawn } from 'node:child_process';
import { Readable } from 'node:stream';

import { ProcessError } from '../../../errors/errors.ts';

export interface ProcessSpec {
  readonly binary: string;
  readonly args: readonly string[];
  readonly timeoutMs: number;
  readonly cwd?: string;
}

export interface ProcessExecutionResult {
  readonly exitCode: number;
  /** Everything the process wrote to stdout, decoded as UTF-8. */
  readonly stdout: string;
}

/** Consumer of the combined stdout/stderr stream, typically a log file writer. */
export type OutputSink = (combined: NodeJS.ReadableStream) => Promise<void>;

/**
 * Run a process to completion, stream its combined output to `sink` and
 * enforce the configured timeout.
 *
 * @throws {ProcessError} `PROCESS_SPAWN_FAILED` or `PROCESS_TIMEOUT`.
 */
export async function runProcess(
  spec: ProcessSpec,
  sink?: OutputSink,
): Promise<ProcessExecutionResult> {
  // Spawn the process immediately so event listeners are attached asap
  const proc = spawn(spec.binary, [...spec.args], {
    stdio: ['ignore', 'pipe', 'pipe'],
    detached: process.platform !== 'win32',
    ...(spec.cwd === undefined ? {} : { cwd: spec.cwd }),
  });

  const combined = new Readable({ read() {} });
  let combinedEnded = false;
  const stdoutChunks: Buffer[] = [];

  const endCombined = (): void => {
    if (combinedEnded) {
      return;
    }
    combinedEnded = true;
    combined.push(null);
  };

  const forward = (chunk: Buffer): void => {
    if (combinedEnded || sink === undefined) {
      return;
    }
    combined.push(chunk);
  };

  proc.stdout?.on('data', (chunk: Buffer) => {
    stdoutChunks.push(chunk);
    forward(chunk);
  });
  proc.stderr?.on('data', forward);

  const logPromise: Promise<void> = sink === undefined ? Promise.resolve() : sink(combined);
  // Keep an early logger failure from surfacing as an unhandled rejection;
  // it is still awaited below.
  logPromise.catch(() => {});

  let timer: NodeJS.Timeout | undefined;
  try {
    const exitCode = await new Promise<number>((resolve, reject) => {
      timer = setTimeout(() => {
        endCombined();
        killProcessTree(proc);
        reject(new ProcessError('PROCESS_TIMEOUT', `Timeout exceeded (${spec.timeoutMs}ms)`));
      }, spec.timeoutMs);

      proc.on('close', (code) => {
        endCombined();
        resolve(code ?? 1);
      });

      proc.on('error', (err) => {
        endCombined();
        reject(
          new ProcessError('PROCESS_SPAWN_FAILED', `Process spawn failed: ${err.message}`, {
            cause: err,
          }),
        );
      });
    });

    await logPromise;
    return { exitCode, stdout: Buffer.concat(stdoutChunks).toString('utf8') };
  } catch (err: unknown) {
    endCombined();
    await logPromise.catch(() => {
      // The process failure is the error worth reporting
    });
    throw err;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Forcefully terminate the given process and, on POSIX, its process group.
 */
export function killProcessTree(proc: ChildProcess): void {
  const pid = proc.pid;
  /* v8 ignore next 3 */
  if (pid === undefined || pid === 0) {
    return;
  }

  /* v8 ignore next 9 */
  if (process.platform === 'win32') {
    // Windows: spawn taskkill to terminate process tree
    try {
      spawn(String.raw`C:\Windows\System32\taskkill.exe`, ['/pid', String(pid), '/T', '/F'], {
        stdio: 'ignore',
      });
    } catch {
      // Fall through to direct kill
    }
  } else {
    // POSIX: kill the process group (negative pid)
    try {
      process.kill(-pid, 'SIGKILL');
    } catch {
      // Process group may already be gone
    }
  }

  try {
    proc.kill('SIGKILL');
  } catch {
    // Process may already be terminated
  }
}
