/**
 * Lint Logging
 *
 * Role:
 *   Deterministic per-dependency log files for compiler output and lint events.
 *
 * Guarantees:
 *   - One log file per dependency, truncated on first use within a run
 *   - Ordered, complete output
 *   - Raw mode preserves byte-for-byte output
 *   - Standard mode prefixes every line with a timestamp and the dependency
 *
 * Non-goals:
 *   - No buffering of entire streams
 *   - No log rotation
 */

import { createWriteStream, type WriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { pipeline, Transform } from 'node:stream';
import { promisify } from 'node:util';

const pipelineAsync = promisify(pipeline);

interface StructuredPayload {
  timestamp: string;
  dependency: string;
  message: string;
}

export interface LogOptions {
  readonly logDir: string;
  readonly dependency: string;
  /** Pass bytes through untouched. */
  readonly raw: boolean;
  readonly structured?: boolean;
  /** Maximum bytes to write; logs beyond this are truncated deterministically. */
  readonly maxBytes?: number;
  /** `w` truncates the file, `a` appends. Defaults to `a`. */
  readonly flags?: 'w' | 'a';
}

/**
 * Build `LogOptions` with optional fields in a type-safe manner.
 */
export function makeLogOptions(opts: {
  logDir: string;
  dependency: string;
  raw: boolean;
  structured?: boolean | undefined;
  maxBytes?: number | undefined;
  flags?: 'w' | 'a' | undefined;
}): LogOptions {
  const { logDir, dependency, raw, structured, maxBytes, flags } = opts;

  return {
    logDir,
    dependency,
    raw,
    ...(structured === undefined ? {} : { structured }),
    ...(maxBytes === undefined ? {} : { maxBytes }),
    ...(flags === undefined ? {} : { flags }),
  };
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

/**
 * Determine a log path for the provided dependency under the configured log dir.
 */
export function getLogPath(logDir: string, dependency: string): string {
  return path.join(logDir, `${dependency}.log`);
}

async function ensureLogDirectory(logDir: string): Promise<void> {
  // eslint-disable-next-line security/detect-non-literal-fs-filename
  await mkdir(logDir, { recursive: true });
}

function formatLine(line: string, dependency: string): string {
  const timestamp = new Date().toISOString();
  const suffix = line.length === 0 ? '' : ` ${line}`;
  return `[${timestamp}] [${dependency}]${suffix}`;
}

function formatStructured(line: string, dependency: string): string {
  const payload: StructuredPayload = {
    timestamp: new Date().toISOString(),
    dependency,
    message: line,
  };
  return JSON.stringify(payload);
}

/* -------------------------------------------------------------------------- */
/* Base transform factory for line-safe, chunk-safe processing                */
/* -------------------------------------------------------------------------- */

type LineProcessor = (line: string) => string;

/**
 * Build a transform stream that buffers chunks until line boundaries appear.
 */
function createBufferingTransform(processLine: LineProcessor): Transform {
  let buffer = '';

  return new Transform({
    transform(chunk: Buffer, _enc, cb): void {
      buffer += chunk.toString('utf8');

      for (;;) {
        const newlineIndex = buffer.indexOf('\n');
        if (newlineIndex < 0) {
          break;
        }

        const line = buffer.slice(0, newlineIndex);
        buffer = buffer.slice(newlineIndex + 1);
        this.push(`${processLine(line)}\n`);
      }

      cb();
    },

    flush(cb): void {
      if (buffer.length > 0) {
        this.push(`${processLine(buffer)}\n`);
      }
      cb();
    },
  });
}

function createFormattingTransform(dependency: string, structured: boolean): Transform {
  return createBufferingTransform((line) =>
    structured ? formatStructured(line, dependency) : formatLine(line, dependency),
  );
}

/**
 * Create a transform that truncates output after a certain byte budget.
 */
function createBoundedTransform(
  dependency: string,
  structured: boolean,
  maxBytes?: number,
): Transform {
  if (maxBytes === undefined) {
    return new Transform({
      transform(chunk, _enc, cb) {
        this.push(chunk);
        cb();
      },
    });
  }

  let remaining = Math.max(0, maxBytes);
  let truncated = false;

  return new Transform({
    transform(chunk: Buffer, _enc, cb): void {
      if (remaining <= 0) {
        cb();
        return;
      }

      const slice = chunk.length > remaining ? chunk.subarray(0, remaining) : chunk;
      this.push(slice);
      remaining -= slice.length;

      if (chunk.length > slice.length && !truncated) {
        truncated = true;
        const note = structured
          ? `${formatStructured('[TRUNCATED]', dependency)}\n`
          : `${formatLine(`[TRUNCATED at ${maxBytes} bytes]`, dependency)}\n`;
        this.push(note);
        remaining = 0;
      }

      cb();
    },
  });
}

/* -------------------------------------------------------------------------- */
/* Public API                                                                  */
/* -------------------------------------------------------------------------- */

/**
 * Create a logger function for one output stream of a dependency.
 *
 * @returns Async function that consumes a readable stream and writes to disk.
 */
export async function createLogger(
  options: LogOptions,
): Promise<(readStream: NodeJS.ReadableStream) => Promise<void>> {
  await ensureLogDirectory(options.logDir);

  const logPath = getLogPath(options.logDir, options.dependency);
  // eslint-disable-next-line security/detect-non-literal-fs-filename
  const writeStream: WriteStream = createWriteStream(logPath, { flags: options.flags ?? 'a' });

  return async (readStream: NodeJS.ReadableStream): Promise<void> => {
    const structured = options.structured === true;
    const bound = createBoundedTransform(options.dependency, structured, options.maxBytes);
    if (options.raw) {
      await pipelineAsync(readStream, bound, writeStream);
    } else {
      const format = createFormattingTransform(options.dependency, structured);
      await pipelineAsync(readStream, format, bound, writeStream);
    }
  };
}

/**
 * Append a single message to a dependency log.
 */
export async function appendToLog(
  logDir: string,
  dependency: string,
  message: string,
  flags: 'w' | 'a' = 'a',
): Promise<void> {
  await ensureLogDirectory(logDir);

  const logPath = getLogPath(logDir, dependency);
  // eslint-disable-next-line security/detect-non-literal-fs-filename
  const writeStream = createWriteStream(logPath, { flags });

  return new Promise<void>((resolve, reject) => {
    writeStream.on('error', reject);
    writeStream.end(`${message}\n`, () => resolve());
  });
}

/**
 * Log files for every dependency of one run. The first write to a dependency
 * truncates whatever an earlier run left behind.
 */
export class DependencyLogs {
  readonly #options: Omit<LogOptions, 'dependency' | 'flags'>;
  readonly #started = new Set<string>();

  constructor(options: Omit<LogOptions, 'dependency' | 'flags'>) {
    this.#options = options;
  }

  get logDir(): string {
    return this.#options.logDir;
  }

  pathFor(dependency: string): string {
    return getLogPath(this.#options.logDir, dependency);
  }

  /** Record a lint event line (`COMPILED <file>`, `ERROR: ...`). */
  async append(dependency: string, message: string): Promise<void> {
    const line = this.#options.structured === true
      ? formatStructured(message, dependency)
      : message;
    await appendToLog(this.#options.logDir, dependency, line, this.#flags(dependency));
  }

  /** Stream process output into the dependency log. */
  async stream(dependency: string, readStream: NodeJS.ReadableStream): Promise<void> {
    const logger = await createLogger(
      makeLogOptions({ ...this.#options, dependency, flags: this.#flags(dependency) }),
    );
    await logger(readStream);
  }

  #flags(dependency: string): 'w' | 'a' {
    if (this.#started.has(dependency)) {
      return 'a';
    }
    this.#started.add(dependency);
    return 'w';
  }
}
