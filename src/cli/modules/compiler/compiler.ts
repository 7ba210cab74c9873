/**
 * Process Compiler
 *
 * Role:
 *   Check one source file by running the external compiler on it.
 *
 * Responsibilities:
 *   - Resolve the compiler binary once, before the first compile
 *   - Hand the dependency stubs to the compiler as a JSON file
 *   - Stream compiler output into the dependency's log
 *
 * Non-goals:
 *   - No parsing of compiler diagnostics
 *   - No artifact caching
 */

import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import { CompilationError, formatErrorMessage } from '../../../errors/errors.ts';
import type {
  CompileRequest,
  Compiler,
  CompilerFactory,
  CompilerOptions,
  Stub,
  StubSet,
} from '../../../lint/types.ts';
import { MINUTE_MS } from '../../constants/time.ts';
import { requireCompiler } from '../binary-checker/binary-checker.ts';
import { type OutputSink, runProcess } from '../process-manager/process-manager.ts';

export const DEFAULT_COMPILER_BINARY = 'leo';
export const DEFAULT_COMPILER_TIMEOUT_MS = 2 * MINUTE_MS;
/** Name of the stubs file written into the outputs scratch directory. */
export const STUBS_FILE = 'stubs.json';

export interface ProcessCompilerConfig {
  readonly binary: string;
  readonly timeoutMs: number;
  /** Receives the compiler's combined output for the dependency being compiled. */
  readonly sinkFor?: (dependency: string) => OutputSink;
  readonly runProcessFn?: typeof runProcess;
  readonly requireCompilerFn?: (binary: string) => Promise<string>;
}

function optionArgs(options: CompilerOptions): string[] {
  const args = ['--conditional-block-max-depth', String(options.conditionalBlockMaxDepth)];
  if (!options.dce) {
    args.push('--no-dce');
  }
  if (options.disableConditionalBranchTypeChecking) {
    args.push('--disable-conditional-branch-type-checking');
  }
  return args;
}

/**
 * Command line for one compile.
 */
export function compilerArgs(request: CompileRequest, stubsFile: string): string[] {
  return [
    'compile-file',
    '--network',
    request.network,
    '--program',
    request.programName,
    '--output',
    request.outputsPath,
    '--stubs',
    stubsFile,
    ...optionArgs(request.options),
    request.filePath,
  ];
}

export function serializeStubs(stubs: StubSet): Record<string, Stub> {
  return Object.fromEntries(stubs);
}

/**
 * Build a `CompilerFactory` that spawns the compiler binary for every file.
 */
export function createProcessCompilerFactory(config: ProcessCompilerConfig): CompilerFactory {
  const run = config.runProcessFn ?? runProcess;
  const resolve = config.requireCompilerFn ?? requireCompiler;
  let resolved: Promise<string> | undefined;

  return (request: CompileRequest): Compiler => ({
    async compile(): Promise<string> {
      resolved ??= resolve(config.binary);
      const binary = await resolved;

      const stubsFile = path.join(request.outputsPath, STUBS_FILE);
      // eslint-disable-next-line security/detect-non-literal-fs-filename -- outputsPath is a scratch directory
      await writeFile(stubsFile, `${JSON.stringify(serializeStubs(request.stubs), null, 2)}\n`);

      const sink = config.sinkFor?.(request.programName);
      let result: Awaited<ReturnType<typeof runProcess>>;
      try {
        result = await run(
          { binary, args: compilerArgs(request, stubsFile), timeoutMs: config.timeoutMs },
          sink,
        );
      } catch (error) {
        throw new CompilationError(
          'COMPILATION_FAILED',
          `Failed to compile ${request.filePath}: ${formatErrorMessage(error)}`,
          { cause: error, details: { filePath: request.filePath } },
        );
      }

      if (result.exitCode !== 0) {
        throw new CompilationError(
          'COMPILATION_FAILED',
          `Compiler exited with code ${result.exitCode} for ${request.filePath}`,
          { details: { filePath: request.filePath, exitCode: result.exitCode } },
        );
      }
      return result.stdout;
    },
  });
}
