/**
 * Lint Engine — Orchestrator
 *
 * Role:
 *   Drive the compile-then-format pass across a package's local dependency
 *   closure.
 *
 * Guarantees:
 *   - Dependencies are processed one at a time, root last
 *   - A dependency is only reformatted after all of its files compiled
 *   - Scratch directories are gone before formatting starts
 *   - The first failure aborts the pass; nothing is rolled back
 *
 * Non-goals:
 *   - No semantic analysis of its own
 *   - No caching, no incremental formatting
 */

import path from 'node:path';

import {
  CompilationError,
  DependencyError,
  type ErrorCode,
  FileSystemError,
  formatErrorMessage,
  isLintError,
  type LintError,
} from '../errors/errors.ts';
import { normalize } from './normalizer.ts';
import { type DependencySymbol, type ProgramId, programIdFor } from './program-id.ts';
import {
  type CompilerFactory,
  type CompilerOptions,
  DEFAULT_COMPILER_OPTIONS,
  DEFAULT_NETWORK,
  type DirectoryHelpers,
  type LintEvents,
  type NetworkName,
  type PackageScaffold,
  type Retriever,
  type RetrieverFactory,
  type SourceFileIo,
  type StubSet,
} from './types.ts';

/** Name of the top-level build directory cleared at the start of every pass. */
export const BUILD_DIRECTORY = 'build';

/** Scratch directory the compiler writes its outputs into. */
export const OUTPUTS_DIRECTORY = 'outputs';

export interface LintInit {
  readonly programId: ProgramId;
  readonly endpoint: string;
  readonly packagePath: string;
  readonly homePath: string;
  readonly network?: NetworkName;
  readonly compilerOptions?: CompilerOptions;
}

/**
 * Collaborators used by the pass. The CLI wires the default implementations;
 * tests substitute in-process fakes.
 */
export interface LinterDeps extends LintEvents {
  readonly retrieverFactory: RetrieverFactory;
  readonly compilerFactory: CompilerFactory;
  readonly scaffold: PackageScaffold;
  readonly directories: DirectoryHelpers;
  readonly files: SourceFileIo;
  readonly normalizeFn?: (source: string) => string;
  /** Per-dependency event log (`COMPILED <file>`, `FORMATTED <file>`, warnings). */
  readonly log?: (symbol: DependencySymbol, message: string) => Promise<void>;
}

/**
 * Keep structured failures as they are and wrap anything else in the
 * category of the step that raised it.
 */
function toLintError(error: unknown, wrap: (cause: unknown) => LintError): LintError {
  return isLintError(error) ? error : wrap(error);
}

export class Linter {
  readonly #init: LintInit;
  readonly #deps: LinterDeps;
  readonly #network: NetworkName;
  readonly #compilerOptions: CompilerOptions;
  readonly #normalize: (source: string) => string;

  constructor(init: LintInit, deps: LinterDeps) {
    this.#init = init;
    this.#deps = deps;
    this.#network = init.network ?? DEFAULT_NETWORK;
    this.#compilerOptions = init.compilerOptions ?? DEFAULT_COMPILER_OPTIONS;
    this.#normalize = deps.normalizeFn ?? normalize;
  }

  /**
   * Run the pass.
   *
   * @throws {LintError} on the first failure anywhere in the pass.
   */
  async lint(): Promise<void> {
    const { programId, packagePath, homePath, endpoint } = this.#init;
    const { directories, scaffold } = this.#deps;
    const buildPath = path.join(packagePath, BUILD_DIRECTORY);

    await this.#fs('FS_REMOVE_FAILED', `Failed to remove ${buildPath}`, () =>
      directories.removeDirectory(buildPath),
    );
    await this.#fs('FS_CREATE_FAILED', `Failed to create package in ${buildPath}`, () =>
      scaffold.create(buildPath, programId),
    );

    const mainSymbol = programId.name;
    const retriever = await this.#retrieve(() =>
      this.#deps.retrieverFactory({
        mainSymbol,
        packagePath,
        homePath,
        endpoint,
        network: this.#network,
      }),
    );
    const dependencies = [...(await this.#retrieve(() => retriever.retrieve())), mainSymbol];

    this.#deps.onDependenciesResolved?.(dependencies);

    for (const [index, symbol] of dependencies.entries()) {
      try {
        await this.#lintDependency(retriever, symbol, symbol === mainSymbol);
      } catch (error) {
        this.#deps.onStatusChange?.(symbol, 'FAILED');
        for (const skipped of dependencies.slice(index + 1)) {
          this.#deps.onStatusChange?.(skipped, 'SKIPPED');
        }
        await this.#logBestEffort(symbol, `ERROR: ${formatErrorMessage(error)}`);
        throw error;
      }
      this.#deps.onStatusChange?.(symbol, 'FORMATTED');
    }
  }

  async #lintDependency(
    retriever: Retriever,
    symbol: DependencySymbol,
    isRoot: boolean,
  ): Promise<void> {
    const { directories, files } = this.#deps;
    const { localPath, stubs } = await this.#retrieve(() => retriever.prepareLocal(symbol));
    const programId = programIdFor(symbol);

    this.#deps.onStatusChange?.(symbol, 'COMPILING');

    const scratch: string[] = [];
    let sourceFiles: readonly string[] = [];
    try {
      const outputsPath = await this.#fs(
        'FS_CREATE_FAILED',
        `Failed to create ${localPath}/${OUTPUTS_DIRECTORY}`,
        () => directories.createScratchDirectory(localPath, OUTPUTS_DIRECTORY),
      );
      scratch.push(outputsPath);
      // The root build directory was recreated by this pass and holds the scaffold.
      const buildPath = await this.#fs(
        'FS_CREATE_FAILED',
        `Failed to create ${localPath}/build`,
        () => directories.createScratchDirectory(localPath, 'build', { reuse: isRoot }),
      );
      scratch.push(buildPath);

      sourceFiles = await this.#fs(
        'FS_READ_FAILED',
        `Failed to list sources in ${localPath}`,
        () => directories.sourceFiles(localPath),
      );
      await this.#fs('SOURCE_FILE_INVALID', `Invalid sources in ${localPath}`, () =>
        directories.checkSourceFiles(sourceFiles),
      );

      for (const filePath of sourceFiles) {
        await this.#compile(programId, filePath, outputsPath, stubs);
        this.#deps.onFile?.(symbol, filePath, 'compiled');
        await this.#log(symbol, `COMPILED ${filePath}`);
      }
    } catch (error) {
      await this.#discardScratch(symbol, scratch);
      throw error;
    }

    for (const dir of scratch) {
      await this.#fs('FS_REMOVE_FAILED', `Failed to remove ${dir}`, () =>
        directories.removeDirectory(dir),
      );
    }

    this.#deps.onStatusChange?.(symbol, 'FORMATTING');

    for (const filePath of sourceFiles) {
      const source = await this.#fs('FS_READ_FAILED', `Failed to read ${filePath}`, () =>
        files.read(filePath),
      );
      const formatted = this.#normalize(source);
      await this.#fs('FS_WRITE_FAILED', `Failed to write ${filePath}`, () =>
        files.write(filePath, formatted),
      );
      this.#deps.onFile?.(symbol, filePath, 'formatted');
      await this.#log(symbol, `FORMATTED ${filePath}`);
    }
  }

  async #retrieve<T>(action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      throw toLintError(
        error,
        (cause) =>
          new DependencyError(
            'DEPENDENCY_RETRIEVAL_FAILED',
            `Failed to retrieve dependencies: ${formatErrorMessage(cause)}`,
            { cause },
          ),
      );
    }
  }

  async #fs<T>(code: ErrorCode, message: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      throw toLintError(error, (cause) => new FileSystemError(code, message, { cause }));
    }
  }

  async #compile(
    programId: ProgramId,
    filePath: string,
    outputsPath: string,
    stubs: StubSet,
  ): Promise<void> {
    try {
      const compiler = this.#deps.compilerFactory({
        programName: programId.name,
        network: this.#network,
        filePath,
        outputsPath,
        options: this.#compilerOptions,
        stubs,
      });
      // The artifact only proves the file compiles; it is not kept.
      await compiler.compile();
    } catch (error) {
      throw toLintError(
        error,
        (cause) =>
          new CompilationError(
            'COMPILATION_FAILED',
            `Failed to compile ${filePath}: ${formatErrorMessage(cause)}`,
            { cause, details: { filePath } },
          ),
      );
    }
  }

  /**
   * Best-effort removal on the failure path; the original failure wins.
   */
  async #discardScratch(symbol: DependencySymbol, dirs: readonly string[]): Promise<void> {
    for (const dir of dirs) {
      try {
        await this.#deps.directories.removeDirectory(dir);
      } catch (error) {
        await this.#logBestEffort(
          symbol,
          `WARN: failed to remove ${dir}: ${formatErrorMessage(error)}`,
        );
      }
    }
  }

  async #log(symbol: DependencySymbol, message: string): Promise<void> {
    const { log } = this.#deps;
    if (log === undefined) {
      return;
    }
    await this.#fs('FS_WRITE_FAILED', `Failed to write the ${symbol} log`, () =>
      log(symbol, message),
    );
  }

  /**
   * Log on the failure path. A log error must not replace the failure being
   * propagated, so it is only reported through `onLogError`.
   */
  async #logBestEffort(symbol: DependencySymbol, message: string): Promise<void> {
    try {
      await this.#log(symbol, message);
    } catch (error) {
      this.#deps.onLogError?.(symbol, error);
    }
  }
}

/**
 * Convenience wrapper: construct a `Linter` and run it once.
 */
export async function lint(init: LintInit, deps: LinterDeps): Promise<void> {
  await new Linter(init, deps).lint();
}
