/**
 * Shared types for the lint pass and its collaborators.
 */

import type { DependencySymbol, ProgramId } from './program-id.ts';

/** Network tag handed to the compiler. */
export const NETWORK_NAMES = ['testnet', 'mainnet', 'canary'] as const;
export type NetworkName = (typeof NETWORK_NAMES)[number];

export const DEFAULT_NETWORK: NetworkName = 'testnet';

/** Signature-only view of a dependency's public interface. */
export interface Stub {
  readonly program: string;
  /** Declaration headers without bodies (e.g. `transition mint(a: u64) -> Token`). */
  readonly declarations: readonly string[];
}

export type StubSet = ReadonlyMap<DependencySymbol, Stub>;

/** Options forwarded to the compiler on every file. */
export interface CompilerOptions {
  readonly dce: boolean;
  readonly conditionalBlockMaxDepth: number;
  readonly disableConditionalBranchTypeChecking: boolean;
}

export const DEFAULT_COMPILER_OPTIONS: CompilerOptions = {
  dce: true,
  conditionalBlockMaxDepth: 10,
  disableConditionalBranchTypeChecking: false,
};

/* -------------------------------------------------------------------------- */
/* Collaborator contracts                                                     */
/* -------------------------------------------------------------------------- */

export interface LocalDependency {
  /** Package directory holding `program.json` and `src/`. */
  readonly localPath: string;
  readonly stubs: StubSet;
}

/**
 * Resolves the local dependency closure and stages each dependency.
 */
export interface Retriever {
  /** Local dependency symbols, dependencies before dependents, root excluded. */
  retrieve(): Promise<readonly DependencySymbol[]>;
  prepareLocal(symbol: DependencySymbol): Promise<LocalDependency>;
}

export interface RetrieverInit {
  readonly mainSymbol: DependencySymbol;
  readonly packagePath: string;
  readonly homePath: string;
  readonly endpoint: string;
  readonly network: NetworkName;
}

export type RetrieverFactory = (init: RetrieverInit) => Promise<Retriever>;

export interface CompileRequest {
  readonly programName: DependencySymbol;
  readonly network: NetworkName;
  readonly filePath: string;
  readonly outputsPath: string;
  readonly options: CompilerOptions;
  readonly stubs: StubSet;
}

export interface Compiler {
  /** Resolves with the compiled artifact text; rejects with a `CompilationError`. */
  compile(): Promise<string>;
}

export type CompilerFactory = (request: CompileRequest) => Compiler;

export interface PackageScaffold {
  create(buildPath: string, programId: ProgramId): Promise<void>;
}

export type ScratchDirectoryName = 'build' | 'outputs';

export interface DirectoryHelpers {
  /**
   * Create `<localPath>/<name>`. Unless `reuse` is set, an existing non-empty
   * directory is rejected rather than merged into.
   */
  createScratchDirectory(
    localPath: string,
    name: ScratchDirectoryName,
    options?: { readonly reuse?: boolean },
  ): Promise<string>;
  sourceFiles(localPath: string): Promise<readonly string[]>;
  checkSourceFiles(paths: readonly string[]): Promise<void>;
  removeDirectory(path: string): Promise<void>;
}

export interface SourceFileIo {
  read(path: string): Promise<string>;
  write(path: string, contents: string): Promise<void>;
}

/* -------------------------------------------------------------------------- */
/* Progress                                                                   */
/* -------------------------------------------------------------------------- */

export type DependencyStatus =
  | 'PENDING'
  | 'COMPILING'
  | 'FORMATTING'
  | 'FORMATTED'
  | 'FAILED'
  | 'SKIPPED';

export interface LintEvents {
  /** Called once with the full ordered dependency set, root last. */
  readonly onDependenciesResolved?: (symbols: readonly DependencySymbol[]) => void;
  readonly onStatusChange?: (symbol: DependencySymbol, status: DependencyStatus) => void;
  /** Called after each source file is compiled (`compiled`) or rewritten (`formatted`). */
  readonly onFile?: (
    symbol: DependencySymbol,
    filePath: string,
    phase: 'compiled' | 'formatted',
  ) => void;
  /** Called when the event log cannot be written while a failure is propagating. */
  readonly onLogError?: (symbol: DependencySymbol, error: unknown) => void;
}
