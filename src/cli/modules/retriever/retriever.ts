/**
 * Manifest Retriever
 *
 * Role:
 *   Resolve a package's local dependency closure from `program.json`
 *   manifests and stage each dependency for compilation.
 *
 * Guarantees:
 *   - `retrieve()` lists dependencies before their dependents, each once
 *   - Cycles and missing packages are rejected before anything is compiled
 *   - Network programs are fetched at most once and cached under the home path
 *
 * Non-goals:
 *   - Network dependencies are never reformatted; they only contribute stubs
 *   - No version resolution
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { DependencyError, formatErrorMessage, systemErrorCode } from '../../../errors/errors.ts';
import { type DependencySymbol, parseProgramId } from '../../../lint/program-id.ts';
import type {
  LocalDependency,
  NetworkName,
  Retriever,
  RetrieverInit,
  Stub,
} from '../../../lint/types.ts';
import { directoryExists, sourceFiles } from '../file-system/file-system.ts';
import { type Manifest, readManifest } from '../manifest/manifest.ts';
import { localStub, networkStub } from './stubs.ts';

/** Downloads the text at `url`; rejects on transport or HTTP failure. */
export type FetchProgram = (url: string) => Promise<string>;

/** Name of the directory under the home path that caches network programs. */
export const REGISTRY_DIRECTORY = 'registry';

type DirectDependency =
  | { readonly symbol: DependencySymbol; readonly location: 'local' }
  | {
      readonly symbol: DependencySymbol;
      readonly location: 'network';
      readonly network: NetworkName;
    };

interface LocalPackage {
  readonly localPath: string;
  readonly direct: readonly DirectDependency[];
}

/**
 * Default `FetchProgram` on the global `fetch`.
 */
export const fetchProgram: FetchProgram = async (url) => {
  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(`GET ${url} returned ${response.status}`);
  }
  return programText(await response.text());
};

/**
 * The registry answers with the program text as a JSON string; plain text is
 * taken as is.
 */
export function programText(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === 'string') {
      return parsed;
    }
  } catch {
    // Not JSON
  }
  return body;
}

export class ManifestRetriever implements Retriever {
  readonly #init: RetrieverInit;
  readonly #fetch: FetchProgram;
  readonly #packages = new Map<DependencySymbol, LocalPackage>();
  readonly #order: DependencySymbol[] = [];
  #resolved: Promise<readonly DependencySymbol[]> | undefined;

  constructor(init: RetrieverInit, fetchFn: FetchProgram = fetchProgram) {
    this.#init = init;
    this.#fetch = fetchFn;
  }

  /**
   * Local dependency closure of the root package, root excluded.
   */
  async retrieve(): Promise<readonly DependencySymbol[]> {
    this.#resolved ??= this.#resolve();
    return this.#resolved;
  }

  async prepareLocal(symbol: DependencySymbol): Promise<LocalDependency> {
    await this.retrieve();
    const pkg = this.#localPackage(symbol);

    const stubs = new Map<DependencySymbol, Stub>();
    for (const dep of pkg.direct) {
      stubs.set(dep.symbol, await this.#stubFor(dep));
    }
    return { localPath: pkg.localPath, stubs };
  }

  #localPackage(symbol: DependencySymbol): LocalPackage {
    const pkg = this.#packages.get(symbol);
    if (pkg === undefined) {
      throw new DependencyError('DEPENDENCY_NOT_FOUND', `Unknown local dependency ${symbol}`, {
        details: { dependency: symbol },
      });
    }
    return pkg;
  }

  async #resolve(): Promise<readonly DependencySymbol[]> {
    const { mainSymbol, packagePath } = this.#init;
    await this.#visit(mainSymbol, path.resolve(packagePath), [mainSymbol]);
    return [...this.#order];
  }

  async #visit(
    symbol: DependencySymbol,
    localPath: string,
    stack: readonly DependencySymbol[],
  ): Promise<void> {
    const manifest = await readManifest(localPath);
    const direct = this.#directDependencies(manifest);
    this.#packages.set(symbol, { localPath, direct });

    for (const entry of manifest.dependencies ?? []) {
      if (entry.location !== 'local' || entry.path === undefined) {
        continue;
      }
      const child = parseProgramId(entry.name).name;
      if (stack.includes(child)) {
        throw new DependencyError(
          'DEPENDENCY_CYCLE',
          `Dependency cycle: ${[...stack, child].join(' -> ')}`,
          { details: { cycle: [...stack, child] } },
        );
      }
      if (this.#packages.has(child)) {
        continue;
      }
      const childPath = path.resolve(localPath, entry.path);
      if (!(await directoryExists(childPath))) {
        throw new DependencyError(
          'DEPENDENCY_NOT_FOUND',
          `Local dependency ${child} not found at ${childPath}`,
          { details: { dependency: child, path: childPath } },
        );
      }
      await this.#visit(child, childPath, [...stack, child]);
      this.#order.push(child);
    }
  }

  #directDependencies(manifest: Manifest): DirectDependency[] {
    return (manifest.dependencies ?? []).map((entry): DirectDependency => {
      const symbol = parseProgramId(entry.name).name;
      return entry.location === 'local'
        ? { symbol, location: 'local' }
        : { symbol, location: 'network', network: entry.network ?? this.#init.network };
    });
  }

  async #stubFor(dep: DirectDependency): Promise<Stub> {
    if (dep.location === 'network') {
      return networkStub(dep.symbol, await this.#networkProgram(dep.symbol, dep.network));
    }
    return localStub(dep.symbol, await sourceFiles(this.#localPackage(dep.symbol).localPath));
  }

  /**
   * Program text of a network dependency, from the cache when present.
   */
  async #networkProgram(symbol: DependencySymbol, network: NetworkName): Promise<string> {
    const cacheDir = path.join(this.#init.homePath, REGISTRY_DIRECTORY, network, symbol);
    const cacheFile = path.join(cacheDir, `${symbol}.aleo`);
    try {
      // eslint-disable-next-line security/detect-non-literal-fs-filename -- cache path is derived from the home path
      return await readFile(cacheFile, 'utf8');
    } catch (error) {
      if (systemErrorCode(error) !== 'ENOENT') {
        throw new DependencyError(
          'DEPENDENCY_RETRIEVAL_FAILED',
          `Cannot read cached ${symbol}: ${formatErrorMessage(error)}`,
          { cause: error, details: { dependency: symbol, path: cacheFile } },
        );
      }
    }

    const endpoint = this.#init.endpoint.replace(/\/+$/, '');
    const url = `${endpoint}/${network}/program/${symbol}.aleo`;
    let program: string;
    try {
      program = await this.#fetch(url);
    } catch (error) {
      throw new DependencyError(
        'DEPENDENCY_RETRIEVAL_FAILED',
        `Failed to fetch ${symbol}.aleo: ${formatErrorMessage(error)}`,
        { cause: error, details: { dependency: symbol, url } },
      );
    }

    // eslint-disable-next-line security/detect-non-literal-fs-filename -- cache path is derived from the home path
    await mkdir(cacheDir, { recursive: true });
    await writeFile(cacheFile, program);
    return program;
  }
}

/**
 * `RetrieverFactory` for the CLI.
 */
export function createManifestRetrieverFactory(
  fetchFn?: FetchProgram,
): (init: RetrieverInit) => Promise<Retriever> {
  return async (init) => new ManifestRetriever(init, fetchFn);
}
