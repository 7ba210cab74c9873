/**
 * @file CLI — default collaborator re-exports
 *
 * Centralized re-export of the process-backed implementations the lint pass
 * runs with (retriever, compiler, scaffold, directory helpers). Keep this file
 * as a thin re-export layer with no executable behavior.
 */

export * from './binary-checker/binary-checker.ts';
export * from './compiler/compiler.ts';
export * from './file-system/file-system.ts';
export * from './manifest/manifest.ts';
export * from './process-manager/process-manager.ts';
export * from './retriever/retriever.ts';
export * from './retriever/stubs.ts';
export * from './scaffold/scaffold.ts';
