/**
 * Lint Engine — public surface
 */

export { BUILD_DIRECTORY, Linter, OUTPUTS_DIRECTORY, type LinterDeps, type LintInit, lint } from './linter.ts';
export { INDENT_WIDTH, INITIAL_STATE, type NormalizerState, normalize, step } from './normalizer.ts';
export {
  type DependencySymbol,
  formatProgramId,
  PROGRAM_NETWORK_SUFFIX,
  type ProgramId,
  parseProgramId,
  programIdFor,
  toDependencySymbol,
} from './program-id.ts';
export * from './types.ts';
