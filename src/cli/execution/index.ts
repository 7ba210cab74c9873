/**
 * Execution orchestration and coordination
 */

export {
  createLinterDeps,
  executeWithArgs,
  type MainDeps,
  type MainResult,
} from './execution.ts';
export { calculateSummary, type LintSummary } from './summary.ts';
