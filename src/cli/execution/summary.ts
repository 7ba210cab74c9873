/**
 * Outcome counts for one lint pass.
 */

import type { DependencyStatus } from '../../lint/types.ts';

export interface LintSummary {
  readonly total: number;
  readonly formatted: number;
  readonly failed: number;
  readonly skipped: number;
  readonly durationMs: number;
}

export function calculateSummary(
  statuses: Iterable<DependencyStatus>,
  durationMs: number,
): LintSummary {
  let total = 0;
  let formatted = 0;
  let failed = 0;
  let skipped = 0;
  for (const status of statuses) {
    total += 1;
    if (status === 'FORMATTED') {
      formatted += 1;
    } else if (status === 'FAILED') {
      failed += 1;
    } else if (status === 'SKIPPED') {
      skipped += 1;
    }
  }
  return { total, formatted, failed, skipped, durationMs };
}
