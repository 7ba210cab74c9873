/**
 * Leo Lint CLI — public surface
 */

export * from './core/index.ts';
