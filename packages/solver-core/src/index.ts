// packages/solver-core/src/index.ts
//
// Entry point for the solver-core package.
// Re-exports the solver so consumers can import from one place.
//
// Includes:
//   • feedback.ts / constraints.ts → parsing feedback into constraint sets
//   • filter.ts / expansion.ts     → candidate filtering and recovery search
//   • recommend.ts / solver.ts     → next-guess selection, full round pipeline
//   • session.ts                   → interactive state machine
//   • scoring.ts / simulate.ts     → marks for a known answer, self-play
//   • loader.ts                    → word list and frequency file loading
//
// Example usage:
//   import { solveRound, emptyConstraints } from '@letterwise/solver-core';

export * from './config.js';
export * from './errors.js';
export * from './frequency.js';
export * from './corpus.js';
export * from './constraints.js';
export * from './feedback.js';
export * from './filter.js';
export * from './expansion.js';
export * from './recommend.js';
export * from './solver.js';
export * from './session.js';
export * from './scoring.js';
export * from './simulate.js';
export * from './loader.js';
