// packages/solver-core/src/errors.ts
//
// Error taxonomy for the solver.
//
//   • InputFormatError   → wrong length, disallowed character (per round)
//   • ContradictionError → feedback inconsistent with itself or prior rounds
//   • CorpusLoadError    → word list unreadable (startup only)
//   • FrequencyLoadError → frequency tables unreadable (startup only)
//
// Per-round errors are returned inside results, never thrown. Load errors
// are thrown once by the loaders and handled by the app that booted.

export type SolverErrorKind =
  | 'input_format'
  | 'contradiction'
  | 'corpus_load'
  | 'frequency_load';

export abstract class SolverError extends Error {
  abstract readonly kind: SolverErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InputFormatError extends SolverError {
  readonly kind = 'input_format';
}

export class ContradictionError extends SolverError {
  readonly kind = 'contradiction';
}

export class CorpusLoadError extends SolverError {
  readonly kind = 'corpus_load';
}

export class FrequencyLoadError extends SolverError {
  readonly kind = 'frequency_load';
}

/** Errors a single round of feedback can produce. */
export type FeedbackError = InputFormatError | ContradictionError;
