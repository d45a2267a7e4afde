// packages/solver-core/src/solver.ts
//
// One solver round: parse → filter → (expand) → recommend.
//
// The context (corpora, frequencies, config) is read-only and may be shared
// by any number of sessions or requests; each call is given its own
// constraint set and returns the next one. Nothing here keeps state.

import type { SolverConfig } from './config.js';
import type { ConstraintSet } from './constraints.js';
import type { WordCorpus } from './corpus.js';
import type { FeedbackError } from './errors.js';
import { expandCandidates } from './expansion.js';
import { parseFeedback, type FeedbackInput } from './feedback.js';
import { filterCandidates, partitionByUniqueness, type FilteredResult } from './filter.js';
import type { FrequencyTable } from './frequency.js';
import { rankSuggestions, recommendGuess, type Suggestion } from './recommend.js';

export type SolverContext = {
  /** Solution words; the candidate filter runs over these. */
  corpus: WordCorpus;
  /** Wider allowed-guess list searched by expansion; defaults to `corpus`. */
  guessCorpus?: WordCorpus;
  frequencies: FrequencyTable;
  config: SolverConfig;
};

export type RoundAnalysis = {
  constraints: ConstraintSet;
  result: FilteredResult;
  /** True when `result` came from the expansion search. */
  expanded: boolean;
  /** Next guess, or null when even expansion found nothing. */
  recommendation: string | null;
  suggestions: Suggestion[];
  /**
   * True only when the round's green row was all letters: the answer was
   * played. Greens gathered over several rounds can pin every position
   * without it; the single remaining word is then just the recommendation.
   */
  solved: boolean;
};

export type RoundOutcome =
  | ({ ok: true } & RoundAnalysis)
  | { ok: false; error: FeedbackError; constraints: ConstraintSet };

/**
 * analyze runs the filter/expansion/recommendation half of a round for an
 * already-parsed constraint set. `solved` is passed through as given.
 */
export function analyze(ctx: SolverContext, constraints: ConstraintSet, solved = false): RoundAnalysis {
  let result = filterCandidates(constraints, ctx.corpus);
  let expanded = false;

  if (result.count === 0) {
    const word = expandCandidates(constraints, ctx.guessCorpus ?? ctx.corpus, ctx.frequencies);
    if (word) {
      result = partitionByUniqueness([word]);
      expanded = true;
    }
  }

  return {
    constraints,
    result,
    expanded,
    recommendation: recommendGuess(constraints, result, ctx.config),
    suggestions: rankSuggestions(
      [...result.unique, ...result.repeated],
      constraints,
      ctx.frequencies,
    ),
    solved,
  };
}

/**
 * solveRound applies one round of feedback. On error the input constraint
 * set comes back untouched so the round can be retried.
 */
export function solveRound(
  ctx: SolverContext,
  constraints: ConstraintSet,
  input: FeedbackInput,
): RoundOutcome {
  const parsed = parseFeedback(constraints, input, ctx.config);
  if (!parsed.ok) return { ok: false, error: parsed.error, constraints };
  return { ok: true, ...analyze(ctx, parsed.constraints, parsed.allGreen) };
}
