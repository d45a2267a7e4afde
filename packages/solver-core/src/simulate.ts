// packages/solver-core/src/simulate.ts
//
// Plays the solver against a known answer: every round the recommended
// guess is scored, the marks are fed back as raw tokens, and the next
// recommendation is taken. Stops on a win, after `maxRounds`, or when the
// solver has nothing left to suggest.

import { emptyConstraints } from './constraints.js';
import type { FeedbackError } from './errors.js';
import { marksToFeedback, scoreGuess, type Mark } from './scoring.js';
import { solveRound, type SolverContext } from './solver.js';

export type SimulationStep = {
  guess: string;
  marks: Mark[];
  /** Candidates left after this round's feedback. */
  remaining: number;
};

export type SimulationSummary = {
  success: boolean;
  answer: string;
  steps: SimulationStep[];
  /** Set when the generated feedback was rejected. */
  error?: FeedbackError;
};

export function simulateGame(ctx: SolverContext, answer: string, maxRounds = 6): SimulationSummary {
  const theAnswer = answer.toLowerCase();
  const steps: SimulationStep[] = [];
  let constraints = emptyConstraints(ctx.config.wordLength);
  let guess: string | null = ctx.config.firstGuess;

  for (let round = 0; round < maxRounds && guess; round++) {
    const marks = scoreGuess(theAnswer, guess);
    if (marks.every((m) => m === 'hit')) {
      steps.push({ guess, marks, remaining: 1 });
      return { success: true, answer: theAnswer, steps };
    }

    const outcome = solveRound(ctx, constraints, marksToFeedback(guess, marks));
    if (!outcome.ok) return { success: false, answer: theAnswer, steps, error: outcome.error };

    steps.push({ guess, marks, remaining: outcome.result.count });
    constraints = outcome.constraints;
    guess = outcome.recommendation;
  }

  return { success: false, answer: theAnswer, steps };
}
