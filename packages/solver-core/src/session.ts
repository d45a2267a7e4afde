// packages/solver-core/src/session.ts
//
// Interactive session as a pure state machine, independent of any I/O.
//
//   awaitGuess → awaitGreen → awaitYellow → awaitGrey → display → awaitGuess …
//                    │                          │
//                    └─ all green ─→ solved     └─ contradiction → awaitGuess
//
// Each step validates only its own token; a format error keeps the phase
// and records a message so the driver can re-prompt. The round itself runs
// at awaitGrey. A rejected round goes back to awaitGuess with the same round
// number and the constraint set untouched. Only an all-green row ends the
// session; greens gathered over several rounds that pin every position
// still go to display, since the answer has not been played yet.

import { emptyConstraints, type ConstraintSet } from './constraints.js';
import { normalizeGrey, normalizeGuess, normalizePattern } from './feedback.js';
import { InputFormatError } from './errors.js';
import { solveRound, type RoundAnalysis, type SolverContext } from './solver.js';

type Base = {
  readonly round: number;
  readonly constraints: ConstraintSet;
  /** Message for the last rejected input, cleared by the next accepted one. */
  readonly error: string | null;
};

export type SessionState =
  | (Base & { readonly phase: 'awaitGuess' })
  | (Base & { readonly phase: 'awaitGreen'; readonly guess: string })
  | (Base & { readonly phase: 'awaitYellow'; readonly guess: string; readonly green: string })
  | (Base & {
      readonly phase: 'awaitGrey';
      readonly guess: string;
      readonly green: string;
      readonly yellow: string;
    })
  | (Base & { readonly phase: 'display'; readonly analysis: RoundAnalysis })
  | (Base & { readonly phase: 'solved'; readonly analysis: RoundAnalysis });

export type SessionPhase = SessionState['phase'];

export function createSession(ctx: Pick<SolverContext, 'config'>): SessionState {
  return {
    phase: 'awaitGuess',
    round: 1,
    constraints: emptyConstraints(ctx.config.wordLength),
    error: null,
  };
}

/** Move from display to the next round's guess prompt. */
export function acknowledge(state: SessionState): SessionState {
  if (state.phase !== 'display') return state;
  return { phase: 'awaitGuess', round: state.round + 1, constraints: state.constraints, error: null };
}

function runRound(
  ctx: SolverContext,
  state: SessionState,
  guess: string,
  green: string,
  yellow: string,
  grey: string[],
): SessionState {
  const base = { round: state.round, constraints: state.constraints };
  const outcome = solveRound(ctx, state.constraints, { guess, green, yellow, grey });
  if (!outcome.ok) return { ...base, phase: 'awaitGuess', error: outcome.error.message };
  const { ok: _ok, ...analysis } = outcome;
  return {
    round: state.round,
    constraints: analysis.constraints,
    phase: analysis.solved ? 'solved' : 'display',
    analysis,
    error: null,
  };
}

/**
 * advanceSession feeds one line of user input to the machine.
 *
 * Input in display is ignored (the round just shown is acknowledged);
 * solved is terminal.
 */
export function advanceSession(ctx: SolverContext, state: SessionState, input: string): SessionState {
  const L = ctx.config.wordLength;
  const reject = (err: InputFormatError): SessionState => ({ ...state, error: err.message });

  switch (state.phase) {
    case 'awaitGuess': {
      const guess = normalizeGuess(input, L);
      if (guess instanceof InputFormatError) return reject(guess);
      return { ...state, phase: 'awaitGreen', guess, error: null };
    }
    case 'awaitGreen': {
      const green = normalizePattern(input, L, 'Green');
      if (green instanceof InputFormatError) return reject(green);
      if (!green.includes('.')) return runRound(ctx, state, state.guess, green, '', []);
      return { ...state, phase: 'awaitYellow', green, error: null };
    }
    case 'awaitYellow': {
      const yellow = normalizePattern(input, L, 'Yellow');
      if (yellow instanceof InputFormatError) return reject(yellow);
      return { ...state, phase: 'awaitGrey', yellow, error: null };
    }
    case 'awaitGrey': {
      const grey = normalizeGrey(input);
      if (grey instanceof InputFormatError) return reject(grey);
      return runRound(ctx, state, state.guess, state.green, state.yellow, grey);
    }
    case 'display':
      return acknowledge(state);
    case 'solved':
      return state;
  }
}
