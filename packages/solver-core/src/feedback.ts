// packages/solver-core/src/feedback.ts
//
// Feedback parser: turns one round of raw feedback into a new constraint set.
//
// Raw encodings (case-insensitive):
//   • guess  → the word that was played, e.g. "SAINT"
//   • green  → one char per position, letter = exact match, "." = unknown ("S..NT")
//   • yellow → same shape, letter = present elsewhere (".A..."); "" = none
//   • grey   → whitespace-separated letters ("E R") or an array of letters
//
// Grey letters that are also green or yellow (this round or earlier) are not
// excluded globally: for a guess with a repeated letter a grey only means
// "no further copies". Greens and yellows are applied before greys for that
// reason.
//
// Errors are returned, never thrown; the caller's constraint set is never
// partially updated.

import type { SolverConfig } from './config.js';
import { freezeConstraints, validateConstraints, type ConstraintSet } from './constraints.js';
import { ContradictionError, InputFormatError, type FeedbackError } from './errors.js';

export type FeedbackInput = {
  guess: string;
  green: string;
  yellow?: string;
  grey?: string | ReadonlyArray<string>;
};

export type ParseResult =
  /** `allGreen`: this round's green row named every letter, i.e. the answer was played. */
  | { ok: true; constraints: ConstraintSet; allGreen: boolean }
  | { ok: false; error: FeedbackError };

type Normalized = {
  guess: string;
  green: string;
  yellow: string;
  grey: string[];
};

/* -------------------------------------------------------------------------- */
/*                               Format checks                                */
/* -------------------------------------------------------------------------- */

export function normalizeGuess(raw: string, wordLength: number): string | InputFormatError {
  const guess = raw.trim().toLowerCase();
  if (!guess) return new InputFormatError('Guess cannot be empty');
  if (guess.length !== wordLength)
    return new InputFormatError(
      `Guess must be exactly ${wordLength} letters (got ${guess.length})`,
    );
  if (!/^[a-z]+$/.test(guess)) return new InputFormatError('Guess must contain only letters');
  return guess;
}

/**
 * Validate a green or yellow token. An empty yellow token stands for
 * "no yellow letters"; greens must always be given in full.
 */
export function normalizePattern(
  raw: string,
  wordLength: number,
  label: 'Green' | 'Yellow',
): string | InputFormatError {
  const token = raw.trim().toLowerCase();
  if (!token && label === 'Yellow') return '.'.repeat(wordLength);
  if (token.length !== wordLength)
    return new InputFormatError(
      `${label} letters must be exactly ${wordLength} characters (got ${token.length})`,
    );
  if (!/^[a-z.]+$/.test(token))
    return new InputFormatError(`${label} letters must contain only letters and dots`);
  return token;
}

export function normalizeGrey(raw: string | ReadonlyArray<string> = ''): string[] | InputFormatError {
  const tokens = typeof raw === 'string' ? raw.trim().split(/\s+/) : raw.map((t) => t.trim());
  const letters: string[] = [];
  for (const token of tokens) {
    if (!token) continue;
    if (!/^[a-z]$/i.test(token))
      return new InputFormatError(`Each grey letter must be a single letter (got '${token}')`);
    letters.push(token.toLowerCase());
  }
  return letters;
}

function normalize(input: FeedbackInput, wordLength: number): Normalized | InputFormatError {
  const guess = normalizeGuess(input.guess, wordLength);
  if (guess instanceof InputFormatError) return guess;
  const green = normalizePattern(input.green, wordLength, 'Green');
  if (green instanceof InputFormatError) return green;
  const yellow = normalizePattern(input.yellow ?? '', wordLength, 'Yellow');
  if (yellow instanceof InputFormatError) return yellow;
  const grey = normalizeGrey(input.grey);
  if (grey instanceof InputFormatError) return grey;
  return { guess, green, yellow, grey };
}

/* -------------------------------------------------------------------------- */
/*                                   Parser                                   */
/* -------------------------------------------------------------------------- */

/**
 * parseFeedback merges one round of feedback into `constraints`.
 *
 * The incoming set is validated first, so a set supplied from outside
 * (rather than built by earlier rounds) is rejected instead of merged.
 *
 * @returns the new constraint set, or the first format / contradiction
 * error found
 *
 * Example:
 *   guess "saint", green ".....", yellow ".a...", grey "e r"
 *   → excludedPositions { a: [2] }, excludedLetters ["e", "r"]
 */
export function parseFeedback(
  constraints: ConstraintSet,
  input: FeedbackInput,
  config: Pick<SolverConfig, 'wordLength'>,
): ParseResult {
  const n = normalize(input, config.wordLength);
  if (n instanceof InputFormatError) return { ok: false, error: n };
  const invalid = validateConstraints(constraints, config.wordLength);
  if (invalid) return { ok: false, error: invalid };

  const fixed = [...constraints.fixed];
  const excludedPositions: Record<string, number[]> = {};
  for (const [letter, positions] of Object.entries(constraints.excludedPositions)) {
    excludedPositions[letter] = [...positions];
  }
  const excludedLetters = new Set(constraints.excludedLetters);

  const fail = (message: string): ParseResult => ({
    ok: false,
    error: new ContradictionError(message),
  });

  // Greens
  for (let i = 0; i < config.wordLength; i++) {
    const g = n.green[i];
    if (g === '.') continue;
    const pos = i + 1;
    if (g !== n.guess[i])
      return fail(`Green '${g}' at position ${pos} does not match guess letter '${n.guess[i]}'`);
    const prior = fixed[i];
    if (prior !== null && prior !== g)
      return fail(`Position ${pos} is already fixed to '${prior}', cannot become '${g}'`);
    if (excludedLetters.has(g))
      return fail(`'${g}' was reported absent earlier but is green at position ${pos}`);
    if (excludedPositions[g]?.includes(pos))
      return fail(`'${g}' was reported not at position ${pos} earlier but is green there`);
    fixed[i] = g;
  }

  // Yellows
  for (let i = 0; i < config.wordLength; i++) {
    const y = n.yellow[i];
    if (y === '.') continue;
    const pos = i + 1;
    const g = n.green[i];
    if (g === y) return fail(`'${y}' at position ${pos} cannot be both green and yellow`);
    if (g !== '.')
      return fail(`Position ${pos} is green '${g}' and yellow '${y}' in the same round`);
    if (y !== n.guess[i])
      return fail(`Yellow '${y}' at position ${pos} does not match guess letter '${n.guess[i]}'`);
    if (fixed[i] === y) return fail(`'${y}' is already fixed at position ${pos}`);
    if (excludedLetters.has(y))
      return fail(`'${y}' was reported absent earlier but is yellow at position ${pos}`);
    (excludedPositions[y] ??= []).push(pos);
  }

  // Greys, after greens and yellows so repeated-letter greys are recognised
  for (const letter of n.grey) {
    if (fixed.includes(letter) || excludedPositions[letter]?.length) continue;
    excludedLetters.add(letter);
  }

  return {
    ok: true,
    constraints: freezeConstraints({ fixed, excludedPositions, excludedLetters }),
    allGreen: !n.green.includes('.'),
  };
}
