// packages/solver-core/src/config.ts
//
// Per-session solver settings. Passed explicitly to every operation that
// needs them instead of living in module state, so a session (or a single
// HTTP request) can override the opening word or the word length.

export type SolverConfig = {
  /** Number of letters in every guess and corpus word. */
  wordLength: number;
  /** Suggested opening word, returned while no feedback has been given. */
  firstGuess: string;
};

export const DEFAULT_WORD_LENGTH = 5;
export const DEFAULT_FIRST_GUESS = 'saint';

export const DEFAULT_CONFIG: Readonly<SolverConfig> = {
  wordLength: DEFAULT_WORD_LENGTH,
  firstGuess: DEFAULT_FIRST_GUESS,
};

/**
 * Merge overrides onto the defaults.
 *
 * @throws Error if the word length is not a positive integer or the first
 * guess does not fit it.
 */
export function createConfig(overrides: Partial<SolverConfig> = {}): SolverConfig {
  const wordLength = overrides.wordLength ?? DEFAULT_WORD_LENGTH;
  const firstGuess = (overrides.firstGuess ?? DEFAULT_FIRST_GUESS).trim().toLowerCase();

  if (!Number.isInteger(wordLength) || wordLength < 1)
    throw new Error(`Word length must be a positive integer (got ${wordLength})`);
  if (firstGuess.length !== wordLength || !/^[a-z]+$/.test(firstGuess)) {
    throw new Error(`First guess must be ${wordLength} letters a–z (got '${firstGuess}')`);
  }

  return { wordLength, firstGuess };
}
