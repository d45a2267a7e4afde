// packages/solver-core/src/recommend.ts
//
// Guess recommendation and scored suggestions.
//
// recommendGuess picks the single next guess:
//   • no feedback yet      → the configured first guess
//   • unique bucket        → its first word (more letters tested per guess)
//   • else repeated bucket → its first word
//   • else                 → null, nothing left to suggest
//
// rankSuggestions orders a candidate list for display: most vowels first,
// then by positional-frequency score (lower is better).

import type { SolverConfig } from './config.js';
import { freePositions, isEmptyConstraints, type ConstraintSet } from './constraints.js';
import type { FilteredResult } from './filter.js';
import { letterRank, type FrequencyTable } from './frequency.js';

export type Suggestion = { word: string; score: number };

/** Score added for a letter the frequency table does not list. */
export const UNRANKED_PENALTY = 1000;

const VOWELS = new Set(['a', 'e', 'i', 'o', 'u']);

export function recommendGuess(
  constraints: ConstraintSet,
  result: FilteredResult,
  config: Pick<SolverConfig, 'firstGuess'>,
): string | null {
  if (isEmptyConstraints(constraints)) return config.firstGuess;
  return result.unique[0] ?? result.repeated[0] ?? null;
}

export function vowelCount(word: string): number {
  let n = 0;
  for (const c of word) if (VOWELS.has(c)) n++;
  return n;
}

/**
 * Sum of 1-based frequency ranks of the word's letters at free positions.
 * Fixed positions add nothing; unlisted letters add UNRANKED_PENALTY.
 */
export function wordScore(word: string, constraints: ConstraintSet, frequencies: FrequencyTable): number {
  let score = 0;
  for (const pos of freePositions(constraints)) {
    score += letterRank(frequencies, pos, word[pos - 1]) ?? UNRANKED_PENALTY;
  }
  return score;
}

/**
 * rankSuggestions keeps the words with the highest vowel count and sorts
 * them by score, then alphabetically.
 *
 * Example (position 1 ranked [s, a, i], other positions fixed "_aint"):
 *   ["taint", "saint"] → [{ word: "saint", score: 1 }, { word: "taint", score: 1000 }]
 */
export function rankSuggestions(
  words: ReadonlyArray<string>,
  constraints: ConstraintSet,
  frequencies: FrequencyTable,
): Suggestion[] {
  if (!words.length) return [];
  const most = Math.max(...words.map(vowelCount));
  return words
    .filter((w) => vowelCount(w) === most)
    .map((word) => ({ word, score: wordScore(word, constraints, frequencies) }))
    .sort((a, b) => a.score - b.score || (a.word < b.word ? -1 : a.word > b.word ? 1 : 0));
}
