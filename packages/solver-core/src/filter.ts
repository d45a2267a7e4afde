// packages/solver-core/src/filter.ts
//
// Candidate filter: applies a constraint set to a corpus.
//
// A word matches when
//   1. each position passes its character class:
//        fixed position → exactly that letter
//        free position  → any letter not grey and not yellow-excluded there
//   2. every yellow letter occurs somewhere in the word.
//
// Check 2 is separate from check 1 and is what makes a yellow mean
// "present". The classes and required letters are built once per call, then
// the corpus is scanned once. Matches are split into unique-letter and
// repeated-letter buckets afterwards, both in corpus order.

import { bannedAt, type ConstraintSet } from './constraints.js';
import type { WordCorpus } from './corpus.js';

export type FilteredResult = {
  unique: string[];
  repeated: string[];
  count: number;
};

type PositionClass = { fixed: string } | { banned: ReadonlySet<string> };

export type WordMatcher = (word: string) => boolean;

/** Compile a constraint set into a reusable predicate. */
export function buildMatcher(constraints: ConstraintSet, wordLength: number): WordMatcher {
  const classes: PositionClass[] = [];
  for (let i = 0; i < wordLength; i++) {
    const letter = constraints.fixed[i];
    classes.push(letter ? { fixed: letter } : { banned: bannedAt(constraints, i + 1) });
  }
  const required = Object.keys(constraints.excludedPositions).filter(
    (l) => constraints.excludedPositions[l].length > 0,
  );

  return (word: string) => {
    if (word.length !== wordLength) return false;
    for (let i = 0; i < wordLength; i++) {
      const cls = classes[i];
      const c = word[i];
      if ('fixed' in cls ? c !== cls.fixed : cls.banned.has(c)) return false;
    }
    return required.every((l) => word.includes(l));
  };
}

export function hasUniqueLetters(word: string): boolean {
  return new Set(word).size === word.length;
}

/** Split words into (all-distinct letters, some letter repeated), keeping order. */
export function partitionByUniqueness(words: Iterable<string>): FilteredResult {
  const unique: string[] = [];
  const repeated: string[] = [];
  for (const w of words) (hasUniqueLetters(w) ? unique : repeated).push(w);
  return { unique, repeated, count: unique.length + repeated.length };
}

/**
 * filterCandidates returns every corpus word consistent with `constraints`,
 * partitioned by letter uniqueness.
 *
 * Example:
 *   corpus = saint, slant, plant, chant, grant
 *   constraints from guess "saint", yellow ".a...", grey "e r"
 *   → { unique: ["slant", "plant", "chant"], repeated: [], count: 3 }
 */
export function filterCandidates(constraints: ConstraintSet, corpus: WordCorpus): FilteredResult {
  const matches = buildMatcher(constraints, corpus.wordLength);
  const seen = new Set<string>();
  const matched: string[] = [];
  for (const w of corpus.words) {
    if (seen.has(w) || !matches(w)) continue;
    seen.add(w);
    matched.push(w);
  }
  return partitionByUniqueness(matched);
}
