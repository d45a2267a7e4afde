// packages/solver-core/src/expansion.ts
//
// Expansion strategy: recovery search used when filtering finds nothing.
//
// The constraint set stays authoritative. Only the letters *tried* at free
// positions change: each free position gets its frequency-ranked letters
// (grey and yellow-excluded letters removed), and words are assembled from
// a growing pool of those letters until one is in the corpus and passes the
// full matcher.
//
// Order is depth-wise round-robin. At depth d every free position may use
// its top d letters; only combinations that use a rank-d letter somewhere
// are new at that depth. Within a depth, combinations are visited in
// lexicographic order of rank indices, leftmost free position first.
//
//   free positions 4, 5 with lists [s, t] and [y, e]
//   depth 1: sy
//   depth 2: se, ty, te
//
// Sub-trees whose prefix begins no corpus word are skipped. That never
// changes the first word found, only how many dead ends are assembled.

import { bannedAt, freePositions, type ConstraintSet } from './constraints.js';
import type { WordCorpus } from './corpus.js';
import { buildMatcher } from './filter.js';
import { rankedLetters, type FrequencyTable } from './frequency.js';

export type ExpansionOptions = {
  /** Called with each fully assembled word, in search order. */
  onAttempt?: (word: string) => void;
};

function prefixSet(corpus: WordCorpus): Set<string> {
  const out = new Set<string>();
  for (const w of corpus.words) {
    for (let i = 1; i <= w.length; i++) out.add(w.slice(0, i));
  }
  return out;
}

/**
 * expandCandidates returns the first corpus word found by the widening
 * search, or null once every ranked list is exhausted.
 *
 * Example:
 *   fixed "plan_", position 5 ranked [e, y, a, t, r], "e" grey
 *   → tries "plany", "plana", "plant"; returns "plant" if listed
 */
export function expandCandidates(
  constraints: ConstraintSet,
  corpus: WordCorpus,
  frequencies: FrequencyTable,
  options: ExpansionOptions = {},
): string | null {
  const free = freePositions(constraints);
  if (free.length === 0) return null;

  const lists = free.map((pos) => {
    const banned = bannedAt(constraints, pos);
    return rankedLetters(frequencies, pos).filter((l) => !banned.has(l));
  });
  if (lists.some((l) => l.length === 0)) return null;

  const matches = buildMatcher(constraints, corpus.wordLength);
  const prefixes = prefixSet(corpus);
  const letters = constraints.fixed.map((l) => l ?? '.');
  const last = free.length - 1;

  // Depth-first over free positions; `reached` marks that a rank-`depth`
  // letter is already in use.
  const search = (k: number, depth: number, reached: boolean): string | null => {
    if (k > last) {
      if (!reached) return null;
      const word = letters.join('');
      options.onAttempt?.(word);
      return corpus.lookup.has(word) && matches(word) ? word : null;
    }
    if (!reached && !lists.slice(k).some((l) => l.length >= depth)) return null;

    const idx = free[k] - 1;
    const limit = Math.min(depth, lists[k].length);
    for (let r = 0; r < limit; r++) {
      letters[idx] = lists[k][r];
      if (k < last && !prefixes.has(letters.slice(0, idx + 1).join(''))) continue;
      const found = search(k + 1, depth, reached || r === depth - 1);
      if (found) return found;
    }
    return null;
  };

  const maxDepth = Math.max(...lists.map((l) => l.length));
  for (let depth = 1; depth <= maxDepth; depth++) {
    const found = search(0, depth, false);
    if (found) return found;
  }
  return null;
}
