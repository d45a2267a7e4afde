// packages/solver-core/src/constraints.ts
//
// Constraint set: everything learned from feedback so far.
//
//   • fixed             → letter confirmed per position (green), null if unknown
//   • excludedPositions → letter → positions where it is present but wrong (yellow)
//   • excludedLetters   → letters absent from the solution (grey)
//
// Positions are 1-based everywhere except the `fixed` array index.
// Values are plain, frozen, JSON-friendly data. Each round produces a new
// value; nothing here mutates an existing one.

import { ContradictionError, InputFormatError, type FeedbackError } from './errors.js';

export type ConstraintSet = {
  readonly fixed: ReadonlyArray<string | null>;
  readonly excludedPositions: Readonly<Record<string, ReadonlyArray<number>>>;
  readonly excludedLetters: ReadonlyArray<string>;
};

export function emptyConstraints(wordLength: number): ConstraintSet {
  return freezeConstraints({
    fixed: Array<string | null>(wordLength).fill(null),
    excludedPositions: {},
    excludedLetters: [],
  });
}

/** True when no feedback has been recorded yet. */
export function isEmptyConstraints(cs: ConstraintSet): boolean {
  return (
    cs.fixed.every((l) => l === null) &&
    Object.keys(cs.excludedPositions).length === 0 &&
    cs.excludedLetters.length === 0
  );
}

/** 1-based positions that are not fixed, left to right. */
export function freePositions(cs: ConstraintSet): number[] {
  const out: number[] = [];
  cs.fixed.forEach((l, i) => {
    if (l === null) out.push(i + 1);
  });
  return out;
}

/** Letters banned at a 1-based position by yellows and greys. */
export function bannedAt(cs: ConstraintSet, position: number): Set<string> {
  const banned = new Set(cs.excludedLetters);
  for (const [letter, positions] of Object.entries(cs.excludedPositions)) {
    if (positions.includes(position)) banned.add(letter);
  }
  return banned;
}

/**
 * Freeze a constraint set, sorting its collections so equal knowledge
 * always serializes identically.
 */
export function freezeConstraints(cs: {
  fixed: ReadonlyArray<string | null>;
  excludedPositions: Readonly<Record<string, ReadonlyArray<number>>>;
  excludedLetters: Iterable<string>;
}): ConstraintSet {
  const excludedPositions: Record<string, ReadonlyArray<number>> = {};
  for (const letter of Object.keys(cs.excludedPositions).sort()) {
    const positions = [...new Set(cs.excludedPositions[letter])].sort((a, b) => a - b);
    if (positions.length) excludedPositions[letter] = Object.freeze(positions);
  }
  return Object.freeze({
    fixed: Object.freeze([...cs.fixed]),
    excludedPositions: Object.freeze(excludedPositions),
    excludedLetters: Object.freeze([...new Set(cs.excludedLetters)].sort()),
  });
}

/**
 * validateConstraints checks a constraint set that did not come from
 * parseFeedback (e.g. one sent back by an API client).
 *
 * Shape problems (length, letters, positions out of range) are
 * InputFormatErrors; sets no feedback sequence could produce are
 * ContradictionErrors.
 */
export function validateConstraints(cs: ConstraintSet, wordLength: number): FeedbackError | null {
  if (cs.fixed.length !== wordLength) {
    return new InputFormatError(`Constraint set covers ${cs.fixed.length} positions, expected ${wordLength}`);
  }
  for (let i = 0; i < wordLength; i++) {
    const letter = cs.fixed[i];
    if (letter !== null && !/^[a-z]$/.test(letter))
      return new InputFormatError(`Fixed letter at position ${i + 1} must be a single letter a–z`);
  }
  for (const letter of cs.excludedLetters) {
    if (!/^[a-z]$/.test(letter))
      return new InputFormatError(`Excluded letter '${letter}' must be a single letter a–z`);
    const at = cs.fixed.indexOf(letter);
    if (at !== -1)
      return new ContradictionError(`'${letter}' is fixed at position ${at + 1} but listed as absent`);
    if (cs.excludedPositions[letter]?.length)
      return new ContradictionError(`'${letter}' is listed as present elsewhere and as absent`);
  }
  for (const [letter, positions] of Object.entries(cs.excludedPositions)) {
    if (!/^[a-z]$/.test(letter))
      return new InputFormatError(`Excluded letter '${letter}' must be a single letter a–z`);
    for (const pos of positions) {
      if (!Number.isInteger(pos) || pos < 1 || pos > wordLength)
        return new InputFormatError(`Excluded position ${pos} for '${letter}' is outside 1..${wordLength}`);
      if (cs.fixed[pos - 1] === letter)
        return new ContradictionError(`'${letter}' is fixed at position ${pos} but excluded there`);
    }
  }
  return null;
}
