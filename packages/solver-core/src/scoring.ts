// packages/solver-core/src/scoring.ts
//
// Wordle scoring: evaluates a guess against a known answer, and converts the
// resulting marks into the raw green/yellow/grey tokens the feedback parser
// reads. Used to simulate games and to produce feedback in tests.
//
// Mark legend:
//   - "hit":     correct letter, correct position   → green
//   - "present": correct letter, wrong position     → yellow
//   - "miss":    no (further) copy of the letter    → grey
//
// Repeated letters are handled with the standard two-pass algorithm:
// non-hit answer letters are counted, and each "present" uses one up.

import { InputFormatError } from './errors.js';
import type { FeedbackInput } from './feedback.js';

export type Mark = 'hit' | 'present' | 'miss';

/**
 * scoreGuess compares a guess against the answer.
 *
 * @throws InputFormatError if the words differ in length or contain
 * anything but letters
 *
 * Example:
 *   answer = "crane", guess = "cared"
 *   → ["hit", "present", "present", "present", "miss"]
 */
export function scoreGuess(answer: string, guess: string): Mark[] {
  const A = answer.toLowerCase();
  const G = guess.toLowerCase();

  if (A.length !== G.length) throw new InputFormatError('Words must be the same length');
  if (!/^[a-z]+$/.test(A) || !/^[a-z]+$/.test(G)) {
    throw new InputFormatError('Only a–z letters allowed');
  }

  const marks: Mark[] = Array<Mark>(G.length).fill('miss');
  const counts: Record<string, number> = {};

  // Pass 1: exact hits, count the rest of the answer
  for (let i = 0; i < G.length; i++) {
    if (G[i] === A[i]) {
      marks[i] = 'hit';
    } else {
      counts[A[i]] = (counts[A[i]] ?? 0) + 1;
    }
  }

  // Pass 2: presents from what is left
  for (let i = 0; i < G.length; i++) {
    if (marks[i] === 'hit') continue;
    const c = G[i];
    if ((counts[c] ?? 0) > 0) {
      marks[i] = 'present';
      counts[c]--;
    }
  }

  return marks;
}

/**
 * marksToFeedback renders marks as parser input.
 *
 * Example:
 *   guess "saint", marks [miss, present, miss, hit, hit]
 *   → { guess: "saint", green: "...nt", yellow: ".a...", grey: "s i" }
 */
export function marksToFeedback(guess: string, marks: ReadonlyArray<Mark>): Required<FeedbackInput> {
  const g = guess.toLowerCase();
  let green = '';
  let yellow = '';
  const grey: string[] = [];
  marks.forEach((m, i) => {
    green += m === 'hit' ? g[i] : '.';
    yellow += m === 'present' ? g[i] : '.';
    if (m === 'miss' && !grey.includes(g[i])) grey.push(g[i]);
  });
  return { guess: g, green, yellow, grey: grey.join(' ') };
}
