// packages/solver-core/src/__tests__/recommend.test.ts
//
// Unit tests for recommendGuess() and rankSuggestions().

import {
  UNRANKED_PENALTY,
  createFrequencyTable,
  emptyConstraints,
  parseFeedback,
  rankSuggestions,
  recommendGuess,
  vowelCount,
  type ConstraintSet,
  type FeedbackInput,
} from '../index.js';

function constraintsFrom(input: FeedbackInput): ConstraintSet {
  const res = parseFeedback(emptyConstraints(5), input, { wordLength: 5 });
  if (!res.ok) throw res.error;
  return res.constraints;
}

const played = constraintsFrom({ guess: 'saint', green: '.....', grey: 's' });

describe('recommendGuess', () => {
  const config = { firstGuess: 'crane' };

  it('returns the configured first guess before any feedback', () => {
    const result = { unique: ['plant'], repeated: [], count: 1 };
    expect(recommendGuess(emptyConstraints(5), result, config)).toBe('crane');
  });

  it('prefers the first unique-letter word', () => {
    const result = { unique: ['plant', 'chant'], repeated: ['llama'], count: 3 };
    expect(recommendGuess(played, result, config)).toBe('plant');
  });

  it('falls back to the first repeated-letter word', () => {
    const result = { unique: [], repeated: ['llama', 'sassy'], count: 2 };
    expect(recommendGuess(played, result, config)).toBe('llama');
  });

  it('returns null when there are no candidates', () => {
    expect(recommendGuess(played, { unique: [], repeated: [], count: 0 }, config)).toBeNull();
  });
});

describe('rankSuggestions', () => {
  it('keeps the most vowels and orders by positional rank', () => {
    const cs = constraintsFrom({ guess: 'saint', green: '.aint' });
    const freq = createFrequencyTable([['s', 'a', 'i']], 5);
    expect(rankSuggestions(['taint', 'tryst', 'saint'], cs, freq)).toEqual([
      { word: 'saint', score: 1 },
      { word: 'taint', score: UNRANKED_PENALTY },
    ]);
  });

  it('sums ranks over every free position', () => {
    const freq = createFrequencyTable([['c', 'p'], ['h', 'l'], ['a'], ['n'], ['t']], 5);
    const cs = constraintsFrom({ guess: 'giant', green: '..ant' });
    expect(rankSuggestions(['plant', 'chant'], cs, freq)).toEqual([
      { word: 'chant', score: 2 },
      { word: 'plant', score: 4 },
    ]);
  });

  it('scores 0 when every position is fixed', () => {
    const cs = constraintsFrom({ guess: 'plant', green: 'plant' });
    expect(rankSuggestions(['plant'], cs, createFrequencyTable([], 5))).toEqual([
      { word: 'plant', score: 0 },
    ]);
  });

  it('breaks score ties alphabetically', () => {
    const freq = createFrequencyTable([], 5);
    expect(rankSuggestions(['mount', 'count'], emptyConstraints(5), freq)).toEqual([
      { word: 'count', score: 5 * UNRANKED_PENALTY },
      { word: 'mount', score: 5 * UNRANKED_PENALTY },
    ]);
  });

  it('returns nothing for no words', () => {
    expect(rankSuggestions([], played, createFrequencyTable([], 5))).toEqual([]);
  });

  it('counts vowels', () => {
    expect(vowelCount('audio')).toBe(4);
    expect(vowelCount('tryst')).toBe(0);
  });
});
