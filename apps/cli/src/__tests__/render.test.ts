// apps/cli/src/__tests__/render.test.ts
//
// Output formatting: word rows, section headers, expansion and empty
// results.

import { emptyConstraints, type RoundAnalysis } from '@letterwise/solver-core';

import { formatWordRows, renderAnalysis, renderSolved } from '../render.js';

function analysis(overrides: Partial<RoundAnalysis>): RoundAnalysis {
  return {
    constraints: emptyConstraints(5),
    result: { unique: [], repeated: [], count: 0 },
    expanded: false,
    recommendation: null,
    suggestions: [],
    solved: false,
    ...overrides,
  };
}

describe('formatWordRows', () => {
  it('prints ten upper-cased words per line', () => {
    const words = ['alpha', 'bravo', 'cabin', 'delta', 'eagle', 'fable', 'giant', 'hotel', 'igloo', 'joker', 'kiosk', 'lemon'];
    expect(formatWordRows(words)).toEqual([
      '  ALPHA BRAVO CABIN DELTA EAGLE FABLE GIANT HOTEL IGLOO JOKER',
      '  KIOSK LEMON',
    ]);
  });

  it('prints nothing for an empty list', () => {
    expect(formatWordRows([])).toEqual([]);
  });
});

describe('renderAnalysis', () => {
  it('lists both buckets', () => {
    const lines = renderAnalysis(
      analysis({
        result: { unique: ['plant'], repeated: ['llama'], count: 2 },
        recommendation: 'plant',
        suggestions: [{ word: 'plant', score: 7 }],
      }),
    );
    expect(lines).toEqual([
      '',
      'Found 2 candidate word(s):',
      '',
      'Unique letters (1 word(s)):',
      '  PLANT',
      '',
      'Repeated letters (1 word(s)):',
      '  LLAMA',
      '',
      'Recommended guess: PLANT',
      '',
      'Suggestions:',
      '  PLANT (score: 7)',
    ]);
  });

  it('says when the candidates came from expansion', () => {
    const lines = renderAnalysis(
      analysis({ result: { unique: ['plant'], repeated: [], count: 1 }, expanded: true, recommendation: 'plant' }),
    );
    expect(lines[1]).toBe('No word in the list fits; expansion found:');
  });

  it('reports an empty result', () => {
    expect(renderAnalysis(analysis({}))).toEqual([
      '',
      'No candidate words found.',
      'Check the feedback you entered, or type quit.',
    ]);
  });
});

describe('renderSolved', () => {
  it('spells out the solved word', () => {
    const solved = analysis({
      constraints: { fixed: ['c', 'h', 'a', 'n', 't'], excludedPositions: {}, excludedLetters: [] },
      solved: true,
    });
    expect(renderSolved(solved, 3)).toEqual(['', 'Solved: CHANT in 3 round(s). Congratulations!']);
  });
});
