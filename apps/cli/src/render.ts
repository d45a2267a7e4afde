// apps/cli/src/render.ts
//
// Text rendering for the terminal solver. Pure functions returning lines;
// the driver decides where they go.

import type { RoundAnalysis, SessionPhase } from '@letterwise/solver-core';

export const WORDS_PER_LINE = 10;
export const MAX_SUGGESTIONS = 10;

/** Upper-cased words, WORDS_PER_LINE per indented line. */
export function formatWordRows(words: ReadonlyArray<string>, perLine = WORDS_PER_LINE): string[] {
  const rows: string[] = [];
  for (let i = 0; i < words.length; i += perLine) {
    rows.push('  ' + words.slice(i, i + perLine).map((w) => w.toUpperCase()).join(' '));
  }
  return rows;
}

function section(title: string, words: ReadonlyArray<string>): string[] {
  if (!words.length) return [];
  return ['', `${title} (${words.length} word(s)):`, ...formatWordRows(words)];
}

export function renderAnalysis(analysis: RoundAnalysis): string[] {
  const { result, expanded, recommendation, suggestions } = analysis;
  if (result.count === 0) {
    return ['', 'No candidate words found.', 'Check the feedback you entered, or type quit.'];
  }

  const lines = [
    '',
    expanded
      ? 'No word in the list fits; expansion found:'
      : `Found ${result.count} candidate word(s):`,
    ...section('Unique letters', result.unique),
    ...section('Repeated letters', result.repeated),
  ];

  if (recommendation) lines.push('', `Recommended guess: ${recommendation.toUpperCase()}`);
  if (suggestions.length) {
    lines.push('', 'Suggestions:');
    for (const s of suggestions.slice(0, MAX_SUGGESTIONS)) {
      lines.push(`  ${s.word.toUpperCase()} (score: ${s.score})`);
    }
  }
  return lines;
}

export function renderSolved(analysis: RoundAnalysis, round: number): string[] {
  const word = analysis.constraints.fixed.join('').toUpperCase();
  return ['', `Solved: ${word} in ${round} round(s). Congratulations!`];
}

const PROMPTS: Record<Exclude<SessionPhase, 'display' | 'solved'>, string> = {
  awaitGuess: 'Guess: ',
  awaitGreen: 'Green letters (e.g. S..NT): ',
  awaitYellow: 'Yellow letters (e.g. .A..., blank for none): ',
  awaitGrey: 'Grey letters (space separated, blank for none): ',
};

export function promptFor(phase: Exclude<SessionPhase, 'display' | 'solved'>, round: number): string {
  return phase === 'awaitGuess' ? `\nRound ${round}\n${PROMPTS[phase]}` : PROMPTS[phase];
}
