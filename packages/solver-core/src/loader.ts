// packages/solver-core/src/loader.ts
//
// Startup loaders for the word lists and positional frequency files.
//
//   • <frequencyDir>/pos1.txt … pos<L>.txt → FrequencyTable
//   • wordsFile   → solution corpus (one word per line)
//   • guessesFile → optional extra allowed guesses, merged into the guess corpus
//
// Failures throw CorpusLoadError / FrequencyLoadError; they are fatal at
// startup and not retried here.

import fs from 'node:fs';
import path from 'node:path';

import type { SolverConfig } from './config.js';
import { mergeCorpora, parseWordList, type WordCorpus } from './corpus.js';
import { CorpusLoadError, FrequencyLoadError } from './errors.js';
import { createFrequencyTable, parseFrequencyText, type FrequencyTable } from './frequency.js';
import type { SolverContext } from './solver.js';

export type DataPaths = {
  wordsFile: string;
  guessesFile?: string;
  frequencyDir: string;
};

export function loadWordCorpus(file: string, wordLength: number): WordCorpus {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf8');
  } catch (err) {
    throw new CorpusLoadError(`Failed to load word list ${file}`, { cause: err });
  }
  const corpus = parseWordList(raw, wordLength);
  if (!corpus.words.length) {
    throw new CorpusLoadError(`Word list ${file} has no ${wordLength}-letter words`);
  }
  return corpus;
}

/** A missing pos<N>.txt leaves that position without ranked letters. */
export function loadFrequencyTable(dir: string, wordLength: number): FrequencyTable {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new FrequencyLoadError(`Frequency directory ${dir} not found`);
  }
  const lists: string[][] = [];
  for (let pos = 1; pos <= wordLength; pos++) {
    const file = path.join(dir, `pos${pos}.txt`);
    if (!fs.existsSync(file)) {
      lists.push([]);
      continue;
    }
    try {
      lists.push(parseFrequencyText(fs.readFileSync(file, 'utf8')));
    } catch (err) {
      throw new FrequencyLoadError(`Failed to load frequency file ${file}`, { cause: err });
    }
  }
  return createFrequencyTable(lists, wordLength);
}

export function loadSolverContext(paths: DataPaths, config: SolverConfig): SolverContext {
  const corpus = loadWordCorpus(paths.wordsFile, config.wordLength);
  const guessCorpus = paths.guessesFile
    ? mergeCorpora(corpus, loadWordCorpus(paths.guessesFile, config.wordLength))
    : undefined;
  return {
    corpus,
    guessCorpus,
    frequencies: loadFrequencyTable(paths.frequencyDir, config.wordLength),
    config,
  };
}
