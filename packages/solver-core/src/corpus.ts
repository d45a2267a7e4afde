// packages/solver-core/src/corpus.ts
//
// Word corpus: the legal words for a session, in load order.
//
// Normalization rules:
//   • Entries are trimmed and lowercased.
//   • Anything that is not exactly `wordLength` letters a–z is dropped.
//   • Duplicates are dropped, keeping the first occurrence, so repeated
//     entries never change filtering results.

export type WordCorpus = {
  readonly wordLength: number;
  readonly words: ReadonlyArray<string>;
  readonly lookup: ReadonlySet<string>;
};

export function createCorpus(entries: Iterable<string>, wordLength: number): WordCorpus {
  const shape = new RegExp(`^[a-z]{${wordLength}}$`);
  const lookup = new Set<string>();
  const words: string[] = [];
  for (const entry of entries) {
    const w = entry.trim().toLowerCase();
    if (!shape.test(w) || lookup.has(w)) continue;
    lookup.add(w);
    words.push(w);
  }
  return { wordLength, words, lookup };
}

/** Parse a one-word-per-line list. Blank lines are ignored. */
export function parseWordList(text: string, wordLength: number): WordCorpus {
  return createCorpus(text.split(/\r?\n/), wordLength);
}

/**
 * Union of two corpora, `base` words first. Used to build the wider guess
 * corpus (solutions plus extra allowed guesses).
 */
export function mergeCorpora(base: WordCorpus, extra: WordCorpus): WordCorpus {
  if (base.wordLength !== extra.wordLength) {
    throw new Error(
      `Cannot merge corpora of length ${base.wordLength} and ${extra.wordLength}`,
    );
  }
  return createCorpus([...base.words, ...extra.words], base.wordLength);
}
