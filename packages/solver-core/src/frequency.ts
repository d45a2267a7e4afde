// packages/solver-core/src/frequency.ts
//
// Positional letter-frequency tables.
//
// One ranked letter list per position, most frequent first. Only the order
// matters to the solver: it drives the expansion order and the suggestion
// scores. Counts in the source text are read past and discarded.
//
// Text format, one record per line, already sorted by descending count:
//   1132 s
//   635 a
// A bare letter per line is accepted too.

/** Index `i` holds the ranked letters for position `i + 1`. */
export type FrequencyTable = ReadonlyArray<ReadonlyArray<string>>;

/**
 * parseFrequencyText extracts the letter order from one position's file.
 *
 * Blank lines and records whose last field is not a single letter are
 * skipped; a letter listed twice keeps its first rank.
 *
 * Example:
 *   "1000 e\n900 y\n\n800 t" → ["e", "y", "t"]
 */
export function parseFrequencyText(text: string): string[] {
  const letters: string[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const parts = raw.trim().split(/\s+/);
    const letter = parts[parts.length - 1].toLowerCase();
    if (!/^[a-z]$/.test(letter)) continue;
    if (!letters.includes(letter)) letters.push(letter);
  }
  return letters;
}

/**
 * Build a table for `wordLength` positions. Missing positions become
 * empty lists, extra ones are dropped.
 */
export function createFrequencyTable(
  lists: ReadonlyArray<ReadonlyArray<string>>,
  wordLength: number,
): FrequencyTable {
  return Array.from({ length: wordLength }, (_, i) =>
    Object.freeze((lists[i] ?? []).map((l) => l.toLowerCase())),
  );
}

/** Ranked letters for a 1-based position (empty when unknown). */
export function rankedLetters(table: FrequencyTable, position: number): ReadonlyArray<string> {
  return table[position - 1] ?? [];
}

/** 1-based rank of `letter` at `position`, or null if the table omits it. */
export function letterRank(table: FrequencyTable, position: number, letter: string): number | null {
  const idx = rankedLetters(table, position).indexOf(letter.toLowerCase());
  return idx === -1 ? null : idx + 1;
}
