export type HighScoreEntry = Readonly<{
  name: string;
  score: number;
}>;

// Sorted descending by score
export type HighScoreTable = ReadonlyArray<HighScoreEntry>;

export const DEFAULT_MAX_ENTRIES = 10 as const;
export const MAX_NAME_LENGTH = 16 as const;
export const ANONYMOUS = "anonymous" as const;

/**
 * Names must survive the one-record-per-line format: tabs and line breaks
 * become spaces, the result is trimmed and capped.
 */
export function sanitizeName(name: string): string {
  const cleaned = name
    .replace(/[\t\r\n]+/g, " ")
    .trim()
    .slice(0, MAX_NAME_LENGTH)
    .trim();
  return cleaned.length > 0 ? cleaned : ANONYMOUS;
}

export function sortTable(table: HighScoreTable): HighScoreTable {
  // Array.prototype.sort is stable: earlier entries win ties
  return [...table].sort((a, b) => b.score - a.score);
}

/**
 * Insert an entry, re-sort descending, keep the top `maxEntries`.
 * A low score is not an error; it is just truncated away.
 */
export function updateHighScores(
  table: HighScoreTable,
  name: string,
  score: number,
  maxEntries: number = DEFAULT_MAX_ENTRIES,
): HighScoreTable {
  const entry: HighScoreEntry = {
    name: sanitizeName(name),
    score: Math.max(0, Math.floor(score)),
  };
  return sortTable([...table, entry]).slice(0, Math.max(0, maxEntries));
}

// Would this score make the table?
export function qualifies(
  table: HighScoreTable,
  score: number,
  maxEntries: number = DEFAULT_MAX_ENTRIES,
): boolean {
  if (maxEntries <= 0) return false;
  if (table.length < maxEntries) return true;
  const lowest = table[maxEntries - 1];
  return lowest === undefined || score > lowest.score;
}
