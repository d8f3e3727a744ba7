import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { debugLog } from "../utils/debug";

import {
  type HighScoreEntry,
  type HighScoreTable,
  sanitizeName,
  sortTable,
} from "./table";

export type SaveResult = { ok: true } | { ok: false; error: string };

/**
 * Persistence for the high-score table. Neither method rejects: a missing
 * or unreadable store loads as an empty table, and write failures come
 * back as `{ ok: false }` for the caller to report.
 */
export type ScoreStore = {
  load(): Promise<HighScoreTable>;
  save(table: HighScoreTable): Promise<SaveResult>;
};

const FIELD_SEPARATOR = "\t";

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function isMissingFile(e: unknown): boolean {
  return (
    typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT"
  );
}

// One "name<TAB>score" record per line
export function serializeTable(table: HighScoreTable): string {
  return table
    .map((e) => `${sanitizeName(e.name)}${FIELD_SEPARATOR}${String(e.score)}\n`)
    .join("");
}

function parseLine(line: string): HighScoreEntry | null {
  const at = line.lastIndexOf(FIELD_SEPARATOR);
  if (at <= 0) return null;
  const name = line.slice(0, at);
  const rawScore = line.slice(at + 1).trim();
  if (!/^\d+$/.test(rawScore)) return null;
  return { name: sanitizeName(name), score: Number(rawScore) };
}

/**
 * Malformed lines are skipped; the result is sorted descending.
 */
export function parseTable(text: string): HighScoreTable {
  const entries: Array<HighScoreEntry> = [];
  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === "") continue;
    const entry = parseLine(line);
    if (entry) {
      entries.push(entry);
    } else {
      debugLog("store", "skipping malformed high-score line", line);
    }
  }
  return sortTable(entries);
}

export class FileScoreStore implements ScoreStore {
  constructor(private readonly path: string) {}

  async load(): Promise<HighScoreTable> {
    try {
      const text = await readFile(this.path, "utf8");
      return parseTable(text);
    } catch (e) {
      if (!isMissingFile(e)) {
        debugLog("store", `could not read ${this.path}`, errorMessage(e));
      }
      return [];
    }
  }

  async save(table: HighScoreTable): Promise<SaveResult> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, serializeTable(table), "utf8");
      return { ok: true };
    } catch (e) {
      debugLog("store", `could not write ${this.path}`, errorMessage(e));
      return { error: errorMessage(e), ok: false };
    }
  }
}

export class MemoryScoreStore implements ScoreStore {
  private table: HighScoreTable;

  constructor(initial: HighScoreTable = []) {
    this.table = sortTable(initial);
  }

  load(): Promise<HighScoreTable> {
    return Promise.resolve(this.table);
  }

  save(table: HighScoreTable): Promise<SaveResult> {
    this.table = sortTable(table);
    return Promise.resolve({ ok: true });
  }
}
