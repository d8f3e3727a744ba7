import { describe, test, expect, beforeEach, afterEach } from "@jest/globals";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  FileScoreStore,
  MemoryScoreStore,
  parseTable,
  serializeTable,
} from "../../src/highscores/store";

describe("high-score file format", () => {
  test("one name<TAB>score record per line", () => {
    expect(
      serializeTable([
        { name: "ann", score: 30 },
        { name: "bob lee", score: 12 },
      ]),
    ).toBe("ann\t30\nbob lee\t12\n");
  });

  test("parse skips malformed lines and sorts", () => {
    const text = "ann\t30\nno separator\nbob\tx\n\ncarol smith\t45\r\n";
    expect(parseTable(text)).toEqual([
      { name: "carol smith", score: 45 },
      { name: "ann", score: 30 },
    ]);
  });

  test("names and scores survive a round trip", () => {
    const table = [
      { name: "zoe", score: 900 },
      { name: "a b c", score: 7 },
    ];
    expect(parseTable(serializeTable(table))).toEqual(table);
  });
});

describe("FileScoreStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "termtris-store-"));
  });

  afterEach(() => {
    rmSync(dir, { force: true, recursive: true });
  });

  test("missing file loads as an empty table", async () => {
    const store = new FileScoreStore(join(dir, "scores.txt"));
    await expect(store.load()).resolves.toEqual([]);
  });

  test("save then load", async () => {
    const path = join(dir, "nested", "scores.txt");
    const store = new FileScoreStore(path);
    const table = [
      { name: "ann", score: 30 },
      { name: "bob", score: 10 },
    ];
    await expect(store.save(table)).resolves.toEqual({ ok: true });
    expect(readFileSync(path, "utf8")).toBe("ann\t30\nbob\t10\n");
    await expect(new FileScoreStore(path).load()).resolves.toEqual(table);
  });

  test("unreadable path loads as an empty table", async () => {
    // a directory cannot be read as a file
    await expect(new FileScoreStore(dir).load()).resolves.toEqual([]);
  });

  test("write failure is reported, not thrown", async () => {
    const blocker = join(dir, "blocker");
    writeFileSync(blocker, "not a directory");
    const store = new FileScoreStore(join(blocker, "scores.txt"));
    const result = await store.save([{ name: "ann", score: 1 }]);
    expect(result.ok).toBe(false);
  });
});

describe("MemoryScoreStore", () => {
  test("keeps the saved table", async () => {
    const store = new MemoryScoreStore([{ name: "a", score: 1 }, { name: "b", score: 5 }]);
    await expect(store.load()).resolves.toEqual([
      { name: "b", score: 5 },
      { name: "a", score: 1 },
    ]);
    await store.save([{ name: "c", score: 9 }]);
    await expect(store.load()).resolves.toEqual([{ name: "c", score: 9 }]);
  });
});
