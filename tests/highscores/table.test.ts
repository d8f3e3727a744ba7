import { describe, test, expect } from "@jest/globals";
import {
  ANONYMOUS,
  qualifies,
  sanitizeName,
  updateHighScores,
  type HighScoreTable,
} from "../../src/highscores/table";

describe("updateHighScores", () => {
  test("first score makes a one-entry table", () => {
    const table = updateHighScores([], "ann", 100);
    expect(table).toEqual([{ name: "ann", score: 100 }]);
  });

  test("entries stay sorted by descending score", () => {
    let table = updateHighScores([], "ann", 100);
    table = updateHighScores(table, "bob", 40);
    table = updateHighScores(table, "cy", 250);
    expect(table.map((e) => e.score)).toEqual([250, 100, 40]);
    expect(table.map((e) => e.name)).toEqual(["cy", "ann", "bob"]);
  });

  test("ties keep the earlier entry first", () => {
    let table = updateHighScores([], "first", 50);
    table = updateHighScores(table, "second", 50);
    expect(table.map((e) => e.name)).toEqual(["first", "second"]);
  });

  test("truncates to the maximum, dropping low scores", () => {
    let table: HighScoreTable = [];
    for (let i = 1; i <= 3; i++) table = updateHighScores(table, `p${String(i)}`, i * 10, 3);
    table = updateHighScores(table, "low", 5, 3);
    expect(table).toHaveLength(3);
    expect(table.map((e) => e.name)).toEqual(["p3", "p2", "p1"]);
    table = updateHighScores(table, "high", 25, 3);
    expect(table.map((e) => e.name)).toEqual(["p3", "high", "p2"]);
  });

  test("a zero score is still inserted", () => {
    const table = updateHighScores([{ name: "ann", score: 4 }], "zed", 0);
    expect(table).toEqual([
      { name: "ann", score: 4 },
      { name: "zed", score: 0 },
    ]);
  });

  test("does not modify the input table", () => {
    const table: HighScoreTable = [{ name: "ann", score: 1 }];
    updateHighScores(table, "bob", 2);
    expect(table).toEqual([{ name: "ann", score: 1 }]);
  });
});

describe("sanitizeName", () => {
  test("replaces separators and trims", () => {
    expect(sanitizeName("  ann\tlee\n")).toBe("ann lee");
  });

  test("caps the length", () => {
    expect(sanitizeName("abcdefghijklmnopqrstuvwxyz")).toBe("abcdefghijklmnop");
  });

  test("empty names become anonymous", () => {
    expect(sanitizeName("")).toBe(ANONYMOUS);
    expect(sanitizeName(" \t ")).toBe("anonymous");
  });
});

describe("qualifies", () => {
  const full: HighScoreTable = [
    { name: "a", score: 30 },
    { name: "b", score: 20 },
  ];

  test("any score fits while the table has room", () => {
    expect(qualifies([], 0)).toBe(true);
    expect(qualifies(full, 1, 3)).toBe(true);
  });

  test("a full table needs a strictly higher score than the last entry", () => {
    expect(qualifies(full, 20, 2)).toBe(false);
    expect(qualifies(full, 21, 2)).toBe(true);
  });

  test("a zero-size table takes nothing", () => {
    expect(qualifies([], 100, 0)).toBe(false);
  });
});
