import { describe, test, expect } from "@jest/globals";
import {
  ANSI_RESET,
  bannerFor,
  renderCell,
  renderFrame,
  renderHighScores,
  renderPreview,
} from "../../src/ui/render";
import { PIECES } from "../../src/engine/core/pieces";

import { createTestGameState, createTestPiece } from "../test-helpers";

const PLAIN = { color: false, ghost: false };
const EMPTY_ROW = " .".repeat(10);
const BORDER = `+${"-".repeat(20)}+`;

describe("renderFrame", () => {
  const state = createTestGameState({ piece: createTestPiece("T", 3, 0) });

  test("draws the field, preview and counters", () => {
    const lines = renderFrame(state, "playing", PLAIN);
    expect(lines).toHaveLength(22);
    expect(lines[0]).toBe(BORDER);
    expect(lines[1]).toBe("| . . .[][][] . . . .|  NEXT");
    expect(lines[2]).toBe("| . . . .[] . . . . .|  [][][]  ");
    expect(lines[3]).toBe(`|${EMPTY_ROW}|    []    `);
    expect(lines[4]).toBe(`|${EMPTY_ROW}|  `);
    expect(lines[5]).toBe(`|${EMPTY_ROW}|  SCORE 0`);
    expect(lines[6]).toBe(`|${EMPTY_ROW}|  LINES 0`);
    expect(lines[7]).toBe(`|${EMPTY_ROW}|  SPEED 500ms`);
    expect(lines[8]).toBe(`|${EMPTY_ROW}|`);
    expect(lines[21]).toBe(BORDER);
  });

  test("ghost shows the landing spot", () => {
    const lines = renderFrame(state, "playing", { color: false, ghost: true });
    expect(lines[19]).toBe("| . . .:::::: . . . .|");
    expect(lines[20]).toBe("| . . . .:: . . . . .|");
  });

  test("game over banner across the middle", () => {
    const over = { ...state, piece: null, status: "gameOver" as const };
    const lines = renderFrame(over, "over", PLAIN);
    expect(lines[11]).toBe("|     GAME OVER      |");
  });

  test("paused banner", () => {
    const lines = renderFrame(state, "paused", PLAIN);
    expect(lines[11]).toBe("|       PAUSED       |");
  });

  test("renderer does not change the state", () => {
    const before = JSON.stringify(state.grid);
    renderFrame(state, "playing");
    expect(JSON.stringify(state.grid)).toBe(before);
  });
});

describe("cells and banners", () => {
  test("colored cells use the piece color", () => {
    const opts = { color: true, ghost: true };
    expect(renderCell({ id: "T", kind: "active" }, opts)).toBe(
      `\x1b[35m[]${ANSI_RESET}`,
    );
    expect(renderCell({ id: null, kind: "locked" }, opts)).toBe("[]");
    expect(renderCell({ kind: "empty" }, opts)).toBe(`\x1b[2m .${ANSI_RESET}`);
    expect(renderCell({ id: "I", kind: "ghost" }, PLAIN)).toBe("::");
  });

  test("preview is two rows of four cells", () => {
    expect(renderPreview(PIECES.I.matrix, "I", PLAIN)).toEqual([
      "[][][][]",
      "        ",
    ]);
    expect(renderPreview(null, null, PLAIN)).toEqual(["        ", "        "]);
  });

  test("banner text", () => {
    const state = createTestGameState();
    expect(bannerFor("playing", state)).toBeNull();
    expect(bannerFor("paused", state)).toBe("PAUSED");
    expect(bannerFor("over", { ...state, status: "gameOver" })).toBe("GAME OVER");
  });
});

describe("renderHighScores", () => {
  test("empty table", () => {
    expect(renderHighScores([])).toEqual(["HIGH SCORES", "  (none yet)"]);
  });

  test("ranks, pads and marks the new entry once", () => {
    const table = [
      { name: "ann", score: 120 },
      { name: "bob", score: 7 },
      { name: "bob", score: 7 },
    ];
    expect(renderHighScores(table, { name: "bob", score: 7 })).toEqual([
      "HIGH SCORES",
      ` 1. ann${" ".repeat(17)}120`,
      ` 2. bob${" ".repeat(19)}7  <`,
      ` 3. bob${" ".repeat(19)}7`,
    ]);
  });
});
