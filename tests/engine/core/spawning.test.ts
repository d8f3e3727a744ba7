import { describe, test, expect } from "@jest/globals";
import { createEmptyGrid } from "../../../src/engine/core/grid";
import {
  canSpawnPiece,
  createActivePiece,
  isTopOut,
} from "../../../src/engine/core/spawning";
import type { PieceId } from "../../../src/engine/core/types";

import { setGridCell } from "../../test-helpers";

describe("createActivePiece", () => {
  test.each<[PieceId, number]>([
    ["T", 3],
    ["O", 4],
    ["I", 3],
    ["S", 3],
  ])("%s spawns top-center at column %d", (id, x) => {
    const piece = createActivePiece(id);
    expect(piece.id).toBe(id);
    expect(piece.x).toBe(x);
    expect(piece.y).toBe(0);
  });
});

describe("top-out detection", () => {
  test("spawn is free on an empty grid", () => {
    expect(canSpawnPiece(createEmptyGrid(), "T")).toBe(true);
    expect(isTopOut(createEmptyGrid(), "T")).toBe(false);
  });

  test("blocked when a spawn cell is occupied", () => {
    const grid = setGridCell(createEmptyGrid(), 4, 1);
    // T covers (3,0) (4,0) (5,0) (4,1)
    expect(isTopOut(grid, "T")).toBe(true);
    // O covers (4,0) (5,0) (4,1) (5,1)
    expect(isTopOut(grid, "O")).toBe(true);
    // I covers (3,0)..(6,0)
    expect(isTopOut(grid, "I")).toBe(false);
  });
});
