import { describe, test, expect } from "@jest/globals";
import { SequenceRng } from "../../src/engine/core/rng/sequence";
import { init, step, stepN } from "../../src/engine/index";

import {
  countFilled,
  createTestConfig,
  createTestGameState,
  createTestPiece as piece,
  emptyGridWithRows,
  fillGridRowExcept,
} from "../test-helpers";

import type { Command } from "../../src/engine/commands";

const HARD_DROP: Command = { kind: "HardDrop" };

function hardDrops(n: number): ReadonlyArray<Command> {
  return Array.from({ length: n }, () => HARD_DROP);
}

describe("init", () => {
  test("spawns the first piece and fills the preview", () => {
    const { state, events } = init(createTestConfig());
    expect(state.status).toBe("playing");
    expect(state.piece?.id).toBe("T");
    expect(state.piece?.x).toBe(3);
    expect(state.piece?.y).toBe(0);
    expect(state.queue).toEqual(["O"]);
    expect(state.score).toBe(0);
    expect(state.speed).toBe(500);
    expect(events).toEqual([{ kind: "PieceSpawned", pieceId: "T", tick: 0 }]);
  });

  test("seeded sessions repeat", () => {
    const cfg = { ...createTestConfig(), rng: undefined, rngSeed: "repeat" };
    const a = stepN(init(cfg).state, hardDrops(5)).state;
    const b = stepN(init(cfg).state, hardDrops(5)).state;
    expect(a.grid).toEqual(b.grid);
    expect(a.queue).toEqual(b.queue);
  });
});

describe("step", () => {
  test("hard drop locks and spawns the next piece", () => {
    const start = init(createTestConfig()).state;
    const { state, events } = step(start, HARD_DROP);
    expect(events).toEqual([
      { kind: "Locked", pieceId: "T", source: "hardDrop", tick: 0 },
      { kind: "PieceSpawned", pieceId: "O", tick: 0 },
    ]);
    expect(state.grid[18]?.slice(3, 6)).toEqual([3, 3, 3]);
    expect(state.grid[19]?.[4]).toBe(3);
    expect(state.piece?.id).toBe("O");
    expect(state.piecesPlaced).toBe(1);
    expect(state.tick).toBe(1);
  });

  test("one command plus one gravity check per tick", () => {
    const start = init(createTestConfig()).state;
    const { state, events } = step(start, { kind: "MoveLeft" }, 500);
    expect(state.piece?.x).toBe(2);
    expect(state.piece?.y).toBe(1);
    expect(events.map((e) => e.kind)).toEqual(["Moved", "Moved"]);
  });

  test("clearing two rows scores two", () => {
    let grid = fillGridRowExcept(emptyGridWithRows(), 18, [4, 5]);
    grid = fillGridRowExcept(grid, 19, [4, 5]);
    const start = createTestGameState(
      { grid, piece: piece("O", 4, 0) },
      { rng: new SequenceRng(["O"]) },
    );
    const { state, events } = step(start, HARD_DROP);
    expect(events).toContainEqual({ kind: "LinesCleared", rows: [18, 19], tick: 0 });
    expect(state.score).toBe(2);
    expect(state.linesCleared).toBe(2);
    expect(countFilled(state.grid)).toBe(0);
  });

  test("crossing a score threshold speeds up gravity", () => {
    const grid = fillGridRowExcept(emptyGridWithRows(), 19, [4, 5]);
    const start = createTestGameState({
      grid,
      piece: piece("O", 4, 0),
      score: 9,
    });
    const { state, events } = step(start, HARD_DROP);
    expect(state.score).toBe(10);
    expect(state.speed).toBe(450);
    expect(events).toContainEqual({
      fromMs: 500,
      kind: "SpeedChanged",
      tick: 0,
      toMs: 450,
    });
  });

  test("stacking to the top ends the game", () => {
    const start = init(createTestConfig({ rng: new SequenceRng(["O"]) })).state;
    const nine = stepN(start, hardDrops(9)).state;
    expect(nine.status).toBe("playing");

    const { state, events } = step(nine, HARD_DROP);
    expect(events.map((e) => e.kind)).toEqual(["Locked", "TopOut"]);
    expect(state.status).toBe("gameOver");
    expect(state.piece).toBeNull();
    expect(state.piecesPlaced).toBe(10);
  });

  test("locking above the grid ends the game", () => {
    const grid = fillGridRowExcept(emptyGridWithRows(), 1, [0, 1, 2, 3, 6, 7, 8, 9]);
    const start = createTestGameState({ grid, piece: piece("O", 4, -1) });
    const { state, events } = step(start, { kind: "SoftDrop" });
    expect(events).toContainEqual({
      kind: "Locked",
      pieceId: "O",
      source: "softDrop",
      tick: 0,
    });
    expect(events.at(-1)?.kind).toBe("TopOut");
    expect(state.status).toBe("gameOver");
  });

  test("a finished game ignores further steps", () => {
    const over = createTestGameState({ status: "gameOver" });
    const r = step(over, HARD_DROP, 10_000);
    expect(r.state).toBe(over);
    expect(r.events).toEqual([]);
  });
});
