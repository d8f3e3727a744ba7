import {
  clearLines,
  getCompletedLines,
  isAboveGrid,
  lockPiece,
} from "../core/grid";
import { createActivePiece, isTopOut } from "../core/spawning";
import { speedForScore } from "../scoring/speed";

import type { GameState, PieceId } from "../types";

/**
 * Write the active piece into the grid. `lockedOut` is set when part of the
 * piece was still above row 0, which ends the game.
 */
export function placeActivePiece(state: GameState): {
  state: GameState;
  pieceId: PieceId | null;
  lockedOut: boolean;
} {
  if (!state.piece) {
    return { lockedOut: false, pieceId: null, state };
  }

  const newState: GameState = {
    ...state,
    grid: lockPiece(state.grid, state.piece),
    piece: null,
    piecesPlaced: state.piecesPlaced + 1,
  };

  return {
    lockedOut: isAboveGrid(state.piece),
    pieceId: state.piece.id,
    state: newState,
  };
}

/**
 * Remove full rows, one point per row. Speed follows the new score.
 * Clearing nothing leaves the state untouched.
 */
export function clearCompletedLines(state: GameState): {
  state: GameState;
  rows: ReadonlyArray<number>;
} {
  const completedRows = getCompletedLines(state.grid);
  if (completedRows.length === 0) {
    return { rows: [], state };
  }

  const score = state.score + completedRows.length;
  return {
    rows: completedRows,
    state: {
      ...state,
      grid: clearLines(state.grid, completedRows),
      linesCleared: state.linesCleared + completedRows.length,
      score,
      speed: speedForScore(score, state.cfg.speed),
    },
  };
}

/**
 * Take the next piece from the preview queue, refill the queue from the
 * generator, and place the piece at its start position.
 * `topOut` is set (and the state left as is) when the start is blocked.
 */
export function spawnPiece(
  state: GameState,
  pieceIdOverride?: PieceId,
): {
  state: GameState;
  spawnedId: PieceId | null;
  topOut: boolean;
} {
  let pieceToSpawn: PieceId;
  let newQueue = state.queue;
  let newRng = state.rng;

  if (pieceIdOverride !== undefined) {
    pieceToSpawn = pieceIdOverride;
  } else {
    const first = state.queue[0];
    if (first === undefined) {
      const drawn = state.rng.getNextPiece();
      pieceToSpawn = drawn.piece;
      newRng = drawn.newRng;
    } else {
      pieceToSpawn = first;
      newQueue = state.queue.slice(1);
    }

    const wanted = Math.max(1, state.cfg.previewCount);
    if (newQueue.length < wanted) {
      const refill = newRng.getNextPieces(wanted - newQueue.length);
      newQueue = [...newQueue, ...refill.pieces];
      newRng = refill.newRng;
    }
  }

  if (isTopOut(state.grid, pieceToSpawn)) {
    return { spawnedId: null, state, topOut: true };
  }

  return {
    spawnedId: pieceToSpawn,
    state: {
      ...state,
      gravityAccumMs: 0,
      piece: createActivePiece(pieceToSpawn),
      queue: newQueue,
      rng: newRng,
    },
    topOut: false,
  };
}
