import { dropToBottom, tryMove, canPlacePiece } from "../core/grid";
import { rotateMatrix, type RotationDirection } from "../core/rotation";
import { type GameState } from "../types";

type MoveResult = { state: GameState; moved: boolean };
type RotateResult = { state: GameState; rotated: boolean };

/**
 * Propose position + (dx, dy); commit only when the piece fits there.
 * A failed downward move is the caller's signal to lock.
 */
export function tryMovePiece(
  state: GameState,
  dx: number,
  dy: number,
): MoveResult {
  if (!state.piece) return { moved: false, state };
  const movedPiece = tryMove(state.grid, state.piece, dx, dy);
  if (!movedPiece) return { moved: false, state };
  return { moved: true, state: { ...state, piece: movedPiece } };
}

export function tryMoveLeft(state: GameState): MoveResult {
  return tryMovePiece(state, -1, 0);
}

export function tryMoveRight(state: GameState): MoveResult {
  return tryMovePiece(state, 1, 0);
}

export function tryMoveDown(state: GameState): MoveResult {
  return tryMovePiece(state, 0, 1);
}

/**
 * Rotate in place around the top-left anchor. A rotation that would leave
 * the grid or overlap locked cells is rejected and the piece is unchanged.
 */
export function tryRotate(
  state: GameState,
  direction: RotationDirection = "CW",
): RotateResult {
  if (!state.piece) return { rotated: false, state };
  const rotatedPiece = {
    ...state.piece,
    matrix: rotateMatrix(state.piece.matrix, direction),
  };
  if (!canPlacePiece(state.grid, rotatedPiece)) {
    return { rotated: false, state };
  }
  return { rotated: true, state: { ...state, piece: rotatedPiece } };
}

export function tryHardDrop(state: GameState): {
  state: GameState;
  hardDropped: boolean;
} {
  if (!state.piece) return { hardDropped: false, state };
  // Only moves the piece; locking happens when transitions resolve
  return {
    hardDropped: true,
    state: { ...state, piece: dropToBottom(state.grid, state.piece) },
  };
}
