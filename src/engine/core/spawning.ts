import { canPlacePiece } from "./grid";
import { PIECES } from "./pieces";
import {
  type ActivePiece,
  type Grid,
  type PieceId,
  GRID_COLS,
  createGridCoord,
} from "./types";

/**
 * Create a new active piece at the top-center start:
 * column floor((cols - width) / 2), row 0.
 */
export function createActivePiece(pieceId: PieceId): ActivePiece {
  const matrix = PIECES[pieceId].matrix;
  const width = matrix[0]?.length ?? 0;
  return {
    id: pieceId,
    matrix,
    x: createGridCoord(Math.floor((GRID_COLS - width) / 2)),
    y: createGridCoord(0),
  };
}

export function canSpawnPiece(grid: Grid, pieceId: PieceId): boolean {
  return canPlacePiece(grid, createActivePiece(pieceId));
}

export function isTopOut(grid: Grid, pieceId: PieceId): boolean {
  return !canSpawnPiece(grid, pieceId);
}
