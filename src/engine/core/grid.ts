import { PIECES } from "./pieces";
import {
  type ActivePiece,
  type CellValue,
  type Grid,
  type GridRow,
  type PieceMatrix,
  type Position,
  EMPTY_CELL,
  GRID_COLS,
  GRID_ROWS,
  createGridCoord,
  gridCoordAsNumber,
} from "./types";

function createEmptyRow(): GridRow {
  return Array.from({ length: GRID_COLS }, () => EMPTY_CELL);
}

export function createEmptyGrid(): Grid {
  return Array.from({ length: GRID_ROWS }, () => createEmptyRow());
}

// Absolute grid coordinates of every occupied matrix cell at a position
export function occupiedCells(
  matrix: PieceMatrix,
  position: Position,
): ReadonlyArray<readonly [number, number]> {
  const px = gridCoordAsNumber(position.x);
  const py = gridCoordAsNumber(position.y);
  const cells: Array<readonly [number, number]> = [];
  matrix.forEach((row, dy) => {
    row.forEach((cell, dx) => {
      if (cell !== 0) cells.push([px + dx, py + dy]);
    });
  });
  return cells;
}

/**
 * True when any occupied cell of `matrix` at `position` is off the sides,
 * below the bottom, or on an occupied grid cell. Rows above the grid (y < 0)
 * are open so pieces can enter from the top.
 */
export function checkCollision(
  grid: Grid,
  matrix: PieceMatrix,
  position: Position,
): boolean {
  for (const [x, y] of occupiedCells(matrix, position)) {
    if (x < 0 || x >= GRID_COLS) return true;
    if (y >= GRID_ROWS) return true;
    if (y < 0) continue;
    if ((grid[y]?.[x] ?? EMPTY_CELL) !== 0) return true;
  }
  return false;
}

export function canPlacePiece(grid: Grid, piece: ActivePiece): boolean {
  return !checkCollision(grid, piece.matrix, piece);
}

// Return the moved piece if valid; otherwise null
export function tryMove(
  grid: Grid,
  piece: ActivePiece,
  dx: number,
  dy: number,
): ActivePiece | null {
  const moved: ActivePiece = {
    ...piece,
    x: createGridCoord(gridCoordAsNumber(piece.x) + dx),
    y: createGridCoord(gridCoordAsNumber(piece.y) + dy),
  };
  return canPlacePiece(grid, moved) ? moved : null;
}

export function dropToBottom(grid: Grid, piece: ActivePiece): ActivePiece {
  let current = piece;
  let next = tryMove(grid, current, 0, 1);
  while (next) {
    current = next;
    next = tryMove(grid, current, 0, 1);
  }
  return current;
}

export function isAtBottom(grid: Grid, piece: ActivePiece): boolean {
  return tryMove(grid, piece, 0, 1) === null;
}

// Any occupied cell still above row 0
export function isAboveGrid(piece: ActivePiece): boolean {
  return occupiedCells(piece.matrix, piece).some(([, y]) => y < 0);
}

// Write the piece's fill value into every in-bounds occupied cell
export function lockPiece(grid: Grid, piece: ActivePiece): Grid {
  const fill = PIECES[piece.id].fill;
  const rows: Array<Array<CellValue>> = grid.map((row) => [...row]);
  for (const [x, y] of occupiedCells(piece.matrix, piece)) {
    const row = rows[y];
    if (row === undefined || x < 0 || x >= GRID_COLS) continue;
    row[x] = fill;
  }
  return rows;
}

export function isRowFull(row: GridRow): boolean {
  return row.every((cell) => cell !== 0);
}

export function getCompletedLines(grid: Grid): ReadonlyArray<number> {
  const completed: Array<number> = [];
  grid.forEach((row, y) => {
    if (isRowFull(row)) completed.push(y);
  });
  return completed;
}

/**
 * Remove the given rows and add as many empty rows at the top.
 * Remaining rows keep their relative order.
 */
export function clearLines(grid: Grid, toClear: ReadonlyArray<number>): Grid {
  if (toClear.length === 0) return grid;
  const cleared = new Set(toClear);
  const kept = grid.filter((_, y) => !cleared.has(y));
  const fresh = Array.from({ length: grid.length - kept.length }, () =>
    createEmptyRow(),
  );
  return [...fresh, ...kept];
}
