// Grid dimensions
export const GRID_COLS = 10 as const;
export const GRID_ROWS = 20 as const; // rows 0..19, negative rows are above the grid

// Grid coordinates - for grid positions (must be integers)
declare const GridCoordBrand: unique symbol;
export type GridCoord = number & { readonly [GridCoordBrand]: true };
export const gridCoordAsNumber = (g: GridCoord): number => g as number;

// Cell values - 0=empty, 1-7=locked tetromino fill
declare const CellValueBrand: unique symbol;
export type CellValue = (0 | 1 | 2 | 3 | 4 | 5 | 6 | 7) & {
  readonly [CellValueBrand]: true;
};

// GridCoord constructors and guards
export function createGridCoord(value: number): GridCoord {
  if (!Number.isInteger(value)) {
    throw new Error("GridCoord must be an integer");
  }
  return value as GridCoord;
}

export function isGridCoord(n: unknown): n is GridCoord {
  return typeof n === "number" && Number.isInteger(n);
}

// CellValue constructors and guards
export function createCellValue(value: number): CellValue {
  if (!Number.isInteger(value) || value < 0 || value > 7) {
    throw new Error("CellValue must be an integer from 0 to 7");
  }
  return value as CellValue;
}

export function isCellValue(n: unknown): n is CellValue {
  return typeof n === "number" && Number.isInteger(n) && n >= 0 && n <= 7;
}

export const EMPTY_CELL: CellValue = createCellValue(0);

export type GridRow = ReadonlyArray<CellValue>;

// Row-major playing field; exactly GRID_ROWS rows of GRID_COLS cells
export type Grid = ReadonlyArray<GridRow>;

// Pieces
export type PieceId = "I" | "O" | "T" | "S" | "Z" | "J" | "L";

export type MatrixCell = 0 | 1;

// Occupancy inside the piece's bounding box, row-major
export type PieceMatrix = ReadonlyArray<ReadonlyArray<MatrixCell>>;

export type TetrominoShape = {
  id: PieceId;
  matrix: PieceMatrix;
  fill: CellValue;
  color: string;
};

export type Position = {
  x: GridCoord;
  y: GridCoord;
};

export type ActivePiece = Position & {
  id: PieceId;
  matrix: PieceMatrix;
};

export function createPosition(x: number, y: number): Position {
  return { x: createGridCoord(x), y: createGridCoord(y) };
}
