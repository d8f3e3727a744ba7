import {
  type PieceId,
  type TetrominoShape,
  createCellValue,
} from "./types";

export const PIECES: Readonly<Record<PieceId, TetrominoShape>> = {
  I: {
    color: "cyan",
    fill: createCellValue(1),
    id: "I",
    matrix: [[1, 1, 1, 1]],
  },
  J: {
    color: "blue",
    fill: createCellValue(6),
    id: "J",
    matrix: [
      [1, 0, 0],
      [1, 1, 1],
    ],
  },
  L: {
    color: "white", // orange is not in the basic ANSI palette
    fill: createCellValue(7),
    id: "L",
    matrix: [
      [0, 0, 1],
      [1, 1, 1],
    ],
  },
  O: {
    color: "yellow",
    fill: createCellValue(2),
    id: "O",
    matrix: [
      [1, 1],
      [1, 1],
    ],
  },
  S: {
    color: "green",
    fill: createCellValue(4),
    id: "S",
    matrix: [
      [0, 1, 1],
      [1, 1, 0],
    ],
  },
  T: {
    color: "magenta",
    fill: createCellValue(3),
    id: "T",
    matrix: [
      [1, 1, 1],
      [0, 1, 0],
    ],
  },
  Z: {
    color: "red",
    fill: createCellValue(5),
    id: "Z",
    matrix: [
      [1, 1, 0],
      [0, 1, 1],
    ],
  },
};

export const ALL_PIECES: ReadonlyArray<PieceId> = [
  "I",
  "O",
  "T",
  "S",
  "Z",
  "J",
  "L",
];

export function isPieceId(u: unknown): u is PieceId {
  return typeof u === "string" && ALL_PIECES.some((id) => id === u);
}

// Reverse lookup for the renderer: locked cells only carry their fill value
export function pieceIdForFill(fill: number): PieceId | null {
  for (const id of ALL_PIECES) {
    if (PIECES[id].fill === fill) return id;
  }
  return null;
}
