import type { MatrixCell, PieceMatrix } from "./types";

export type RotationDirection = "CW" | "CCW";

// Rows become columns
export function transpose(matrix: PieceMatrix): PieceMatrix {
  const rows = matrix.length;
  const cols = matrix[0]?.length ?? 0;
  const out: Array<Array<MatrixCell>> = [];
  for (let c = 0; c < cols; c++) {
    const row: Array<MatrixCell> = [];
    for (let r = 0; r < rows; r++) {
      row.push(matrix[r]?.[c] ?? 0);
    }
    out.push(row);
  }
  return out;
}

/**
 * Rotate a piece matrix by 90 degrees.
 * CW: transpose, then reverse each row.
 * CCW: transpose, then reverse the order of rows.
 * Four rotations in the same direction return the original matrix.
 */
export function rotateMatrix(
  matrix: PieceMatrix,
  direction: RotationDirection = "CW",
): PieceMatrix {
  const t = transpose(matrix);
  if (direction === "CW") {
    return t.map((row) => [...row].reverse());
  }
  return [...t].reverse();
}

export function matricesEqual(a: PieceMatrix, b: PieceMatrix): boolean {
  if (a.length !== b.length) return false;
  return a.every((row, r) => {
    const other = b[r];
    return (
      other !== undefined &&
      row.length === other.length &&
      row.every((cell, c) => cell === other[c])
    );
  });
}
