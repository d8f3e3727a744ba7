import { dropToBottom, occupiedCells } from "./core/grid";
import { pieceIdForFill } from "./core/pieces";

import type { ActivePiece, GameState, PieceId } from "./types";

// State helpers for UI branching
export const selectIsGameOver = (s: GameState): boolean =>
  s.status === "gameOver";

export const selectNextPiece = (s: GameState): PieceId | null =>
  s.queue[0] ?? null;

// Where the active piece would land
export function selectGhostPiece(s: GameState): ActivePiece | null {
  return s.piece ? dropToBottom(s.grid, s.piece) : null;
}

export type RenderCell =
  | { kind: "empty" }
  | { kind: "locked"; id: PieceId | null }
  | { kind: "ghost"; id: PieceId }
  | { kind: "active"; id: PieceId };

/**
 * Grid cells as the renderer should draw them: locked cells, then the
 * ghost, then the active piece on top. Cells above row 0 are not shown.
 */
export function selectRenderCells(
  s: GameState,
  opts: { ghost?: boolean } = {},
): ReadonlyArray<ReadonlyArray<RenderCell>> {
  const rows: Array<Array<RenderCell>> = s.grid.map((row) =>
    row.map(
      (v): RenderCell =>
        v === 0 ? { kind: "empty" } : { id: pieceIdForFill(v), kind: "locked" },
    ),
  );

  const paint = (piece: ActivePiece, kind: "ghost" | "active"): void => {
    for (const [x, y] of occupiedCells(piece.matrix, piece)) {
      const row = rows[y];
      if (row === undefined || x < 0 || x >= row.length) continue;
      row[x] = { id: piece.id, kind };
    }
  };

  if (opts.ghost !== false) {
    const ghost = selectGhostPiece(s);
    if (ghost) paint(ghost, "ghost");
  }
  if (s.piece) paint(s.piece, "active");
  return rows;
}
