import type { PieceId } from "../types";

/**
 * Source of upcoming pieces. Implementations are immutable: every draw
 * returns the piece together with the generator to use for the next draw.
 */
export type PieceRandomGenerator = {
  getNextPiece(): { piece: PieceId; newRng: PieceRandomGenerator };

  // Preview queue refill
  getNextPieces(count: number): {
    pieces: ReadonlyArray<PieceId>;
    newRng: PieceRandomGenerator;
  };
};

export function drawPieces(
  rng: PieceRandomGenerator,
  count: number,
): { pieces: ReadonlyArray<PieceId>; newRng: PieceRandomGenerator } {
  const pieces: Array<PieceId> = [];
  let current = rng;
  for (let i = 0; i < count; i++) {
    const r = current.getNextPiece();
    pieces.push(r.piece);
    current = r.newRng;
  }
  return { newRng: current, pieces };
}
