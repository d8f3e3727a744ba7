import { drawPieces, type PieceRandomGenerator } from "./interface";

import type { PieceId } from "../types";

/**
 * Sequential generator: yields a fixed order and wraps around.
 */
export class SequenceRng implements PieceRandomGenerator {
  constructor(
    private readonly sequence: ReadonlyArray<PieceId>,
    private readonly index = 0,
  ) {
    if (sequence.length === 0) throw new Error("Sequence must not be empty");
  }

  getNextPiece(): { piece: PieceId; newRng: PieceRandomGenerator } {
    const piece = this.sequence[this.index % this.sequence.length];
    if (piece === undefined) throw new Error("Sequence index out of bounds");
    return {
      newRng: new SequenceRng(
        this.sequence,
        (this.index + 1) % this.sequence.length,
      ),
      piece,
    };
  }

  getNextPieces(count: number): {
    pieces: ReadonlyArray<PieceId>;
    newRng: PieceRandomGenerator;
  } {
    return drawPieces(this, count);
  }
}
