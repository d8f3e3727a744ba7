import { ALL_PIECES } from "../pieces";

import { drawPieces, type PieceRandomGenerator } from "./interface";

import type { PieceId } from "../types";

// FNV-1a, 32-bit
export function hashSeed(seed: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < seed.length; i++) {
    h ^= seed.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

// Linear congruential step, kept in unsigned 32-bit range
function nextRandom(state: number): number {
  return (Math.imul(state, 1664525) + 1013904223) >>> 0;
}

function shuffleBag(state: number): {
  bag: ReadonlyArray<PieceId>;
  nextState: number;
} {
  const bag = [...ALL_PIECES];
  let s = state;
  for (let i = bag.length - 1; i > 0; i--) {
    s = nextRandom(s);
    // high bits mapped to [0, i]
    const j = Math.floor((s / 4294967296) * (i + 1));
    const a = bag[i];
    const b = bag[j];
    if (a === undefined || b === undefined) throw new Error("Bag corrupted");
    bag[i] = b;
    bag[j] = a;
  }
  return { bag, nextState: s };
}

/**
 * 7-bag generator: every run of seven draws contains each piece once.
 * The same seed always produces the same order.
 */
export class SevenBagRng implements PieceRandomGenerator {
  private constructor(
    private readonly state: number,
    private readonly bag: ReadonlyArray<PieceId>,
    private readonly bagIndex: number,
  ) {}

  static fromSeed(seed: string): SevenBagRng {
    return new SevenBagRng(hashSeed(seed), [], 0);
  }

  getNextPiece(): { piece: PieceId; newRng: PieceRandomGenerator } {
    let { bag, bagIndex, state } = this;
    if (bagIndex >= bag.length) {
      const shuffled = shuffleBag(state);
      bag = shuffled.bag;
      state = shuffled.nextState;
      bagIndex = 0;
    }
    const piece = bag[bagIndex];
    if (piece === undefined) throw new Error("Bag is empty or corrupted");
    return { newRng: new SevenBagRng(state, bag, bagIndex + 1), piece };
  }

  getNextPieces(count: number): {
    pieces: ReadonlyArray<PieceId>;
    newRng: PieceRandomGenerator;
  } {
    return drawPieces(this, count);
  }
}

export function createSevenBagRng(seed = "default"): PieceRandomGenerator {
  return SevenBagRng.fromSeed(seed);
}
