import { createEmptyGrid } from "./core/grid";
import { type PieceRandomGenerator } from "./core/rng/interface";
import { createSevenBagRng } from "./core/rng/seeded";
import {
  type ActivePiece,
  type Grid,
  type PieceId,
} from "./core/types";
import { type SpeedPolicy, speedForScore } from "./scoring/speed";
import { asTick } from "./utils/tick";

export * from "./core/types";
export type Tick = number & { readonly brand: "Tick" };

export { type PieceRandomGenerator } from "./core/rng/interface";
export { type SpeedPolicy } from "./scoring/speed";

export type EngineConfig = Readonly<{
  previewCount: number;
  speed: SpeedPolicy;
  rngSeed: string;
  /** Overrides the seeded 7-bag, e.g. a SequenceRng. */
  rng?: PieceRandomGenerator;
}>;

export type GameStatus = "playing" | "gameOver";

export type GameState = {
  readonly cfg: EngineConfig;
  readonly grid: Grid;
  readonly piece: ActivePiece | null;
  readonly queue: ReadonlyArray<PieceId>;
  readonly rng: PieceRandomGenerator;
  readonly score: number;
  readonly linesCleared: number;
  readonly piecesPlaced: number;
  /** Gravity interval in ms for the current score. */
  readonly speed: number;
  readonly gravityAccumMs: number;
  readonly status: GameStatus;
  readonly tick: Tick;
};

// Empty grid, filled preview queue, no active piece yet
export function mkInitialState(cfg: EngineConfig): GameState {
  const rng = cfg.rng ?? createSevenBagRng(cfg.rngSeed);
  const queueResult = rng.getNextPieces(Math.max(1, cfg.previewCount));

  return {
    cfg,
    gravityAccumMs: 0,
    grid: createEmptyGrid(),
    linesCleared: 0,
    piece: null,
    piecesPlaced: 0,
    queue: queueResult.pieces,
    rng: queueResult.newRng,
    score: 0,
    speed: speedForScore(0, cfg.speed),
    status: "playing",
    tick: asTick(0),
  };
}
