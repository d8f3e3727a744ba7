import type { PieceId, Tick } from "./types";

export type DomainEvent =
  | { kind: "PieceSpawned"; pieceId: PieceId; tick: Tick }
  | { kind: "Moved"; dx: number; dy: number; tick: Tick }
  | { kind: "Rotated"; pieceId: PieceId; tick: Tick }
  | {
      kind: "Locked";
      source: "gravity" | "softDrop" | "hardDrop";
      pieceId: PieceId;
      tick: Tick;
    }
  | { kind: "LinesCleared"; rows: ReadonlyArray<number>; tick: Tick }
  | { kind: "SpeedChanged"; fromMs: number; toMs: number; tick: Tick }
  | { kind: "TopOut"; tick: Tick };
