import {
  clearCompletedLines,
  placeActivePiece,
  spawnPiece,
} from "../gameplay/spawn";

import type { DomainEvent } from "../events";
import type { GameState } from "../types";
import type { PhysicsSideEffects } from "./advance-physics";

function gameOver(
  state: GameState,
  events: Array<DomainEvent>,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  events.push({ kind: "TopOut", tick: state.tick });
  return { events, state: { ...state, piece: null, status: "gameOver" } };
}

/**
 * Lock -> clear lines -> spawn. Also spawns when no piece is active
 * (first tick after init). Any blocked spawn or lock above row 0 ends
 * the game.
 */
export function resolveTransitions(
  state: GameState,
  sideEffects: PhysicsSideEffects,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  const events: Array<DomainEvent> = [];
  let s = state;

  if (sideEffects.lockNow !== null && s.piece) {
    const placed = placeActivePiece(s);
    s = placed.state;
    if (placed.pieceId !== null) {
      events.push({
        kind: "Locked",
        pieceId: placed.pieceId,
        source: sideEffects.lockNow,
        tick: s.tick,
      });
    }

    const cleared = clearCompletedLines(s);
    if (cleared.rows.length > 0) {
      events.push({ kind: "LinesCleared", rows: cleared.rows, tick: s.tick });
      if (cleared.state.speed !== s.speed) {
        events.push({
          fromMs: s.speed,
          kind: "SpeedChanged",
          tick: s.tick,
          toMs: cleared.state.speed,
        });
      }
    }
    s = cleared.state;

    if (placed.lockedOut) return gameOver(s, events);
  }

  if (!s.piece) {
    const spawned = spawnPiece(s);
    if (spawned.topOut) return gameOver(s, events);
    s = spawned.state;
    if (spawned.spawnedId !== null) {
      events.push({
        kind: "PieceSpawned",
        pieceId: spawned.spawnedId,
        tick: s.tick,
      });
    }
  }

  return { events, state: s };
}
