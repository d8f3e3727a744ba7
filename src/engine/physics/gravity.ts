import { tryMoveDown } from "../gameplay/movement";

import type { GameState } from "../types";

/**
 * Accumulate elapsed time and make at most one downward move once the
 * current speed interval is reached. `blocked` reports a due move that
 * could not happen, which means the piece has landed.
 */
export function gravityStep(
  state: GameState,
  elapsedMs: number,
): { state: GameState; fell: boolean; blocked: boolean } {
  if (!state.piece) return { blocked: false, fell: false, state };

  const accum = state.gravityAccumMs + Math.max(0, elapsedMs);
  if (accum < state.speed) {
    return { blocked: false, fell: false, state: { ...state, gravityAccumMs: accum } };
  }

  // Carry at most one interval so a long stall does not queue several drops
  const nextAccum = Math.min(accum - state.speed, state.speed);
  const r = tryMoveDown(state);
  return {
    blocked: !r.moved,
    fell: r.moved,
    state: { ...r.state, gravityAccumMs: nextAccum },
  };
}
