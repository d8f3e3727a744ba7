import { gravityStep } from "../physics/gravity";

import type { DomainEvent } from "../events";
import type { GameState } from "../types";
import type { CommandSideEffects, LockSource } from "./apply-commands";

export type PhysicsSideEffects = {
  lockNow: LockSource | null;
};

/**
 * Gravity runs only when the command did not already end the fall.
 */
export function advancePhysics(
  state: GameState,
  elapsedMs: number,
  sideEffects: CommandSideEffects,
): {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
  sideEffects: PhysicsSideEffects;
} {
  if (sideEffects.lockRequested !== null) {
    return {
      events: [],
      sideEffects: { lockNow: sideEffects.lockRequested },
      state,
    };
  }

  const g = gravityStep(state, elapsedMs);
  const events: Array<DomainEvent> = g.fell
    ? [{ dx: 0, dy: 1, kind: "Moved", tick: state.tick }]
    : [];
  return {
    events,
    sideEffects: { lockNow: g.blocked ? "gravity" : null },
    state: g.state,
  };
}
