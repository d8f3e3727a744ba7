import { NO_COMMAND, type Command } from "./commands";
import { applyCommand } from "./step/apply-commands";
import { advancePhysics } from "./step/advance-physics";
import { resolveTransitions } from "./step/resolve-transitions";
import { mkInitialState } from "./types";
import { incrementTick } from "./utils/tick";

import type { DomainEvent } from "./events";
import type { EngineConfig, GameState } from "./types";

/**
 * Create a session and spawn its first piece.
 */
export function init(cfg: EngineConfig): {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
} {
  return resolveTransitions(mkInitialState(cfg), { lockNow: null });
}

/**
 * One tick: at most one command, then one gravity check for `elapsedMs`,
 * then lock/clear/spawn. A finished game is returned unchanged.
 */
export function step(
  state: GameState,
  cmd: Command = NO_COMMAND,
  elapsedMs = 0,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  if (state.status === "gameOver") return { events: [], state };

  const a = applyCommand(state, cmd);
  const b = advancePhysics(a.state, elapsedMs, a.sideEffects);
  const c = resolveTransitions(b.state, b.sideEffects);
  const events = [...a.events, ...b.events, ...c.events];

  return { events, state: { ...c.state, tick: incrementTick(c.state.tick) } };
}

/**
 * Run several ticks, one command each.
 */
export function stepN(
  state: GameState,
  cmds: ReadonlyArray<Command>,
  elapsedMs = 0,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  let s = state;
  const all: Array<DomainEvent> = [];
  for (const cmd of cmds) {
    const r = step(s, cmd, elapsedMs);
    s = r.state;
    all.push(...r.events);
  }
  return { events: all, state: s };
}
