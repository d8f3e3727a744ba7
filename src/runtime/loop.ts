import { NO_COMMAND } from "../engine/commands";
import { step as engineStep } from "../engine/index";
import { actionToCommand, isGameAction } from "../device/keys";

import type { InputAction } from "../device/keys";
import type { DomainEvent } from "../engine/events";
import type { GameState } from "../engine/types";
import type { SessionService, SessionStateName } from "../session/machine";

export type RuntimeTickOutput = Readonly<{
  engine: GameState;
  /** Engine domain events produced this tick. */
  events: ReadonlyArray<DomainEvent>;
  session: SessionStateName;
}>;

/**
 * One runtime tick:
 *  - session actions (pause, quit) go to the session machine,
 *  - while playing, at most one game action plus one gravity check hit the engine,
 *  - a top-out reported by the engine ends the session.
 * Nothing is stepped while paused or after the session ended.
 */
export function runtimeStep(
  engine: GameState,
  session: SessionService,
  action: InputAction | null,
  elapsedMs: number,
): RuntimeTickOutput {
  if (action === "Quit") {
    return { engine, events: [], session: session.send({ type: "QUIT" }) };
  }
  if (action === "Pause") {
    return { engine, events: [], session: session.togglePause() };
  }
  if (session.state !== "playing") {
    return { engine, events: [], session: session.state };
  }

  const cmd =
    action !== null && isGameAction(action)
      ? actionToCommand(action)
      : NO_COMMAND;
  const r = engineStep(engine, cmd, elapsedMs);

  const sessionState =
    r.state.status === "gameOver"
      ? session.send({ type: "TOP_OUT" })
      : session.state;

  return { engine: r.state, events: r.events, session: sessionState };
}
