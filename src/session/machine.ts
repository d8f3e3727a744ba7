/*
 * Session lifecycle machine (robot3).
 *
 * playing --PAUSE--> paused --RESUME--> playing
 * playing --TOP_OUT--> over
 * playing|paused --QUIT--> over
 *
 * The machine only tracks the lifecycle. Grid, piece and score live in the
 * engine GameState; the runtime consults the session before stepping it.
 */

import { createMachine, interpret, reduce, state, transition } from "robot3";

import type {
  Machine,
  MachineState,
  MachineStates,
  Service,
  Transition,
} from "robot3";

export type SessionStateName = "playing" | "paused" | "over";

export type SessionEndReason = "topOut" | "quit";

export type SessionContext = {
  endReason: SessionEndReason | null;
};

export type SessionEvent =
  | { type: "PAUSE" }
  | { type: "RESUME" }
  | { type: "TOP_OUT" }
  | { type: "QUIT" };

type SessionEventType = SessionEvent["type"];

const endWith =
  (reason: SessionEndReason) =>
  (ctx: SessionContext, _event: SessionEvent): SessionContext => ({
    ...ctx,
    endReason: reason,
  });

// Explicit type argument: state() otherwise infers T from the first transition
const createPlayingState = (): MachineState<SessionEventType> =>
  state<Transition<SessionEventType>>(
    transition("PAUSE", "paused"),
    transition("TOP_OUT", "over", reduce(endWith("topOut"))),
    transition("QUIT", "over", reduce(endWith("quit"))),
  );

const createPausedState = (): MachineState<SessionEventType> =>
  state<Transition<SessionEventType>>(
    transition("RESUME", "playing"),
    transition("QUIT", "over", reduce(endWith("quit"))),
  );

// Final: no transitions out
const createOverState = (): MachineState<SessionEventType> => state();

type SessionStatesObject = Record<SessionStateName, MachineState<SessionEventType>>;
export type SessionMachine = Machine<
  SessionStatesObject,
  SessionContext,
  SessionStateName,
  SessionEventType
>;

export const createSessionMachine = (): SessionMachine => {
  const states = {
    over: createOverState(),
    paused: createPausedState(),
    playing: createPlayingState(),
  } as const;

  // robot3's return type widens the event type to `string`; cast back to
  // keep the state/event unions at this module's boundary.
  return createMachine(
    "playing" as const,
    states as unknown as MachineStates<SessionStatesObject, SessionEventType>,
    (): SessionContext => ({ endReason: null }),
  ) as unknown as SessionMachine;
};

/**
 * Thin wrapper around the robot3 service with a typed snapshot of the
 * current state name.
 */
export class SessionService {
  private readonly service: Service<SessionMachine>;
  private currentStateName: SessionStateName = "playing";

  constructor(private readonly onChange?: (name: SessionStateName) => void) {
    this.service = interpret(createSessionMachine(), (service) => {
      this.currentStateName = service.machine.state.name;
      this.onChange?.(this.currentStateName);
    });
  }

  send(event: SessionEvent): SessionStateName {
    this.service.send(event);
    return this.currentStateName;
  }

  get state(): SessionStateName {
    return this.currentStateName;
  }

  get endReason(): SessionEndReason | null {
    return this.service.context.endReason;
  }

  get isOver(): boolean {
    return this.currentStateName === "over";
  }

  togglePause(): SessionStateName {
    if (this.currentStateName === "playing") return this.send({ type: "PAUSE" });
    if (this.currentStateName === "paused") return this.send({ type: "RESUME" });
    return this.currentStateName;
  }
}
