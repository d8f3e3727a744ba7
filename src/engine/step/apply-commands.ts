import {
  tryHardDrop,
  tryMoveDown,
  tryMoveLeft,
  tryMoveRight,
  tryRotate,
} from "../gameplay/movement";

import type { Command } from "../commands";
import type { DomainEvent } from "../events";
import type { GameState } from "../types";

export type LockSource = "gravity" | "softDrop" | "hardDrop";

export type CommandSideEffects = {
  /** Set when the command itself ended the piece's fall. */
  lockRequested: LockSource | null;
};

type CommandResult = {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
  sideEffects: CommandSideEffects;
};

function createCommandResult(opts: {
  state: GameState;
  events?: ReadonlyArray<DomainEvent>;
  lockRequested?: LockSource;
}): CommandResult {
  return {
    events: opts.events ?? [],
    sideEffects: { lockRequested: opts.lockRequested ?? null },
    state: opts.state,
  };
}

function handleShift(state: GameState, dx: -1 | 1): CommandResult {
  const r = dx < 0 ? tryMoveLeft(state) : tryMoveRight(state);
  if (!r.moved) return createCommandResult({ state });
  return createCommandResult({
    events: [{ dx, dy: 0, kind: "Moved", tick: state.tick }],
    state: r.state,
  });
}

/**
 * Soft drop is one downward move. When it is blocked the piece locks.
 */
function handleSoftDrop(state: GameState): CommandResult {
  if (!state.piece) return createCommandResult({ state });
  const r = tryMoveDown(state);
  if (!r.moved) {
    return createCommandResult({ lockRequested: "softDrop", state });
  }
  return createCommandResult({
    events: [{ dx: 0, dy: 1, kind: "Moved", tick: state.tick }],
    state: r.state,
  });
}

function handleHardDrop(state: GameState): CommandResult {
  const r = tryHardDrop(state);
  if (!r.hardDropped) return createCommandResult({ state });
  return createCommandResult({ lockRequested: "hardDrop", state: r.state });
}

function handleRotate(state: GameState): CommandResult {
  const r = tryRotate(state, "CW");
  if (!r.rotated || !r.state.piece) return createCommandResult({ state });
  return createCommandResult({
    events: [{ kind: "Rotated", pieceId: r.state.piece.id, tick: state.tick }],
    state: r.state,
  });
}

/**
 * Apply at most one input command. Quit is handled by the session,
 * so the engine treats it like None.
 */
export function applyCommand(state: GameState, cmd: Command): CommandResult {
  switch (cmd.kind) {
    case "MoveLeft":
      return handleShift(state, -1);
    case "MoveRight":
      return handleShift(state, 1);
    case "SoftDrop":
      return handleSoftDrop(state);
    case "HardDrop":
      return handleHardDrop(state);
    case "Rotate":
      return handleRotate(state);
    case "Quit":
    case "None":
      return createCommandResult({ state });
  }
}
