import type { Command } from "../engine/commands";

// Engine-bound actions
export type GameAction =
  | "MoveLeft"
  | "MoveRight"
  | "SoftDrop"
  | "HardDrop"
  | "Rotate";

// Session-bound actions, never reach the engine as movement
export type SessionAction = "Pause" | "Quit";

export type InputAction = GameAction | SessionAction;

// Shape of node:readline keypress info; every field may be missing
export type KeyPress = Readonly<{
  name?: string | undefined;
  ctrl?: boolean | undefined;
  meta?: boolean | undefined;
  shift?: boolean | undefined;
  sequence?: string | undefined;
}>;

// Keymap maps key ids ("left", "space", "ctrl+c", "q") to logical actions
export type Keymap = Readonly<Map<string, InputAction>>;

/**
 * Normalise a keypress to the id used in keymaps. Letters are lower-cased
 * so caps lock does not change bindings.
 */
export function keyId(key: KeyPress): string | null {
  const name = key.name ?? key.sequence;
  if (name === undefined || name === "") return null;
  const base = name.length === 1 ? name.toLowerCase() : name;
  return key.ctrl === true ? `ctrl+${base}` : base;
}

export function isGameAction(a: InputAction): a is GameAction {
  return a !== "Pause" && a !== "Quit";
}

export function actionToCommand(action: GameAction): Command {
  return { kind: action };
}
