import type { Keymap } from "./keys";

// readline key name -> InputAction
export const DEFAULT_TERMINAL_MAP: Keymap = new Map([
  // Arrows
  ["left", "MoveLeft"],
  ["right", "MoveRight"],
  ["down", "SoftDrop"],
  ["up", "Rotate"],
  ["space", "HardDrop"],

  // vi keys
  ["h", "MoveLeft"],
  ["l", "MoveRight"],
  ["j", "SoftDrop"],
  ["k", "Rotate"],

  // WASD
  ["a", "MoveLeft"],
  ["d", "MoveRight"],
  ["s", "SoftDrop"],
  ["w", "Rotate"],

  // Session
  ["p", "Pause"],
  ["q", "Quit"],
  ["escape", "Quit"],
  ["ctrl+c", "Quit"],
]);
