export type Command =
  | { kind: "MoveLeft" }
  | { kind: "MoveRight" }
  | { kind: "SoftDrop" }
  | { kind: "HardDrop" }
  | { kind: "Rotate" }
  | { kind: "Quit" }
  | { kind: "None" };

export const NO_COMMAND: Command = { kind: "None" };
