import { emitKeypressEvents } from "node:readline";

import { debugLog } from "../utils/debug";

import { DEFAULT_TERMINAL_MAP } from "./default-keymaps";
import { keyId, type InputAction, type KeyPress, type Keymap } from "./keys";

// The subset of a TTY read stream the driver touches
export type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export type DeviceDriver = {
  /** Begin listening to the terminal (impure). */
  start: () => void;
  /** Stop listening and restore the terminal (impure). */
  stop: () => void;
  /**
   * Take the oldest buffered action, or null. The loop calls this once
   * per tick, so each tick sees at most one action.
   */
  drainAction: () => InputAction | null;
};

export const MAX_BUFFERED_ACTIONS = 8 as const;

export function createTerminalDriver(opts: {
  input: KeyInput;
  keymap?: Keymap;
  /** Skip readline's keypress decoding (tests emit keypress directly). */
  decodeKeypress?: boolean;
}): DeviceDriver {
  const keymap = opts.keymap ?? DEFAULT_TERMINAL_MAP;
  const input = opts.input;
  const buffer: Array<InputAction> = [];

  const onKeypress = (_str: string | undefined, key: KeyPress | undefined): void => {
    if (!key) return;
    const id = keyId(key);
    if (id === null) return;
    const action = keymap.get(id);
    if (action === undefined) return;
    // Quit always gets through, even when the buffer is full
    if (action === "Quit") {
      buffer.unshift(action);
    } else if (buffer.length < MAX_BUFFERED_ACTIONS) {
      buffer.push(action);
    }
    debugLog("input", `key ${id} -> ${action}`);
  };

  return {
    drainAction: () => buffer.shift() ?? null,
    start: () => {
      if (opts.decodeKeypress !== false) emitKeypressEvents(input);
      if (input.isTTY === true) input.setRawMode?.(true);
      input.on("keypress", onKeypress);
      input.resume();
    },
    stop: () => {
      input.off("keypress", onKeypress);
      if (input.isTTY === true) input.setRawMode?.(false);
      input.pause();
      buffer.length = 0;
    },
  };
}
