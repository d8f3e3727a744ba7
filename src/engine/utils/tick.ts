import type { Tick } from "../types";

/**
 * Converts a raw number to a branded Tick.
 * Only for system boundaries (initialization, tests).
 */
export function asTick(n: number): Tick {
  if (!Number.isInteger(n) || n < 0) {
    throw new Error("Tick must be a non-negative integer");
  }
  return n as Tick;
}

/**
 * Increments a tick by 1. Used for advancing time in the engine.
 */
export function incrementTick(tick: Tick): Tick {
  return (tick + 1) as Tick;
}
