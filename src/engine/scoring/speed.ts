export type SpeedPolicy = Readonly<{
  /** Gravity interval at score 0. */
  baseMs: number;
  /** Interval removed each time the score crosses a threshold. */
  stepMs: number;
  /** Points per speed step. */
  threshold: number;
  /** Floor for the interval. */
  minMs: number;
}>;

export const DEFAULT_SPEED_POLICY: SpeedPolicy = {
  baseMs: 500,
  minMs: 100,
  stepMs: 50,
  threshold: 10,
};

/**
 * Gravity interval for a score: a non-increasing step function, one step
 * every `threshold` points, clamped at `minMs`.
 */
export function speedForScore(
  score: number,
  policy: SpeedPolicy = DEFAULT_SPEED_POLICY,
): number {
  const steps = Math.floor(Math.max(0, score) / Math.max(1, policy.threshold));
  return Math.max(policy.minMs, policy.baseMs - steps * policy.stepMs);
}
