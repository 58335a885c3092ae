import type { IndicatorSeries } from "./indicators/types.js";

/**
 * Returns true when `a` has just crossed above `b` at `step`:
 * `a[step-1] <= b[step-1]` and `a[step] > b[step]`.
 *
 * A missing value (warm-up `null`, or an index past either series) on
 * either side, at either step, never counts as a crossing.
 */
export const crossover = (a: IndicatorSeries, b: IndicatorSeries, step: number): boolean => {
  if (!Number.isInteger(step) || step <= 0) {
    return false;
  }
  if (step >= a.length || step >= b.length) {
    return false;
  }

  const prevA = a[step - 1];
  const prevB = b[step - 1];
  const currA = a[step];
  const currB = b[step];
  if (prevA == null || prevB == null || currA == null || currB == null) {
    return false;
  }

  return prevA <= prevB && currA > currB;
};
