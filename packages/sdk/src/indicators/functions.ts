import type { StrategyBar } from "../index.js";

import { indicator, type IndicatorSeries, type IndicatorValue } from "./types.js";

const assertPeriod = (label: string, period: number): void => {
  if (!Number.isInteger(period) || period < 1) {
    throw new RangeError(`${label} must be a positive integer, received ${period}`);
  }
};

const rolling = (
  values: IndicatorSeries,
  period: number,
  reduce: (window: ReadonlyArray<number>) => number,
): IndicatorValue[] => {
  const out: IndicatorValue[] = [];
  for (let i = 0; i < values.length; i += 1) {
    if (i < period - 1) {
      out.push(null);
      continue;
    }
    const window: number[] = [];
    for (let j = i - period + 1; j <= i; j += 1) {
      const value = values[j];
      if (value == null) {
        break;
      }
      window.push(value);
    }
    out.push(window.length === period ? reduce(window) : null);
  }
  return out;
};

const sum = (values: ReadonlyArray<number>): number =>
  values.reduce((acc, value) => acc + value, 0);

/**
 * Simple moving average. A window containing any missing value is missing.
 */
export const sma = indicator(
  "sma",
  (values: IndicatorSeries, period: number): IndicatorSeries => {
    assertPeriod("sma period", period);
    return rolling(values, period, (window) => sum(window) / period);
  },
  (period) => period,
);

/**
 * Exponential moving average with `alpha = 2 / (span + 1)`, seeded with the
 * first observation and undefined until `span` observations have been seen.
 * Leading missing values are skipped, so it can be layered on another
 * indicator.
 */
export const ema = indicator(
  "ema",
  (values: IndicatorSeries, span: number): IndicatorSeries => {
    assertPeriod("ema span", span);
    const alpha = 2 / (span + 1);
    const out: IndicatorValue[] = [];
    let state: number | null = null;
    let observations = 0;

    for (const value of values) {
      if (value == null) {
        out.push(null);
        continue;
      }
      state = state === null ? value : (1 - alpha) * state + alpha * value;
      observations += 1;
      out.push(observations >= span ? state : null);
    }
    return out;
  },
  (span) => span,
);

export const rollingMax = indicator(
  "max",
  (values: IndicatorSeries, period: number): IndicatorSeries => {
    assertPeriod("rolling max period", period);
    return rolling(values, period, (window) => Math.max(...window));
  },
  (period) => period,
);

export const rollingMin = indicator(
  "min",
  (values: IndicatorSeries, period: number): IndicatorSeries => {
    assertPeriod("rolling min period", period);
    return rolling(values, period, (window) => Math.min(...window));
  },
  (period) => period,
);

/** Passes a column through unchanged; useful as a crossover operand. */
export const price = indicator(
  "price",
  (values: ReadonlyArray<number>): IndicatorSeries => [...values],
);

/**
 * MACD line: fast EMA minus slow EMA.
 */
export const macdLine = indicator(
  "macd",
  (values: IndicatorSeries, fast: number, slow: number): IndicatorSeries => {
    const fastEma = ema(values, fast);
    const slowEma = ema(values, slow);
    return fastEma.map((value, index) => {
      const other = slowEma[index];
      return value == null || other == null ? null : value - other;
    });
  },
  (fast, slow) => Math.max(fast, slow),
);

const dualThrustRange = (window: ReadonlyArray<StrategyBar>): number => {
  const highestHigh = Math.max(...window.map((bar) => bar.high));
  const highestClose = Math.max(...window.map((bar) => bar.close));
  const lowestClose = Math.min(...window.map((bar) => bar.close));
  const lowestLow = Math.min(...window.map((bar) => bar.low));
  return Math.max(highestHigh - lowestClose, highestClose - lowestLow);
};

const dualThrustBound = (
  bars: ReadonlyArray<StrategyBar>,
  lookback: number,
  k: number,
  direction: 1 | -1,
): IndicatorSeries => {
  assertPeriod("dual thrust lookback", lookback);
  return bars.map((bar, index) => {
    if (index < lookback - 1) {
      return null;
    }
    const range = dualThrustRange(bars.slice(index - lookback + 1, index + 1));
    return bar.open + direction * k * range;
  });
};

/** Dual Thrust upper band: `open + k * range` over the lookback window. */
export const dualThrustUpper = indicator(
  "dt_upper",
  (input: ReadonlyArray<StrategyBar>, lookback: number, k: number): IndicatorSeries =>
    dualThrustBound(input, lookback, k, 1),
  (lookback) => lookback,
);

/** Dual Thrust lower band: `open - k * range` over the lookback window. */
export const dualThrustLower = indicator(
  "dt_lower",
  (input: ReadonlyArray<StrategyBar>, lookback: number, k: number): IndicatorSeries =>
    dualThrustBound(input, lookback, k, -1),
  (lookback) => lookback,
);
