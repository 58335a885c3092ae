import type { Decision, PositionSide, StrategyBar } from "../index.js";
import type {
  IndicatorHandle,
  IndicatorRegistry,
  IndicatorSeries,
  IndicatorValue,
} from "../indicators/types.js";

/**
 * Read-only view handed to {@link Strategy.next}. Everything in it is bounded
 * by the current step; there is no way to reach a later bar.
 */
export interface StrategyContext {
  readonly symbol: string;
  readonly step: number;
  /** Bars `0..step`. */
  readonly bars: ReadonlyArray<StrategyBar>;
  readonly bar: StrategyBar;
  readonly position: PositionSide;
  /** Indicator value at `step` (defaults to the current step). */
  value(handle: IndicatorHandle, step?: number): IndicatorValue;
  series(handle: IndicatorHandle): IndicatorSeries;
  /** True when `a` crossed above `b` at the current step. */
  crossover(a: IndicatorHandle, b: IndicatorHandle): boolean;
}

export interface Strategy {
  readonly name: string;
  readonly params: Readonly<Record<string, unknown>>;
  /** Called once before the first step. */
  setIndicators(indicators: IndicatorRegistry): void;
  /** Called once per bar; must return exactly one decision. */
  next(step: number, context: StrategyContext): Decision;
}

export type StrategyFactory<P> = (params: P) => Strategy;
