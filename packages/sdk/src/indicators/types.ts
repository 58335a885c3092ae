import type { PriceField, StrategyBar } from "../index.js";

/** An indicator reading; `null` marks warm-up or otherwise missing data. */
export type IndicatorValue = number | null;

export type IndicatorSeries = ReadonlyArray<IndicatorValue>;

/**
 * Reference to a registered indicator. Values are read through the engine.
 */
export interface IndicatorHandle {
  readonly id: number;
  readonly name: string;
  /** Bars needed before the first defined value. */
  readonly warmup: number;
}

/** What a source selector can see: the visible bars and earlier indicators. */
export interface SourceView {
  readonly bars: ReadonlyArray<StrategyBar>;
  values(handle: IndicatorHandle): IndicatorSeries;
}

export interface SourceSelector<S> {
  (view: SourceView): S;
  readonly label: string;
  /** Warm-up already carried by the source (1 for raw bar data). */
  readonly warmup: number;
}

export interface IndicatorFunction<S, P extends unknown[]> {
  (input: S, ...params: P): IndicatorSeries;
  readonly indicatorName?: string;
  readonly warmup?: (...params: P) => number;
}

/**
 * Registry a strategy declares its indicators against.
 */
export interface IndicatorRegistry {
  define<S, P extends unknown[]>(
    fn: IndicatorFunction<S, P>,
    source: SourceSelector<S>,
    ...params: P
  ): IndicatorHandle;
}

/**
 * Attaches a display name and a warm-up rule to an indicator function.
 */
export const indicator = <S, P extends unknown[]>(
  name: string,
  compute: (input: S, ...params: P) => IndicatorSeries,
  warmup?: (...params: P) => number,
): IndicatorFunction<S, P> => Object.assign(compute, { indicatorName: name, warmup });

const selector = <S>(
  read: (view: SourceView) => S,
  label: string,
  warmup: number,
): SourceSelector<S> => Object.assign(read, { label, warmup });

const FIELD_LABELS: Record<PriceField, string> = {
  open: "o",
  high: "h",
  low: "l",
  close: "c",
  volume: "v",
};

/** Selects one numeric column of the visible bars. */
export const column = (field: PriceField): SourceSelector<ReadonlyArray<number>> =>
  selector((view) => view.bars.map((bar) => bar[field]), FIELD_LABELS[field], 1);

/** Selects the visible bars themselves. */
export const bars: SourceSelector<ReadonlyArray<StrategyBar>> = selector(
  (view) => view.bars,
  "bars",
  1,
);

/** Selects the values of an indicator defined earlier. */
export const ref = (handle: IndicatorHandle): SourceSelector<IndicatorSeries> =>
  selector((view) => view.values(handle), handle.name, handle.warmup);

/** Maps non-finite numbers and absent values to `null`. */
export const toIndicatorValue = (value: unknown): IndicatorValue =>
  typeof value === "number" && Number.isFinite(value) ? value : null;
