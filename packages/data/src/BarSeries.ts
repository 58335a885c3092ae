import {
  BarRowSchema,
  EmptySeriesError,
  formatIssues,
  MalformedDataError,
  type ISODate,
  type PriceField,
  type StrategyBar,
} from "@steptrade/sdk";

export interface LoadBarSeriesOptions {
  /** Fewer rows than this raises {@link EmptySeriesError}. Defaults to 1. */
  readonly minLength?: number;
  readonly symbol?: string;
}

const DEFAULT_SYMBOL = "primary";

/**
 * Immutable, strictly time-ordered OHLCV bars. Safe to share across runs.
 */
export class BarSeries {
  public readonly symbol: string;
  private readonly bars: ReadonlyArray<StrategyBar>;

  private constructor(bars: ReadonlyArray<StrategyBar>, symbol: string) {
    this.bars = Object.freeze(bars);
    this.symbol = symbol;
  }

  /** Builds a series from rows that {@link validateRows} already accepted. */
  public static fromValidated(bars: ReadonlyArray<StrategyBar>, symbol = DEFAULT_SYMBOL): BarSeries {
    return new BarSeries(bars.map((bar) => Object.freeze({ ...bar })), symbol);
  }

  public get length(): number {
    return this.bars.length;
  }

  public get start(): ISODate {
    return this.at(0).timestamp;
  }

  public get end(): ISODate {
    return this.at(this.bars.length - 1).timestamp;
  }

  public at(index: number): StrategyBar {
    this.assertIndex(index);
    return this.bars[index];
  }

  /**
   * Bars `0..uptoIndex` inclusive. Nothing after `uptoIndex` is reachable
   * through the returned array.
   */
  public window(uptoIndex: number): ReadonlyArray<StrategyBar> {
    this.assertIndex(uptoIndex);
    return Object.freeze(this.bars.slice(0, uptoIndex + 1));
  }

  public column(field: PriceField, uptoIndex: number): ReadonlyArray<number> {
    return this.window(uptoIndex).map((bar) => bar[field]);
  }

  public toArray(): ReadonlyArray<StrategyBar> {
    return this.bars;
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.bars.length) {
      throw new RangeError(`Bar index ${index} outside [0, ${this.bars.length})`);
    }
  }
}

const checkPrices = (bar: StrategyBar, index: number): void => {
  const { open, high, low, close, volume } = bar;
  if (open <= 0 || high <= 0 || low <= 0 || close <= 0) {
    throw new MalformedDataError(`Bar ${index} (${bar.timestamp}) has a non-positive price`, {
      index,
    });
  }
  if (volume < 0) {
    throw new MalformedDataError(`Bar ${index} (${bar.timestamp}) has negative volume`, { index });
  }
  if (high < Math.max(open, close)) {
    throw new MalformedDataError(
      `Bar ${index} (${bar.timestamp}) has high ${high} below max(open, close)`,
      { index },
    );
  }
  if (low > Math.min(open, close)) {
    throw new MalformedDataError(
      `Bar ${index} (${bar.timestamp}) has low ${low} above min(open, close)`,
      { index },
    );
  }
};

/**
 * Checks shape, OHLC consistency and strictly increasing timestamps.
 *
 * @throws MalformedDataError naming the first offending row.
 */
export const validateRows = (rows: ReadonlyArray<unknown>): StrategyBar[] => {
  const bars: StrategyBar[] = [];
  let previousEpoch = Number.NEGATIVE_INFINITY;

  rows.forEach((row, index) => {
    const parsed = BarRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new MalformedDataError(`Bar ${index} is invalid: ${formatIssues(parsed.error).join("; ")}`, {
        index,
      });
    }
    const bar = parsed.data;
    checkPrices(bar, index);

    const epoch = Date.parse(bar.timestamp);
    if (Number.isNaN(epoch)) {
      throw new MalformedDataError(`Bar ${index} has an unparseable timestamp "${bar.timestamp}"`, {
        index,
      });
    }
    if (epoch === previousEpoch) {
      throw new MalformedDataError(`Bar ${index} duplicates timestamp ${bar.timestamp}`, { index });
    }
    if (epoch < previousEpoch) {
      throw new MalformedDataError(`Bar ${index} (${bar.timestamp}) is earlier than bar ${index - 1}`, {
        index,
      });
    }
    previousEpoch = epoch;
    bars.push(bar);
  });

  return bars;
};

/**
 * Validates raw rows from a data collaborator and wraps them in a
 * {@link BarSeries}.
 */
export const loadBarSeries = (
  rows: ReadonlyArray<unknown>,
  options: LoadBarSeriesOptions = {},
): BarSeries => {
  const minLength = Math.max(options.minLength ?? 1, 1);
  const bars = validateRows(rows);
  if (bars.length < minLength) {
    throw new EmptySeriesError(bars.length, minLength);
  }
  return BarSeries.fromValidated(bars, options.symbol);
};
