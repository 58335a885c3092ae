import type { Decision } from "../index.js";
import { crossover } from "../crossover.js";
import type { IndicatorRegistry } from "../indicators/types.js";

import type { Strategy, StrategyContext } from "./types.js";

/**
 * Base class for strategies. Subclasses declare indicators in
 * `setIndicators` and decide in `next`.
 *
 * `long`, `short`, `close` and `hold` only build requests; the runner owns
 * the position. Strategies must not mutate bars, indicator values or the
 * context they are given.
 */
export abstract class StrategyBase<P extends Record<string, unknown> = Record<string, never>>
  implements Strategy
{
  public static readonly crossover = crossover;

  public abstract readonly name: string;
  public readonly params: Readonly<P>;

  public constructor(params: P) {
    this.params = Object.freeze({ ...params });
  }

  public abstract setIndicators(indicators: IndicatorRegistry): void;

  public abstract next(step: number, context: StrategyContext): Decision;

  public long(): Decision {
    return "long";
  }

  public short(): Decision {
    return "short";
  }

  public close(): Decision {
    return "close";
  }

  public hold(): Decision {
    return "hold";
  }

  /** Unwraps state that `setIndicators` is expected to have filled in. */
  protected ready<T>(value: T | undefined): T {
    if (value === undefined) {
      throw new Error(`${this.name}: next() called before setIndicators()`);
    }
    return value;
  }
}
