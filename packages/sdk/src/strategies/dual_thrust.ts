import { z } from "zod";

import type { Decision } from "../index.js";
import { dualThrustLower, dualThrustUpper, price } from "../indicators/functions.js";
import {
  bars,
  column,
  type IndicatorHandle,
  type IndicatorRegistry,
} from "../indicators/types.js";

import { StrategyBase } from "./base.js";
import type { StrategyContext, StrategyFactory } from "./types.js";

export const name = "dual_thrust" as const;

export const schema = z.object({
  lookback: z.number().int().min(1),
  k1: z.number().positive(),
  k2: z.number().positive(),
});

export type DualThrustParams = z.infer<typeof schema>;

interface DualThrustHandles {
  readonly close: IndicatorHandle;
  readonly upper: IndicatorHandle;
  readonly lower: IndicatorHandle;
}

/**
 * Range breakout. Close above the upper band goes long, falling back under
 * it exits, and close below the lower band goes short.
 */
export class DualThrustStrategy extends StrategyBase<DualThrustParams> {
  public readonly name = name;

  private handles?: DualThrustHandles;

  public setIndicators(indicators: IndicatorRegistry): void {
    const { lookback, k1, k2 } = this.params;
    this.handles = {
      upper: indicators.define(dualThrustUpper, bars, lookback, k1),
      close: indicators.define(price, column("close")),
      lower: indicators.define(dualThrustLower, bars, lookback, k2),
    };
  }

  public next(_step: number, context: StrategyContext): Decision {
    const { close, upper, lower } = this.ready(this.handles);

    if (context.crossover(close, upper)) {
      return this.long();
    }
    if (context.crossover(upper, close)) {
      return this.close();
    }
    if (context.crossover(lower, close)) {
      return this.short();
    }
    return this.hold();
  }
}

export const factory: StrategyFactory<DualThrustParams> = (params) =>
  new DualThrustStrategy(params);
