import { z } from "zod";

import type { Decision } from "../index.js";
import { sma } from "../indicators/functions.js";
import { column, type IndicatorHandle, type IndicatorRegistry } from "../indicators/types.js";

import { StrategyBase } from "./base.js";
import type { StrategyContext, StrategyFactory } from "./types.js";

export const name = "sma_crossover" as const;

export const schema = z
  .object({
    fastLength: z.number().int().min(1),
    slowLength: z.number().int().min(2),
  })
  .superRefine((value, ctx) => {
    if (value.fastLength >= value.slowLength) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "fastLength must be less than slowLength",
        path: ["fastLength"],
      });
    }
  });

export type SmaCrossoverParams = z.infer<typeof schema>;

/**
 * Goes long when the fast SMA crosses above the slow one and short on the
 * opposite cross. Each reversal closes the previous position.
 */
export class SmaCrossoverStrategy extends StrategyBase<SmaCrossoverParams> {
  public readonly name = name;

  private fast?: IndicatorHandle;
  private slow?: IndicatorHandle;

  public setIndicators(indicators: IndicatorRegistry): void {
    this.fast = indicators.define(sma, column("close"), this.params.fastLength);
    this.slow = indicators.define(sma, column("close"), this.params.slowLength);
  }

  public next(_step: number, context: StrategyContext): Decision {
    const fast = this.ready(this.fast);
    const slow = this.ready(this.slow);

    if (context.crossover(fast, slow)) {
      return this.long();
    }
    if (context.crossover(slow, fast)) {
      return this.short();
    }
    return this.hold();
  }
}

export const factory: StrategyFactory<SmaCrossoverParams> = (params) =>
  new SmaCrossoverStrategy(params);
