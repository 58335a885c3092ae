import { z } from "zod";

import type { Decision } from "../index.js";
import { ema, macdLine } from "../indicators/functions.js";
import { column, ref, type IndicatorHandle, type IndicatorRegistry } from "../indicators/types.js";

import { StrategyBase } from "./base.js";
import type { StrategyContext, StrategyFactory } from "./types.js";

export const name = "macd" as const;

export const schema = z
  .object({
    fast: z.number().int().min(1),
    slow: z.number().int().min(2),
    signal: z.number().int().min(1),
  })
  .superRefine((value, ctx) => {
    if (value.fast >= value.slow) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "fast must be less than slow",
        path: ["fast"],
      });
    }
  });

export type MacdParams = z.infer<typeof schema>;

export class MacdStrategy extends StrategyBase<MacdParams> {
  public readonly name = name;

  private line?: IndicatorHandle;
  private signal?: IndicatorHandle;

  public setIndicators(indicators: IndicatorRegistry): void {
    const line = indicators.define(macdLine, column("close"), this.params.fast, this.params.slow);
    this.line = line;
    // Signal line is an EMA of the MACD line itself.
    this.signal = indicators.define(ema, ref(line), this.params.signal);
  }

  public next(_step: number, context: StrategyContext): Decision {
    const line = this.ready(this.line);
    const signal = this.ready(this.signal);

    if (context.crossover(line, signal)) {
      return this.long();
    }
    if (context.crossover(signal, line)) {
      return this.short();
    }
    return this.hold();
  }
}

export const factory: StrategyFactory<MacdParams> = (params) => new MacdStrategy(params);
