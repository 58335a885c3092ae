import { z } from "zod";

import type { Decision } from "../index.js";
import type { IndicatorRegistry } from "../indicators/types.js";

import { StrategyBase } from "./base.js";
import type { StrategyContext, StrategyFactory } from "./types.js";

export const name = "buy_and_hold" as const;

export const schema = z.object({});

export type BuyAndHoldParams = z.infer<typeof schema>;

/** Baseline: long on the first bar, then never trades again. */
export class BuyAndHoldStrategy extends StrategyBase<BuyAndHoldParams> {
  public readonly name = name;

  public setIndicators(_indicators: IndicatorRegistry): void {}

  public next(_step: number, context: StrategyContext): Decision {
    return context.position === "flat" ? this.long() : this.hold();
  }
}

export const factory: StrategyFactory<BuyAndHoldParams> = (params) =>
  new BuyAndHoldStrategy(params);
