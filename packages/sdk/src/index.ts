// Source of truth for the shapes shared across steptrade packages.

import { z } from "zod";

/** -----------------------------------------------------------------------
 *  Shared primitives
 *  -------------------------------------------------------------------- */

/** ISO-8601 date string (UTC recommended). */
export type ISODate = string;

/** Numeric columns of a bar. */
export type PriceField = "open" | "high" | "low" | "close" | "volume";

export const PRICE_FIELDS: ReadonlyArray<PriceField> = ["open", "high", "low", "close", "volume"];

/**
 * One OHLCV observation. Bars handed to strategies are frozen.
 */
export interface StrategyBar {
  readonly timestamp: ISODate;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

/** -----------------------------------------------------------------------
 *  Raw bar rows
 *  -------------------------------------------------------------------- */

/**
 * Shape check for rows coming from a data collaborator. Ordering and OHLC
 * consistency are checked by the bar series loader, not here.
 */
export const BarRowSchema = z.object({
  timestamp: z.string().min(1),
  open: z.number().finite(),
  high: z.number().finite(),
  low: z.number().finite(),
  close: z.number().finite(),
  volume: z.number().finite(),
});

export type BarRow = z.infer<typeof BarRowSchema>;

/** -----------------------------------------------------------------------
 *  Decisions and positions
 *  -------------------------------------------------------------------- */

export const DECISIONS = ["long", "short", "close", "hold"] as const;

/** A strategy's per-step trading request. */
export type Decision = (typeof DECISIONS)[number];

/** Runtime validator for {@link Decision}; strategies may be plain JS. */
export const DecisionSchema = z.enum(DECISIONS);

export type PositionSide = "flat" | "long" | "short";

export { assertValid, formatIssues } from "./validation.js";
export * from "./errors.js";
export { crossover } from "./crossover.js";
export * from "./indicators/index.js";
export * from "./strategies/types.js";
export { StrategyBase } from "./strategies/base.js";
export * as strategies from "./strategies/index.js";
export {
  strategyConfigs,
  strategyList,
  isStrategyKey,
  type StrategyConfig,
  type StrategyField,
  type StrategyKey,
} from "./strategies/config.js";
