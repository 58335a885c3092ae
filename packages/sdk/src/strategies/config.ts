import type { z } from "zod";

import * as buyAndHold from "./buy_and_hold.js";
import * as dualThrust from "./dual_thrust.js";
import * as macd from "./macd.js";
import * as smaCrossover from "./sma_crossover.js";
import { assertValid } from "../validation.js";

import type { Strategy } from "./types.js";

export type StrategyKey =
  | typeof smaCrossover.name
  | typeof macd.name
  | typeof dualThrust.name
  | typeof buyAndHold.name;

export interface StrategyField {
  readonly key: string;
  readonly label: string;
  readonly description?: string;
  readonly type: "number";
  readonly min?: number;
  readonly max?: number;
  readonly step?: number;
}

export interface StrategyConfig {
  readonly key: StrategyKey;
  readonly title: string;
  readonly description: string;
  readonly defaults: Readonly<Record<string, number>>;
  readonly fields: ReadonlyArray<StrategyField>;
  readonly schema: z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>;
  /** Validates `params` with `schema` and builds a fresh instance. */
  readonly create: (params: unknown) => Strategy;
}

export const strategyConfigs: Record<StrategyKey, StrategyConfig> = {
  [smaCrossover.name]: {
    key: smaCrossover.name,
    title: "SMA Crossover",
    description: "Trend-following crossover with fast/slow moving averages.",
    defaults: { fastLength: 5, slowLength: 20 },
    fields: [
      {
        key: "fastLength",
        label: "Fast Length",
        description: "Short-term SMA window size.",
        type: "number",
        min: 1,
        step: 1,
      },
      {
        key: "slowLength",
        label: "Slow Length",
        description: "Long-term SMA window size.",
        type: "number",
        min: 2,
        step: 1,
      },
    ],
    schema: smaCrossover.schema,
    create: (params) =>
      smaCrossover.factory(assertValid(smaCrossover.schema, params, "sma_crossover params")),
  },
  [macd.name]: {
    key: macd.name,
    title: "MACD",
    description: "MACD line against its signal line.",
    defaults: { fast: 12, slow: 26, signal: 9 },
    fields: [
      { key: "fast", label: "Fast Span", type: "number", min: 1, step: 1 },
      { key: "slow", label: "Slow Span", type: "number", min: 2, step: 1 },
      {
        key: "signal",
        label: "Signal Span",
        description: "EMA span applied to the MACD line.",
        type: "number",
        min: 1,
        step: 1,
      },
    ],
    schema: macd.schema,
    create: (params) =>
      macd.factory(assertValid(macd.schema, params, "macd params")),
  },
  [dualThrust.name]: {
    key: dualThrust.name,
    title: "Dual Thrust",
    description: "Range breakout around the open with asymmetric bands.",
    defaults: { lookback: 3, k1: 0.5, k2: 0.3 },
    fields: [
      {
        key: "lookback",
        label: "Lookback",
        description: "Bars used to measure the range.",
        type: "number",
        min: 1,
        step: 1,
      },
      {
        key: "k1",
        label: "Upper K",
        type: "number",
        min: 0,
        step: 0.1,
      },
      {
        key: "k2",
        label: "Lower K",
        type: "number",
        min: 0,
        step: 0.1,
      },
    ],
    schema: dualThrust.schema,
    create: (params) =>
      dualThrust.factory(assertValid(dualThrust.schema, params, "dual_thrust params")),
  },
  [buyAndHold.name]: {
    key: buyAndHold.name,
    title: "Buy and Hold",
    description: "Enters long on the first bar and holds to the end.",
    defaults: {},
    fields: [],
    schema: buyAndHold.schema,
    create: (params) =>
      buyAndHold.factory(assertValid(buyAndHold.schema, params, "buy_and_hold params")),
  },
};

export const strategyList = Object.values(strategyConfigs);

export const isStrategyKey = (value: string): value is StrategyKey =>
  Object.prototype.hasOwnProperty.call(strategyConfigs, value);
