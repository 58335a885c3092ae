import { strict as assert } from "node:assert";
import test from "node:test";

import { z } from "zod";

import { strategies, type StrategyContext } from "../src/index.js";
import { buildBars, runDecisions } from "./harness.js";

const parse = <Schema extends z.ZodTypeAny>(
  schema: Schema,
  params: z.input<Schema>,
): z.infer<Schema> => schema.parse(params);

test("sma crossover goes long on the upward cross and short on the downward cross", () => {
  const params = parse(strategies.smaCrossover.schema, { fastLength: 2, slowLength: 3 });
  const strategy = strategies.smaCrossover.factory(params);
  // sma2: -, 10, 10, 11, 10.5, 8.5, 9.5, 12.5
  // sma3: -, -, 10, 10.67, 10.33, 9.67, 9.33, 11
  const decisions = runDecisions(strategy, buildBars([10, 10, 10, 12, 9, 8, 11, 14]));
  assert.deepEqual(decisions, ["hold", "hold", "hold", "long", "hold", "short", "long", "hold"]);
});

test("sma crossover schema rejects a fast length that is not shorter", () => {
  const result = strategies.smaCrossover.schema.safeParse({ fastLength: 5, slowLength: 5 });
  assert.equal(result.success, false);
});

test("sma crossover exposes frozen params", () => {
  const strategy = new strategies.smaCrossover.SmaCrossoverStrategy({ fastLength: 2, slowLength: 4 });
  assert.equal(strategy.name, "sma_crossover");
  assert.deepEqual(strategy.params, { fastLength: 2, slowLength: 4 });
  assert.ok(Object.isFrozen(strategy.params));
});

test("strategies refuse to decide before indicators are declared", () => {
  const strategy = strategies.macd.factory({ fast: 2, slow: 3, signal: 2 });
  const context = {} as StrategyContext;
  assert.throws(() => strategy.next(0, context), /next\(\) called before setIndicators\(\)/u);
});

test("macd stays on hold until the signal line has a prior value", () => {
  const strategy = strategies.macd.factory({ fast: 2, slow: 3, signal: 2 });
  // signal needs 3 + 2 - 1 = 4 bars, a crossover one more
  const decisions = runDecisions(strategy, buildBars([10, 11, 12, 13, 9]));
  assert.deepEqual(decisions.slice(0, 4), ["hold", "hold", "hold", "hold"]);
});

test("macd shorts when the line drops through the signal", () => {
  const strategy = strategies.macd.factory({ fast: 2, slow: 3, signal: 2 });
  const decisions = runDecisions(strategy, buildBars([10, 11, 12, 13, 14, 8]));
  assert.equal(decisions[5], "short");
});

test("dual thrust goes long on a close above the upper band", () => {
  const strategy = strategies.dualThrust.factory({ lookback: 2, k1: 0.5, k2: 0.3 });
  // flat bars keep the range at 0, so upper == lower == open == close
  // until the breakout bar closes far above its open
  const bars = buildBars([10, 10, 10]);
  bars.push({
    timestamp: "2024-01-04T00:00:00.000Z",
    open: 10,
    high: 14,
    low: 10,
    close: 14,
    volume: 1_000,
  });
  const decisions = runDecisions(strategy, bars);
  assert.deepEqual(decisions, ["hold", "hold", "hold", "long"]);
});

test("buy and hold enters once and then holds", () => {
  const strategy = strategies.buyAndHold.factory({});
  const decisions = runDecisions(strategy, buildBars([5, 6, 7, 8]));
  assert.deepEqual(decisions, ["long", "hold", "hold", "hold"]);
});
