import { strict as assert } from "node:assert";
import test from "node:test";

import { Ledger, type LedgerSettings } from "../src/ledger.js";
import { barAt } from "./fixtures.js";

const settings = (overrides: Partial<LedgerSettings> = {}): LedgerSettings => ({
  initialCash: 50_000,
  positionSize: 100,
  commissionRate: 0,
  amount: 1,
  ...overrides,
});

test("long round trip charges commission on both legs", () => {
  const ledger = new Ledger(settings({ commissionRate: 0.001 }));

  assert.deepEqual(ledger.apply("long", barAt(0, 50)), []);
  assert.equal(ledger.side, "long");
  assert.equal(ledger.cash, 49_995);
  assert.equal(ledger.mark(barAt(0, 50)).equity, 49_995);

  const [trade] = ledger.apply("close", barAt(1, 55));
  assert.equal(ledger.side, "flat");
  assert.equal(trade.side, "long");
  assert.equal(trade.grossPnl, 500);
  assert.equal(trade.commission, 10.5);
  assert.equal(trade.netPnl, 489.5);
  assert.equal(trade.reason, "signal");
  assert.equal(trade.entryTimestamp, "2024-01-01T00:00:00.000Z");
  assert.equal(trade.exitTimestamp, "2024-01-02T00:00:00.000Z");
  assert.equal(ledger.cash, 50_489.5);
  assert.equal(ledger.realizedPnl, 489.5);
  assert.equal(ledger.totalCommission, 10.5);
});

test("short positions profit from a falling price", () => {
  const ledger = new Ledger(settings());
  ledger.apply("short", barAt(0, 100));
  assert.equal(ledger.equityAt(95), 50_500);

  const [trade] = ledger.apply("close", barAt(1, 90));
  assert.equal(trade.grossPnl, 1_000);
  assert.equal(ledger.cash, 51_000);
});

test("a reversal closes then opens in the same step", () => {
  const ledger = new Ledger(settings({ commissionRate: 0.01 }));
  ledger.apply("long", barAt(0, 100));

  const closed = ledger.apply("short", barAt(1, 110));
  assert.equal(closed.length, 1);
  assert.equal(closed[0].reason, "reversal");
  assert.equal(closed[0].netPnl, 790);
  assert.equal(ledger.side, "short");
  assert.equal(ledger.position?.entryPrice, 110);
  assert.equal(ledger.cash, 50_680);
  assert.equal(ledger.totalCommission, 320);
});

test("repeated entries in the held direction are ignored", () => {
  const ledger = new Ledger(settings({ commissionRate: 0.01 }));
  ledger.apply("long", barAt(0, 100));
  assert.deepEqual(ledger.apply("long", barAt(1, 105)), []);
  assert.deepEqual(ledger.apply("hold", barAt(2, 106)), []);
  assert.equal(ledger.position?.entryPrice, 100);
  assert.equal(ledger.totalCommission, 100);
});

test("close and hold while flat change nothing", () => {
  const ledger = new Ledger(settings({ commissionRate: 0.01 }));
  assert.deepEqual(ledger.apply("close", barAt(0, 100)), []);
  assert.deepEqual(ledger.apply("hold", barAt(1, 100)), []);
  assert.equal(ledger.cash, 50_000);
  assert.equal(ledger.side, "flat");
});

test("equity marks the open position at the close, scaled by amount", () => {
  const ledger = new Ledger(settings({ amount: 2 }));
  ledger.apply("long", barAt(0, 100));
  const point = ledger.mark(barAt(1, 105));

  assert.deepEqual(point, { timestamp: "2024-01-02T00:00:00.000Z", equity: 51_000 });
  assert.equal(ledger.unrealizedPnl(105), 1_000);
  assert.equal(ledger.exposure, 1);
  assert.equal(ledger.equityCurve.length, 1);
});

test("an open the equity cannot cover is flagged", () => {
  const ledger = new Ledger(settings({ initialCash: 1_000 }));
  assert.equal(ledger.sufficientCash, true);
  ledger.apply("long", barAt(0, 50));
  assert.equal(ledger.sufficientCash, false);
  assert.equal(ledger.side, "long");
});

test("settle closes at the last bar and restates its equity point", () => {
  const ledger = new Ledger(settings({ commissionRate: 0.001 }));
  ledger.apply("long", barAt(0, 100));
  ledger.mark(barAt(0, 100));
  ledger.mark(barAt(1, 110));
  assert.equal(ledger.equityCurve[1].equity, 50_990);
  assert.equal(ledger.exposure, 2);

  const trade = ledger.settle(barAt(1, 110), "end_of_data");
  assert.equal(trade?.reason, "end_of_data");
  assert.equal(ledger.cash, 50_979);
  assert.equal(ledger.equityCurve.length, 2);
  assert.equal(ledger.equityCurve[1].equity, 50_979);
  assert.equal(ledger.exposure, 1);
  assert.equal(ledger.settle(barAt(1, 110), "end_of_data"), null);
});
