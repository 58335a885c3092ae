import { strict as assert } from "node:assert";
import test from "node:test";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { createLogger } from "@steptrade/logger";
import { InvalidConfigError } from "@steptrade/sdk";

import { readRunConfigEnv, runCli, type CliDeps } from "../src/cli.js";

const SAMPLE_DATA = `timestamp,open,high,low,close,volume
2024-01-01T00:00:00.000Z,10,10,10,10,1000
2024-01-02T00:00:00.000Z,10,10,10,10,1200
2024-01-03T00:00:00.000Z,10,10,10,10,1100
2024-01-04T00:00:00.000Z,10,12,10,12,1300
2024-01-05T00:00:00.000Z,12,12,9,9,1400
2024-01-06T00:00:00.000Z,9,9,8,8,1450
2024-01-07T00:00:00.000Z,8,11,8,11,1500
2024-01-08T00:00:00.000Z,11,14,11,14,1550`;

const SMA_PARAMS = JSON.stringify({ fastLength: 2, slowLength: 3 });

interface Harness {
  readonly deps: CliDeps;
  readonly out: string[];
  readonly err: string[];
}

const harness = (env: NodeJS.ProcessEnv = {}): Harness => {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    deps: {
      io: { out: (text) => out.push(text), err: (text) => err.push(text) },
      env,
      logger: createLogger("backtest-cli", { level: "silent" }),
      now: () => new Date("2024-06-01T12:00:00.000Z"),
    },
  };
};

const writeDataset = async (t: test.TestContext): Promise<string> => {
  const dir = await mkdtemp(join(tmpdir(), "steptrade-cli-"));
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });
  const path = join(dir, "test_1d.csv");
  await writeFile(path, SAMPLE_DATA, { encoding: "utf-8" });
  return path;
};

const readJsonReport = (out: ReadonlyArray<string>): Record<string, unknown> => {
  const parsed: unknown = JSON.parse(out.join(""));
  if (typeof parsed !== "object" || parsed === null) {
    throw new Error("expected a JSON object");
  }
  return Object.fromEntries(Object.entries(parsed));
};

// ============================================================================
// Environment
// ============================================================================

test("readRunConfigEnv maps STEPTRADE_* variables to run options", () => {
  assert.deepEqual(
    readRunConfigEnv({
      STEPTRADE_INITIAL_CASH: "100000",
      STEPTRADE_POSITION_SIZE: " 10 ",
      STEPTRADE_COMMISSION_RATE: "0.001",
      STEPTRADE_AMOUNT: "",
      UNRELATED: "x",
    }),
    { initialCash: 100_000, positionSize: 10, commissionRate: 0.001 },
  );
  assert.deepEqual(readRunConfigEnv({}), {});
});

test("readRunConfigEnv rejects values that are not numbers", () => {
  assert.throws(
    () => readRunConfigEnv({ STEPTRADE_COMMISSION_RATE: "abc", STEPTRADE_AMOUNT: "2x" }),
    (error: unknown) => {
      assert.ok(error instanceof InvalidConfigError);
      assert.deepEqual(error.issues, [
        'STEPTRADE_COMMISSION_RATE: expected a number, received "abc"',
        'STEPTRADE_AMOUNT: expected a number, received "2x"',
      ]);
      return true;
    },
  );
});

// ============================================================================
// run
// ============================================================================

test("run prints a JSON report for a CSV dataset", async (t) => {
  const csv = await writeDataset(t);
  const { deps, out, err } = harness();

  const code = await runCli(
    ["run", "--csv", csv, "--strategy", "sma_crossover", "--params", SMA_PARAMS, "--format", "json"],
    deps,
  );

  assert.equal(code, 0);
  assert.deepEqual(err, []);
  const report = readJsonReport(out);
  assert.equal(report.symbol, "test_1d");
  assert.equal(report.strategyName, "sma_crossover");
  assert.equal(report.tradeCount, 2);
  assert.equal(report.finalEquity, 49_600);
  assert.equal(report.initialCash, 50_000);
});

test("flags override the environment, which overrides defaults", async (t) => {
  const csv = await writeDataset(t);
  const base = ["run", "--csv", csv, "--strategy", "buy_and_hold", "--format", "json"];

  const fromEnv = harness({ STEPTRADE_INITIAL_CASH: "100000", STEPTRADE_POSITION_SIZE: "10" });
  assert.equal(await runCli(base, fromEnv.deps), 0);
  const envReport = readJsonReport(fromEnv.out);
  assert.equal(envReport.initialCash, 100_000);
  assert.equal(envReport.finalEquity, 100_000 + (14 - 10) * 10);

  const fromFlags = harness({ STEPTRADE_INITIAL_CASH: "100000" });
  assert.equal(await runCli([...base, "--cash", "20000", "--close-on-finish"], fromFlags.deps), 0);
  const flagReport = readJsonReport(fromFlags.out);
  assert.equal(flagReport.initialCash, 20_000);
  assert.equal(flagReport.finalEquity, 20_000 + (14 - 10) * 100);
  assert.equal(flagReport.openPosition, null);
});

test("date bounds restrict the simulated bars", async (t) => {
  const csv = await writeDataset(t);
  const { deps, out } = harness();

  const code = await runCli(
    [
      "run",
      "--csv",
      csv,
      "--strategy",
      "buy_and_hold",
      "--start",
      "2024-01-04T00:00:00.000Z",
      "--end",
      "2024-01-06T00:00:00.000Z",
      "--format",
      "json",
    ],
    deps,
  );

  assert.equal(code, 0);
  const report = readJsonReport(out);
  assert.equal(report.bars, 3);
  assert.equal(report.start, "2024-01-04T00:00:00.000Z");
});

test("the text format is the default", async (t) => {
  const csv = await writeDataset(t);
  const { deps, out } = harness();

  const code = await runCli(
    ["run", "--csv", csv, "--strategy", "sma_crossover", "--params", SMA_PARAMS],
    deps,
  );

  assert.equal(code, 0);
  const lines = out.join("").trimEnd().split("\n");
  assert.equal(lines[0], `${"Start".padEnd(22)}2024-01-03T00:00:00.000Z`);
  assert.equal(lines[lines.length - 1], `${"Strategy".padEnd(22)}sma_crossover(fastLength=2,slowLength=3)`);
});

test("the markdown format renders the trade table", async (t) => {
  const csv = await writeDataset(t);
  const { deps, out } = harness();

  const code = await runCli(
    ["run", "--csv", csv, "--strategy", "sma_crossover", "--params", SMA_PARAMS, "--format", "markdown"],
    deps,
  );

  assert.equal(code, 0);
  const markdown = out.join("");
  assert.ok(markdown.startsWith("# Backtest: sma_crossover(fastLength=2,slowLength=3)\n"));
  assert.ok(markdown.includes("| 1 | long | 100 |"));
  assert.ok(markdown.includes("| 2 | short | 100 |"));
});

// ============================================================================
// Failures
// ============================================================================

test("an unknown strategy fails with one line and exit code 1", async (t) => {
  const csv = await writeDataset(t);
  const { deps, out, err } = harness();

  const code = await runCli(["run", "--csv", csv, "--strategy", "martingale"], deps);

  assert.equal(code, 1);
  assert.deepEqual(out, []);
  assert.equal(err.length, 1);
  assert.match(err[0], /^error: Invalid strategy: unknown strategy "martingale"/);
});

test("invalid run options are reported before the data is read", async () => {
  const { deps, err } = harness();

  const code = await runCli(
    ["run", "--csv", "missing.csv", "--strategy", "buy_and_hold", "--commission", "1.5"],
    deps,
  );

  assert.equal(code, 1);
  assert.deepEqual(err, [
    "error: Invalid run config: commissionRate: Number must be less than 1\n",
  ]);
});

test("malformed params JSON is rejected", async () => {
  const { deps, err } = harness();

  const code = await runCli(
    ["run", "--csv", "missing.csv", "--strategy", "macd", "--params", "{fast:"],
    deps,
  );

  assert.equal(code, 1);
  assert.match(err[0], /^error: Invalid --params: not valid JSON/);
});

test("a bad environment value fails the run", async () => {
  const { deps, err } = harness({ STEPTRADE_AMOUNT: "lots" });

  const code = await runCli(["run", "--csv", "missing.csv", "--strategy", "buy_and_hold"], deps);

  assert.equal(code, 1);
  assert.deepEqual(err, [
    'error: Invalid environment: STEPTRADE_AMOUNT: expected a number, received "lots"\n',
  ]);
});

test("a missing CSV file fails with exit code 1", async () => {
  const { deps, err } = harness();

  const code = await runCli(
    ["run", "--csv", join(tmpdir(), "steptrade-does-not-exist.csv"), "--strategy", "buy_and_hold"],
    deps,
  );

  assert.equal(code, 1);
  assert.equal(err.length, 1);
  assert.match(err[0], /^error: ENOENT/);
});

test("commander rejects unknown formats and non-numeric flags", async () => {
  const badFormat = harness();
  assert.equal(
    await runCli(["run", "--csv", "a.csv", "--strategy", "macd", "--format", "yaml"], badFormat.deps),
    1,
  );
  assert.match(badFormat.err.join(""), /argument 'yaml' is invalid/);

  const badNumber = harness();
  assert.equal(
    await runCli(["run", "--csv", "a.csv", "--strategy", "macd", "--cash", "lots"], badNumber.deps),
    1,
  );
  assert.match(badNumber.err.join(""), /argument 'lots' is invalid\. Not a number\./);

  const missing = harness();
  assert.equal(await runCli(["run", "--strategy", "macd"], missing.deps), 1);
  assert.match(missing.err.join(""), /required option '--csv <file>' not specified/);
});

// ============================================================================
// strategies
// ============================================================================

test("strategies lists every bundled strategy with its defaults", async () => {
  const { deps, out } = harness();

  assert.equal(await runCli(["strategies"], deps), 0);
  assert.deepEqual(out, [
    'sma_crossover  SMA Crossover {"fastLength":5,"slowLength":20}\n',
    'macd           MACD {"fast":12,"slow":26,"signal":9}\n',
    'dual_thrust    Dual Thrust {"lookback":3,"k1":0.5,"k2":0.3}\n',
    "buy_and_hold   Buy and Hold {}\n",
  ]);
});
