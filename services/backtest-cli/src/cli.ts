import { basename, extname } from "node:path";

import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { z } from "zod";

import { CsvSource, loadBarSeries } from "@steptrade/data";
import {
  BacktestRunner,
  createStrategy,
  resolveRunConfig,
  type BacktestReport,
  type RunConfig,
} from "@steptrade/engine";
import { createLogger, isLogThreshold, type Logger } from "@steptrade/logger";
import { formatReportMarkdown, formatReportText, reportToJson } from "@steptrade/report";
import { assertValid, describeCause, InvalidConfigError, strategyList } from "@steptrade/sdk";

export const FORMATS = ["text", "markdown", "json"] as const;
export type ReportFormat = (typeof FORMATS)[number];

export interface CliIo {
  readonly out: (text: string) => void;
  readonly err: (text: string) => void;
}

export interface CliDeps {
  readonly io?: CliIo;
  readonly env?: NodeJS.ProcessEnv;
  readonly logger?: Logger;
  readonly csvSource?: CsvSource;
  readonly now?: () => Date;
}

const processIo: CliIo = {
  out: (text) => {
    process.stdout.write(text);
  },
  err: (text) => {
    process.stderr.write(text);
  },
};

type NumericRunOption = keyof Pick<
  RunConfig,
  "initialCash" | "positionSize" | "commissionRate" | "amount"
>;

const ENV_KEYS: Record<string, NumericRunOption> = {
  STEPTRADE_INITIAL_CASH: "initialCash",
  STEPTRADE_POSITION_SIZE: "positionSize",
  STEPTRADE_COMMISSION_RATE: "commissionRate",
  STEPTRADE_AMOUNT: "amount",
};

/**
 * Run options taken from `STEPTRADE_*` variables. Unset or empty variables
 * are skipped; range checks are left to {@link resolveRunConfig}.
 *
 * @throws InvalidConfigError when a variable is not a number.
 */
export const readRunConfigEnv = (
  env: NodeJS.ProcessEnv,
): Partial<Record<NumericRunOption, number>> => {
  const config: Partial<Record<NumericRunOption, number>> = {};
  const issues: string[] = [];

  for (const [variable, key] of Object.entries(ENV_KEYS)) {
    const raw = env[variable]?.trim();
    if (!raw) {
      continue;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      issues.push(`${variable}: expected a number, received "${raw}"`);
      continue;
    }
    config[key] = value;
  }

  if (issues.length > 0) {
    throw new InvalidConfigError("environment", issues);
  }
  return config;
};

const parseNumber = (value: string): number => {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
};

const RunOptionsSchema = z.object({
  csv: z.string().min(1),
  strategy: z.string().min(1),
  params: z.string().optional(),
  cash: z.number().optional(),
  size: z.number().optional(),
  commission: z.number().optional(),
  amount: z.number().optional(),
  start: z.string().optional(),
  end: z.string().optional(),
  closeOnFinish: z.boolean().optional(),
  format: z.enum(FORMATS).default("text"),
});

type RunOptions = z.infer<typeof RunOptionsSchema>;

const parseParams = (raw: string | undefined): unknown => {
  if (raw === undefined) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new InvalidConfigError("--params", [`not valid JSON (${describeCause(error)})`]);
  }
};

const definedOnly = (values: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));

const makeRunId = (strategy: string, now: Date): string => {
  const timestamp = now
    .toISOString()
    .replace(/[^0-9]+/g, "")
    .slice(0, 14);
  return `${strategy}-${timestamp}`;
};

const formatReport = (report: BacktestReport, format: ReportFormat): string => {
  switch (format) {
    case "markdown":
      return formatReportMarkdown(report);
    case "json":
      return reportToJson(report);
    case "text":
      return formatReportText(report);
  }
};

const defaultLogger = (env: NodeJS.ProcessEnv): Logger => {
  const fromEnv = env.LOG_LEVEL?.trim().toLowerCase();
  // report output owns stdout unless a level is asked for explicitly
  return createLogger("backtest-cli", { level: isLogThreshold(fromEnv) ? fromEnv : "warn" });
};

/**
 * Builds the `steptrade` program. Flags override `STEPTRADE_*` variables,
 * which override the engine defaults.
 */
export const buildProgram = (deps: CliDeps = {}): Command => {
  const io = deps.io ?? processIo;
  const env = deps.env ?? process.env;
  const logger = deps.logger ?? defaultLogger(env);
  const csvSource = deps.csvSource ?? new CsvSource();
  const now = deps.now ?? (() => new Date());

  const program = new Command();
  program
    .name("steptrade")
    .description("Event-driven backtests over OHLCV bars")
    .version("0.1.0")
    .exitOverride()
    .configureOutput({ writeOut: io.out, writeErr: io.err });

  program
    .command("run")
    .description("Run a bundled strategy over a CSV dataset and print the report")
    .requiredOption("--csv <file>", "CSV with timestamp,open,high,low,close,volume columns")
    .requiredOption("--strategy <name>", "bundled strategy name (see `steptrade strategies`)")
    .option("--params <json>", "strategy params as a JSON object")
    .option("--cash <amount>", "initial cash", parseNumber)
    .option("--size <units>", "units traded per open", parseNumber)
    .option("--commission <rate>", "commission as a fraction of notional", parseNumber)
    .option("--amount <multiplier>", "leverage multiplier on notional", parseNumber)
    .option("--start <iso>", "first timestamp to include")
    .option("--end <iso>", "last timestamp to include")
    .option("--close-on-finish", "close an open position at the last bar")
    .addOption(new Option("--format <format>", "report format").choices(FORMATS).default("text"))
    .action(async (raw: unknown) => {
      const options: RunOptions = assertValid(RunOptionsSchema, raw, "options");
      const strategy = createStrategy(options.strategy, parseParams(options.params));
      const config = resolveRunConfig({
        ...readRunConfigEnv(env),
        ...definedOnly({
          initialCash: options.cash,
          positionSize: options.size,
          commissionRate: options.commission,
          amount: options.amount,
          closeOnFinish: options.closeOnFinish,
        }),
      });

      const rows = await csvSource.loadFile(options.csv, {
        start: options.start,
        end: options.end,
      });
      const series = loadBarSeries(rows, {
        symbol: basename(options.csv, extname(options.csv)),
      });
      const runner = new BacktestRunner(series, config, {
        logger,
        runId: makeRunId(strategy.name, now()),
      });
      io.out(`${formatReport(runner.run(strategy), options.format)}\n`);
    });

  program
    .command("strategies")
    .description("List bundled strategies and their default params")
    .action(() => {
      const width = Math.max(...strategyList.map((config) => config.key.length)) + 2;
      for (const config of strategyList) {
        io.out(`${config.key.padEnd(width)}${config.title} ${JSON.stringify(config.defaults)}\n`);
      }
    });

  return program;
};

/**
 * Parses `argv` (without the node and script entries) and runs the command.
 * Resolves to the process exit code; failures print a single line.
 */
export const runCli = async (argv: ReadonlyArray<string>, deps: CliDeps = {}): Promise<number> => {
  const io = deps.io ?? processIo;
  try {
    await buildProgram(deps).parseAsync([...argv], { from: "user" });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander has already written its own message
      return error.exitCode;
    }
    io.err(`error: ${describeCause(error)}\n`);
    return 1;
  }
};
