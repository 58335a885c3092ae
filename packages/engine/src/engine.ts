import type { BarSeries } from "@steptrade/data";
import { createLogger, type Logger } from "@steptrade/logger";
import {
  crossover,
  DecisionSchema,
  describeCause,
  EmptySeriesError,
  RunAbortedError,
  StrategyExecutionError,
  type Decision,
  type Strategy,
  type StrategyContext,
} from "@steptrade/sdk";

import { resolveRunConfig, type RunConfig } from "./config.js";
import { IndicatorEngine } from "./indicatorEngine.js";
import { Ledger } from "./ledger.js";
import { buildReport } from "./report.js";
import type { BacktestReport } from "./types.js";

export interface BacktestRunnerOptions {
  readonly logger?: Logger;
  /** Checked before every step; aborting stops the run with {@link RunAbortedError}. */
  readonly signal?: AbortSignal;
  /** Attached to every log entry of the run. */
  readonly runId?: string;
}

const describeDecision = (value: unknown): string =>
  typeof value === "string" ? `"${value}"` : String(value);

/**
 * Drives one strategy over a bar series, one bar at a time.
 *
 * Each {@link run} gets its own indicator engine and ledger, so a runner
 * (and the series it holds) can be reused for several strategies.
 */
export class BacktestRunner {
  public readonly config: RunConfig;
  private readonly logger: Logger;
  private readonly signal?: AbortSignal;

  /**
   * @throws InvalidConfigError listing every invalid option.
   */
  public constructor(
    private readonly series: BarSeries,
    config: unknown = {},
    options: BacktestRunnerOptions = {},
  ) {
    this.config = resolveRunConfig(config);
    const base = options.logger ?? createLogger("engine");
    this.logger = options.runId ? base.child({ runId: options.runId }) : base;
    this.signal = options.signal;
  }

  public run(strategy: Strategy): BacktestReport {
    const log = this.logger.child({ strategy: strategy.name });
    const indicators = new IndicatorEngine(this.series);
    strategy.setIndicators(indicators);

    const warmup = indicators.warmup;
    if (this.series.length < warmup) {
      throw new EmptySeriesError(this.series.length, warmup);
    }

    const ledger = new Ledger(this.config);
    const firstStep = Math.max(0, warmup - 1);
    log.info("Backtest started", {
      symbol: this.series.symbol,
      bars: this.series.length,
      firstStep,
      indicators: indicators.handles.map((handle) => handle.name),
    });

    try {
      for (let step = firstStep; step < this.series.length; step += 1) {
        if (this.signal?.aborted) {
          throw new RunAbortedError(step, this.signal.reason);
        }
        const bar = this.series.at(step);
        const decision = this.decide(strategy, indicators, ledger, step);
        for (const trade of ledger.apply(decision, bar)) {
          log.debug("Trade closed", { step, ...trade });
        }
        ledger.mark(bar);
      }
    } catch (error) {
      log.error("Backtest failed", { error: describeCause(error) });
      throw error;
    }

    if (this.config.closeOnFinish) {
      const trade = ledger.settle(this.series.at(this.series.length - 1), "end_of_data");
      if (trade) {
        log.debug("Trade closed", { step: this.series.length - 1, ...trade });
      }
    }

    const report = buildReport({
      strategy,
      series: this.series,
      ledger,
      initialCash: this.config.initialCash,
    });
    log.info("Backtest completed", {
      bars: report.bars,
      trades: report.tradeCount,
      finalEquity: report.finalEquity,
    });
    return report;
  }

  private decide(
    strategy: Strategy,
    indicators: IndicatorEngine,
    ledger: Ledger,
    step: number,
  ): Decision {
    try {
      indicators.advance(step);
      const context: StrategyContext = {
        symbol: this.series.symbol,
        step,
        bars: this.series.window(step),
        bar: this.series.at(step),
        position: ledger.side,
        value: (handle, at = step) => indicators.valueAt(handle, at),
        series: (handle) => indicators.series(handle),
        crossover: (a, b) => crossover(indicators.series(a), indicators.series(b), step),
      };
      const raw: unknown = strategy.next(step, Object.freeze(context));
      const parsed = DecisionSchema.safeParse(raw);
      if (!parsed.success) {
        const expected = DecisionSchema.options.join(", ");
        throw new TypeError(`next() returned ${describeDecision(raw)}; expected one of ${expected}`);
      }
      return parsed.data;
    } catch (error) {
      throw new StrategyExecutionError(step, error);
    }
  }
}

/**
 * One-call form of {@link BacktestRunner}.
 */
export const runBacktest = (
  series: BarSeries,
  strategy: Strategy,
  config: unknown = {},
  options: BacktestRunnerOptions = {},
): BacktestReport => new BacktestRunner(series, config, options).run(strategy);
