import { loadBarSeries, type BarSeries } from "@steptrade/data";
import type { LogLevel, LogMeta, Logger } from "@steptrade/logger";
import {
  StrategyBase,
  type Decision,
  type IndicatorRegistry,
  type StrategyBar,
  type StrategyContext,
} from "@steptrade/sdk";

export const DAY_MS = 86_400_000;

export const timestampAt = (index: number): string =>
  new Date(Date.UTC(2024, 0, 1) + index * DAY_MS).toISOString();

export const barAt = (index: number, close: number): StrategyBar => ({
  timestamp: timestampAt(index),
  open: close,
  high: close,
  low: close,
  close,
  volume: 1_000,
});

export const barsFrom = (closes: ReadonlyArray<number>): StrategyBar[] =>
  closes.map((close, index) => barAt(index, close));

export const seriesFrom = (closes: ReadonlyArray<number>): BarSeries =>
  loadBarSeries(barsFrom(closes), { symbol: "TEST" });

export const range = (length: number, at: (index: number) => number): number[] =>
  Array.from({ length }, (_, index) => at(index));

export interface LogEntry {
  readonly level: LogLevel;
  readonly msg: string;
  readonly meta: LogMeta;
}

/** Logger that keeps entries in memory instead of writing them. */
export const recordingLogger = (
  entries: LogEntry[] = [],
  bindings: LogMeta = {},
): Logger & { readonly entries: LogEntry[] } => {
  const log = (level: LogLevel, msg: string, meta: LogMeta = {}): void => {
    entries.push({ level, msg, meta: { ...bindings, ...meta } });
  };
  return {
    module: "test",
    level: "debug",
    entries,
    log,
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
    child: (extra) => recordingLogger(entries, { ...bindings, ...extra }),
  };
};

/** Plays back fixed decisions by step; holds everywhere else. */
export class ScriptedStrategy extends StrategyBase {
  public readonly name = "scripted";
  public readonly seen: number[] = [];

  public constructor(private readonly script: Readonly<Record<number, Decision>> = {}) {
    super({});
  }

  public setIndicators(_indicators: IndicatorRegistry): void {}

  public next(step: number, _context: StrategyContext): Decision {
    this.seen.push(step);
    return this.script[step] ?? this.hold();
  }
}
