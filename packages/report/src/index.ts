import type { BacktestReport, TradeRecord } from "@steptrade/engine";

const LABEL_WIDTH = 22;
const MS_PER_SECOND = 1_000;
const MS_PER_DAY = 86_400_000;

const fmtNum = (value: number, digits = 2): string =>
  Number.isFinite(value) ? value.toFixed(digits) : "n/a";

const fmtRatio = (value: number): string => (value === Infinity ? "inf" : fmtNum(value));

const pad2 = (value: number): string => String(value).padStart(2, "0");

/** `5 days 06:30:00`, the way a timedelta prints. */
export const formatDuration = (ms: number): string => {
  if (!Number.isFinite(ms) || ms < 0) {
    return "n/a";
  }
  const days = Math.floor(ms / MS_PER_DAY);
  const seconds = Math.floor((ms % MS_PER_DAY) / MS_PER_SECOND);
  const hours = Math.floor(seconds / 3_600);
  const minutes = Math.floor((seconds % 3_600) / 60);
  const clock = `${pad2(hours)}:${pad2(minutes)}:${pad2(seconds % 60)}`;
  return `${days} ${days === 1 ? "day" : "days"} ${clock}`;
};

/** `sma_crossover(fastLength=5,slowLength=20)`; bare name without params. */
export const formatStrategy = (name: string, params: Readonly<Record<string, unknown>>): string => {
  const entries = Object.entries(params);
  if (entries.length === 0) {
    return name;
  }
  return `${name}(${entries.map(([key, value]) => `${key}=${String(value)}`).join(",")})`;
};

const formatPosition = (report: BacktestReport): string => {
  const position = report.openPosition;
  if (!position) {
    return "none";
  }
  return `${position.side} ${position.quantity} @ ${fmtNum(position.entryPrice)}`;
};

const summaryRows = (report: BacktestReport): Array<readonly [string, string]> => [
  ["Start", report.start],
  ["End", report.end],
  ["Duration", formatDuration(report.durationMs)],
  ["Bars", String(report.bars)],
  ["Exposure Time [%]", fmtNum(report.exposurePct)],
  ["Equity Final [$]", fmtNum(report.finalEquity)],
  ["Equity Peak [$]", fmtNum(report.peakEquity)],
  ["Cash Final [$]", fmtNum(report.finalCash)],
  ["Return [%]", fmtNum(report.returnPct)],
  ["CAGR [%]", fmtNum(report.cagr * 100)],
  ["Sharpe Ratio", fmtNum(report.sharpe)],
  ["Sortino Ratio", fmtNum(report.sortino)],
  ["Max. Drawdown [%]", fmtNum(report.maxDrawdown * 100)],
  ["# Trades", String(report.tradeCount)],
  ["Win Rate [%]", fmtNum(report.winRate * 100)],
  ["Profit Factor", fmtRatio(report.profitFactor)],
  ["Realized P&L [$]", fmtNum(report.realizedPnl)],
  ["Commissions [$]", fmtNum(report.totalCommission)],
  ["Sufficient Cash", report.sufficientCash ? "yes" : "no"],
  ["Open Position", formatPosition(report)],
  ["Strategy", formatStrategy(report.strategyName, report.params)],
];

/**
 * Aligned `label value` lines, one statistic per line.
 */
export const formatReportText = (report: BacktestReport): string =>
  summaryRows(report)
    .map(([label, value]) => `${label.padEnd(LABEL_WIDTH)}${value}`)
    .join("\n");

const escapePipes = (value: string): string => value.replace(/\|/g, "\\|");

const tradeRow = (trade: TradeRecord, index: number): string =>
  [
    String(index + 1),
    trade.side,
    String(trade.quantity),
    trade.entryTimestamp,
    trade.exitTimestamp,
    fmtNum(trade.entryPrice),
    fmtNum(trade.exitPrice),
    fmtNum(trade.commission),
    fmtNum(trade.netPnl),
    trade.reason,
  ].join(" | ");

/**
 * Summary table followed by the trade log.
 */
export const formatReportMarkdown = (report: BacktestReport): string => {
  const lines: string[] = [];

  lines.push(`# Backtest: ${escapePipes(formatStrategy(report.strategyName, report.params))}`);
  lines.push("");
  lines.push(`${report.symbol}, ${report.start} to ${report.end}`);
  lines.push("");

  lines.push("## Summary");
  lines.push("");
  lines.push("| Metric | Value |");
  lines.push("|---|---:|");
  for (const [label, value] of summaryRows(report).slice(2, -1)) {
    lines.push(`| ${escapePipes(label)} | ${escapePipes(value)} |`);
  }
  lines.push("");

  lines.push("## Trades");
  lines.push("");
  if (report.tradeLog.length === 0) {
    lines.push("_No closed trades._");
  } else {
    lines.push(
      "| # | Side | Qty | Entry | Exit | Entry Price | Exit Price | Commission | Net P&L | Reason |",
    );
    lines.push("|---:|---|---:|---|---|---:|---:|---:|---:|---|");
    report.tradeLog.forEach((trade, index) => {
      lines.push(`| ${tradeRow(trade, index)} |`);
    });
  }
  lines.push("");

  return lines.join("\n");
};

/** Pretty-printed JSON of the whole report, curve and trades included. */
export const reportToJson = (report: BacktestReport, space = 2): string =>
  JSON.stringify(report, null, space);
