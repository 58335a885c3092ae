import type { BarSeries } from "@steptrade/data";
import {
  calculateCagr,
  calculateMaxDrawdown,
  calculateProfitFactor,
  calculateReturnPct,
  calculateSharpe,
  calculateSortino,
  calculateWinRate,
} from "@steptrade/metrics";
import type { Strategy } from "@steptrade/sdk";

import type { Ledger } from "./ledger.js";
import type { BacktestReport } from "./types.js";

export interface ReportInput {
  readonly strategy: Strategy;
  readonly series: BarSeries;
  readonly ledger: Ledger;
  readonly initialCash: number;
}

/**
 * Freezes a finished run into a {@link BacktestReport}. Only called once the
 * loop has completed; a failed run never reaches here.
 */
export const buildReport = ({ strategy, series, ledger, initialCash }: ReportInput): BacktestReport => {
  const equityCurve = Object.freeze([...ledger.equityCurve]);
  const tradeLog = Object.freeze([...ledger.tradeLog]);
  const first = equityCurve[0];
  const last = equityCurve[equityCurve.length - 1];
  const start = first?.timestamp ?? series.start;
  const end = last?.timestamp ?? series.end;
  const finalEquity = last?.equity ?? initialCash;
  const peakEquity = equityCurve.reduce((peak, point) => Math.max(peak, point.equity), initialCash);

  return Object.freeze({
    strategyName: strategy.name,
    params: Object.freeze({ ...strategy.params }),
    symbol: series.symbol,
    start,
    end,
    durationMs: Date.parse(end) - Date.parse(start),
    bars: equityCurve.length,
    initialCash,
    finalEquity,
    finalCash: ledger.cash,
    peakEquity,
    returnPct: calculateReturnPct(initialCash, finalEquity),
    tradeCount: tradeLog.length,
    winRate: calculateWinRate(tradeLog),
    profitFactor: calculateProfitFactor(tradeLog),
    maxDrawdown: calculateMaxDrawdown(equityCurve, initialCash),
    exposurePct: equityCurve.length > 0 ? (ledger.exposure / equityCurve.length) * 100 : 0,
    realizedPnl: ledger.realizedPnl,
    totalCommission: ledger.totalCommission,
    sharpe: calculateSharpe(equityCurve),
    sortino: calculateSortino(equityCurve),
    cagr: calculateCagr(equityCurve),
    sufficientCash: ledger.sufficientCash,
    openPosition: ledger.position,
    equityCurve,
    tradeLog,
  });
};
