import type { ISODate, PositionSide } from "@steptrade/sdk";

/**
 * Equity snapshot captured after processing a bar.
 */
export interface EquityPoint {
  readonly timestamp: ISODate;
  readonly equity: number;
}

export type TradeSide = Exclude<PositionSide, "flat">;

/** Why a position was closed. */
export type ExitReason = "signal" | "reversal" | "end_of_data";

/**
 * Position currently held by the ledger.
 */
export interface OpenPosition {
  readonly side: TradeSide;
  readonly quantity: number;
  readonly entryPrice: number;
  readonly entryTimestamp: ISODate;
  readonly entryCommission: number;
}

/**
 * A completed round trip. `netPnl` is `grossPnl` less both commissions.
 */
export interface TradeRecord {
  readonly side: TradeSide;
  readonly quantity: number;
  readonly entryTimestamp: ISODate;
  readonly exitTimestamp: ISODate;
  readonly entryPrice: number;
  readonly exitPrice: number;
  readonly grossPnl: number;
  readonly commission: number;
  readonly netPnl: number;
  readonly reason: ExitReason;
}

/**
 * Immutable summary of a finished run.
 */
export interface BacktestReport {
  readonly strategyName: string;
  readonly params: Readonly<Record<string, unknown>>;
  readonly symbol: string;
  readonly start: ISODate;
  readonly end: ISODate;
  /** Wall-clock span covered by the processed bars. */
  readonly durationMs: number;
  /** Number of steps simulated (bars after warm-up). */
  readonly bars: number;
  readonly initialCash: number;
  readonly finalEquity: number;
  readonly finalCash: number;
  readonly peakEquity: number;
  /** Percent, e.g. 0.979 for +0.979%. */
  readonly returnPct: number;
  readonly tradeCount: number;
  /** Fraction of trades with positive net P&L. */
  readonly winRate: number;
  /** Gross profit over gross loss; `Infinity` with winners and no losers, `null` in JSON. */
  readonly profitFactor: number;
  /** Non-positive fraction; -0.1 is a 10% drawdown. */
  readonly maxDrawdown: number;
  /** Percent of simulated steps that ended holding a position. */
  readonly exposurePct: number;
  readonly realizedPnl: number;
  readonly totalCommission: number;
  readonly sharpe: number;
  readonly sortino: number;
  readonly cagr: number;
  /** False when some open was taken without equity covering notional plus commission. */
  readonly sufficientCash: boolean;
  readonly openPosition: OpenPosition | null;
  readonly equityCurve: ReadonlyArray<EquityPoint>;
  readonly tradeLog: ReadonlyArray<TradeRecord>;
}
