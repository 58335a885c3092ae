import type { Decision, PositionSide, StrategyBar } from "@steptrade/sdk";

import type { RunConfig } from "./config.js";
import type {
  EquityPoint,
  ExitReason,
  OpenPosition,
  TradeRecord,
  TradeSide,
} from "./types.js";

export type LedgerSettings = Pick<
  RunConfig,
  "initialCash" | "positionSize" | "commissionRate" | "amount"
>;

const direction = (side: TradeSide): 1 | -1 => (side === "long" ? 1 : -1);

/**
 * Cash, the open position and the trade log of a single run.
 *
 * Margin-style accounting: an open debits only its commission, a close
 * credits the gross P&L less the exit commission. All fills happen at the
 * bar's close.
 */
export class Ledger {
  private cashBalance: number;
  private open: OpenPosition | null = null;
  private readonly trades: TradeRecord[] = [];
  private readonly curve: EquityPoint[] = [];
  private commissionPaid = 0;
  private realized = 0;
  private exposedSteps = 0;
  private funded = true;

  public constructor(private readonly settings: LedgerSettings) {
    this.cashBalance = settings.initialCash;
  }

  public get side(): PositionSide {
    return this.open?.side ?? "flat";
  }

  public get position(): OpenPosition | null {
    return this.open;
  }

  public get cash(): number {
    return this.cashBalance;
  }

  public get tradeLog(): ReadonlyArray<TradeRecord> {
    return this.trades;
  }

  public get equityCurve(): ReadonlyArray<EquityPoint> {
    return this.curve;
  }

  public get totalCommission(): number {
    return this.commissionPaid;
  }

  /** Sum of net P&L over closed trades. */
  public get realizedPnl(): number {
    return this.realized;
  }

  /** Marked steps that ended with a position open. */
  public get exposure(): number {
    return this.exposedSteps;
  }

  /** False once an open was taken while equity did not cover notional plus commission. */
  public get sufficientCash(): boolean {
    return this.funded;
  }

  public unrealizedPnl(price: number): number {
    if (!this.open) {
      return 0;
    }
    return direction(this.open.side) * (price - this.open.entryPrice) * this.units(this.open);
  }

  public equityAt(price: number): number {
    return this.cashBalance + this.unrealizedPnl(price);
  }

  /**
   * Applies one decision at `bar.close`. Returns the trades it closed: none,
   * or one when a close or a reversal happened.
   */
  public apply(decision: Decision, bar: StrategyBar): TradeRecord[] {
    const current = this.open;
    switch (decision) {
      case "hold":
        return [];
      case "close":
        return current ? [this.closeAt(current, bar, "signal")] : [];
      case "long":
      case "short": {
        if (current?.side === decision) {
          return [];
        }
        const closed = current ? [this.closeAt(current, bar, "reversal")] : [];
        this.openAt(decision, bar);
        return closed;
      }
    }
  }

  /** Appends the equity at `bar.close` to the curve. */
  public mark(bar: StrategyBar): EquityPoint {
    const point = Object.freeze({ timestamp: bar.timestamp, equity: this.equityAt(bar.close) });
    this.curve.push(point);
    if (this.open) {
      this.exposedSteps += 1;
    }
    return point;
  }

  /**
   * Closes whatever is still open at `bar.close`. When the final equity point
   * belongs to the same bar it is restated, and that step no longer counts as
   * exposed since it now ends flat.
   */
  public settle(bar: StrategyBar, reason: ExitReason): TradeRecord | null {
    if (!this.open) {
      return null;
    }
    const trade = this.closeAt(this.open, bar, reason);
    const last = this.curve.length - 1;
    if (last >= 0 && this.curve[last].timestamp === bar.timestamp) {
      this.curve[last] = Object.freeze({ timestamp: bar.timestamp, equity: this.cashBalance });
      this.exposedSteps -= 1;
    }
    return trade;
  }

  private units(position: Pick<OpenPosition, "quantity">): number {
    return position.quantity * this.settings.amount;
  }

  private notional(price: number, quantity: number): number {
    return price * quantity * this.settings.amount;
  }

  private openAt(side: TradeSide, bar: StrategyBar): void {
    const price = bar.close;
    const notional = this.notional(price, this.settings.positionSize);
    const commission = this.settings.commissionRate * notional;
    if (this.equityAt(price) < notional + commission) {
      this.funded = false;
    }

    this.cashBalance -= commission;
    this.commissionPaid += commission;
    this.open = Object.freeze({
      side,
      quantity: this.settings.positionSize,
      entryPrice: price,
      entryTimestamp: bar.timestamp,
      entryCommission: commission,
    });
  }

  private closeAt(position: OpenPosition, bar: StrategyBar, reason: ExitReason): TradeRecord {
    const exitPrice = bar.close;
    const grossPnl =
      direction(position.side) * (exitPrice - position.entryPrice) * this.units(position);
    const exitCommission =
      this.settings.commissionRate * this.notional(exitPrice, position.quantity);
    const netPnl = grossPnl - position.entryCommission - exitCommission;

    this.cashBalance += grossPnl - exitCommission;
    this.commissionPaid += exitCommission;
    this.realized += netPnl;
    this.open = null;

    const trade: TradeRecord = Object.freeze({
      side: position.side,
      quantity: position.quantity,
      entryTimestamp: position.entryTimestamp,
      exitTimestamp: bar.timestamp,
      entryPrice: position.entryPrice,
      exitPrice,
      grossPnl,
      commission: position.entryCommission + exitCommission,
      netPnl,
      reason,
    });
    this.trades.push(trade);
    return trade;
  }
}
