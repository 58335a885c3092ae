export {
  DEFAULT_RUN_CONFIG,
  RunConfigSchema,
  resolveRunConfig,
  type RunConfig,
  type RunConfigInput,
} from "./config.js";
export { BacktestRunner, runBacktest, type BacktestRunnerOptions } from "./engine.js";
export { IndicatorEngine } from "./indicatorEngine.js";
export { Ledger, type LedgerSettings } from "./ledger.js";
export { createStrategy, findStrategy } from "./registry.js";
export { buildReport, type ReportInput } from "./report.js";
export type {
  BacktestReport,
  EquityPoint,
  ExitReason,
  OpenPosition,
  TradeRecord,
  TradeSide,
} from "./types.js";
