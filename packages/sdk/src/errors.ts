export type ErrorCode =
  | "MALFORMED_DATA"
  | "EMPTY_SERIES"
  | "INVALID_CONFIG"
  | "INDICATOR_FAILED"
  | "STRATEGY_EXECUTION"
  | "RUN_ABORTED";

/**
 * Base class for every error raised by the backtesting core.
 * `code` is stable and safe to branch on; messages are for humans.
 */
export class SteptradeError extends Error {
  public readonly code: ErrorCode;

  public constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Input bars failed validation. Raised before any simulation step runs.
 */
export class MalformedDataError extends SteptradeError {
  /** Offending row, when the problem is attributable to one. */
  public readonly index: number | null;

  public constructor(
    message: string,
    details: { readonly index?: number } = {},
    code: "MALFORMED_DATA" | "EMPTY_SERIES" = "MALFORMED_DATA",
  ) {
    super(code, message);
    this.index = details.index ?? null;
  }
}

export class EmptySeriesError extends MalformedDataError {
  public readonly length: number;
  public readonly minLength: number;

  public constructor(length: number, minLength: number) {
    super(
      `Bar series has ${length} bar(s); at least ${minLength} required`,
      {},
      "EMPTY_SERIES",
    );
    this.length = length;
    this.minLength = minLength;
  }
}

export class InvalidConfigError extends SteptradeError {
  public readonly issues: ReadonlyArray<string>;

  public constructor(label: string, issues: ReadonlyArray<string>) {
    super("INVALID_CONFIG", `Invalid ${label}: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class IndicatorError extends SteptradeError {
  public readonly indicator: string;

  public constructor(indicator: string, message: string, options?: ErrorOptions) {
    super("INDICATOR_FAILED", `Indicator "${indicator}" ${message}`, options);
    this.indicator = indicator;
  }
}

/**
 * A strategy step failed. The run is abandoned and no report is produced.
 */
export class StrategyExecutionError extends SteptradeError {
  public readonly step: number;

  public constructor(step: number, cause: unknown) {
    super("STRATEGY_EXECUTION", `Strategy failed at step ${step}: ${describeCause(cause)}`, {
      cause,
    });
    this.step = step;
  }
}

export class RunAbortedError extends SteptradeError {
  public readonly step: number;

  public constructor(step: number, reason?: unknown) {
    super("RUN_ABORTED", `Run aborted before step ${step}`, { cause: reason });
    this.step = step;
  }
}

export const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) {
    return cause.message;
  }
  if (typeof cause === "string") {
    return cause;
  }
  return String(cause);
};
