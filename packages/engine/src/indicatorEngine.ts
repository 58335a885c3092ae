import type { BarSeries } from "@steptrade/data";
import {
  describeCause,
  IndicatorError,
  toIndicatorValue,
  type IndicatorFunction,
  type IndicatorHandle,
  type IndicatorRegistry,
  type IndicatorSeries,
  type IndicatorValue,
  type SourceSelector,
  type SourceView,
} from "@steptrade/sdk";

interface Definition {
  readonly handle: IndicatorHandle;
  readonly evaluate: (view: SourceView) => IndicatorSeries;
}

const formatParam = (param: unknown): string => {
  if (typeof param === "number" || typeof param === "string" || typeof param === "boolean") {
    return String(param);
  }
  return typeof param;
};

/** `sma(c,5)`: function name, source label, then params. */
const displayName = (fnName: string, sourceLabel: string, params: ReadonlyArray<unknown>): string =>
  `${fnName}(${[sourceLabel, ...params.map(formatParam)].join(",")})`;

/**
 * Owns the indicators of one run. Every {@link advance} recomputes each
 * indicator, in definition order, over bars `0..step`; nothing past the
 * current step is ever visible to an indicator or a reader.
 */
export class IndicatorEngine implements IndicatorRegistry {
  private readonly definitions: Definition[] = [];
  private values = new Map<number, IndicatorSeries>();
  private currentStep = -1;

  public constructor(private readonly bars: BarSeries) {}

  public get step(): number {
    return this.currentStep;
  }

  /** Largest warm-up across defined indicators; 0 when there are none. */
  public get warmup(): number {
    return this.definitions.reduce((max, { handle }) => Math.max(max, handle.warmup), 0);
  }

  public get handles(): ReadonlyArray<IndicatorHandle> {
    return this.definitions.map(({ handle }) => handle);
  }

  /**
   * @throws IndicatorError after the first step, or when the declared
   * warm-up is not a positive integer.
   */
  public define<S, P extends unknown[]>(
    fn: IndicatorFunction<S, P>,
    source: SourceSelector<S>,
    ...params: P
  ): IndicatorHandle {
    const fnName = fn.indicatorName ?? (fn.name || "indicator");
    const name = displayName(fnName, source.label, params);
    if (this.currentStep >= 0) {
      throw new IndicatorError(name, "must be defined before the first step");
    }
    const ownWarmup = fn.warmup ? fn.warmup(...params) : 1;
    if (!Number.isInteger(ownWarmup) || ownWarmup < 1) {
      throw new IndicatorError(
        name,
        `declares a warm-up of ${ownWarmup}; expected a positive integer`,
      );
    }
    const handle: IndicatorHandle = Object.freeze({
      id: this.definitions.length,
      name,
      warmup: source.warmup + ownWarmup - 1,
    });
    this.definitions.push({ handle, evaluate: (view) => fn(source(view), ...params) });
    return handle;
  }

  /**
   * Re-evaluates every indicator on the window ending at `step`.
   *
   * @throws IndicatorError when a function throws or returns a misaligned series.
   */
  public advance(step: number): void {
    const window = this.bars.window(step);
    const values = new Map<number, IndicatorSeries>();
    const view: SourceView = {
      bars: window,
      values: (handle) => {
        const computed = values.get(handle.id);
        if (!computed) {
          throw new RangeError(`${handle.name} is not available here; define it first`);
        }
        return computed;
      },
    };

    for (const { handle, evaluate } of this.definitions) {
      values.set(handle.id, this.evaluateOne(handle, evaluate, view, window.length));
    }

    this.values = values;
    this.currentStep = step;
  }

  /**
   * Value of `handle` at `step` (the current step by default). `null` while
   * the indicator is warming up.
   *
   * @throws RangeError when `step` lies beyond the current step.
   */
  public valueAt(handle: IndicatorHandle, step = this.currentStep): IndicatorValue {
    if (!Number.isInteger(step) || step < 0) {
      throw new RangeError(`Step ${step} is not a valid bar index`);
    }
    if (step > this.currentStep) {
      throw new RangeError(
        `Cannot read ${handle.name} at step ${step}; the run is at step ${this.currentStep}`,
      );
    }
    return this.computed(handle)[step] ?? null;
  }

  /** Values of `handle` for bars `0..step`, aligned with the window. */
  public series(handle: IndicatorHandle): IndicatorSeries {
    return this.computed(handle);
  }

  private computed(handle: IndicatorHandle): IndicatorSeries {
    if (this.definitions[handle.id]?.handle !== handle) {
      throw new RangeError(`Unknown indicator ${handle.name}`);
    }
    return this.values.get(handle.id) ?? [];
  }

  private evaluateOne(
    handle: IndicatorHandle,
    evaluate: Definition["evaluate"],
    view: SourceView,
    expectedLength: number,
  ): IndicatorSeries {
    let raw: IndicatorSeries;
    try {
      raw = evaluate(view);
    } catch (error) {
      throw new IndicatorError(handle.name, `failed: ${describeCause(error)}`, { cause: error });
    }
    if (!Array.isArray(raw) || raw.length !== expectedLength) {
      const received = Array.isArray(raw) ? `${raw.length} values` : typeof raw;
      throw new IndicatorError(
        handle.name,
        `returned ${received} for a window of ${expectedLength} bars`,
      );
    }
    return Object.freeze(raw.map(toIndicatorValue));
  }
}
