import { z } from "zod";

import { assertValid } from "@steptrade/sdk";

export const RunConfigSchema = z
  .object({
    initialCash: z.number().finite().positive().default(50_000),
    /** Units traded per open. */
    positionSize: z.number().finite().positive().default(100),
    /** Fraction of notional charged on every open and every close. */
    commissionRate: z.number().finite().min(0).lt(1).default(0),
    /** Leverage multiplier applied to notional per unit. */
    amount: z.number().finite().positive().default(1),
    /** Close a position still open after the last bar. */
    closeOnFinish: z.boolean().default(false),
  })
  .strict();

export type RunConfigInput = z.input<typeof RunConfigSchema>;
export type RunConfig = z.output<typeof RunConfigSchema>;

export const DEFAULT_RUN_CONFIG: RunConfig = Object.freeze(RunConfigSchema.parse({}));

/**
 * Applies defaults and checks every option, reporting all violations at once.
 *
 * @throws InvalidConfigError
 */
export const resolveRunConfig = (input: unknown = {}): RunConfig =>
  Object.freeze(assertValid(RunConfigSchema, input, "run config"));
