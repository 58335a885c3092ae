import type { z } from "zod";

import { InvalidConfigError } from "./errors.js";

/**
 * Flattens zod issues into `path: message` strings.
 */
export const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => {
    const path = issue.path.join(".") || "(root)";
    return `${path}: ${issue.message}`;
  });

/**
 * Validates the supplied payload against the provided schema.
 *
 * @param label - Descriptive label for error reporting.
 * @returns The parsed payload, defaults applied.
 * @throws InvalidConfigError when validation fails.
 */
export function assertValid<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  label = "payload",
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidConfigError(label, formatIssues(parsed.error));
  }
  return parsed.data;
}
