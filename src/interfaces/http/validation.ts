import type { z } from "zod";

import { ValidationError } from "@domain/errors";

/**
 * Parses an HTTP input against its schema. Failures become a 400
 * ValidationError carrying the zod issues as details.
 */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  label = "request"
): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${label}`, {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }
  return parsed.data;
}
