/**
 * Zod validation with strict / lenient modes.
 * LENIENT drops the offending top-level fields and falls back to defaults,
 * logging a warning; STRICT throws.
 */

import type { z } from "zod";
import { ValidationMode } from "../../types/layout.types";
import { layoutLogger } from "../logger";

export class ShapingOptionsError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid shaping options: ${issues.join("; ")}`);
    this.name = "ShapingOptionsError";
    this.issues = issues;
  }
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`);
}

function withoutKeys(data: unknown, keys: ReadonlySet<string>): unknown {
  if (typeof data !== "object" || data === null || Array.isArray(data)) return {};
  return Object.fromEntries(Object.entries(data).filter(([key]) => !keys.has(key)));
}

/**
 * Validate data against `schema` in the given mode.
 */
export function validateWithMode<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  mode: ValidationMode = ValidationMode.LENIENT
): { success: boolean; data: z.output<S>; errors: string[] } {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data, errors: [] };
  }

  const errors = describeIssues(result.error);
  if (mode === ValidationMode.STRICT) {
    throw new ShapingOptionsError(errors);
  }

  layoutLogger.warn("Validation", "lenientFallback", { errorCount: errors.length, errors });

  const invalidKeys = new Set(
    result.error.issues.map((issue) => String(issue.path[0] ?? "")).filter((key) => key !== "")
  );
  const pruned = schema.safeParse(withoutKeys(data, invalidKeys));
  if (pruned.success) {
    return { success: false, data: pruned.data, errors };
  }

  const defaults = schema.safeParse({});
  if (defaults.success) {
    return { success: false, data: defaults.data, errors };
  }
  throw new ShapingOptionsError(errors);
}
