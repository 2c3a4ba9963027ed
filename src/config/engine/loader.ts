/**
 * Engine options loader and validator.
 *
 * Responsible for:
 * - Merging partial overrides onto the defaults
 * - Validating against the schema with fail-fast behavior
 * - Freezing the result to enforce immutability
 */

import type { ZodIssue } from "zod";
import { EngineOptionsSchema, type EngineOptions } from "./schema.js";
import { DEFAULT_ENGINE_OPTIONS } from "./defaults.js";

/**
 * Individual validation issue.
 */
export interface EngineConfigIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

/**
 * Structured validation error for engine options.
 */
export class EngineConfigError extends Error {
  public readonly issues: EngineConfigIssue[];

  constructor(message: string, issues: EngineConfigIssue[]) {
    super(message);
    this.name = "EngineConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Engine options validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

function toIssues(zodIssues: ZodIssue[]): EngineConfigIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate and load engine options.
 *
 * @param overrides - Partial options; anything omitted comes from the defaults
 * @returns Validated and frozen options
 * @throws EngineConfigError if validation fails
 *
 * @example
 *   const options = loadEngineOptions({ strictConcepts: true });
 */
export function loadEngineOptions(overrides: unknown = {}): Readonly<EngineOptions> {
  const input =
    overrides !== null && typeof overrides === "object"
      ? { ...DEFAULT_ENGINE_OPTIONS, ...overrides }
      : overrides;

  const result = EngineOptionsSchema.safeParse(input);

  if (!result.success) {
    const issues = toIssues(result.error.issues);
    throw new EngineConfigError(
      `Invalid engine options: ${issues.length} validation error(s)`,
      issues
    );
  }

  return Object.freeze(result.data);
}
