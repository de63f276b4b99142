/**
 * Centralized Zod exports for the whole workspace.
 * This provides a single point of control for Zod versioning.
 */

import type { ZodIssue } from "zod";

export { z, ZodError } from "zod";

export type { ZodIssue, ZodType, ZodSchema, ZodTypeAny } from "zod";

/**
 * One-line summary of zod issues, e.g. `concurrency: Expected number, received string`
 */
export function formatZodIssues(issues: readonly ZodIssue[]): string {
  return issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    )
    .join("; ");
}
