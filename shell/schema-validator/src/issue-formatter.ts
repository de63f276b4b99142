import { z } from "@slidesmith/utils";
import type { ZodIssue } from "@slidesmith/utils";

/**
 * Render an issue path as `slides[1].background.filename`
 */
export function formatPath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>((formatted, segment) => {
    if (typeof segment === "number") return `${formatted}[${segment}]`;
    return formatted ? `${formatted}.${segment}` : segment;
  }, "");
}

/**
 * Turn a zod issue into a single report line that names the field path
 */
export function formatIssue(issue: ZodIssue): string {
  const path = formatPath(issue.path) || "document";

  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      if (issue.received === z.ZodParsedType.undefined) {
        return `${path} is required`;
      }
      return `${path} must be ${issue.expected}, got ${issue.received}`;

    case z.ZodIssueCode.invalid_enum_value:
      return `${path} must be one of: ${issue.options.join(", ")}, got: ${String(issue.received)}`;

    default:
      return `${path} ${issue.message}`;
  }
}
