import { readFile } from "fs/promises";
import { getErrorCode, getErrorMessage } from "@slidesmith/utils";
import { collectAdvisoryWarnings } from "./advisory-rules";
import { SchemaRejectionError } from "./errors";
import { formatIssue } from "./issue-formatter";
import { presentationSchema, type PresentationSchema } from "./schema";
import { parseJsonSource } from "./source-checks";
import { checkStructuralRules } from "./structural-rules";

export interface ValidationReport {
  errors: string[];
  warnings: string[];
}

export type ValidationResult =
  | (ValidationReport & { valid: true; schema: PresentationSchema })
  | (ValidationReport & { valid: false });

function rejected(errors: string[], warnings: string[] = []): ValidationResult {
  return { valid: false, errors, warnings };
}

/**
 * Validate a parsed presentation document.
 * Never throws: every fault is collected into the report.
 */
export function validatePresentation(document: unknown): ValidationResult {
  const parsed = presentationSchema.safeParse(document);
  const errors = parsed.success ? [] : parsed.error.issues.map(formatIssue);
  errors.push(...checkStructuralRules(document));
  const warnings = collectAdvisoryWarnings(document);

  if (parsed.success && errors.length === 0) {
    return { valid: true, errors, warnings, schema: parsed.data };
  }
  return rejected(errors, warnings);
}

/**
 * Validate raw JSON text. Text that does not parse is rejected with its
 * syntax faults only.
 */
export function validateSource(source: string): ValidationResult {
  const parsed = parseJsonSource(source);
  if (!parsed.ok) {
    return rejected(parsed.errors);
  }
  return validatePresentation(parsed.data);
}

export async function validateFile(filePath: string): Promise<ValidationResult> {
  let source: string;
  try {
    source = await readFile(filePath, "utf-8");
  } catch (error) {
    if (getErrorCode(error) === "ENOENT") {
      return rejected([`file not found: ${filePath}`]);
    }
    return rejected([`cannot read ${filePath}: ${getErrorMessage(error)}`]);
  }
  return validateSource(source);
}

/**
 * Narrow a result to its schema, throwing the full report otherwise
 */
export function requireValidSchema(
  result: ValidationResult,
): PresentationSchema {
  if (!result.valid) {
    throw new SchemaRejectionError(result.errors, result.warnings);
  }
  return result.schema;
}
