/**
 * Slidesmith Utils Package
 *
 * Shared utilities used across the build pipeline packages.
 */

// Logger
export { Logger, LogLevel, parseLogLevel } from "./logger";
export type { LoggerOptions } from "./logger";

// Progress utilities
export { ProgressReporter } from "./progress";
export type { ProgressCallback, ProgressNotification } from "./progress";

// Error utilities
export { getErrorMessage, getErrorCode, toError } from "./error";

// ID generation
export { createId } from "./id";

// File utilities
export {
  writeFileAtomic,
  copyFileAtomic,
  isPartialFile,
  partialFileName,
} from "./atomic-write";

// YAML
export { fromYaml } from "./yaml";

// Zod
export { z, ZodError, formatZodIssues } from "./zod";
export type { ZodIssue, ZodType, ZodSchema, ZodTypeAny } from "./zod";
