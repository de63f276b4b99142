import { z } from "@slidesmith/utils";
import { retryPolicySchema } from "@slidesmith/assets";

export const LOG_LEVEL_NAMES = [
  "silly",
  "verbose",
  "debug",
  "info",
  "warn",
  "error",
  "none",
] as const;

/**
 * Optional slidesmith.config.yaml in the working directory
 */
export const cliConfigSchema = z
  .object({
    outputRoot: z
      .string()
      .describe("Root of the build output, relative to the working directory")
      .optional(),
    templateDir: z
      .string()
      .describe("Directory with presentation.html and README.md")
      .optional(),
    logLevel: z.enum(LOG_LEVEL_NAMES).optional(),
    concurrency: z
      .number()
      .int()
      .min(1)
      .describe("Assets generated at the same time")
      .optional(),
    generation: retryPolicySchema.optional(),
    download: retryPolicySchema.optional(),
  })
  .strict();

export type CLIConfig = z.infer<typeof cliConfigSchema>;
