import { z } from "@slidesmith/utils";

/**
 * Build orchestrator configuration schema
 */
export const buildConfigSchema = z.object({
  /** Root of unversioned and versioned project directories */
  outputRoot: z.string().default("build"),
  assetsDirName: z.string().default("assets_generated"),
  schemaFileName: z.string().default("presentation_schema.json"),
  runtimeSlidesFileName: z.string().default("slides_runtime.json"),
  /** Directory holding presentation.html and README.md for the viewer */
  templateDir: z.string().optional(),
});

export type BuildConfig = z.infer<typeof buildConfigSchema>;
export type BuildConfigInput = z.input<typeof buildConfigSchema>;
