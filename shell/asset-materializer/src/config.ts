import { z } from "@slidesmith/utils";

/**
 * Bounded retry with linear backoff: the wait before retry n is delayMs × n
 */
export const retryPolicySchema = z.object({
  attempts: z.number().int().min(1),
  delayMs: z.number().int().min(0),
});

export type RetryPolicy = z.infer<typeof retryPolicySchema>;

/**
 * Asset materializer configuration schema
 */
export const materializerConfigSchema = z.object({
  /**
   * Number of assets processed at the same time
   */
  concurrency: z.number().int().min(1).default(1),
  /**
   * Retries around the generator call
   */
  generation: retryPolicySchema.default({ attempts: 3, delayMs: 5000 }),
  /**
   * Retries around download and decode of a generated image
   */
  download: retryPolicySchema.default({ attempts: 3, delayMs: 2000 }),
});

/**
 * Materializer configuration (output, with all defaults applied)
 */
export type MaterializerConfig = z.infer<typeof materializerConfigSchema>;

/**
 * Materializer configuration input (allows optional fields with defaults)
 */
export type MaterializerConfigInput = z.input<typeof materializerConfigSchema>;
