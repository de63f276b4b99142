/**
 * Schema rejected before any build work started.
 * Carries every fault found, not just the first one.
 */
export class SchemaRejectionError extends Error {
  constructor(
    public readonly errors: readonly string[],
    public readonly warnings: readonly string[] = [],
    public readonly context?: Record<string, unknown>,
  ) {
    super(`Schema validation failed with ${errors.length} error(s)`);
    this.name = "SchemaRejectionError";
  }
}
