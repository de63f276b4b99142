/**
 * Progress notification for long-running operations
 */
export interface ProgressNotification {
  progress: number;
  total?: number | undefined;
  message?: string | undefined;
}

/**
 * Progress callback type
 */
export type ProgressCallback = (
  notification: ProgressNotification,
) => void | Promise<void>;

/**
 * Thin wrapper around an optional progress callback
 *
 * @example
 * ```typescript
 * const progress = ProgressReporter.from(onProgress);
 *
 * await progress?.report({
 *   message: "SLIDE-01-Intro.png generated",
 *   progress: 1,
 *   total: 12,
 * });
 * ```
 */
export class ProgressReporter {
  private constructor(private readonly callback: ProgressCallback) {}

  /**
   * Create a progress reporter from a callback
   */
  static from(
    callback: ProgressCallback | undefined,
  ): ProgressReporter | undefined {
    if (!callback) return undefined;
    return new ProgressReporter(callback);
  }

  async report(notification: ProgressNotification): Promise<void> {
    await this.callback(notification);
  }

  /**
   * Get the underlying callback function
   */
  toCallback(): ProgressCallback {
    return this.callback;
  }
}
