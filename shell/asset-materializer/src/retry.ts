import pRetry, { AbortError } from "p-retry";
import { setTimeout as sleep } from "timers/promises";
import { toError } from "@slidesmith/utils";
import type { Logger } from "@slidesmith/utils";
import type { RetryPolicy } from "./config";

export interface RetryOptions {
  operation: string;
  policy: RetryPolicy;
  /** Errors for which this returns false fail at once */
  isRetryable: (error: unknown) => boolean;
  signal?: AbortSignal | undefined;
}

export class RetryHandler {
  constructor(private readonly logger?: Logger) {}

  /**
   * Run `fn` up to `policy.attempts` times, waiting delayMs × attempt
   * between attempts. Rejects with the last error.
   */
  public async retry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
    const { operation, policy, isRetryable, signal } = options;

    return pRetry(
      async () => {
        try {
          return await fn();
        } catch (error) {
          if (!isRetryable(error)) {
            throw new AbortError(toError(error));
          }
          throw toError(error);
        }
      },
      {
        retries: policy.attempts - 1,
        factor: 1,
        minTimeout: 0,
        maxTimeout: 0,
        randomize: false,
        ...(signal ? { signal } : {}),
        onFailedAttempt: async (error) => {
          if (error.retriesLeft === 0) return;

          const waitMs = policy.delayMs * error.attemptNumber;
          this.logger?.warn(
            `${operation} attempt ${error.attemptNumber}/${policy.attempts} failed, retrying in ${waitMs}ms: ${error.message}`,
          );
          await sleep(waitMs, undefined, signal ? { signal } : {});
        },
      },
    );
  }
}
