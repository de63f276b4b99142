/**
 * Extract a human-readable error message from an unknown error value.
 * Handles Error objects, strings, and other types.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap a non-Error throwable so it can be rethrown or chained as a cause
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Read the `code` of a Node.js system error (ENOENT, EEXIST, ...)
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  const { code } = error;
  return typeof code === "string" ? code : undefined;
}
