import { getErrorCode } from "@slidesmith/utils";

/**
 * Network or connection failure worth retrying
 */
export class TransientIOError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "TransientIOError";
  }
}

/**
 * Generator refused or failed the request for good
 */
export class GenerationError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "GenerationError";
  }
}

/**
 * Download answered with a status that will not change on retry
 */
export class DownloadError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "DownloadError";
  }
}

/**
 * Bytes could not be decoded as an image
 */
export class ImageDecodeError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ImageDecodeError";
  }
}

const TRANSIENT_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EPIPE",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

/**
 * Transient failure class: TransientIOError or a connection-level error
 * code, directly or anywhere in the cause chain
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof TransientIOError) return true;

  const code = getErrorCode(error);
  if (code !== undefined && TRANSIENT_ERROR_CODES.has(code)) return true;

  if (error instanceof Error && error.cause !== undefined && error.cause !== error) {
    return isTransientError(error.cause);
  }
  return false;
}
