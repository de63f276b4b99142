import { getErrorMessage } from "@slidesmith/utils";
import { DownloadError, ImageDecodeError, TransientIOError } from "./errors";
import { decodeDataUrl, detectImageFormat, isDataUrl } from "./lib/image-utils";

export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 30_000;

/**
 * Statuses a later attempt may see differently
 */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Fetch the bytes of a generated image.
 *
 * `data:` URLs are decoded in place. HTTP failures that may clear up
 * (network errors, timeouts, 408/429/5xx) throw TransientIOError; other
 * statuses throw DownloadError. A body that is not an image throws
 * ImageDecodeError.
 */
export async function fetchImageBytes(
  url: string,
  signal?: AbortSignal,
  timeoutMs: number = DEFAULT_DOWNLOAD_TIMEOUT_MS,
): Promise<Uint8Array> {
  if (isDataUrl(url)) {
    try {
      return decodeDataUrl(url);
    } catch (error) {
      throw new ImageDecodeError(getErrorMessage(error), { url: "data:" });
    }
  }

  const timeout = AbortSignal.timeout(timeoutMs);
  const requestSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;

  let response: Response;
  try {
    response = await fetch(url, { signal: requestSignal });
  } catch (error) {
    if (signal?.aborted) throw error;
    throw new TransientIOError(
      `Failed to fetch image: ${getErrorMessage(error)}`,
      { url },
    );
  }

  if (!response.ok) {
    const message = `Failed to fetch image: ${response.status} ${response.statusText}`;
    if (isTransientStatus(response.status)) {
      throw new TransientIOError(message, { url, status: response.status });
    }
    throw new DownloadError(message, { url, status: response.status });
  }

  let data: Uint8Array;
  try {
    data = new Uint8Array(await response.arrayBuffer());
  } catch (error) {
    if (signal?.aborted) throw error;
    throw new TransientIOError(
      `Failed to read image body: ${getErrorMessage(error)}`,
      { url },
    );
  }

  if (!detectImageFormat(data)) {
    throw new ImageDecodeError("URL does not point to an image", {
      url,
      contentType: response.headers.get("content-type"),
    });
  }
  return data;
}
