import { vi } from "vitest";
import type { Mock } from "vitest";

/**
 * Type for a fetch handler used in tests
 */
export type FetchHandler = (
  url: string,
  options?: RequestInit,
) => Promise<Response>;

/**
 * Replace the global `fetch` with a mock function.
 * Undo with `vi.unstubAllGlobals()`.
 *
 * @example
 * ```ts
 * afterEach(() => { vi.unstubAllGlobals(); });
 *
 * mockFetch(() => Promise.resolve(new Response(pngBytes, { status: 200 })));
 * ```
 */
export function mockFetch(handler: FetchHandler): Mock<FetchHandler> {
  const fetchMock = vi.fn(handler);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}
