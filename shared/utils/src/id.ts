import { nanoid } from "nanoid";

/**
 * Create a unique ID for general use
 * This wrapper allows for easy mocking in tests
 */
export function createId(size = 12): string {
  return nanoid(size);
}
