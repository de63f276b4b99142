export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Walk nested records, stopping at the first segment that is not a record
 */
export function getSection(
  document: unknown,
  path: readonly string[],
): unknown {
  let current: unknown = document;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}
