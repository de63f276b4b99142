import { getSection } from "./guards";

/**
 * Report every entry whose key repeats an earlier entry's key
 */
function findDuplicates(
  entries: unknown,
  section: string,
  key: string,
): string[] {
  if (!Array.isArray(entries)) return [];

  const seen = new Set<string>();
  const errors: string[] = [];

  entries.forEach((entry: unknown, index) => {
    const value = getSection(entry, [key]);
    if (typeof value !== "string") return;

    if (seen.has(value)) {
      errors.push(
        `${section}[${index}].${key} must be unique, got duplicate: ${value}`,
      );
    }
    seen.add(value);
  });

  return errors;
}

/**
 * Cross-record rules: slide ids and icon filenames are unique.
 * Runs on the raw document so it still reports when other fields are broken.
 */
export function checkStructuralRules(document: unknown): string[] {
  return [
    ...findDuplicates(getSection(document, ["slides"]), "slides", "id"),
    ...findDuplicates(getSection(document, ["icons"]), "icons", "filename"),
  ];
}
