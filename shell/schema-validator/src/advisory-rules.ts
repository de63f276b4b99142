import { LAYOUT_NAMES, isCssSize } from "./field-validators";
import { getSection, isRecord } from "./guards";

const TYPOGRAPHY_SIZE_FIELDS = [
  "title_size",
  "subtitle_size",
  "body_size",
  "small_size",
] as const;

function cssSizeWarning(path: string, value: unknown): string[] {
  if (typeof value !== "string" || isCssSize(value)) return [];
  return [`${path} should use valid CSS units, got: ${value}`];
}

/**
 * Layout tokens are advisory: a malformed size is a warning, never an error
 */
export function collectAdvisoryWarnings(document: unknown): string[] {
  const warnings: string[] = [];

  const typography = getSection(document, ["visual_identity", "typography"]);
  if (isRecord(typography)) {
    for (const field of TYPOGRAPHY_SIZE_FIELDS) {
      warnings.push(
        ...cssSizeWarning(
          `visual_identity.typography.${field}`,
          typography[field],
        ),
      );
    }
  }

  const layouts = getSection(document, ["layout_system", "layouts"]);
  if (isRecord(layouts)) {
    for (const name of LAYOUT_NAMES) {
      warnings.push(
        ...cssSizeWarning(
          `layout_system.layouts.${name}.max_width`,
          getSection(layouts, [name, "max_width"]),
        ),
      );
    }
  }

  return warnings;
}
