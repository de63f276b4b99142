import { load } from "js-yaml";

/**
 * Parse YAML text. The result is unchecked; validate it with a schema.
 */
export function fromYaml(text: string): unknown {
  return load(text);
}
