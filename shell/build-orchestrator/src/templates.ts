import { existsSync } from "fs";
import { join } from "path";
import { copyFileAtomic } from "@slidesmith/utils";

/**
 * Viewer files copied into every build: [template name, name in the build]
 */
export const TEMPLATE_FILES: ReadonlyArray<readonly [string, string]> = [
  ["presentation.html", "index.html"],
  ["README.md", "README.md"],
];

/**
 * Copy the viewer templates into a build directory.
 * Returns one warning per template that does not exist.
 */
export async function copyTemplates(
  templateDir: string,
  buildDir: string,
): Promise<string[]> {
  const warnings: string[] = [];

  for (const [source, target] of TEMPLATE_FILES) {
    const sourcePath = join(templateDir, source);
    if (!existsSync(sourcePath)) {
      warnings.push(`template not found: ${sourcePath}`);
      continue;
    }
    await copyFileAtomic(sourcePath, join(buildDir, target));
  }
  return warnings;
}
