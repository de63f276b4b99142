import { copyFile, rename, rm, writeFile } from "fs/promises";
import { basename, dirname, join } from "path";
import { createId } from "./id";

const PARTIAL_SUFFIX = ".partial";

/**
 * Name of the hidden sibling a file is written to before it is renamed
 * into place, e.g. `.SLIDE-01-Intro.png.k3j2h1g0f9e8.partial`
 */
export function partialFileName(fileName: string): string {
  return `.${fileName}.${createId()}${PARTIAL_SUFFIX}`;
}

export function isPartialFile(fileName: string): boolean {
  return fileName.startsWith(".") && fileName.endsWith(PARTIAL_SUFFIX);
}

/**
 * Write a file so that it either appears complete under its final name or
 * not at all. The partial file is removed when the write fails.
 */
export async function writeFileAtomic(
  filePath: string,
  data: string | Uint8Array,
): Promise<void> {
  const partialPath = join(dirname(filePath), partialFileName(basename(filePath)));

  try {
    await writeFile(partialPath, data);
    await rename(partialPath, filePath);
  } catch (error) {
    await rm(partialPath, { force: true });
    throw error;
  }
}

/**
 * Copy a file with the same all-or-nothing guarantee as writeFileAtomic
 */
export async function copyFileAtomic(
  sourcePath: string,
  targetPath: string,
): Promise<void> {
  const partialPath = join(dirname(targetPath), partialFileName(basename(targetPath)));

  try {
    await copyFile(sourcePath, partialPath);
    await rename(partialPath, targetPath);
  } catch (error) {
    await rm(partialPath, { force: true });
    throw error;
  }
}
