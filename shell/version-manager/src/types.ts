import { z } from "@slidesmith/utils";

/**
 * Version metadata persisted as version.json in each version directory
 */
export const versionMetadataSchema = z.object({
  version: z.number().int().min(1),
  created_at: z.string(),
  previous_version: z.number().int().min(1).nullable(),
});

export type VersionMetadata = z.infer<typeof versionMetadataSchema>;

export interface BuildVersionRef {
  version: number;
  dir: string;
}

/**
 * Numbered build history of one project.
 *
 * Versions are strictly increasing and gaps are never filled: the next
 * version is always the highest existing one plus one. After a successful
 * build the current pointer resolves to the highest version.
 */
export interface VersionManager {
  /** Existing versions in ascending order; malformed names are ignored */
  listVersions(projectDir: string): Promise<BuildVersionRef[]>;
  nextVersion(projectDir: string): Promise<number>;
  latestVersion(projectDir: string): Promise<BuildVersionRef | undefined>;
  /**
   * Highest version holding readable metadata. Directories left by builds
   * that never finalized have none and are passed over.
   */
  latestCompleteVersion(projectDir: string): Promise<BuildVersionRef | undefined>;
  /** Create the next version directory, claiming it exclusively */
  allocateVersion(projectDir: string): Promise<BuildVersionRef>;
  /**
   * Copy an unversioned output directory into version 1.
   * Does nothing (returns undefined) once any version exists or when there
   * is nothing to migrate.
   */
  migrateLegacy(
    legacyDir: string,
    projectDir: string,
  ): Promise<BuildVersionRef | undefined>;
  /**
   * Copy files of `assetsDirName` in the previous version that the new
   * version does not have yet. Returns the number of files copied.
   */
  carryForward(
    previousVersionDir: string,
    newVersionDir: string,
    assetsDirName: string,
  ): Promise<number>;
  writeVersionMetadata(
    versionDir: string,
    version: number,
    previousVersion: number | null,
  ): Promise<VersionMetadata>;
  readVersionMetadata(versionDir: string): Promise<VersionMetadata | undefined>;
  /** Point `current` at the given version; throws PointerError on failure */
  updateCurrentPointer(projectDir: string, version: number): Promise<void>;
}

const VERSION_DIR_PATTERN = /^v([1-9]\d*)$/;

export function versionDirName(version: number): string {
  return `v${version}`;
}

export function parseVersionDirName(name: string): number | undefined {
  const match = VERSION_DIR_PATTERN.exec(name);
  return match?.[1] ? Number(match[1]) : undefined;
}
