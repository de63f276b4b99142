import { existsSync } from "fs";
import type { Dirent } from "fs";
import { cp, mkdir, readFile, readdir, rename, rm, symlink } from "fs/promises";
import { join } from "path";
import {
  copyFileAtomic,
  createId,
  getErrorCode,
  getErrorMessage,
  isPartialFile,
  writeFileAtomic,
} from "@slidesmith/utils";
import type { Logger } from "@slidesmith/utils";
import { MigrationError, PointerError, StructuralError } from "./errors";
import {
  parseVersionDirName,
  versionDirName,
  versionMetadataSchema,
} from "./types";
import type { BuildVersionRef, VersionManager, VersionMetadata } from "./types";

export const CURRENT_POINTER_NAME = "current";
export const VERSION_METADATA_FILE = "version.json";

export interface FileSystemVersionManagerOptions {
  logger: Logger;
  /** Clock used for created_at */
  now?: (() => Date) | undefined;
}

/**
 * Version history kept as `v<N>` directories next to a `current` symlink
 *
 * ```
 * build/<short_name>/
 *   v1/  v2/  v4/
 *   current -> v4
 * ```
 */
export class FileSystemVersionManager implements VersionManager {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: FileSystemVersionManagerOptions) {
    this.logger = options.logger.child("FileSystemVersionManager");
    this.now = options.now ?? ((): Date => new Date());
  }

  public async listVersions(projectDir: string): Promise<BuildVersionRef[]> {
    const entries = await this.readEntries(projectDir);

    return entries
      .filter((entry) => entry.isDirectory())
      .flatMap((entry) => {
        const version = parseVersionDirName(entry.name);
        return version === undefined
          ? []
          : [{ version, dir: join(projectDir, entry.name) }];
      })
      .sort((a, b) => a.version - b.version);
  }

  public async nextVersion(projectDir: string): Promise<number> {
    const latest = await this.latestVersion(projectDir);
    return latest ? latest.version + 1 : 1;
  }

  public async latestVersion(
    projectDir: string,
  ): Promise<BuildVersionRef | undefined> {
    const versions = await this.listVersions(projectDir);
    return versions[versions.length - 1];
  }

  public async latestCompleteVersion(
    projectDir: string,
  ): Promise<BuildVersionRef | undefined> {
    const versions = await this.listVersions(projectDir);

    for (const candidate of versions.reverse()) {
      try {
        if (await this.readVersionMetadata(candidate.dir)) {
          return candidate;
        }
        this.logger.debug(`Skipping unfinished version ${candidate.version}`);
      } catch (error) {
        if (!(error instanceof StructuralError)) throw error;
        this.logger.warn(`Skipping version ${candidate.version}: ${error.message}`);
      }
    }
    return undefined;
  }

  public async allocateVersion(projectDir: string): Promise<BuildVersionRef> {
    try {
      await mkdir(projectDir, { recursive: true });
    } catch (error) {
      throw new StructuralError(
        `Cannot create project directory ${projectDir}: ${getErrorMessage(error)}`,
        { projectDir },
        error,
      );
    }

    // mkdir without recursive fails on EEXIST, so a racing build takes the next number
    for (let version = await this.nextVersion(projectDir); ; version++) {
      const dir = join(projectDir, versionDirName(version));
      try {
        await mkdir(dir);
        this.logger.info(`Allocated version ${version}`, { dir });
        return { version, dir };
      } catch (error) {
        if (getErrorCode(error) === "EEXIST") continue;
        throw new StructuralError(
          `Cannot create version directory ${dir}: ${getErrorMessage(error)}`,
          { projectDir, version },
          error,
        );
      }
    }
  }

  public async migrateLegacy(
    legacyDir: string,
    projectDir: string,
  ): Promise<BuildVersionRef | undefined> {
    if ((await this.listVersions(projectDir)).length > 0) {
      return undefined;
    }

    const legacyEntries = (await this.readEntries(legacyDir)).filter(
      (entry) =>
        entry.name !== CURRENT_POINTER_NAME &&
        parseVersionDirName(entry.name) === undefined,
    );
    if (legacyEntries.length === 0) {
      return undefined;
    }

    const dir = join(projectDir, versionDirName(1));
    this.logger.info("Migrating legacy output to version 1", {
      legacyDir,
      entries: legacyEntries.length,
    });

    try {
      await mkdir(dir, { recursive: true });
      for (const entry of legacyEntries) {
        await cp(join(legacyDir, entry.name), join(dir, entry.name), {
          recursive: true,
        });
      }
      await this.writeVersionMetadata(dir, 1, null);
    } catch (error) {
      // a half-copied v1 would block any later migration
      await rm(dir, { recursive: true, force: true });
      throw new MigrationError(
        `Cannot migrate legacy output from ${legacyDir}: ${getErrorMessage(error)}`,
        { legacyDir, projectDir },
        error,
      );
    }

    return { version: 1, dir };
  }

  public async carryForward(
    previousVersionDir: string,
    newVersionDir: string,
    assetsDirName: string,
  ): Promise<number> {
    const sourceDir = join(previousVersionDir, assetsDirName);
    const targetDir = join(newVersionDir, assetsDirName);

    const assets = (await this.readEntries(sourceDir)).filter(
      (entry) => entry.isFile() && !isPartialFile(entry.name),
    );

    let copied = 0;
    try {
      await mkdir(targetDir, { recursive: true });
      for (const asset of assets) {
        const target = join(targetDir, asset.name);
        if (existsSync(target)) continue;

        await copyFileAtomic(join(sourceDir, asset.name), target);
        copied += 1;
      }
    } catch (error) {
      throw new StructuralError(
        `Cannot carry assets forward into ${targetDir}: ${getErrorMessage(error)}`,
        { previousVersionDir, newVersionDir, copied },
        error,
      );
    }

    this.logger.info(`Carried forward ${copied} assets`, {
      from: previousVersionDir,
      available: assets.length,
    });
    return copied;
  }

  public async writeVersionMetadata(
    versionDir: string,
    version: number,
    previousVersion: number | null,
  ): Promise<VersionMetadata> {
    const metadata: VersionMetadata = {
      version,
      created_at: this.now().toISOString(),
      previous_version: previousVersion,
    };

    try {
      await writeFileAtomic(
        join(versionDir, VERSION_METADATA_FILE),
        `${JSON.stringify(metadata, null, 2)}\n`,
      );
    } catch (error) {
      throw new StructuralError(
        `Cannot write version metadata in ${versionDir}: ${getErrorMessage(error)}`,
        { versionDir, version },
        error,
      );
    }
    return metadata;
  }

  public async readVersionMetadata(
    versionDir: string,
  ): Promise<VersionMetadata | undefined> {
    const path = join(versionDir, VERSION_METADATA_FILE);

    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch (error) {
      if (getErrorCode(error) === "ENOENT") return undefined;
      throw new StructuralError(
        `Cannot read version metadata ${path}: ${getErrorMessage(error)}`,
        { path },
        error,
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new StructuralError(`Version metadata ${path} is not valid JSON`, { path }, error);
    }

    const parsed = versionMetadataSchema.safeParse(data);
    if (!parsed.success) {
      throw new StructuralError(`Version metadata ${path} is malformed`, {
        path,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    return parsed.data;
  }

  public async updateCurrentPointer(
    projectDir: string,
    version: number,
  ): Promise<void> {
    const target = versionDirName(version);
    const pointer = join(projectDir, CURRENT_POINTER_NAME);
    const temporary = join(projectDir, `.${CURRENT_POINTER_NAME}.${createId()}.tmp`);

    try {
      if (!existsSync(join(projectDir, target))) {
        throw new Error(`version directory ${target} does not exist`);
      }
      await symlink(target, temporary, "dir");
      await rename(temporary, pointer);
    } catch (error) {
      await rm(temporary, { force: true });
      throw new PointerError(
        `Cannot point ${CURRENT_POINTER_NAME} at ${target}: ${getErrorMessage(error)}`,
        { projectDir, version },
        error,
      );
    }

    this.logger.debug(`${CURRENT_POINTER_NAME} -> ${target}`, { projectDir });
  }

  /**
   * Directory entries, or none when the directory does not exist
   */
  private async readEntries(dir: string): Promise<Dirent[]> {
    try {
      return await readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (getErrorCode(error) === "ENOENT") return [];
      throw new StructuralError(
        `Cannot read directory ${dir}: ${getErrorMessage(error)}`,
        { dir },
        error,
      );
    }
  }
}
