export {
  FileSystemVersionManager,
  CURRENT_POINTER_NAME,
  VERSION_METADATA_FILE,
} from "./fs-version-manager";
export type { FileSystemVersionManagerOptions } from "./fs-version-manager";

export {
  versionMetadataSchema,
  versionDirName,
  parseVersionDirName,
} from "./types";
export type { BuildVersionRef, VersionManager, VersionMetadata } from "./types";

export { StructuralError, MigrationError, PointerError } from "./errors";
