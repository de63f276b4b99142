import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  readlinkSync,
  writeFileSync,
} from "fs";
import { join } from "path";
import {
  createMockLogger,
  createSilentLogger,
  createTempDir,
  removeTempDir,
} from "@slidesmith/test-utils";
import {
  FileSystemVersionManager,
  PointerError,
  StructuralError,
} from "../src";

const fixedClock = (): Date => new Date("2024-03-01T12:00:00.000Z");

describe("FileSystemVersionManager", () => {
  let rootDir: string;
  let projectDir: string;
  let versions: FileSystemVersionManager;

  beforeEach(async () => {
    rootDir = await createTempDir();
    projectDir = join(rootDir, "build", "test-deck");
    versions = new FileSystemVersionManager({
      logger: createSilentLogger(),
      now: fixedClock,
    });
  });

  afterEach(async () => {
    await removeTempDir(rootDir);
  });

  function makeDirs(...names: string[]): void {
    for (const name of names) {
      mkdirSync(join(projectDir, name), { recursive: true });
    }
  }

  describe("version discovery", () => {
    it("should start at 1 for a missing or empty project", async () => {
      expect(await versions.nextVersion(projectDir)).toBe(1);
      mkdirSync(projectDir, { recursive: true });
      expect(await versions.nextVersion(projectDir)).toBe(1);
      expect(await versions.latestVersion(projectDir)).toBeUndefined();
    });

    it("should not fill gaps", async () => {
      makeDirs("v1", "v2", "v4");

      expect(await versions.nextVersion(projectDir)).toBe(5);
      expect(await versions.latestVersion(projectDir)).toEqual({
        version: 4,
        dir: join(projectDir, "v4"),
      });
    });

    it("should pass over versions that never finalized", async () => {
      makeDirs("v1", "v2", "v3");
      await versions.writeVersionMetadata(join(projectDir, "v1"), 1, null);
      writeFileSync(join(projectDir, "v3", "version.json"), "{ broken");

      expect(await versions.latestCompleteVersion(projectDir)).toEqual({
        version: 1,
        dir: join(projectDir, "v1"),
      });
      expect(await versions.latestVersion(projectDir)).toEqual({
        version: 3,
        dir: join(projectDir, "v3"),
      });
    });

    it("should find no complete version in an empty project", async () => {
      expect(await versions.latestCompleteVersion(projectDir)).toBeUndefined();
    });

    it("should ignore malformed names and plain files", async () => {
      makeDirs("v2", "v10", "vx", "v", "v0", "v03", "version3", "assets_generated");
      writeFileSync(join(projectDir, "v7"), "not a directory");

      const listed = await versions.listVersions(projectDir);

      expect(listed.map((ref) => ref.version)).toEqual([2, 10]);
      expect(await versions.nextVersion(projectDir)).toBe(11);
    });
  });

  describe("allocateVersion", () => {
    it("should create the next version directory", async () => {
      makeDirs("v1", "v2");

      const allocated = await versions.allocateVersion(projectDir);

      expect(allocated).toEqual({ version: 3, dir: join(projectDir, "v3") });
      expect(existsSync(join(projectDir, "v3"))).toBe(true);
    });

    it("should create the project directory on first use", async () => {
      const allocated = await versions.allocateVersion(projectDir);

      expect(allocated.version).toBe(1);
    });

    it("should give concurrent callers distinct versions", async () => {
      const [first, second] = await Promise.all([
        versions.allocateVersion(projectDir),
        versions.allocateVersion(projectDir),
      ]);

      expect([first?.version, second?.version].sort()).toEqual([1, 2]);
    });

    it("should raise StructuralError when the project path is a file", async () => {
      mkdirSync(join(rootDir, "build"), { recursive: true });
      writeFileSync(projectDir, "oops");

      await expect(versions.allocateVersion(projectDir)).rejects.toBeInstanceOf(
        StructuralError,
      );
    });
  });

  describe("migrateLegacy", () => {
    it("should copy unversioned output into v1 once", async () => {
      makeDirs("assets_generated");
      writeFileSync(join(projectDir, "assets_generated", "SLIDE-01-Intro.png"), "a");
      writeFileSync(join(projectDir, "slides_runtime.json"), "[]");

      const migrated = await versions.migrateLegacy(projectDir, projectDir);

      expect(migrated).toEqual({ version: 1, dir: join(projectDir, "v1") });
      expect(readdirSync(join(projectDir, "v1")).sort()).toEqual([
        "assets_generated",
        "slides_runtime.json",
        "version.json",
      ]);
      expect(
        readFileSync(join(projectDir, "v1", "assets_generated", "SLIDE-01-Intro.png"), "utf-8"),
      ).toBe("a");
      expect(await versions.readVersionMetadata(join(projectDir, "v1"))).toEqual({
        version: 1,
        created_at: "2024-03-01T12:00:00.000Z",
        previous_version: null,
      });

      expect(await versions.migrateLegacy(projectDir, projectDir)).toBeUndefined();
      expect(readdirSync(projectDir).sort()).toEqual([
        "assets_generated",
        "slides_runtime.json",
        "v1",
      ]);
    });

    it("should copy from a separate legacy directory", async () => {
      const legacyDir = join(rootDir, "old-output");
      mkdirSync(legacyDir, { recursive: true });
      writeFileSync(join(legacyDir, "index.html"), "<html></html>");

      const migrated = await versions.migrateLegacy(legacyDir, projectDir);

      expect(migrated?.version).toBe(1);
      expect(readFileSync(join(projectDir, "v1", "index.html"), "utf-8")).toBe(
        "<html></html>",
      );
    });

    it("should do nothing when versions already exist", async () => {
      makeDirs("v3");
      writeFileSync(join(projectDir, "slides_runtime.json"), "[]");

      expect(await versions.migrateLegacy(projectDir, projectDir)).toBeUndefined();
      expect(existsSync(join(projectDir, "v1"))).toBe(false);
    });

    it("should do nothing when there is no legacy content", async () => {
      expect(await versions.migrateLegacy(projectDir, projectDir)).toBeUndefined();
      mkdirSync(projectDir, { recursive: true });
      expect(await versions.migrateLegacy(projectDir, projectDir)).toBeUndefined();
      expect(existsSync(join(projectDir, "v1"))).toBe(false);
    });

    it("should raise StructuralError when the project path is a file", async () => {
      const legacyDir = join(rootDir, "old-output");
      mkdirSync(legacyDir, { recursive: true });
      writeFileSync(join(legacyDir, "index.html"), "x");
      mkdirSync(join(rootDir, "build"), { recursive: true });
      writeFileSync(projectDir, "oops");

      await expect(versions.migrateLegacy(legacyDir, projectDir)).rejects.toBeInstanceOf(
        StructuralError,
      );
    });
  });

  describe("carryForward", () => {
    it("should copy only the assets the new version lacks", async () => {
      makeDirs("v1/assets_generated", "v2/assets_generated");
      writeFileSync(join(projectDir, "v1/assets_generated/A.png"), "old-a");
      writeFileSync(join(projectDir, "v1/assets_generated/B.png"), "old-b");
      writeFileSync(join(projectDir, "v2/assets_generated/A.png"), "new-a");

      const copied = await versions.carryForward(
        join(projectDir, "v1"),
        join(projectDir, "v2"),
        "assets_generated",
      );

      expect(copied).toBe(1);
      expect(readdirSync(join(projectDir, "v2/assets_generated")).sort()).toEqual([
        "A.png",
        "B.png",
      ]);
      expect(readFileSync(join(projectDir, "v2/assets_generated/A.png"), "utf-8")).toBe(
        "new-a",
      );
    });

    it("should skip partial files", async () => {
      makeDirs("v1/assets_generated", "v2");
      writeFileSync(join(projectDir, "v1/assets_generated/A.png"), "a");
      writeFileSync(join(projectDir, "v1/assets_generated/.B.png.abc.partial"), "half");

      const copied = await versions.carryForward(
        join(projectDir, "v1"),
        join(projectDir, "v2"),
        "assets_generated",
      );

      expect(copied).toBe(1);
      expect(readdirSync(join(projectDir, "v2/assets_generated"))).toEqual(["A.png"]);
    });

    it("should copy nothing when the previous version has no assets", async () => {
      makeDirs("v1", "v2");

      expect(
        await versions.carryForward(
          join(projectDir, "v1"),
          join(projectDir, "v2"),
          "assets_generated",
        ),
      ).toBe(0);
    });

    it("should use the given asset directory name", async () => {
      makeDirs("v1/images", "v1/assets_generated", "v2");
      writeFileSync(join(projectDir, "v1/images/A.png"), "a");
      writeFileSync(join(projectDir, "v1/assets_generated/B.png"), "b");

      expect(
        await versions.carryForward(join(projectDir, "v1"), join(projectDir, "v2"), "images"),
      ).toBe(1);
      expect(existsSync(join(projectDir, "v2/images/A.png"))).toBe(true);
    });
  });

  describe("version metadata", () => {
    it("should round-trip version.json", async () => {
      makeDirs("v2");
      const versionDir = join(projectDir, "v2");

      const written = await versions.writeVersionMetadata(versionDir, 2, 1);

      expect(written).toEqual({
        version: 2,
        created_at: "2024-03-01T12:00:00.000Z",
        previous_version: 1,
      });
      expect(JSON.parse(readFileSync(join(versionDir, "version.json"), "utf-8"))).toEqual(
        written,
      );
      expect(await versions.readVersionMetadata(versionDir)).toEqual(written);
    });

    it("should return undefined when version.json is absent", async () => {
      makeDirs("v1");
      expect(await versions.readVersionMetadata(join(projectDir, "v1"))).toBeUndefined();
    });

    it("should reject malformed metadata", async () => {
      makeDirs("v1");
      writeFileSync(join(projectDir, "v1", "version.json"), '{"version":"one"}');

      await expect(
        versions.readVersionMetadata(join(projectDir, "v1")),
      ).rejects.toBeInstanceOf(StructuralError);
    });
  });

  describe("updateCurrentPointer", () => {
    it("should point current at the version with a relative link", async () => {
      makeDirs("v1", "v2");

      await versions.updateCurrentPointer(projectDir, 1);
      await versions.updateCurrentPointer(projectDir, 2);

      expect(readlinkSync(join(projectDir, "current"))).toBe("v2");
      expect(readdirSync(projectDir).sort()).toEqual(["current", "v1", "v2"]);
    });

    it("should refuse to point at a missing version", async () => {
      makeDirs("v1");
      await versions.updateCurrentPointer(projectDir, 1);

      await expect(versions.updateCurrentPointer(projectDir, 5)).rejects.toBeInstanceOf(
        PointerError,
      );
      expect(readlinkSync(join(projectDir, "current"))).toBe("v1");
    });

    it("should fail when current is a real directory", async () => {
      makeDirs("v1", "current/keep");

      await expect(versions.updateCurrentPointer(projectDir, 1)).rejects.toBeInstanceOf(
        PointerError,
      );
      expect(readdirSync(projectDir).sort()).toEqual(["current", "v1"]);
    });

    it("should log the new target", async () => {
      const logger = createMockLogger();
      const logged = new FileSystemVersionManager({ logger });
      makeDirs("v1");

      await logged.updateCurrentPointer(projectDir, 1);

      expect(logger.debug).toHaveBeenCalledWith("current -> v1", { projectDir });
    });
  });
});
