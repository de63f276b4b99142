import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdir, readFile, readdir, writeFile } from "fs/promises";
import { join } from "path";
import {
  createIcon,
  createPresentationDocument,
  createSilentLogger,
  createSlide,
  createTempDir,
  readImageSize,
  removeTempDir,
  FakeImageGenerator,
  FakeImageProcessor,
  TINY_PNG,
} from "@slidesmith/test-utils";
import {
  AssetMaterializer,
  DownloadError,
  GenerationError,
  SharpImageProcessor,
  TransientIOError,
  deriveAssetSpecs,
} from "../src";
import type {
  AssetMaterializerDependencies,
  AssetSpec,
  ImageDownloader,
} from "../src";

const fastRetries = {
  generation: { attempts: 3, delayMs: 0 },
  download: { attempts: 3, delayMs: 0 },
};

function twoSlideSpecs(): AssetSpec[] {
  return deriveAssetSpecs(createPresentationDocument());
}

function createMaterializer(
  overrides: Partial<AssetMaterializerDependencies> = {},
): AssetMaterializer {
  return new AssetMaterializer({
    generator: new FakeImageGenerator(),
    processor: new FakeImageProcessor(),
    logger: createSilentLogger(),
    config: fastRetries,
    ...overrides,
  });
}

describe("AssetMaterializer", () => {
  let outputDir: string;
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await createTempDir();
    outputDir = join(rootDir, "assets_generated");
  });

  afterEach(async () => {
    await removeTempDir(rootDir);
  });

  describe("idempotence", () => {
    it("should generate missing assets and skip them on the next run", async () => {
      const generator = new FakeImageGenerator();
      const materializer = createMaterializer({ generator });
      const specs = twoSlideSpecs();

      const first = await materializer.materialize(specs, outputDir);
      expect(first.generated).toBe(2);
      expect(first.skipped).toBe(0);
      expect(generator.calls).toHaveLength(2);

      const listing = (await readdir(outputDir)).sort();
      const second = await materializer.materialize(specs, outputDir);

      expect(generator.calls).toHaveLength(2);
      expect(second.generated).toBe(0);
      expect(second.skipped).toBe(2);
      expect(second.succeeded).toEqual(["SLIDE-01-Intro.png", "SLIDE-02-Outro.png"]);
      expect((await readdir(outputDir)).sort()).toEqual(listing);
    });

    it("should pass the resolved prompt, model and generation size", async () => {
      const generator = new FakeImageGenerator();
      await createMaterializer({ generator }).materialize(twoSlideSpecs(), outputDir);

      expect(generator.calls[0]).toEqual({
        prompt: "Flat test style — Wide intro scene with open space on the left",
        size: "1792x1024",
        model: "dall-e-3",
      });
    });

    it("should write the processed bytes under the asset filename", async () => {
      await createMaterializer().materialize(twoSlideSpecs(), outputDir);

      const content = await readFile(join(outputDir, "SLIDE-01-Intro.png"), "utf8");
      expect(content).toBe("1920x1080");
    });
  });

  describe("failures", () => {
    it("should keep going when one asset fails permanently", async () => {
      const generator = new FakeImageGenerator({
        fail: (request) =>
          request.prompt.includes("outro") ? new GenerationError("refused") : undefined,
      });
      const specs = deriveAssetSpecs(
        createPresentationDocument({ icons: [createIcon("Gear")] }),
      );

      const report = await createMaterializer({
        generator,
        processor: new SharpImageProcessor(),
      }).materialize(specs, outputDir);

      expect(report.succeeded).toEqual(["SLIDE-01-Intro.png", "IC-Gear.png"]);
      expect(report.failed).toEqual([
        {
          status: "failure",
          filename: "SLIDE-02-Outro.png",
          kind: "generation",
          detail: "refused",
        },
      ]);
      expect(generator.callsFor("outro")).toBe(1);

      expect(await readImageSize(join(outputDir, "SLIDE-01-Intro.png"))).toEqual({
        width: 1920,
        height: 1080,
        hasAlpha: true,
      });
      expect(await readImageSize(join(outputDir, "IC-Gear.png"))).toEqual({
        width: 350,
        height: 350,
        hasAlpha: true,
      });
      expect((await readdir(outputDir)).sort()).toEqual([
        "IC-Gear.png",
        "SLIDE-01-Intro.png",
      ]);
    });

    it("should retry transient generation failures", async () => {
      const generator = new FakeImageGenerator({
        fail: (_request, attempt) =>
          attempt <= 2 ? new TransientIOError("busy") : undefined,
      });
      const specs = deriveAssetSpecs(
        createPresentationDocument({ slides: [createSlide("01")] }),
      );

      const report = await createMaterializer({ generator }).materialize(specs, outputDir);

      expect(report.succeeded).toEqual(["SLIDE-01-Intro.png"]);
      expect(generator.calls).toHaveLength(3);
    });

    it("should give up after the configured attempts", async () => {
      const generator = new FakeImageGenerator({
        fail: (request) =>
          request.prompt.includes("intro") ? new TransientIOError("busy") : undefined,
      });

      const report = await createMaterializer({ generator }).materialize(
        twoSlideSpecs(),
        outputDir,
      );

      expect(generator.callsFor("intro")).toBe(3);
      expect(report.failed).toEqual([
        {
          status: "failure",
          filename: "SLIDE-01-Intro.png",
          kind: "generation",
          detail: "busy",
        },
      ]);
      expect(report.succeeded).toEqual(["SLIDE-02-Outro.png"]);
    });

    it("should retry transient download failures of URL images", async () => {
      const generator = new FakeImageGenerator({
        image: () => ({ kind: "url", url: "https://images.example.test/a.png" }),
      });
      const downloader = vi
        .fn<ImageDownloader>()
        .mockRejectedValueOnce(new TransientIOError("connection reset"))
        .mockResolvedValue(TINY_PNG);
      const specs = deriveAssetSpecs(
        createPresentationDocument({ slides: [createSlide("01")] }),
      );

      const report = await createMaterializer({ generator, downloader }).materialize(
        specs,
        outputDir,
      );

      expect(report.succeeded).toEqual(["SLIDE-01-Intro.png"]);
      expect(downloader).toHaveBeenCalledTimes(2);
      expect(downloader).toHaveBeenCalledWith("https://images.example.test/a.png", undefined);
    });

    it("should not retry a download that failed for good", async () => {
      const generator = new FakeImageGenerator({
        image: () => ({ kind: "url", url: "https://images.example.test/a.png" }),
      });
      const downloader = vi
        .fn<ImageDownloader>()
        .mockRejectedValue(new DownloadError("Failed to fetch image: 404 Not Found"));
      const specs = deriveAssetSpecs(
        createPresentationDocument({ slides: [createSlide("01")] }),
      );

      const report = await createMaterializer({ generator, downloader }).materialize(
        specs,
        outputDir,
      );

      expect(downloader).toHaveBeenCalledTimes(1);
      expect(report.failed).toEqual([
        {
          status: "failure",
          filename: "SLIDE-01-Intro.png",
          kind: "download",
          detail: "Failed to fetch image: 404 Not Found",
        },
      ]);
    });

    it("should retry a downloaded image that does not decode", async () => {
      const generator = new FakeImageGenerator({
        image: () => ({ kind: "url", url: "https://images.example.test/a.png" }),
      });
      const downloader = vi
        .fn<ImageDownloader>()
        .mockResolvedValue(new TextEncoder().encode("not an image"));
      const specs = deriveAssetSpecs(
        createPresentationDocument({ slides: [createSlide("01")] }),
      );

      const report = await createMaterializer({
        generator,
        downloader,
        processor: new SharpImageProcessor(),
      }).materialize(specs, outputDir);

      expect(downloader).toHaveBeenCalledTimes(3);
      expect(report.failed[0]?.kind).toBe("processing");
    });

    it("should fail inline bytes that do not decode without retrying", async () => {
      const generator = new FakeImageGenerator({
        image: () => ({ kind: "bytes", data: new TextEncoder().encode("not an image") }),
      });
      const processor = new SharpImageProcessor();
      const normalize = vi.spyOn(processor, "normalize");
      const specs = deriveAssetSpecs(
        createPresentationDocument({ slides: [createSlide("01")] }),
      );

      const report = await createMaterializer({ generator, processor }).materialize(
        specs,
        outputDir,
      );

      expect(normalize).toHaveBeenCalledTimes(1);
      expect(report.failed[0]?.kind).toBe("processing");
      expect(report.failed[0]?.detail.startsWith("Cannot decode image")).toBe(true);
      expect(await readdir(outputDir)).toEqual([]);
    });

    it("should report write failures and leave no partial file", async () => {
      const [spec] = twoSlideSpecs();
      if (!spec) throw new Error("fixture has no specs");

      const report = await createMaterializer().materialize(
        [{ ...spec, filename: "missing-dir/SLIDE-01-Intro.png" }],
        outputDir,
      );

      expect(report.failed[0]?.kind).toBe("write");
      expect(await readdir(outputDir)).toEqual([]);
    });
  });

  describe("partial files", () => {
    it("should remove stale partial files and not count them as assets", async () => {
      await mkdir(outputDir, { recursive: true });
      await writeFile(join(outputDir, ".SLIDE-01-Intro.png.abc123.partial"), "half");
      const generator = new FakeImageGenerator();

      const report = await createMaterializer({ generator }).materialize(
        twoSlideSpecs(),
        outputDir,
      );

      expect(report.generated).toBe(2);
      expect((await readdir(outputDir)).sort()).toEqual([
        "SLIDE-01-Intro.png",
        "SLIDE-02-Outro.png",
      ]);
    });
  });

  describe("cancellation", () => {
    it("should mark every spec cancelled when aborted up front", async () => {
      const controller = new AbortController();
      controller.abort();
      const generator = new FakeImageGenerator();

      const report = await createMaterializer({ generator }).materialize(
        twoSlideSpecs(),
        outputDir,
        { signal: controller.signal },
      );

      expect(generator.calls).toHaveLength(0);
      expect(report.failed.map((failure) => failure.kind)).toEqual([
        "cancelled",
        "cancelled",
      ]);
    });

    it("should cancel specs not yet started", async () => {
      const controller = new AbortController();
      const generator = new FakeImageGenerator();

      const report = await createMaterializer({ generator }).materialize(
        twoSlideSpecs(),
        outputDir,
        {
          signal: controller.signal,
          onProgress: () => controller.abort(),
        },
      );

      expect(generator.calls).toHaveLength(1);
      expect(report.succeeded).toEqual(["SLIDE-01-Intro.png"]);
      expect(report.failed).toEqual([
        {
          status: "failure",
          filename: "SLIDE-02-Outro.png",
          kind: "cancelled",
          detail: "build cancelled before this asset started",
        },
      ]);
    });
  });

  describe("progress and concurrency", () => {
    it("should notify once per processed spec", async () => {
      const onProgress = vi.fn();

      await createMaterializer().materialize(twoSlideSpecs(), outputDir, { onProgress });

      expect(onProgress.mock.calls).toEqual([
        [{ progress: 1, total: 2, message: "SLIDE-01-Intro.png generated" }],
        [{ progress: 2, total: 2, message: "SLIDE-02-Outro.png generated" }],
      ]);
    });

    it("should keep going when the progress callback throws", async () => {
      const report = await createMaterializer().materialize(twoSlideSpecs(), outputDir, {
        onProgress: () => {
          throw new Error("listener broke");
        },
      });

      expect(report.generated).toBe(2);
    });

    it("should run up to the configured number of assets at once", async () => {
      const generator = new FakeImageGenerator({ delayMs: 20 });
      const specs = deriveAssetSpecs(
        createPresentationDocument({
          slides: [
            createSlide("01", "Alpha"),
            createSlide("02", "Beta"),
            createSlide("03", "Gamma"),
            createSlide("04", "Delta"),
          ],
        }),
      );

      const report = await createMaterializer({
        generator,
        config: { ...fastRetries, concurrency: 2 },
      }).materialize(specs, outputDir);

      expect(report.generated).toBe(4);
      expect(generator.maxInFlight).toBe(2);
      expect(report.results.map((result) => result.filename)).toEqual([
        "SLIDE-01-Alpha.png",
        "SLIDE-02-Beta.png",
        "SLIDE-03-Gamma.png",
        "SLIDE-04-Delta.png",
      ]);
    });

    it("should run one asset at a time by default", async () => {
      const generator = new FakeImageGenerator({ delayMs: 5 });

      await createMaterializer({ generator }).materialize(twoSlideSpecs(), outputDir);

      expect(generator.maxInFlight).toBe(1);
    });
  });
});
