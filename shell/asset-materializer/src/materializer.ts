import { existsSync } from "fs";
import { mkdir, readdir, rm } from "fs/promises";
import { join } from "path";
import {
  ProgressReporter,
  getErrorMessage,
  isPartialFile,
  writeFileAtomic,
} from "@slidesmith/utils";
import type { Logger } from "@slidesmith/utils";
import { materializerConfigSchema } from "./config";
import type { MaterializerConfig, MaterializerConfigInput } from "./config";
import { fetchImageBytes } from "./downloader";
import { isDataUrl } from "./lib/image-utils";
import { DownloadError, ImageDecodeError, isTransientError } from "./errors";
import { RetryHandler } from "./retry";
import type {
  AssetFailure,
  AssetFailureKind,
  AssetResult,
  AssetSpec,
  AssetSuccess,
  GeneratedImage,
  ImageDownloader,
  ImageGenerator,
  ImageProcessor,
  MaterializeOptions,
  MaterializeReport,
} from "./types";

export interface AssetMaterializerDependencies {
  generator: ImageGenerator;
  processor: ImageProcessor;
  /** Defaults to fetchImageBytes */
  downloader?: ImageDownloader | undefined;
  logger: Logger;
  config?: MaterializerConfigInput | undefined;
}

/**
 * Turns asset specs into image files in an output directory.
 *
 * Assets already on disk are left alone, so a rerun only fills the gaps.
 * Failures are recorded per asset and never stop the batch.
 */
export class AssetMaterializer {
  private readonly generator: ImageGenerator;
  private readonly processor: ImageProcessor;
  private readonly downloader: ImageDownloader;
  private readonly logger: Logger;
  private readonly config: MaterializerConfig;
  private readonly retryHandler: RetryHandler;

  constructor(deps: AssetMaterializerDependencies) {
    this.generator = deps.generator;
    this.processor = deps.processor;
    this.downloader = deps.downloader ?? fetchImageBytes;
    this.logger = deps.logger.child("AssetMaterializer");
    this.config = materializerConfigSchema.parse(deps.config ?? {});
    this.retryHandler = new RetryHandler(this.logger);
  }

  public async materialize(
    specs: readonly AssetSpec[],
    outputDir: string,
    options: MaterializeOptions = {},
  ): Promise<MaterializeReport> {
    const { signal } = options;
    await mkdir(outputDir, { recursive: true });
    await this.removeStalePartials(outputDir);

    const existing = specs.filter((spec) =>
      existsSync(join(outputDir, spec.filename)),
    ).length;
    this.logger.info(`Processing ${specs.length} assets`, {
      existing,
      missing: specs.length - existing,
      concurrency: this.config.concurrency,
    });

    const progress = ProgressReporter.from(options.onProgress);
    const results: Array<AssetResult | undefined> = [];
    let nextIndex = 0;
    let processed = 0;

    const worker = async (): Promise<void> => {
      while (nextIndex < specs.length) {
        const index = nextIndex++;
        const spec = specs[index];
        if (!spec) continue;

        const result = signal?.aborted
          ? failure(spec, "cancelled", "build cancelled before this asset started")
          : await this.materializeAsset(spec, outputDir, signal);
        results[index] = result;
        processed += 1;

        try {
          await progress?.report({
            progress: processed,
            total: specs.length,
            message: describeResult(result),
          });
        } catch (error) {
          this.logger.warn("Progress callback failed", {
            error: getErrorMessage(error),
          });
        }
      }
    };

    const workerCount = Math.min(this.config.concurrency, specs.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const report = summarize(results);
    this.logger.info("Asset materialization finished", {
      succeeded: report.succeeded.length,
      failed: report.failed.length,
      generated: report.generated,
      skipped: report.skipped,
    });
    return report;
  }

  private async materializeAsset(
    spec: AssetSpec,
    outputDir: string,
    signal: AbortSignal | undefined,
  ): Promise<AssetResult> {
    const target = join(outputDir, spec.filename);
    if (existsSync(target)) {
      this.logger.debug(`${spec.filename} already exists, skipping`);
      return { status: "success", filename: spec.filename, path: target, skipped: true };
    }

    let image: GeneratedImage;
    try {
      image = await this.retryHandler.retry(
        () =>
          this.generator.generate(
            { prompt: spec.prompt, size: spec.generationSize, model: spec.model },
            signal,
          ),
        {
          operation: `Generating ${spec.filename}`,
          policy: this.config.generation,
          isRetryable: isTransientError,
          signal,
        },
      );
    } catch (error) {
      return this.fail(spec, signal?.aborted ? "cancelled" : "generation", error);
    }

    let data: Uint8Array;
    try {
      data = await this.retryHandler.retry(
        () => this.retrieve(image, spec, signal),
        {
          operation: `Downloading ${spec.filename}`,
          policy: this.config.download,
          // inline bytes that do not decode will not decode next time either
          isRetryable: (error) =>
            image.kind === "url" &&
            !isDataUrl(image.url) &&
            (isTransientError(error) || error instanceof ImageDecodeError),
          signal,
        },
      );
    } catch (error) {
      return this.fail(
        spec,
        signal?.aborted ? "cancelled" : classifyRetrievalFailure(error),
        error,
      );
    }

    try {
      await writeFileAtomic(target, data);
    } catch (error) {
      return this.fail(spec, "write", error);
    }

    this.logger.debug(`Generated ${spec.filename}`, {
      width: spec.finalSize.width,
      height: spec.finalSize.height,
    });
    return { status: "success", filename: spec.filename, path: target, skipped: false };
  }

  private async retrieve(
    image: GeneratedImage,
    spec: AssetSpec,
    signal: AbortSignal | undefined,
  ): Promise<Uint8Array> {
    const raw =
      image.kind === "bytes" ? image.data : await this.downloader(image.url, signal);
    return this.processor.normalize(raw, spec.finalSize);
  }

  private fail(
    spec: AssetSpec,
    kind: AssetFailureKind,
    error: unknown,
  ): AssetFailure {
    const result = failure(spec, kind, getErrorMessage(error));
    this.logger.warn(`Failed to materialize ${spec.filename}`, {
      kind,
      detail: result.detail,
    });
    return result;
  }

  private async removeStalePartials(outputDir: string): Promise<void> {
    const entries = await readdir(outputDir);
    const partials = entries.filter(isPartialFile);
    for (const name of partials) {
      await rm(join(outputDir, name), { force: true });
    }
    if (partials.length > 0) {
      this.logger.debug(`Removed ${partials.length} stale partial files`);
    }
  }
}

function failure(
  spec: AssetSpec,
  kind: AssetFailureKind,
  detail: string,
): AssetFailure {
  return { status: "failure", filename: spec.filename, kind, detail };
}

function classifyRetrievalFailure(error: unknown): AssetFailureKind {
  if (error instanceof DownloadError || isTransientError(error)) {
    return "download";
  }
  return "processing";
}

function describeResult(result: AssetResult): string {
  if (result.status === "failure") {
    return `${result.filename} failed (${result.kind})`;
  }
  return result.skipped
    ? `${result.filename} already present`
    : `${result.filename} generated`;
}

function summarize(results: ReadonlyArray<AssetResult | undefined>): MaterializeReport {
  const settled = results.filter(
    (result): result is AssetResult => result !== undefined,
  );
  const successes = settled.filter(
    (result): result is AssetSuccess => result.status === "success",
  );
  const failed = settled.filter(
    (result): result is AssetFailure => result.status === "failure",
  );

  return {
    results: settled,
    succeeded: successes.map((result) => result.filename),
    failed,
    generated: successes.filter((result) => !result.skipped).length,
    skipped: successes.filter((result) => result.skipped).length,
  };
}
