import type { ProgressCallback } from "@slidesmith/utils";
import type { GeneratorModel, ImageSize } from "@slidesmith/schema";

export type AssetClass = "background" | "icon";

export interface Dimensions {
  width: number;
  height: number;
}

/**
 * One artifact to materialize, derived from the schema for a single build
 */
export interface AssetSpec {
  filename: string;
  /** Style prompt and asset prompt combined */
  prompt: string;
  assetClass: AssetClass;
  model: GeneratorModel;
  generationSize: ImageSize;
  finalSize: Dimensions;
}

export interface GenerationRequest {
  prompt: string;
  size: ImageSize;
  model: GeneratorModel;
}

/**
 * Generator output: the image itself or a URL (http(s) or data:) to fetch it from
 */
export type GeneratedImage =
  | { kind: "bytes"; data: Uint8Array }
  | { kind: "url"; url: string };

/**
 * External image generator.
 * Throws TransientIOError for failures worth retrying, anything else is permanent.
 */
export interface ImageGenerator {
  generate(
    request: GenerationRequest,
    signal?: AbortSignal,
  ): Promise<GeneratedImage>;
}

/**
 * Decode, resize to the final size and re-encode as PNG.
 * Throws ImageDecodeError when the bytes are not an image.
 */
export interface ImageProcessor {
  normalize(data: Uint8Array, size: Dimensions): Promise<Uint8Array>;
}

export type ImageDownloader = (
  url: string,
  signal?: AbortSignal,
) => Promise<Uint8Array>;

export type AssetFailureKind =
  | "generation"
  | "download"
  | "processing"
  | "write"
  | "cancelled";

export interface AssetSuccess {
  status: "success";
  filename: string;
  path: string;
  /** Already present in the output directory, nothing was generated */
  skipped: boolean;
}

export interface AssetFailure {
  status: "failure";
  filename: string;
  kind: AssetFailureKind;
  detail: string;
}

export type AssetResult = AssetSuccess | AssetFailure;

export interface MaterializeReport {
  /** One result per spec, in spec order */
  results: AssetResult[];
  succeeded: string[];
  failed: AssetFailure[];
  generated: number;
  skipped: number;
}

export interface MaterializeOptions {
  signal?: AbortSignal | undefined;
  onProgress?: ProgressCallback | undefined;
}
