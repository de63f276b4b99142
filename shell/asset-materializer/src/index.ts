export { AssetMaterializer } from "./materializer";
export type { AssetMaterializerDependencies } from "./materializer";

export { deriveAssetSpecs, resolvePrompt } from "./asset-specs";

export {
  materializerConfigSchema,
  retryPolicySchema,
} from "./config";
export type {
  MaterializerConfig,
  MaterializerConfigInput,
  RetryPolicy,
} from "./config";

export { RetryHandler } from "./retry";
export type { RetryOptions } from "./retry";

export {
  TransientIOError,
  GenerationError,
  DownloadError,
  ImageDecodeError,
  isTransientError,
} from "./errors";

export {
  fetchImageBytes,
  isTransientStatus,
  DEFAULT_DOWNLOAD_TIMEOUT_MS,
} from "./downloader";
export { OpenAIImageGenerator, classifyGenerationError } from "./generators/openai-image-generator";
export type { OpenAIImageGeneratorConfig } from "./generators/openai-image-generator";
export { SharpImageProcessor } from "./processors/sharp-image-processor";
export {
  parseDataUrl,
  decodeDataUrl,
  detectImageFormat,
  isDataUrl,
} from "./lib/image-utils";
export type { ImageFormat, ParsedDataUrl } from "./lib/image-utils";

export type {
  AssetClass,
  AssetFailure,
  AssetFailureKind,
  AssetResult,
  AssetSpec,
  AssetSuccess,
  Dimensions,
  GeneratedImage,
  GenerationRequest,
  ImageDownloader,
  ImageGenerator,
  ImageProcessor,
  MaterializeOptions,
  MaterializeReport,
} from "./types";
