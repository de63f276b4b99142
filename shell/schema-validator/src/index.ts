export {
  validatePresentation,
  validateSource,
  validateFile,
  requireValidSchema,
} from "./validator";
export type { ValidationReport, ValidationResult } from "./validator";

export {
  presentationSchema,
  metaSchema,
  visualIdentitySchema,
  layoutSystemSchema,
  layoutDefinitionSchema,
  assetConfigSchema,
  slideSchema,
  iconSchema,
  runtimeConfigSchema,
} from "./schema";
export type {
  PresentationSchema,
  PresentationMeta,
  Slide,
  Icon,
  AssetConfig,
  AssetDimensions,
} from "./schema";

export {
  isColor,
  isSemanticVersion,
  isIsoDate,
  isShortName,
  isImageSize,
  isSlideId,
  isCssSize,
  isLayoutName,
  isTransition,
  isTransitionSpeed,
  matchesAssetFilename,
  LAYOUT_NAMES,
  REQUIRED_LAYOUTS,
  OPTIONAL_LAYOUTS,
  TRANSITIONS,
  TRANSITION_SPEEDS,
  GENERATOR_MODELS,
} from "./field-validators";
export type {
  AssetFilenameClass,
  GeneratorModel,
  ImageSize,
  LayoutName,
  Transition,
  TransitionSpeed,
} from "./field-validators";

export { parseJsonSource } from "./source-checks";
export { formatIssue, formatPath } from "./issue-formatter";
export { SchemaRejectionError } from "./errors";
