/**
 * Field-level predicates for presentation schema values.
 * Each one is pure and usable on its own.
 */

const HEX_COLOR_PATTERN = /^#[0-9A-Fa-f]{6}$/;
const RGBA_COLOR_PATTERN =
  /^rgba?\(\s*\d+\s*,\s*\d+\s*,\s*\d+\s*(,\s*[\d.]+)?\s*\)$/;
const SEMANTIC_VERSION_PATTERN = /^\d+\.\d+\.\d+$/;
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const SHORT_NAME_PATTERN = /^[a-z0-9-]+$/;
const IMAGE_SIZE_PATTERN = /^[1-9]\d*x[1-9]\d*$/;
const SLIDE_ID_PATTERN = /^\d{2}$/;
const CSS_SIZE_PATTERN = /^\d+(\.\d+)?(px|em|rem|vw|vh|%)?$/;

const ASSET_FILENAME_PATTERNS = {
  slide: /^SLIDE-\d{2}-[A-Za-z]+\.png$/,
  icon: /^IC-[A-Za-z]+\.png$/,
} as const;

export type AssetFilenameClass = keyof typeof ASSET_FILENAME_PATTERNS;

export const REQUIRED_LAYOUTS = ["title-slide", "lf", "rf", "tb"] as const;
export const OPTIONAL_LAYOUTS = ["tl", "tr", "bl", "br"] as const;
export const LAYOUT_NAMES = [...REQUIRED_LAYOUTS, ...OPTIONAL_LAYOUTS] as const;
export type LayoutName = (typeof LAYOUT_NAMES)[number];

export const TRANSITIONS = [
  "none",
  "fade",
  "slide",
  "convex",
  "concave",
  "zoom",
] as const;
export type Transition = (typeof TRANSITIONS)[number];

export const TRANSITION_SPEEDS = ["default", "fast", "slow"] as const;
export type TransitionSpeed = (typeof TRANSITION_SPEEDS)[number];

export const GENERATOR_MODELS = ["dall-e-3", "dall-e-2"] as const;
export type GeneratorModel = (typeof GENERATOR_MODELS)[number];

/**
 * Generation size such as "1792x1024"
 */
export type ImageSize = `${number}x${number}`;

/**
 * Hex (#RRGGBB) or rgb()/rgba() color
 */
export function isColor(value: string): boolean {
  return HEX_COLOR_PATTERN.test(value) || RGBA_COLOR_PATTERN.test(value);
}

export function isSemanticVersion(value: string): boolean {
  return SEMANTIC_VERSION_PATTERN.test(value);
}

/**
 * YYYY-MM-DD (shape only, the calendar is not checked)
 */
export function isIsoDate(value: string): boolean {
  return ISO_DATE_PATTERN.test(value);
}

export function isShortName(value: string): boolean {
  return SHORT_NAME_PATTERN.test(value);
}

export function isImageSize(value: string): value is ImageSize {
  return IMAGE_SIZE_PATTERN.test(value);
}

export function isSlideId(value: string): boolean {
  return SLIDE_ID_PATTERN.test(value);
}

export function matchesAssetFilename(
  filename: string,
  assetClass: AssetFilenameClass,
): boolean {
  return ASSET_FILENAME_PATTERNS[assetClass].test(filename);
}

/**
 * Number with an optional px, em, rem, vw, vh or % unit
 */
export function isCssSize(value: string): boolean {
  return CSS_SIZE_PATTERN.test(value);
}

function isMember<T extends string>(
  options: readonly T[],
  value: string,
): value is T {
  return options.some((option) => option === value);
}

export function isLayoutName(value: string): value is LayoutName {
  return isMember(LAYOUT_NAMES, value);
}

export function isTransition(value: string): value is Transition {
  return isMember(TRANSITIONS, value);
}

export function isTransitionSpeed(value: string): value is TransitionSpeed {
  return isMember(TRANSITION_SPEEDS, value);
}
