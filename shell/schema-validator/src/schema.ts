import { z } from "@slidesmith/utils";
import {
  GENERATOR_MODELS,
  LAYOUT_NAMES,
  TRANSITIONS,
  TRANSITION_SPEEDS,
  isColor,
  isImageSize,
  isIsoDate,
  isSemanticVersion,
  isShortName,
  isSlideId,
  matchesAssetFilename,
} from "./field-validators";

/**
 * String that must satisfy a field predicate.
 * The message keeps the offending value so a fault can be fixed in one pass.
 */
function matching(check: (value: string) => boolean, expectation: string) {
  return z
    .string()
    .refine(check, (value) => ({
      message: `must be ${expectation}, got: ${value}`,
    }));
}

/**
 * Free-form value that only has to be present
 */
const required = z.custom<unknown>((value) => value !== undefined, {
  message: "is required",
});

const freeFormObject = z.record(z.string(), z.unknown());

const color = matching(isColor, "hex (#RRGGBB) or rgba() color");

export const metaSchema = z
  .object({
    title: z.string(),
    short_name: matching(
      isShortName,
      "lowercase alphanumeric with hyphens only",
    ),
    version: matching(isSemanticVersion, "semantic version (x.y.z)"),
    created: matching(isIsoDate, "YYYY-MM-DD date"),
    theme: z.string(),
  })
  .passthrough();

export const visualIdentitySchema = z
  .object({
    colors: z
      .object({
        primary: color,
        secondary: color,
        accent: color,
        text_primary: color,
        text_secondary: color,
        overlay_bg: color,
        border: color,
      })
      .passthrough(),
    typography: z
      .object({
        font_family: z.string(),
        title_size: z.string(),
        subtitle_size: z.string(),
        body_size: z.string(),
        small_size: z.string(),
      })
      .passthrough(),
    style_prompt: z.string(),
    atmosphere: z.string(),
  })
  .passthrough();

export const layoutDefinitionSchema = z
  .object({
    description: z.string(),
    text_position: z.string(),
    text_zone: required,
    max_width: z.string(),
  })
  .passthrough();

export const layoutSystemSchema = z
  .object({
    layouts: z
      .object({
        "title-slide": layoutDefinitionSchema,
        lf: layoutDefinitionSchema,
        rf: layoutDefinitionSchema,
        tb: layoutDefinitionSchema,
        tl: layoutDefinitionSchema.optional(),
        tr: layoutDefinitionSchema.optional(),
        bl: layoutDefinitionSchema.optional(),
        br: layoutDefinitionSchema.optional(),
      })
      .passthrough(),
  })
  .passthrough();

const assetDimensionsSchema = z
  .object({
    generation_size: z
      .string()
      .refine(isImageSize, (value) => ({
        message: `must be WIDTHxHEIGHT format, got: ${value}`,
      })),
    final_size: z
      .array(
        z
          .number()
          .int("must be a positive integer")
          .positive("must be a positive integer"),
      )
      .length(2, "must be [width, height] array"),
  })
  .passthrough();

export const assetConfigSchema = z
  .object({
    dimensions: z
      .object({
        background: assetDimensionsSchema,
        icons: assetDimensionsSchema,
      })
      .passthrough(),
    naming_convention: required,
    dalle_model: z.enum(GENERATOR_MODELS),
  })
  .passthrough();

export const slideSchema = z
  .object({
    id: matching(isSlideId, "two-digit zero-padded (e.g. '01')"),
    layout: z.enum(LAYOUT_NAMES),
    content: freeFormObject,
    background: z
      .object({
        filename: matching(
          (value) => matchesAssetFilename(value, "slide"),
          "'SLIDE-XX-Concept.png'",
        ),
        concept: z.string(),
        prompt: z.string(),
        text_zones: z.object({ primary: required }).passthrough(),
      })
      .passthrough(),
  })
  .passthrough();

export const iconSchema = z
  .object({
    filename: matching(
      (value) => matchesAssetFilename(value, "icon"),
      "'IC-Name.png'",
    ),
    prompt: z.string(),
    transparent: z.boolean(),
  })
  .passthrough();

export const runtimeConfigSchema = z
  .object({
    reveal_js: z
      .object({
        transition: z.enum(TRANSITIONS),
        transition_speed: z.enum(TRANSITION_SPEEDS),
        background_transition: z.enum(TRANSITIONS),
        controls: z.boolean(),
        progress: z.boolean(),
        keyboard: required,
        touch: z.boolean(),
        hash: z.boolean(),
      })
      .passthrough(),
    responsive_breakpoints: z
      .object({
        tablet: matching((value) => value.endsWith("px"), "a size ending in 'px'"),
        mobile: matching((value) => value.endsWith("px"), "a size ending in 'px'"),
      })
      .passthrough(),
    content_sizing: required,
  })
  .passthrough();

/**
 * Presentation schema document
 * Sections are checked independently, so one broken section never hides
 * faults in another.
 */
export const presentationSchema = z
  .object({
    meta: metaSchema,
    visual_identity: visualIdentitySchema,
    layout_system: layoutSystemSchema,
    asset_config: assetConfigSchema,
    slides: z.array(slideSchema).min(1, "must contain at least one slide"),
    icons: z.array(iconSchema).optional(),
    runtime_config: runtimeConfigSchema,
  })
  .passthrough();

export type PresentationSchema = z.infer<typeof presentationSchema>;
export type PresentationMeta = z.infer<typeof metaSchema>;
export type Slide = z.infer<typeof slideSchema>;
export type Icon = z.infer<typeof iconSchema>;
export type AssetConfig = z.infer<typeof assetConfigSchema>;
export type AssetDimensions = z.infer<typeof assetDimensionsSchema>;
