import type { AssetDimensions, PresentationSchema } from "@slidesmith/schema";
import type { AssetClass, AssetSpec, Dimensions } from "./types";

/**
 * Prompt sent to the generator: shared style first, then the asset's own prompt
 */
export function resolvePrompt(stylePrompt: string, prompt: string): string {
  return `${stylePrompt} — ${prompt}`;
}

/**
 * Asset specs for every slide background and icon of a validated schema.
 * Backgrounds come first in slide order, then icons. A filename that
 * appears twice is generated once, from its first occurrence.
 */
export function deriveAssetSpecs(schema: PresentationSchema): AssetSpec[] {
  const stylePrompt = schema.visual_identity.style_prompt;
  const { dimensions, dalle_model: model } = schema.asset_config;

  const candidates: Array<{
    filename: string;
    prompt: string;
    assetClass: AssetClass;
  }> = [
    ...schema.slides.map((slide) => ({
      filename: slide.background.filename,
      prompt: slide.background.prompt,
      assetClass: "background" as const,
    })),
    ...(schema.icons ?? []).map((icon) => ({
      filename: icon.filename,
      prompt: icon.prompt,
      assetClass: "icon" as const,
    })),
  ];

  const seen = new Set<string>();
  const specs: AssetSpec[] = [];
  for (const candidate of candidates) {
    if (seen.has(candidate.filename)) continue;
    seen.add(candidate.filename);

    const sizing: AssetDimensions =
      candidate.assetClass === "icon" ? dimensions.icons : dimensions.background;

    specs.push({
      ...candidate,
      prompt: resolvePrompt(stylePrompt, candidate.prompt),
      model,
      generationSize: sizing.generation_size,
      finalSize: toDimensions(sizing.final_size),
    });
  }
  return specs;
}

function toDimensions([width = 0, height = 0]: readonly number[]): Dimensions {
  return { width, height };
}
