import type { PresentationSchema } from "@slidesmith/schema";

/**
 * Slide entry read by the viewer: every content field of the slide plus
 * its layout and background filename, which a content field cannot shadow
 */
export type RuntimeSlide = {
  layout: string;
  bg: string;
} & Record<string, unknown>;

export function createRuntimeSlides(schema: PresentationSchema): RuntimeSlide[] {
  return schema.slides.map((slide) => ({
    ...slide.content,
    layout: slide.layout,
    bg: slide.background.filename,
  }));
}

export function serializeRuntimeSlides(slides: RuntimeSlide[]): string {
  return `${JSON.stringify(slides, null, 2)}\n`;
}
