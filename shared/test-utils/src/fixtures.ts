import type { PresentationSchema, Slide, Icon } from "@slidesmith/schema";

export interface PresentationFixtureOptions {
  slides?: Slide[];
  icons?: Icon[] | undefined;
}

function layout(description: string, textPosition: string) {
  return {
    description,
    text_position: textPosition,
    text_zone: { x: "5%", y: "10%", width: "40%", height: "80%" },
    max_width: "40vw",
  };
}

export function createSlide(id: string, concept = "Intro"): Slide {
  return {
    id,
    layout: "lf",
    content: { title: `Slide ${id}`, bullets: ["First point", "Second point"] },
    background: {
      filename: `SLIDE-${id}-${concept}.png`,
      concept: `${concept} scene`,
      prompt: `Wide ${concept.toLowerCase()} scene with open space on the left`,
      text_zones: { primary: "left third" },
    },
  };
}

export function createIcon(name: string): Icon {
  return {
    filename: `IC-${name}.png`,
    prompt: `Minimal outline ${name.toLowerCase()} icon`,
    transparent: true,
  };
}

/**
 * A well-formed presentation document with two "lf" slides and no icons
 */
export function createPresentationDocument(
  options: PresentationFixtureOptions = {},
): PresentationSchema {
  const document: PresentationSchema = {
    meta: {
      title: "Test Deck",
      short_name: "test-deck",
      version: "1.0.0",
      created: "2024-03-01",
      theme: "test theme",
    },
    visual_identity: {
      colors: {
        primary: "#2D2F92",
        secondary: "#6F3EDD",
        accent: "#15D4C8",
        text_primary: "#FFFFFF",
        text_secondary: "rgba(255, 255, 255, 0.7)",
        overlay_bg: "rgba(10, 10, 30, 0.6)",
        border: "#3A3C9E",
      },
      typography: {
        font_family: "Inter, sans-serif",
        title_size: "3.2rem",
        subtitle_size: "1.8rem",
        body_size: "1.2rem",
        small_size: "14px",
      },
      style_prompt: "Flat test style",
      atmosphere: "calm",
    },
    layout_system: {
      layouts: {
        "title-slide": layout("Centered title", "center"),
        lf: layout("Text on the left", "left"),
        rf: layout("Text on the right", "right"),
        tb: layout("Text at the bottom", "bottom"),
      },
    },
    asset_config: {
      dimensions: {
        background: { generation_size: "1792x1024", final_size: [1920, 1080] },
        icons: { generation_size: "1024x1024", final_size: [350, 350] },
      },
      naming_convention: { slides: "SLIDE-XX-Concept.png", icons: "IC-Name.png" },
      dalle_model: "dall-e-3",
    },
    slides: options.slides ?? [createSlide("01", "Intro"), createSlide("02", "Outro")],
    runtime_config: {
      reveal_js: {
        transition: "fade",
        transition_speed: "default",
        background_transition: "fade",
        controls: true,
        progress: true,
        keyboard: true,
        touch: true,
        hash: true,
      },
      responsive_breakpoints: { tablet: "1024px", mobile: "640px" },
      content_sizing: { max_bullets: 5 },
    },
  };

  if (options.icons) {
    document.icons = options.icons;
  }
  return document;
}

type PathSegment = string | number;

function cloneDocument(document: unknown): unknown {
  return structuredClone(document);
}

function parentOf(root: unknown, path: readonly PathSegment[]): unknown {
  let current = root;
  for (const segment of path.slice(0, -1)) {
    if (typeof current !== "object" || current === null) return undefined;
    current = Reflect.get(current, segment);
  }
  return current;
}

/**
 * Copy of the document with the value at `path` removed
 */
export function omitPath(
  document: unknown,
  path: readonly PathSegment[],
): unknown {
  const copy = cloneDocument(document);
  const parent = parentOf(copy, path);
  const key = path[path.length - 1];
  if (typeof parent === "object" && parent !== null && key !== undefined) {
    Reflect.deleteProperty(parent, key);
  }
  return copy;
}

/**
 * Copy of the document with the value at `path` replaced
 */
export function setPath(
  document: unknown,
  path: readonly PathSegment[],
  value: unknown,
): unknown {
  const copy = cloneDocument(document);
  const parent = parentOf(copy, path);
  const key = path[path.length - 1];
  if (typeof parent === "object" && parent !== null && key !== undefined) {
    Reflect.set(parent, key, value);
  }
  return copy;
}
