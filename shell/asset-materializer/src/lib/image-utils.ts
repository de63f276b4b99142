export type ImageFormat = "png" | "jpg" | "gif" | "webp";

/**
 * Parsed data URL result
 */
export interface ParsedDataUrl {
  format: string;
  base64: string;
}

/**
 * Parse a data URL into format and base64 components
 * @throws Error if not a valid image data URL
 */
export function parseDataUrl(dataUrl: string): ParsedDataUrl {
  const match = dataUrl.match(/^data:image\/([a-z+]+);base64,(.+)$/i);
  if (!match?.[1] || !match[2]) {
    throw new Error("Invalid image data URL");
  }
  return {
    format: match[1].toLowerCase(),
    base64: match[2],
  };
}

export function isDataUrl(str: string): boolean {
  return /^data:/i.test(str);
}

/**
 * Base64 prefixes of the magic bytes of common image formats
 */
const IMAGE_MAGIC_BYTES: ReadonlyArray<readonly [ImageFormat, string]> = [
  // PNG: 89 50 4E 47
  ["png", "iVBORw"],
  // JPEG: FF D8 FF
  ["jpg", "/9j/"],
  // GIF: 47 49 46 38
  ["gif", "R0lGOD"],
  // WebP: 52 49 46 46 (RIFF header)
  ["webp", "UklGR"],
];

/**
 * Detect image format from the leading bytes
 * @returns format or null if unknown
 */
export function detectImageFormat(data: Uint8Array): ImageFormat | null {
  const head = Buffer.from(data.subarray(0, 12)).toString("base64");
  for (const [format, magic] of IMAGE_MAGIC_BYTES) {
    if (head.startsWith(magic)) {
      return format;
    }
  }
  return null;
}

/**
 * Decode the payload of an image data URL
 */
export function decodeDataUrl(dataUrl: string): Uint8Array {
  const { base64 } = parseDataUrl(dataUrl);
  return new Uint8Array(Buffer.from(base64, "base64"));
}
