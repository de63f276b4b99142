import sharp from "sharp";

/**
 * 1x1 transparent PNG
 */
export const TINY_PNG = new Uint8Array(
  Buffer.from(
    "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNk+M9QDwADhgGAWjR9awAAAABJRU5ErkJggg==",
    "base64",
  ),
);

/**
 * Solid-color PNG of the given size
 */
export async function createPng(width: number, height: number): Promise<Uint8Array> {
  return sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 40, g: 60, b: 140 },
    },
  })
    .png()
    .toBuffer();
}

export async function readImageSize(
  path: string,
): Promise<{ width: number | undefined; height: number | undefined; hasAlpha: boolean | undefined }> {
  const { width, height, hasAlpha } = await sharp(path).metadata();
  return { width, height, hasAlpha };
}
