import sharp from "sharp";
import { getErrorMessage } from "@slidesmith/utils";
import { ImageDecodeError } from "../errors";
import type { Dimensions, ImageProcessor } from "../types";

/**
 * Resizes generated images to their final dimensions as RGBA PNG
 */
export class SharpImageProcessor implements ImageProcessor {
  public async normalize(
    data: Uint8Array,
    size: Dimensions,
  ): Promise<Uint8Array> {
    try {
      return await sharp(data)
        .ensureAlpha()
        .resize(size.width, size.height, {
          fit: "fill",
          kernel: sharp.kernel.lanczos3,
        })
        .png()
        .toBuffer();
    } catch (error) {
      throw new ImageDecodeError(
        `Cannot decode image: ${getErrorMessage(error)}`,
        { width: size.width, height: size.height },
      );
    }
  }
}
