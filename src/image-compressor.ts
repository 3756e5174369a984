import sharp from "sharp";
import { ImageProcessingError } from "./errors.js";
import { logger } from "./logger.js";
import type { CompressedImage, ImageConfig } from "./types.js";

const DATA_URL_PREFIX = /^data:[^;,]*;base64,/;

export interface TargetSize {
  width: number;
  height: number;
}

/**
 * Dimensions that fit `maxPixels`, keeping the aspect ratio. Images at or
 * under the budget keep their size; nothing is ever upscaled.
 */
export function fitToPixelBudget(width: number, height: number, maxPixels: number): TargetSize {
  const numPixels = width * height;
  if (numPixels <= maxPixels) {
    return { width, height };
  }

  const scale = Math.sqrt(maxPixels / numPixels);
  return {
    width: Math.max(1, Math.floor(width * scale)),
    height: Math.max(1, Math.floor(height * scale)),
  };
}

export class ImageCompressor {
  private maxPixels: number;
  private jpegQuality: number;

  constructor(config: ImageConfig) {
    this.maxPixels = config.maxPixels;
    this.jpegQuality = config.jpegQuality;
  }

  /**
   * Decode a base64 image, drop its alpha channel, shrink it under the pixel
   * budget and re-encode it as JPEG. Alpha is discarded, not composited.
   */
  async compress(encoded: string, requestId?: string): Promise<CompressedImage> {
    const log = logger.child({ requestId });
    try {
      const input = Buffer.from(encoded.replace(DATA_URL_PREFIX, ""), "base64");
      if (input.length === 0) {
        throw new Error("Image data is empty");
      }

      const metadata = await sharp(input).metadata();
      const { width, height } = metadata;
      if (!width || !height) {
        throw new Error("Unable to determine image dimensions");
      }

      const target = fitToPixelBudget(width, height, this.maxPixels);
      let pipeline = sharp(input).removeAlpha().toColourspace("srgb");
      if (target.width !== width || target.height !== height) {
        pipeline = pipeline.resize(target.width, target.height, {
          fit: "fill",
          kernel: sharp.kernel.lanczos3,
        });
      }

      const { data, info } = await pipeline
        .jpeg({ quality: this.jpegQuality })
        .toBuffer({ resolveWithObject: true });

      log.debug("Compressed image", {
        format: metadata.format,
        original: `${width}x${height}`,
        compressed: `${info.width}x${info.height}`,
        inputBytes: input.length,
        outputBytes: data.length,
      });

      return {
        base64: data.toString("base64"),
        width: info.width,
        height: info.height,
        bytes: data.length,
      };
    } catch (error) {
      log.error("Error processing image", error instanceof Error ? error : new Error(String(error)));
      throw new ImageProcessingError(error);
    }
  }
}
