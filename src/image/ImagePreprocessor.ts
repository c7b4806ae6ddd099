/**
 * DocMatch – Image preprocessing
 *
 * Turns a captured photo into OCR-friendly input:
 *   1. Orientation correction from EXIF (best effort)
 *   2. Fallback rotation when the upright image is still landscape
 *   3. Single-channel grayscale
 *   4. Contrast boost around mid-grey
 *   5. Upscale
 *
 * The policy is decided by `planPreprocessing` (pure); sharp applies it.
 */

import sharp from "sharp";
import type { DocMatchLogger } from "../utils/logger";
import { silentLogger, errorMessage } from "../utils/logger";
import { DocMatchError } from "../core/validator";

export type PreprocessStep =
  | "orient"
  | "rotate-landscape"
  | "grayscale"
  | "contrast"
  | "upscale";

export interface ImageMetadata {
  width: number;
  height: number;
  /** EXIF orientation tag (1–8), absent when the image carries none */
  orientation?: number;
}

export interface PreprocessPlan {
  /** Clockwise rotation implied by the EXIF orientation tag */
  orientationRotation: 0 | 90 | 180 | 270;
  /** Extra clockwise rotation applied to landscape images */
  landscapeRotation: 0 | 90;
  /** Dimensions after EXIF orientation */
  orientedWidth: number;
  orientedHeight: number;
  outputWidth: number;
  outputHeight: number;
  contrastFactor: number;
  steps: PreprocessStep[];
}

export interface PreprocessOptions {
  contrastFactor: number;
  upscaleFactor: number;
}

export interface PreprocessedImage {
  bytes: Buffer;
  width: number;
  height: number;
  plan: PreprocessPlan;
}

const ORIENTATION_ROTATION: Record<number, 0 | 90 | 180 | 270> = {
  1: 0,
  2: 0,
  3: 180,
  4: 180,
  5: 90,
  6: 90,
  7: 270,
  8: 270,
};

/**
 * Decide which transforms apply to an image of the given shape.
 */
export function planPreprocessing(
  meta: ImageMetadata,
  options: PreprocessOptions,
): PreprocessPlan {
  const steps: PreprocessStep[] = [];
  const orientation = meta.orientation ?? 1;
  const orientationRotation = ORIENTATION_ROTATION[orientation] ?? 0;
  // Orientations 5–8 swap width and height
  const swapped = orientation >= 5 && orientation <= 8;
  if (orientation !== 1 && ORIENTATION_ROTATION[orientation] !== undefined) {
    steps.push("orient");
  }

  const orientedWidth = swapped ? meta.height : meta.width;
  const orientedHeight = swapped ? meta.width : meta.height;

  const landscape = orientedWidth > orientedHeight;
  if (landscape) steps.push("rotate-landscape");

  const uprightWidth = landscape ? orientedHeight : orientedWidth;
  const uprightHeight = landscape ? orientedWidth : orientedHeight;

  steps.push("grayscale", "contrast");
  if (options.upscaleFactor !== 1) steps.push("upscale");

  return {
    orientationRotation,
    landscapeRotation: landscape ? 90 : 0,
    orientedWidth,
    orientedHeight,
    outputWidth: Math.max(1, Math.round(uprightWidth * options.upscaleFactor)),
    outputHeight: Math.max(
      1,
      Math.round(uprightHeight * options.upscaleFactor),
    ),
    contrastFactor: options.contrastFactor,
    steps,
  };
}

export class ImagePreprocessor {
  private readonly options: PreprocessOptions;
  private readonly logger: DocMatchLogger;

  constructor(options: PreprocessOptions, logger: DocMatchLogger = silentLogger) {
    this.options = options;
    this.logger = logger;
  }

  /**
   * Apply the full preprocessing policy.
   *
   * @throws DocMatchError with code IMAGE_DECODE_FAILED when sharp cannot read the bytes
   */
  async preprocess(bytes: Buffer): Promise<PreprocessedImage> {
    const meta = await this.readMetadata(bytes);
    const plan = planPreprocessing(meta, this.options);
    this.logger.debug(
      `Preprocess ${meta.width}x${meta.height} → ${plan.outputWidth}x${plan.outputHeight} [${plan.steps.join(", ")}]`,
    );

    try {
      // sharp honours a single rotation per pipeline, so EXIF orientation
      // is baked in first and the landscape fallback applied afterwards.
      const upright = plan.steps.includes("orient")
        ? await sharp(bytes).rotate().png().toBuffer()
        : bytes;

      let pipeline = sharp(upright);
      if (plan.landscapeRotation !== 0) {
        pipeline = pipeline.rotate(plan.landscapeRotation);
      }

      const factor = plan.contrastFactor;
      const { data, info } = await pipeline
        .grayscale()
        .linear(factor, 128 * (1 - factor))
        .resize(plan.outputWidth, plan.outputHeight, { fit: "fill" })
        .toColourspace("b-w")
        .png()
        .toBuffer({ resolveWithObject: true });

      return { bytes: data, width: info.width, height: info.height, plan };
    } catch (err) {
      throw new DocMatchError(
        `Image preprocessing failed: ${errorMessage(err)}`,
        "IMAGE_DECODE_FAILED",
        err,
      );
    }
  }

  private async readMetadata(bytes: Buffer): Promise<ImageMetadata> {
    let meta: sharp.Metadata;
    try {
      meta = await sharp(bytes).metadata();
    } catch (err) {
      throw new DocMatchError(
        `Image could not be decoded: ${errorMessage(err)}`,
        "IMAGE_DECODE_FAILED",
        err,
      );
    }

    if (!meta.width || !meta.height) {
      throw new DocMatchError(
        "Image has no readable dimensions",
        "IMAGE_DECODE_FAILED",
      );
    }

    return {
      width: meta.width,
      height: meta.height,
      orientation: meta.orientation,
    };
  }
}
