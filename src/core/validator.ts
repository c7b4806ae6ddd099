/**
 * DocMatch – Input & configuration validation layer
 *
 * Validates configuration and image inputs before they reach the
 * pipeline, and defines the typed error surfaced to callers.
 */

import type { ImageFormat, ImageInput } from "../types";
import type { DocMatchConfig } from "./config";
import { sniffImageFormat, normaliseFormat } from "../image/formats";

// ─── Validation ───────────────────────────────────────────────────────────────

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export function validateConfig(config: DocMatchConfig): ValidationResult {
  const errors: string[] = [];

  if (!Number.isInteger(config.minDigits) || config.minDigits < 1) {
    errors.push("`minDigits` must be a positive integer.");
  }
  if (!Number.isInteger(config.maxDigits) || config.maxDigits < 1) {
    errors.push("`maxDigits` must be a positive integer.");
  }
  if (config.minDigits > config.maxDigits) {
    errors.push("`minDigits` must not exceed `maxDigits`.");
  }
  if (
    !Number.isInteger(config.identifierLength) ||
    config.identifierLength < config.minDigits ||
    config.identifierLength > config.maxDigits
  ) {
    errors.push(
      "`identifierLength` must be an integer between `minDigits` and `maxDigits`.",
    );
  }
  if (!Number.isInteger(config.suffixLength) || config.suffixLength < 1) {
    errors.push("`suffixLength` must be a positive integer.");
  }
  if (!(config.ocrTimeoutMs > 0)) {
    errors.push("`ocrTimeoutMs` must be greater than 0.");
  }
  if (!(config.contrastFactor > 0)) {
    errors.push("`contrastFactor` must be greater than 0.");
  }
  if (!(config.upscaleFactor > 0)) {
    errors.push("`upscaleFactor` must be greater than 0.");
  }
  if (config.allowedFormats.length === 0) {
    errors.push("`allowedFormats` must name at least one format.");
  }
  for (const label of [...config.vendorLabels, ...config.extraLabels]) {
    if (label.trim().length === 0) {
      errors.push("Label phrases must not be blank.");
      break;
    }
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Check the declared format of an incoming image against the whitelist.
 * Returns the canonical format, or an error message.
 */
export function validateImageInput(
  input: ImageInput,
  allowedFormats: readonly ImageFormat[],
): { format: ImageFormat } | { error: string } {
  const format = normaliseFormat(input.format);
  if (!format || !allowedFormats.includes(format)) {
    return {
      error: `Unsupported image format '${input.format}'. Allowed: ${allowedFormats.join(", ")}.`,
    };
  }
  if (input.bytes.length === 0) {
    return { error: "Image is empty." };
  }
  return { format };
}

/**
 * Confirm the bytes really carry the declared format.
 *
 * @throws DocMatchError with code IMAGE_DECODE_FAILED
 */
export function assertImageBytes(bytes: Buffer, declared: ImageFormat): void {
  const sniffed = sniffImageFormat(bytes);
  if (sniffed === null) {
    throw new DocMatchError(
      "Image bytes are not a recognised JPEG or PNG",
      "IMAGE_DECODE_FAILED",
    );
  }
  if (sniffed !== declared) {
    throw new DocMatchError(
      `Image declared as ${declared} but contains ${sniffed} data`,
      "IMAGE_DECODE_FAILED",
    );
  }
}

// ─── Typed DocMatch error ─────────────────────────────────────────────────────

export type DocMatchErrorCode =
  | "IMAGE_DECODE_FAILED"
  | "UNSUPPORTED_FORMAT"
  | "OCR_FAILED"
  | "TIMEOUT"
  | "CANCELLED"
  | "INVALID_INPUT"
  | "INVALID_CONFIG"
  | "UNKNOWN";

export class DocMatchError extends Error {
  constructor(
    message: string,
    public readonly code: DocMatchErrorCode,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "DocMatchError";
  }
}

/** Wrap any thrown value as a DocMatchError, keeping existing codes */
export function toDocMatchError(
  err: unknown,
  fallback: DocMatchErrorCode = "UNKNOWN",
): DocMatchError {
  if (err instanceof DocMatchError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new DocMatchError(message, fallback, err);
}
