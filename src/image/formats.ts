import type { ImageFormat } from "../types";

const FORMAT_ALIASES: Record<string, ImageFormat> = {
  jpeg: "jpeg",
  jpg: "jpeg",
  "image/jpeg": "jpeg",
  "image/jpg": "jpeg",
  png: "png",
  "image/png": "png",
};

/** Map a file extension or MIME type to a canonical format */
export function normaliseFormat(declared: string): ImageFormat | null {
  const key = declared.trim().toLowerCase().replace(/^\./, "");
  return FORMAT_ALIASES[key] ?? null;
}

/** Format implied by a file name's extension */
export function formatFromFileName(fileName: string): ImageFormat | null {
  const dot = fileName.lastIndexOf(".");
  if (dot < 0) return null;
  return normaliseFormat(fileName.slice(dot + 1));
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/** Detect JPEG / PNG from the leading magic bytes */
export function sniffImageFormat(bytes: Buffer): ImageFormat | null {
  if (
    bytes.length >= 3 &&
    bytes[0] === 0xff &&
    bytes[1] === 0xd8 &&
    bytes[2] === 0xff
  ) {
    return "jpeg";
  }
  if (
    bytes.length >= PNG_SIGNATURE.length &&
    PNG_SIGNATURE.every((b, i) => bytes[i] === b)
  ) {
    return "png";
  }
  return null;
}
