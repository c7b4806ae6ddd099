/**
 * DocMatch – Configuration
 *
 * Identifier length and fuzzy matching are product-policy choices, so both
 * are plain options here. `resolveConfig` fills defaults and validates.
 */

import type { ImageFormat } from "../types";
import { validateConfig, DocMatchError } from "./validator";

export interface DocMatchConfig {
  /** Canonical identifier length; longer runs keep their last N digits */
  identifierLength: number;
  /** Shortest digit run accepted as a candidate */
  minDigits: number;
  /** Longest digit run accepted as a candidate */
  maxDigits: number;
  /** Enable the trailing-suffix fallback policy */
  fuzzyMatching: boolean;
  /** Number of trailing digits compared by the suffix policy */
  suffixLength: number;
  /** Vendor names, each producing a "<Vendor> Invoice Sr. No" label */
  vendorLabels: string[];
  /** Additional label phrases tried in tier 1 */
  extraLabels: string[];
  /** BCP-47 language hint for OCR */
  language: string;
  /** Restrict OCR to digits */
  digitsOnly: boolean;
  /** Hint OCR towards sparse text page segmentation */
  sparseText: boolean;
  /** Preferred OCR provider name */
  ocrProvider?: string;
  /** Upper bound for a single OCR run */
  ocrTimeoutMs: number;
  /** Apply the preprocessing pipeline before OCR */
  preprocess: boolean;
  contrastFactor: number;
  upscaleFactor: number;
  allowedFormats: ImageFormat[];
  debug: boolean;
}

export type DocMatchOptions = Partial<DocMatchConfig>;

export type IdentifierPreset = Pick<
  DocMatchConfig,
  "identifierLength" | "minDigits" | "maxDigits"
>;

/** Identifier length variants seen on supported document families */
export const IDENTIFIER_PRESETS = {
  fixed11: { identifierLength: 11, minDigits: 11, maxDigits: 11 },
  fixed13: { identifierLength: 13, minDigits: 13, maxDigits: 13 },
  range13to14: { identifierLength: 13, minDigits: 13, maxDigits: 14 },
} as const satisfies Record<string, IdentifierPreset>;

export type IdentifierPresetName = keyof typeof IDENTIFIER_PRESETS;

const defaults: DocMatchConfig = {
  ...IDENTIFIER_PRESETS.range13to14,
  fuzzyMatching: true,
  suffixLength: 10,
  vendorLabels: [],
  extraLabels: [],
  language: "en",
  digitsOnly: false,
  sparseText: true,
  ocrTimeoutMs: 60_000,
  preprocess: true,
  contrastFactor: 2.0,
  upscaleFactor: 1.5,
  allowedFormats: ["jpeg", "png"],
  debug: false,
};

export const DEFAULT_CONFIG: Readonly<DocMatchConfig> = Object.freeze(defaults);

/**
 * Merge options over the defaults and validate the result.
 *
 * @throws DocMatchError with code INVALID_CONFIG
 */
export function resolveConfig(options: DocMatchOptions = {}): DocMatchConfig {
  const config: DocMatchConfig = {
    ...DEFAULT_CONFIG,
    ...stripUndefined(options),
    vendorLabels: [...(options.vendorLabels ?? DEFAULT_CONFIG.vendorLabels)],
    extraLabels: [...(options.extraLabels ?? DEFAULT_CONFIG.extraLabels)],
    allowedFormats: [
      ...(options.allowedFormats ?? DEFAULT_CONFIG.allowedFormats),
    ],
  };

  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new DocMatchError(
      `Invalid configuration: ${validation.errors.join("; ")}`,
      "INVALID_CONFIG",
    );
  }
  return config;
}

/** Build options from a named preset plus overrides */
export function presetOptions(
  name: IdentifierPresetName,
  overrides: DocMatchOptions = {},
): DocMatchOptions {
  return { ...IDENTIFIER_PRESETS[name], ...overrides };
}

function stripUndefined(options: DocMatchOptions): DocMatchOptions {
  const out: DocMatchOptions = {};
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) {
      Object.assign(out, { [key]: value });
    }
  }
  return out;
}
