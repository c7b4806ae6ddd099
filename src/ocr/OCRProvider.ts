/**
 * DocMatch – OCR Provider abstraction
 *
 * All OCR providers implement this interface so the engine can swap
 * tesseract.js for any other recogniser at runtime. Output is treated
 * as unreliable text; the number extractor absorbs the noise.
 */

export interface OCRResult {
  /** Extracted plain text */
  text: string;
  /** Estimated confidence (0–1) */
  confidence: number;
  /** Number of text lines recognised */
  lineCount: number;
  /** Name of the provider that produced this result */
  provider: string;
}

export interface OCROptions {
  /** Preprocessed image bytes */
  image: Buffer;
  /** BCP-47 language hint (e.g. "en", "de") */
  language?: string;
  /** Characters the recogniser may emit, e.g. "0123456789" */
  characterWhitelist?: string;
  /** Favour sparse/single-line text layout */
  sparseText?: boolean;
  /** Aborted when the engine times out or the session is reset */
  signal?: AbortSignal;
}

/**
 * Every OCR provider must implement this contract.
 */
export interface OCRProvider {
  /** Unique provider identifier – used to look up by key */
  readonly name: string;

  /**
   * Extract text from the supplied image.
   *
   * Implementations wrap failures in OCRError and return
   * `confidence: 0` when confidence is unknown.
   */
  extractText(options: OCROptions): Promise<OCRResult>;

  /** Return `true` if the provider can run in the current process */
  isAvailable(): Promise<boolean>;
}

/**
 * Typed error thrown by OCR providers.
 */
export class OCRError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly cause?: unknown,
  ) {
    super(`[${provider}] ${message}`);
    this.name = "OCRError";
  }
}
