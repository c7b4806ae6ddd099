/**
 * DocMatch – Comparison pipeline
 *
 * image → validate → preprocess → OCR → extract  (× 2) → match
 * text  →                                extract  (× 2) → match
 *
 * Processing failures come back as `{ ok: false, error }`; the workflow
 * decides the next state from the result instead of catching exceptions.
 */

import type {
  CapturedImage,
  DocumentSource,
  ExtractedDocument,
  MatchResult,
} from "../types";
import type { DocMatchConfig } from "./config";
import type { DocMatchLogger } from "../utils/logger";
import { silentLogger } from "../utils/logger";
import { OCREngine } from "../ocr/OCREngine";
import type { OCRResult } from "../ocr/OCRProvider";
import { ImagePreprocessor } from "../image/ImagePreprocessor";
import { NumberExtractor } from "../parser/NumberExtractor";
import { Matcher } from "./Matcher";
import { DocMatchError, assertImageBytes, toDocMatchError } from "./validator";

export type DocumentPair = readonly [ExtractedDocument, ExtractedDocument];

export type PipelineResult =
  | { ok: true; documents: DocumentPair; match: MatchResult }
  | { ok: false; error: DocMatchError };

export type PipelineSuccess = Extract<PipelineResult, { ok: true }>;

export interface PipelineComponents {
  ocr: OCREngine;
  preprocessor: ImagePreprocessor;
  extractor: NumberExtractor;
  matcher: Matcher;
}

const DIGIT_WHITELIST = "0123456789";

export class ComparisonPipeline {
  private readonly config: DocMatchConfig;
  private readonly logger: DocMatchLogger;
  private readonly ocr: OCREngine;
  private readonly preprocessor: ImagePreprocessor;
  private readonly extractor: NumberExtractor;
  private readonly matcher: Matcher;

  constructor(
    config: DocMatchConfig,
    logger: DocMatchLogger = silentLogger,
    components: Partial<PipelineComponents> = {},
  ) {
    this.config = config;
    this.logger = logger;
    this.ocr =
      components.ocr ??
      new OCREngine(logger, {
        preferredProvider: config.ocrProvider,
        timeoutMs: config.ocrTimeoutMs,
      });
    this.preprocessor =
      components.preprocessor ??
      new ImagePreprocessor(
        {
          contrastFactor: config.contrastFactor,
          upscaleFactor: config.upscaleFactor,
        },
        logger,
      );
    this.extractor = components.extractor ?? new NumberExtractor(config, logger);
    this.matcher = components.matcher ?? new Matcher(config);
  }

  /**
   * Read both images and compare their identifiers.
   * Either document failing discards the whole comparison.
   */
  async compareImages(
    images: readonly [CapturedImage, CapturedImage],
    signal?: AbortSignal,
  ): Promise<PipelineResult> {
    const startTime = Date.now();
    try {
      const first = await this.readImage(images[0], signal);
      const second = await this.readImage(images[1], signal);
      const result = this.finish([first, second]);
      this.logger.info(
        `Image comparison finished in ${Date.now() - startTime}ms – ${result.match.matched ? "match" : "no match"}`,
      );
      return result;
    } catch (err) {
      const error = toDocMatchError(err);
      this.logger.error(`Comparison failed (${error.code}): ${error.message}`);
      return { ok: false, error };
    }
  }

  /**
   * Compare two OCR texts supplied directly, bypassing preprocessing and OCR.
   */
  compareTexts(texts: readonly [string, string]): PipelineResult {
    const documents: DocumentPair = [
      this.extractDocument(0, "text", texts[0]),
      this.extractDocument(1, "text", texts[1]),
    ];
    return this.finish(documents);
  }

  /**
   * Preprocess and OCR one image, then extract its candidates.
   *
   * @throws DocMatchError – IMAGE_DECODE_FAILED, OCR_FAILED, TIMEOUT, CANCELLED
   */
  async readImage(
    image: CapturedImage,
    signal?: AbortSignal,
  ): Promise<ExtractedDocument> {
    if (signal?.aborted) {
      throw new DocMatchError("Comparison cancelled", "CANCELLED");
    }
    assertImageBytes(image.bytes, image.format);

    const input = this.config.preprocess
      ? (await this.preprocessor.preprocess(image.bytes)).bytes
      : image.bytes;

    const ocrResult = await this.ocr.run(
      {
        image: input,
        language: this.config.language,
        characterWhitelist: this.config.digitsOnly
          ? DIGIT_WHITELIST
          : undefined,
        sparseText: this.config.sparseText,
      },
      signal,
    );
    this.logger.debug(
      `Document ${image.index + 1}: ${ocrResult.lineCount} OCR lines`,
    );

    return this.extractDocument(image.index, image.source, ocrResult.text, ocrResult);
  }

  /** Build the immutable ExtractedDocument for one text */
  extractDocument(
    index: 0 | 1,
    source: DocumentSource,
    rawText: string,
    ocr?: OCRResult,
  ): ExtractedDocument {
    const outcome = this.extractor.analyse(rawText);
    this.logger.debug(
      `Document ${index + 1}: ${outcome.candidates.length} candidate(s) via ${outcome.tier}`,
    );
    return Object.freeze({
      index,
      source,
      rawText,
      normalizedText: outcome.normalizedText,
      candidates: Object.freeze(outcome.candidates),
      ...(ocr
        ? { ocrProvider: ocr.provider, ocrConfidence: ocr.confidence }
        : {}),
    });
  }

  private finish(documents: DocumentPair): PipelineSuccess {
    const match = this.matcher.match(
      documents[0].candidates,
      documents[1].candidates,
    );
    return { ok: true, documents, match };
  }
}
