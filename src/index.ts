/**
 * DocMatch – Invoice pair matching
 *
 * Reads the identifying number of two scanned documents via OCR and
 * tells whether both reference the same identifier.
 *
 * @packageDocumentation
 */

// ─── Primary API ──────────────────────────────────────────────────────────────
export { DocMatchSDK as DocMatch } from "./core/DocMatch";

// Workflow & session
export { WorkflowMachine } from "./workflow/WorkflowMachine";
export type {
  WorkflowOptions,
  TransitionResult,
  RejectedInput,
} from "./workflow/WorkflowMachine";
export {
  createSession,
  imagesNeeded,
  IMAGES_PER_COMPARISON,
} from "./session/Session";
export type { Session } from "./session/Session";
export { SessionRegistry } from "./session/SessionRegistry";
export { InMemoryImageStore, TempFileImageStore } from "./session/ImageStore";
export type { ImageStore, StoredImage } from "./session/ImageStore";

// Pipeline, matching & configuration
export {
  ComparisonPipeline,
  Matcher,
  DEFAULT_CONFIG,
  IDENTIFIER_PRESETS,
  resolveConfig,
  presetOptions,
  validateConfig,
  DocMatchError,
} from "./core";
export type {
  PipelineResult,
  PipelineComponents,
  DocumentPair,
  MatcherOptions,
  DocMatchConfig,
  DocMatchOptions,
  IdentifierPreset,
  IdentifierPresetName,
  ValidationResult,
  DocMatchErrorCode,
} from "./core";

// Extraction
export { NumberExtractor, BASE_LABELS } from "./parser/NumberExtractor";
export type {
  NumberExtractorOptions,
  ExtractionOutcome,
} from "./parser/NumberExtractor";
export { normaliseOCRText } from "./parser/normalize";

// Image preprocessing
export {
  ImagePreprocessor,
  planPreprocessing,
} from "./image/ImagePreprocessor";
export type {
  PreprocessPlan,
  PreprocessedImage,
  PreprocessOptions,
  ImageMetadata,
} from "./image/ImagePreprocessor";
export { sniffImageFormat, formatFromFileName } from "./image/formats";

// OCR layer
export {
  OCREngine,
  registerOCRProvider,
  getOCRProvider,
  TesseractOCR,
  OCRError,
} from "./ocr";
export type {
  OCRProvider,
  OCROptions,
  OCRResult,
  OCREngineOptions,
  TesseractOCROptions,
} from "./ocr";

// Presentation
export { ComparisonPresenter } from "./presenter/ComparisonPresenter";
export type {
  ComparisonView,
  DocumentPanel,
  PanelImage,
  Verdict,
} from "./presenter/ComparisonPresenter";

// Logger
export { createLogger, silentLogger } from "./utils/logger";
export type { DocMatchLogger, LogLevel } from "./utils/logger";

// Types & enums
export { WorkflowState, AcquisitionMode } from "./types";
export type {
  ImageSource,
  DocumentSource,
  ImageFormat,
  ImageInput,
  CapturedImage,
  CandidateTier,
  InvoiceNumberCandidate,
  ExtractedDocument,
  MatchPolicy,
  MatchEvidence,
  MatchResult,
} from "./types";
