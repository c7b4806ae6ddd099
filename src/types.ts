/**
 * DocMatch – Document pair matching
 * TypeScript type definitions
 */

/**
 * Workflow states of one acquire → process → compare cycle
 */
export enum WorkflowState {
  HOME = "home",
  ACQUIRING = "acquiring",
  PROCESSING = "processing",
  COMPARISON = "comparison",
}

/**
 * How the two documents are supplied
 */
export enum AcquisitionMode {
  CAMERA = "camera",
  UPLOAD = "upload",
  TEXT = "text",
}

export type ImageSource = "camera" | "upload";

export type DocumentSource = ImageSource | "text";

export type ImageFormat = "jpeg" | "png";

/**
 * A raw image handed over by a camera capture or file upload event
 */
export interface ImageInput {
  bytes: Buffer;
  format: ImageFormat | string;
  source: ImageSource;
  fileName?: string;
}

/**
 * An image held by a Session. Index 0 is "Document 1".
 */
export interface CapturedImage {
  readonly index: 0 | 1;
  readonly bytes: Buffer;
  readonly format: ImageFormat;
  readonly source: ImageSource;
  readonly fileName?: string;
  /** Key assigned by the session's ImageStore, if it persisted the bytes */
  readonly storageKey?: string;
}

export type CandidateTier = "labeled" | "unlabeled";

/**
 * A digit string that might be the document's identifier
 */
export interface InvoiceNumberCandidate {
  /** Normalised value (truncated to the identifier length when longer) */
  readonly value: string;
  /** Digit run as matched in the normalised text */
  readonly raw: string;
  readonly tier: CandidateTier;
  /** Label phrase that produced the match, or "digit-run" for tier 2 */
  readonly pattern: string;
  /** Offset of the digit run in the normalised text */
  readonly position: number;
  readonly truncated: boolean;
}

/**
 * OCR output and extracted candidates for one document
 */
export interface ExtractedDocument {
  readonly index: 0 | 1;
  readonly source: DocumentSource;
  readonly rawText: string;
  readonly normalizedText: string;
  readonly candidates: readonly InvoiceNumberCandidate[];
  readonly ocrProvider?: string;
  readonly ocrConfidence?: number;
}

export type MatchPolicy = "exact" | "suffix";

/**
 * Which candidate of each document produced a match
 */
export interface MatchEvidence {
  readonly identifier: string;
  readonly policy: MatchPolicy;
  readonly document1: InvoiceNumberCandidate;
  readonly document2: InvoiceNumberCandidate;
}

export interface MatchResult {
  readonly matched: boolean;
  /** De-duplicated matched values, first-found order */
  readonly identifiers: readonly string[];
  readonly evidence: readonly MatchEvidence[];
  /** Full candidate lists, present regardless of outcome */
  readonly candidates: {
    readonly document1: readonly InvoiceNumberCandidate[];
    readonly document2: readonly InvoiceNumberCandidate[];
  };
}
