/**
 * DocMatch – Invoice number extraction
 *
 * rawText → normaliseOCRText → tier 1 (labeled) | tier 2 (bare digit runs) → truncate
 *
 * The first tier that yields a candidate wins; tier 2 is only consulted
 * when no label pattern matched at all.
 */

import type { InvoiceNumberCandidate, CandidateTier } from "../types";
import type { DocMatchLogger } from "../utils/logger";
import { silentLogger } from "../utils/logger";
import { normaliseOCRText, escapeRegExp } from "./normalize";

export interface NumberExtractorOptions {
  identifierLength: number;
  minDigits: number;
  maxDigits: number;
  /** Vendor names, each producing a "<Vendor> Invoice Sr. No" label */
  vendorLabels?: readonly string[];
  extraLabels?: readonly string[];
}

export interface ExtractionOutcome {
  normalizedText: string;
  candidates: InvoiceNumberCandidate[];
  /** Tier that produced the candidates, or "none" */
  tier: CandidateTier | "none";
}

/** Label phrases recognised on every document */
export const BASE_LABELS: readonly string[] = [
  "Invoice No",
  "Invoice Number",
  "Invoice Sr. No",
  "Document No",
];

const DIGIT_RUN_PATTERN = "digit-run";

interface LabelPattern {
  label: string;
  regex: RegExp;
}

interface RawMatch {
  raw: string;
  position: number;
  pattern: string;
}

export class NumberExtractor {
  private readonly options: NumberExtractorOptions;
  private readonly labelPatterns: LabelPattern[];
  private readonly logger: DocMatchLogger;

  constructor(
    options: NumberExtractorOptions,
    logger: DocMatchLogger = silentLogger,
  ) {
    this.options = options;
    this.logger = logger;
    this.labelPatterns = this.labels().map((label) => ({
      label,
      regex: this.buildLabelRegex(label),
    }));
  }

  /** Label phrases tried in tier 1, in order */
  labels(): string[] {
    const vendor = (this.options.vendorLabels ?? []).map(
      (v) => `${v.trim()} Invoice Sr. No`,
    );
    return [...BASE_LABELS, ...vendor, ...(this.options.extraLabels ?? [])];
  }

  /**
   * Ordered invoice-number candidates for one document's OCR text.
   */
  extract(rawText: string): InvoiceNumberCandidate[] {
    return this.analyse(rawText).candidates;
  }

  /**
   * Like `extract`, but also reports the normalised text and winning tier.
   */
  analyse(rawText: string): ExtractionOutcome {
    const normalizedText = normaliseOCRText(rawText);

    const labeled = this.findLabeled(normalizedText);
    if (labeled.length > 0) {
      this.logger.debug(`Tier 1 matched ${labeled.length} labeled run(s)`);
      return {
        normalizedText,
        candidates: labeled.map((m) => this.toCandidate(m, "labeled")),
        tier: "labeled",
      };
    }

    const bare = this.findUnlabeled(normalizedText);
    this.logger.debug(`Tier 2 matched ${bare.length} bare run(s)`);
    return {
      normalizedText,
      candidates: bare.map((m) => this.toCandidate(m, "unlabeled")),
      tier: bare.length > 0 ? "unlabeled" : "none",
    };
  }

  // ─── Tiers ────────────────────────────────────────────────────────────────

  private findLabeled(text: string): RawMatch[] {
    const byPosition = new Map<number, RawMatch & { labelStart: number }>();

    for (const { label, regex } of this.labelPatterns) {
      for (const m of text.matchAll(regex)) {
        const digits = m[1];
        if (digits === undefined || m.index === undefined) continue;
        const position = m.index + m[0].length - digits.length;
        // The same run may sit behind a base label and a vendor label;
        // it is kept once, credited to the longer label.
        const seen = byPosition.get(position);
        if (!seen || m.index < seen.labelStart) {
          byPosition.set(position, {
            raw: digits,
            position,
            pattern: label,
            labelStart: m.index,
          });
        }
      }
    }

    return [...byPosition.values()]
      .sort((a, b) => a.position - b.position)
      .map(({ raw, position, pattern }) => ({ raw, position, pattern }));
  }

  private findUnlabeled(text: string): RawMatch[] {
    const { minDigits, maxDigits } = this.options;
    const regex = new RegExp(`(?<!\\d)\\d{${minDigits},${maxDigits}}(?!\\d)`, "g");
    const out: RawMatch[] = [];
    for (const m of text.matchAll(regex)) {
      if (m.index === undefined) continue;
      out.push({ raw: m[0], position: m.index, pattern: DIGIT_RUN_PATTERN });
    }
    return out;
  }

  // ─── Helpers ──────────────────────────────────────────────────────────────

  private buildLabelRegex(label: string): RegExp {
    const { minDigits, maxDigits } = this.options;
    const phrase = label
      .trim()
      .split(/\s+/)
      .map(escapeRegExp)
      .join("\\s*");
    return new RegExp(
      `\\b${phrase}\\s*[:.,]{1,2}\\s*(\\d{${minDigits},${maxDigits}})(?!\\d)`,
      "gi",
    );
  }

  private toCandidate(
    match: RawMatch,
    tier: CandidateTier,
  ): InvoiceNumberCandidate {
    const n = this.options.identifierLength;
    const truncated = match.raw.length > n;
    // Leading digits are the ones OCR corrupts; the tail is kept
    const value = truncated ? match.raw.slice(-n) : match.raw;
    return Object.freeze({
      value,
      raw: match.raw,
      tier,
      pattern: match.pattern,
      position: match.position,
      truncated,
    });
  }
}
