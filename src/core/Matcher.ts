/**
 * DocMatch – Cross-document matching
 *
 * Policies, applied in order and unioned:
 *   1. exact  – the same value appears in both candidate lists
 *   2. suffix – trailing `suffixLength` digits agree (tolerates OCR
 *               corruption of leading digits); the document-1 value is reported
 */

import type {
  InvoiceNumberCandidate,
  MatchEvidence,
  MatchResult,
} from "../types";

export interface MatcherOptions {
  fuzzyMatching: boolean;
  suffixLength: number;
}

export class Matcher {
  constructor(private readonly options: MatcherOptions) {}

  match(
    document1: readonly InvoiceNumberCandidate[],
    document2: readonly InvoiceNumberCandidate[],
  ): MatchResult {
    const evidence: MatchEvidence[] = [];
    const identifiers: string[] = [];
    const seen = new Set<string>();

    const record = (
      policy: MatchEvidence["policy"],
      c1: InvoiceNumberCandidate,
      c2: InvoiceNumberCandidate,
    ): void => {
      if (seen.has(c1.value)) return;
      seen.add(c1.value);
      identifiers.push(c1.value);
      evidence.push(
        Object.freeze({
          identifier: c1.value,
          policy,
          document1: c1,
          document2: c2,
        }),
      );
    };

    // ── 1. Exact ───────────────────────────────────────────────────────────
    const byValue = new Map<string, InvoiceNumberCandidate>();
    for (const c2 of document2) {
      if (!byValue.has(c2.value)) byValue.set(c2.value, c2);
    }
    for (const c1 of document1) {
      const c2 = byValue.get(c1.value);
      if (c2) record("exact", c1, c2);
    }

    // ── 2. Suffix ──────────────────────────────────────────────────────────
    if (this.options.fuzzyMatching) {
      const n = this.options.suffixLength;
      for (const c1 of document1) {
        if (c1.value.length < n || seen.has(c1.value)) continue;
        const tail = c1.value.slice(-n);
        const c2 = document2.find(
          (c) => c.value.length >= n && c.value.slice(-n) === tail,
        );
        if (c2) record("suffix", c1, c2);
      }
    }

    return Object.freeze({
      matched: identifiers.length > 0,
      identifiers: Object.freeze(identifiers),
      evidence: Object.freeze(evidence),
      candidates: Object.freeze({
        document1: Object.freeze([...document1]),
        document2: Object.freeze([...document2]),
      }),
    });
  }
}
