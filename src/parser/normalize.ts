/**
 * DocMatch – OCR text normalisation
 *
 * Repairs the ways OCR breaks up long digit runs before candidates are
 * extracted. Whitespace between words is left alone; labeled patterns
 * still need their word boundaries.
 */

/**
 * Normalise raw OCR text for identifier extraction.
 */
export function normaliseOCRText(raw: string): string {
  let t = raw;

  // 1. Strip invisible / zero-width characters
  t = t.replace(/[\u200B-\u200D\uFEFF]/g, "");

  // 2. 'O' or 'o' mistaken for '0' inside numeric runs
  t = t.replace(/(?<=\d)[Oo]+(?=\d)/g, (m) => "0".repeat(m.length));

  // 3. Digit-group separators: 7,112,600 | 7'112'600 | 7112-6000-0324
  t = t.replace(/(?<=\d)[,'\u2018\u2019`\-\u2013\u2014](?=\d)/g, "");

  // 4. OCR-inserted spaces inside a run of short digit groups
  //    ("7112 6000 0324 0" → "7112600003240"). Needs three or more
  //    groups of at most four digits so separate numbers stay apart.
  t = t.replace(/(?<!\d)\d{1,4}(?:[ \t]\d{1,4}){2,}(?!\d)/g, (m) =>
    m.replace(/[ \t]/g, ""),
  );

  // 5. Trim trailing whitespace per line
  t = t.replace(/[ \t]+$/gm, "");

  return t;
}

/** Escape a literal phrase for use inside a RegExp */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
