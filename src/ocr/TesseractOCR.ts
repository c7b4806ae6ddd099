/**
 * DocMatch – Tesseract.js OCR Provider
 *
 * Fully offline OCR once the traineddata for the language is available.
 * tesseract.js fetches it on first use unless `langPath` points at a
 * local directory holding `<lang>.traineddata`.
 */

import { createWorker, PSM } from "tesseract.js";
import type { Worker } from "tesseract.js";
import type { OCROptions, OCRProvider, OCRResult } from "./OCRProvider";
import { OCRError } from "./OCRProvider";

export interface TesseractOCROptions {
  /** Directory or URL holding `<lang>.traineddata` */
  langPath?: string;
  /** Directory for tesseract.js's language data cache */
  cachePath?: string;
}

export class TesseractOCR implements OCRProvider {
  readonly name = "tesseract";

  constructor(private readonly options: TesseractOCROptions = {}) {}

  async isAvailable(): Promise<boolean> {
    return typeof createWorker === "function";
  }

  async extractText(options: OCROptions): Promise<OCRResult> {
    if (options.signal?.aborted) {
      throw new OCRError("Recognition cancelled before start", this.name);
    }

    const lang = this.normaliseLang(options.language ?? "en");
    let worker: Worker | null = null;
    const terminate = (): void => {
      // Terminating the worker rejects the pending recognize() call.
      void worker?.terminate().catch(() => undefined);
    };
    options.signal?.addEventListener("abort", terminate, { once: true });

    try {
      worker = await createWorker(lang, 1, {
        logger: () => undefined,
        ...(this.options.langPath ? { langPath: this.options.langPath } : {}),
        ...(this.options.cachePath
          ? { cachePath: this.options.cachePath }
          : {}),
      });
      // An abort while the worker was starting found nothing to terminate
      if (options.signal?.aborted) {
        throw new OCRError("Recognition cancelled", this.name);
      }

      await worker.setParameters({
        tessedit_pageseg_mode: options.sparseText
          ? PSM.SPARSE_TEXT
          : PSM.AUTO,
        ...(options.characterWhitelist
          ? { tessedit_char_whitelist: options.characterWhitelist }
          : {}),
      });

      const {
        data: { text, confidence },
      } = await worker.recognize(options.image);

      const lines = text.split("\n").filter((l) => l.trim().length > 0);

      return {
        text: text.trim(),
        confidence: confidence / 100, // Tesseract returns 0–100
        lineCount: lines.length,
        provider: this.name,
      };
    } catch (err) {
      if (err instanceof OCRError) throw err;
      throw new OCRError(
        `Tesseract recognition failed: ${err instanceof Error ? err.message : String(err)}`,
        this.name,
        err,
      );
    } finally {
      options.signal?.removeEventListener("abort", terminate);
      if (worker) {
        await worker.terminate().catch(() => undefined);
      }
    }
  }

  /** Convert BCP-47 "en" → Tesseract "eng" */
  private normaliseLang(lang: string): string {
    const map: Record<string, string> = {
      en: "eng",
      fr: "fra",
      de: "deu",
      es: "spa",
      pt: "por",
      it: "ita",
      nl: "nld",
      hi: "hin",
    };
    return map[lang.toLowerCase()] ?? lang;
  }
}
