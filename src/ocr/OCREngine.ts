/**
 * DocMatch – OCR Engine
 *
 * Orchestrates OCR providers with fallback chain logic and bounds each
 * run by a timeout. Default precedence: tesseract.
 *
 * Providers can be added with registerOCRProvider().
 */

import type { DocMatchLogger } from "../utils/logger";
import type { OCROptions, OCRProvider, OCRResult } from "./OCRProvider";
import { OCRError } from "./OCRProvider";
import { TesseractOCR } from "./TesseractOCR";
import { DocMatchError } from "../core/validator";

// ─── Registry ────────────────────────────────────────────────────────────────

const _registry = new Map<string, OCRProvider>();

// Register built-in providers
_registry.set("tesseract", new TesseractOCR());

/** Default provider resolution order */
const DEFAULT_PROVIDER_ORDER = ["tesseract"];

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Register a custom OCR provider, replacing any provider of the same name.
 * Select it with the `ocrProvider` option.
 */
export function registerOCRProvider(provider: OCRProvider): void {
  _registry.set(provider.name, provider);
}

/**
 * Retrieve a registered provider by name.
 */
export function getOCRProvider(name: string): OCRProvider | undefined {
  return _registry.get(name);
}

// ─── Engine ──────────────────────────────────────────────────────────────────

export interface OCREngineOptions {
  preferredProvider?: string;
  /** Upper bound for one provider run */
  timeoutMs: number;
}

export class OCREngine {
  private readonly logger: DocMatchLogger;
  private readonly options: OCREngineOptions;

  constructor(logger: DocMatchLogger, options: OCREngineOptions) {
    this.logger = logger;
    this.options = options;
  }

  /**
   * Run OCR using the best available provider.
   * Falls back to the next provider if the preferred one is unavailable
   * or fails. Timeouts and cancellation stop the chain.
   *
   * @throws DocMatchError – OCR_FAILED, TIMEOUT or CANCELLED
   */
  async run(options: Omit<OCROptions, "signal">, signal?: AbortSignal): Promise<OCRResult> {
    const order = this.buildProviderOrder();

    let lastError: Error = new OCRError(
      "No OCR provider available",
      "OCREngine",
    );

    for (const key of order) {
      const provider = _registry.get(key);
      if (!provider) continue;
      this.throwIfAborted(signal);

      try {
        const available = await provider.isAvailable();
        if (!available) {
          this.logger.debug(
            `OCR provider '${key}' is not available – skipping`,
          );
          continue;
        }

        this.logger.info(`Running OCR with provider: ${key}`);
        const result = await this.runBounded(provider, options, signal);
        this.logger.debug(
          `OCR result (${key}): ${result.lineCount} lines, confidence=${result.confidence.toFixed(2)}`,
        );
        return result;
      } catch (err) {
        if (err instanceof DocMatchError) throw err;
        this.logger.warn(
          `OCR provider '${key}' failed: ${err instanceof Error ? err.message : String(err)}`,
        );
        lastError = err instanceof Error ? err : new Error(String(err));
      }
    }

    throw new DocMatchError(
      `OCR extraction failed: ${lastError.message}`,
      "OCR_FAILED",
      lastError,
    );
  }

  private async runBounded(
    provider: OCRProvider,
    options: Omit<OCROptions, "signal">,
    outer?: AbortSignal,
  ): Promise<OCRResult> {
    this.throwIfAborted(outer);
    const controller = new AbortController();
    const onOuterAbort = (): void => controller.abort();
    outer?.addEventListener("abort", onOuterAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const bound = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(
          new DocMatchError(
            `OCR provider '${provider.name}' exceeded ${this.options.timeoutMs}ms`,
            "TIMEOUT",
          ),
        );
      }, this.options.timeoutMs);
      controller.signal.addEventListener(
        "abort",
        () => {
          if (outer?.aborted) {
            reject(new DocMatchError("OCR run cancelled", "CANCELLED"));
          }
        },
        { once: true },
      );
    });

    try {
      return await Promise.race([
        provider.extractText({ ...options, signal: controller.signal }),
        bound,
      ]);
    } finally {
      clearTimeout(timer);
      outer?.removeEventListener("abort", onOuterAbort);
    }
  }

  private throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new DocMatchError("OCR run cancelled", "CANCELLED");
    }
  }

  private buildProviderOrder(): string[] {
    const preferred = this.options.preferredProvider;
    if (preferred) {
      const rest = DEFAULT_PROVIDER_ORDER.filter((k) => k !== preferred);
      return [preferred, ...rest];
    }
    return DEFAULT_PROVIDER_ORDER;
  }
}
