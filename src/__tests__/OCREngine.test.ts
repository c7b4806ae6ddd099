/**
 * OCREngine, OCRProvider, registry – unit tests
 */
import { OCRError } from "../ocr/OCRProvider";
import type { OCROptions, OCRProvider, OCRResult } from "../ocr/OCRProvider";
import {
  registerOCRProvider,
  getOCRProvider,
  OCREngine,
} from "../ocr/OCREngine";
import { DocMatchError } from "../core/validator";
import type { DocMatchLogger } from "../utils/logger";
import { silentLogger } from "../utils/logger";

// ─── helpers ──────────────────────────────────────────────────────────────────

const IMAGE = Buffer.from("fake-image");

function mockOCRProvider(
  name: string,
  overrides: Partial<OCRProvider> = {},
): OCRProvider {
  return {
    name,
    extractText: jest.fn().mockResolvedValue({
      text: "Mock OCR output",
      confidence: 0.9,
      lineCount: 3,
      provider: name,
    } satisfies OCRResult),
    isAvailable: jest.fn().mockResolvedValue(true),
    ...overrides,
  };
}

function spyLogger(): DocMatchLogger & {
  calls: Record<string, string[]>;
} {
  const calls: Record<string, string[]> = {
    debug: [],
    info: [],
    warn: [],
    error: [],
  };
  return {
    calls,
    debug(msg: string) {
      calls.debug.push(msg);
    },
    info(msg: string) {
      calls.info.push(msg);
    },
    warn(msg: string) {
      calls.warn.push(msg);
    },
    error(msg: string) {
      calls.error.push(msg);
    },
  };
}

function quietEngine(preferredProvider?: string, timeoutMs = 1_000): OCREngine {
  return new OCREngine(spyLogger(), { preferredProvider, timeoutMs });
}

// ─── OCRError ────────────────────────────────────────────────────────────────

describe("OCRError", () => {
  it("formats message with provider prefix", () => {
    const err = new OCRError("failed", "tesseract");
    expect(err.message).toBe("[tesseract] failed");
    expect(err.name).toBe("OCRError");
    expect(err.provider).toBe("tesseract");
  });

  it("stores optional cause", () => {
    const cause = new TypeError("bad input");
    const err = new OCRError("oops", "tesseract", cause);
    expect(err.cause).toBe(cause);
  });
});

// ─── Registry ────────────────────────────────────────────────────────────────

describe("OCR Registry", () => {
  it("retrieves the built-in tesseract provider", () => {
    const tess = getOCRProvider("tesseract");
    expect(tess?.name).toBe("tesseract");
  });

  it("registers and retrieves a custom provider", () => {
    const custom = mockOCRProvider("custom-ocr");
    registerOCRProvider(custom);
    expect(getOCRProvider("custom-ocr")).toBe(custom);
  });

  it("returns undefined for unknown provider", () => {
    expect(getOCRProvider("nothing")).toBeUndefined();
  });
});

// ─── OCREngine ───────────────────────────────────────────────────────────────

describe("OCREngine", () => {
  // Override the built-in provider so tesseract doesn't actually spawn workers
  beforeEach(() => {
    registerOCRProvider(
      mockOCRProvider("tesseract", {
        isAvailable: jest.fn().mockResolvedValue(false),
      }),
    );
  });

  it("uses preferredProvider if available", async () => {
    const p = mockOCRProvider("my-ocr");
    registerOCRProvider(p);
    const result = await quietEngine("my-ocr").run({ image: IMAGE });

    expect(result.text).toBe("Mock OCR output");
    expect(result.provider).toBe("my-ocr");
    expect(p.extractText).toHaveBeenCalledTimes(1);
  });

  it("falls back when preferred provider is unavailable", async () => {
    registerOCRProvider(
      mockOCRProvider("unavail-ocr", {
        isAvailable: jest.fn().mockResolvedValue(false),
      }),
    );
    registerOCRProvider(mockOCRProvider("tesseract"));

    const logger = spyLogger();
    const engine = new OCREngine(logger, {
      preferredProvider: "unavail-ocr",
      timeoutMs: 1_000,
    });
    const result = await engine.run({ image: IMAGE });

    expect(result.provider).toBe("tesseract");
    expect(logger.calls.debug).toContain(
      "OCR provider 'unavail-ocr' is not available – skipping",
    );
  });

  it("falls back when preferred provider throws", async () => {
    registerOCRProvider(
      mockOCRProvider("err-ocr", {
        extractText: jest
          .fn()
          .mockRejectedValue(new OCRError("boom", "err-ocr")),
      }),
    );
    registerOCRProvider(mockOCRProvider("tesseract"));

    const logger = spyLogger();
    const engine = new OCREngine(logger, {
      preferredProvider: "err-ocr",
      timeoutMs: 1_000,
    });
    const result = await engine.run({ image: IMAGE });

    expect(result.provider).toBe("tesseract");
    expect(logger.calls.warn).toEqual([
      "OCR provider 'err-ocr' failed: [err-ocr] boom",
    ]);
  });

  it("wraps the last provider error as OCR_FAILED", async () => {
    registerOCRProvider(
      mockOCRProvider("tesseract", {
        extractText: jest
          .fn()
          .mockRejectedValue(new OCRError("engine crashed", "tesseract")),
      }),
    );

    const err = await quietEngine()
      .run({ image: IMAGE })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DocMatchError);
    expect(err).toMatchObject({
      code: "OCR_FAILED",
      message: "OCR extraction failed: [tesseract] engine crashed",
    });
  });

  it("reports OCR_FAILED when no provider is available", async () => {
    await expect(quietEngine().run({ image: IMAGE })).rejects.toMatchObject({
      code: "OCR_FAILED",
      message: "OCR extraction failed: [OCREngine] No OCR provider available",
    });
  });

  it("passes options and an abort signal through to provider", async () => {
    const p = mockOCRProvider("opts-ocr");
    registerOCRProvider(p);
    await quietEngine("opts-ocr").run({
      image: IMAGE,
      language: "de",
      characterWhitelist: "0123456789",
      sparseText: true,
    });

    expect(p.extractText).toHaveBeenCalledWith(
      expect.objectContaining({
        image: IMAGE,
        language: "de",
        characterWhitelist: "0123456789",
        sparseText: true,
        signal: expect.any(AbortSignal),
      }),
    );
  });

  // ─── Bounds ────────────────────────────────────────────────────────────────

  it("rejects with TIMEOUT when the provider hangs", async () => {
    const hanging = mockOCRProvider("slow-ocr", {
      extractText: jest.fn(() => new Promise<OCRResult>(() => undefined)),
    });
    registerOCRProvider(hanging);

    await expect(
      quietEngine("slow-ocr", 20).run({ image: IMAGE }),
    ).rejects.toMatchObject({
      code: "TIMEOUT",
      message: "OCR provider 'slow-ocr' exceeded 20ms",
    });
  });

  it("does not fall back after a timeout", async () => {
    registerOCRProvider(
      mockOCRProvider("slow-ocr", {
        extractText: jest.fn(() => new Promise<OCRResult>(() => undefined)),
      }),
    );
    const fallback = mockOCRProvider("tesseract");
    registerOCRProvider(fallback);

    await expect(
      quietEngine("slow-ocr", 20).run({ image: IMAGE }),
    ).rejects.toMatchObject({ code: "TIMEOUT" });
    expect(fallback.extractText).not.toHaveBeenCalled();
  });

  it("rejects with CANCELLED when the caller aborts", async () => {
    let seen: AbortSignal | undefined;
    registerOCRProvider(
      mockOCRProvider("hang-ocr", {
        extractText: jest.fn((options: OCROptions) => {
          seen = options.signal;
          return new Promise<OCRResult>(() => undefined);
        }),
      }),
    );
    const controller = new AbortController();
    const pending = quietEngine("hang-ocr", 5_000).run(
      { image: IMAGE },
      controller.signal,
    );

    // let the engine reach the provider
    await new Promise((resolve) => setImmediate(resolve));
    controller.abort();

    await expect(pending).rejects.toMatchObject({
      code: "CANCELLED",
      message: "OCR run cancelled",
    });
    expect(seen?.aborted).toBe(true);
  });

  it("rejects immediately when already aborted", async () => {
    const p = mockOCRProvider("my-ocr");
    registerOCRProvider(p);
    const controller = new AbortController();
    controller.abort();

    await expect(
      quietEngine("my-ocr").run({ image: IMAGE }, controller.signal),
    ).rejects.toMatchObject({ code: "CANCELLED" });
    expect(p.extractText).not.toHaveBeenCalled();
  });
});

describe("silent engine logger", () => {
  it("accepts the shared silent logger", async () => {
    registerOCRProvider(mockOCRProvider("tesseract"));
    const engine = new OCREngine(silentLogger, { timeoutMs: 1_000 });
    await expect(engine.run({ image: IMAGE })).resolves.toMatchObject({
      provider: "tesseract",
    });
  });
});
