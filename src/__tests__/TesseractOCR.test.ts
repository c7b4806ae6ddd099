/**
 * TesseractOCR – unit tests
 */
import { createWorker } from "tesseract.js";
import { TesseractOCR } from "../ocr/TesseractOCR";
import { OCRError } from "../ocr/OCRProvider";

jest.mock("tesseract.js", () => ({
  createWorker: jest.fn(),
  PSM: { AUTO: "3", SPARSE_TEXT: "11" },
}));

// ─── helpers ──────────────────────────────────────────────────────────────────

const IMAGE = Buffer.from("fake-image");

function fakeWorker(text = "  Invoice No: 7112600003240\n\nRef 1\n", confidence = 87) {
  return {
    setParameters: jest.fn().mockResolvedValue({}),
    recognize: jest.fn().mockResolvedValue({ data: { text, confidence } }),
    terminate: jest.fn().mockResolvedValue(undefined),
  };
}

let worker: ReturnType<typeof fakeWorker>;

beforeEach(() => {
  worker = fakeWorker();
  (createWorker as jest.Mock).mockReset();
  (createWorker as jest.Mock).mockResolvedValue(worker);
});

// ─── Recognition ─────────────────────────────────────────────────────────────

describe("TesseractOCR.extractText", () => {
  it("returns trimmed text with a 0–1 confidence", async () => {
    const result = await new TesseractOCR().extractText({ image: IMAGE });

    expect(result).toEqual({
      text: "Invoice No: 7112600003240\n\nRef 1",
      confidence: 0.87,
      lineCount: 2,
      provider: "tesseract",
    });
    expect(worker.recognize).toHaveBeenCalledWith(IMAGE);
  });

  it("uses automatic layout without a whitelist by default", async () => {
    await new TesseractOCR().extractText({ image: IMAGE });
    expect(worker.setParameters).toHaveBeenCalledWith({
      tessedit_pageseg_mode: "3",
    });
  });

  it("passes sparse layout and the digit whitelist", async () => {
    await new TesseractOCR().extractText({
      image: IMAGE,
      sparseText: true,
      characterWhitelist: "0123456789",
    });
    expect(worker.setParameters).toHaveBeenCalledWith({
      tessedit_pageseg_mode: "11",
      tessedit_char_whitelist: "0123456789",
    });
  });

  it("maps the language and forwards langPath", async () => {
    await new TesseractOCR({ langPath: "/data/tessdata" }).extractText({
      image: IMAGE,
      language: "de",
    });
    const [lang, oem, options] = (createWorker as jest.Mock).mock.calls[0];
    expect(lang).toBe("deu");
    expect(oem).toBe(1);
    expect(options.langPath).toBe("/data/tessdata");
    expect(options.cachePath).toBeUndefined();
  });

  it("terminates the worker after recognition", async () => {
    await new TesseractOCR().extractText({ image: IMAGE });
    expect(worker.terminate).toHaveBeenCalledTimes(1);
  });
});

// ─── Failures ────────────────────────────────────────────────────────────────

describe("TesseractOCR failures", () => {
  it("wraps recognition errors", async () => {
    worker.recognize.mockRejectedValueOnce(new Error("bad image"));
    const pending = new TesseractOCR().extractText({ image: IMAGE });

    await expect(pending).rejects.toBeInstanceOf(OCRError);
    await expect(pending).rejects.toThrow(
      "[tesseract] Tesseract recognition failed: bad image",
    );
    expect(worker.terminate).toHaveBeenCalledTimes(1);
  });

  it("refuses an already aborted signal without starting a worker", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      new TesseractOCR().extractText({ image: IMAGE, signal: controller.signal }),
    ).rejects.toThrow("[tesseract] Recognition cancelled before start");
    expect(createWorker).not.toHaveBeenCalled();
  });

  it("honours an abort that arrives while the worker starts", async () => {
    let startWorker: ((value: unknown) => void) | undefined;
    (createWorker as jest.Mock).mockImplementationOnce(
      () =>
        new Promise((resolve) => {
          startWorker = resolve;
        }),
    );
    const controller = new AbortController();
    const pending = new TesseractOCR().extractText({
      image: IMAGE,
      signal: controller.signal,
    });

    controller.abort();
    startWorker?.(worker);

    await expect(pending).rejects.toThrow("[tesseract] Recognition cancelled");
    expect(worker.setParameters).not.toHaveBeenCalled();
    expect(worker.recognize).not.toHaveBeenCalled();
    expect(worker.terminate).toHaveBeenCalledTimes(1);
  });
});
