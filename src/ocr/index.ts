export { OCREngine, registerOCRProvider, getOCRProvider } from "./OCREngine";
export type { OCREngineOptions } from "./OCREngine";
export { TesseractOCR } from "./TesseractOCR";
export type { TesseractOCROptions } from "./TesseractOCR";
export type { OCRProvider, OCROptions, OCRResult } from "./OCRProvider";
export { OCRError } from "./OCRProvider";
