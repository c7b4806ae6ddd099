export { DocMatchSDK } from "./DocMatch";
export { ComparisonPipeline } from "./pipeline";
export type {
  PipelineResult,
  PipelineComponents,
  DocumentPair,
} from "./pipeline";
export { Matcher } from "./Matcher";
export type { MatcherOptions } from "./Matcher";
export {
  DEFAULT_CONFIG,
  IDENTIFIER_PRESETS,
  resolveConfig,
  presetOptions,
} from "./config";
export type {
  DocMatchConfig,
  DocMatchOptions,
  IdentifierPreset,
  IdentifierPresetName,
} from "./config";
export {
  validateConfig,
  validateImageInput,
  assertImageBytes,
  DocMatchError,
  toDocMatchError,
} from "./validator";
export type { ValidationResult, DocMatchErrorCode } from "./validator";
