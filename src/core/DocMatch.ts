/**
 * DocMatch – Main API
 *
 * Usage:
 *   import { DocMatch } from "docmatch";
 *
 *   const result = DocMatch.compareTexts(textOfInvoice, textOfDeliveryNote);
 *   if (result.ok && result.match.matched) console.log(result.match.identifiers);
 *
 * Interactive usage:
 *   const workflow = DocMatch.createWorkflow({ vendorLabels: ["ACME"] });
 *   const session = DocMatch.createSession();
 *   await workflow.selectMode(session, AcquisitionMode.UPLOAD);
 *   await workflow.acquire(session, [image1, image2]);
 */

import type {
  CapturedImage,
  ImageInput,
  InvoiceNumberCandidate,
  MatchResult,
} from "../types";
import type { DocMatchOptions } from "./config";
import { resolveConfig } from "./config";
import { ComparisonPipeline } from "./pipeline";
import type { PipelineResult } from "./pipeline";
import { Matcher } from "./Matcher";
import { NumberExtractor } from "../parser/NumberExtractor";
import { DocMatchError, validateImageInput } from "./validator";
import { WorkflowMachine } from "../workflow/WorkflowMachine";
import type { WorkflowOptions } from "../workflow/WorkflowMachine";
import { createSession } from "../session/Session";
import { createLogger } from "../utils/logger";

export const DocMatchSDK = {
  /** State machine for interactive acquire → compare cycles */
  createWorkflow(options: WorkflowOptions = {}): WorkflowMachine {
    return new WorkflowMachine(options);
  },

  createSession,

  /** Invoice-number candidates found in one OCR text */
  extractNumbers(
    text: string,
    options: DocMatchOptions = {},
  ): InvoiceNumberCandidate[] {
    const config = resolveConfig(options);
    const logger = createLogger(config.debug, "extractor");
    return new NumberExtractor(config, logger).extract(text);
  },

  /** Compare two candidate lists */
  matchCandidates(
    document1: readonly InvoiceNumberCandidate[],
    document2: readonly InvoiceNumberCandidate[],
    options: DocMatchOptions = {},
  ): MatchResult {
    return new Matcher(resolveConfig(options)).match(document1, document2);
  },

  /** Compare two documents given as OCR text */
  compareTexts(
    text1: string,
    text2: string,
    options: DocMatchOptions = {},
  ): PipelineResult {
    const config = resolveConfig(options);
    const pipeline = new ComparisonPipeline(
      config,
      createLogger(config.debug, "pipeline"),
    );
    return pipeline.compareTexts([text1, text2]);
  },

  /**
   * Compare two document images outside of a workflow session.
   * Never throws for processing failures; inspect `result.ok`.
   */
  async compareImages(
    image1: ImageInput,
    image2: ImageInput,
    options: DocMatchOptions = {},
  ): Promise<PipelineResult> {
    const config = resolveConfig(options);
    const captured: CapturedImage[] = [];

    for (const [index, input] of [image1, image2].entries()) {
      const checked = validateImageInput(input, config.allowedFormats);
      if ("error" in checked) {
        return {
          ok: false,
          error: new DocMatchError(
            `Document ${index + 1}: ${checked.error}`,
            "UNSUPPORTED_FORMAT",
          ),
        };
      }
      captured.push({
        index: index === 0 ? 0 : 1,
        bytes: input.bytes,
        format: checked.format,
        source: input.source,
      });
    }

    const pipeline = new ComparisonPipeline(
      config,
      createLogger(config.debug, "pipeline"),
    );
    return pipeline.compareImages([captured[0], captured[1]]);
  },
};
