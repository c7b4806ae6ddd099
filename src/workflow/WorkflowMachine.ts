/**
 * DocMatch – Workflow state machine
 *
 *   home ──selectMode──▶ acquiring ──2nd image / texts──▶ processing
 *     ▲                    │                                 │
 *     └──── back ──────────┘          ok ──▶ comparison ──back/newScan──▶ home
 *     └──────────────────────────── failure (session reset) ◀┘
 *
 * Every transition takes the Session explicitly. Any return to home
 * resets the session and releases its stored images.
 */

import { AcquisitionMode, WorkflowState } from "../types";
import type { CapturedImage, ImageFormat, ImageInput } from "../types";
import type { Session } from "../session/Session";
import { IMAGES_PER_COMPARISON, imagesNeeded } from "../session/Session";
import type { ImageStore } from "../session/ImageStore";
import { InMemoryImageStore } from "../session/ImageStore";
import type { DocMatchConfig, DocMatchOptions } from "../core/config";
import { resolveConfig } from "../core/config";
import { ComparisonPipeline } from "../core/pipeline";
import type { PipelineResult } from "../core/pipeline";
import {
  DocMatchError,
  toDocMatchError,
  validateImageInput,
} from "../core/validator";
import type { DocMatchLogger } from "../utils/logger";
import { createLogger } from "../utils/logger";

export interface WorkflowOptions extends DocMatchOptions {
  pipeline?: ComparisonPipeline;
  imageStore?: ImageStore;
  logger?: DocMatchLogger;
}

export interface RejectedInput {
  fileName?: string;
  reason: string;
}

export interface TransitionResult {
  /** State after the transition */
  state: WorkflowState;
  /** Inputs appended to the session */
  accepted: number;
  /** Inputs dropped because the session already held enough */
  ignored: number;
  /** Inputs refused for their format */
  rejected: RejectedInput[];
  /** Images (or texts) still required before processing starts */
  needed: number;
  message?: string;
  error?: DocMatchError;
}

interface ImageClaim {
  input: ImageInput;
  format: ImageFormat;
  /** Slot reserved for the image */
  index: 0 | 1;
}

export class WorkflowMachine {
  readonly config: DocMatchConfig;
  private readonly logger: DocMatchLogger;
  private readonly pipeline: ComparisonPipeline;
  private readonly store: ImageStore;

  constructor(options: WorkflowOptions = {}) {
    const { pipeline, imageStore, logger, ...rest } = options;
    this.config = resolveConfig(rest);
    this.logger = logger ?? createLogger(this.config.debug, "workflow");
    this.pipeline = pipeline ?? new ComparisonPipeline(this.config, this.logger);
    this.store = imageStore ?? new InMemoryImageStore();
  }

  // ─── Transitions ──────────────────────────────────────────────────────────

  /**
   * home → acquiring. The session is reset first so nothing from an
   * earlier cycle leaks into the new one.
   */
  async selectMode(
    session: Session,
    mode: AcquisitionMode,
  ): Promise<TransitionResult> {
    if (session.state !== WorkflowState.HOME) {
      return this.refuse(
        session,
        `Cannot start ${mode} acquisition from ${session.state}`,
      );
    }

    await this.reset(session);
    session.mode = mode;
    session.state = WorkflowState.ACQUIRING;
    this.logger.info(`Session ${session.id}: acquiring via ${mode}`);
    return this.result(session);
  }

  /**
   * acquiring → acquiring | processing. Appends images until two are
   * held; later inputs are ignored, never swapped in. The second image
   * starts processing immediately.
   */
  async acquire(
    session: Session,
    inputs: readonly ImageInput[],
  ): Promise<TransitionResult> {
    if (
      session.state !== WorkflowState.ACQUIRING ||
      session.mode === AcquisitionMode.TEXT ||
      session.mode === null
    ) {
      return {
        ...this.refuse(session, `Not acquiring images (state: ${session.state})`),
        ignored: inputs.length,
      };
    }

    const cycle = session.cycle;
    // A camera event yields one frame
    const considered =
      session.mode === AcquisitionMode.CAMERA ? inputs.slice(0, 1) : inputs;
    let ignored = inputs.length - considered.length;
    const rejected: RejectedInput[] = [];
    const claims: ImageClaim[] = [];

    // Slots are claimed before the first await so concurrent calls never
    // hold more than two images between them.
    for (const input of considered) {
      const checked = validateImageInput(input, this.config.allowedFormats);
      if ("error" in checked) {
        rejected.push({ fileName: input.fileName, reason: checked.error });
        continue;
      }
      const taken = session.images.length + session.reserved;
      if (taken >= IMAGES_PER_COMPARISON) {
        ignored++;
        continue;
      }
      session.reserved++;
      claims.push({
        input,
        format: checked.format,
        index: taken === 0 ? 0 : 1,
      });
    }

    if (ignored > 0) {
      this.logger.warn(
        `Session ${session.id}: ignored ${ignored} image(s) beyond the first ${IMAGES_PER_COMPARISON}`,
      );
    }

    const settled = await Promise.allSettled(
      claims.map((claim) => this.capture(session, claim)),
    );
    const stored: CapturedImage[] = [];
    const failures: unknown[] = [];
    for (const outcome of settled) {
      if (outcome.status === "fulfilled") stored.push(outcome.value);
      else failures.push(outcome.reason);
    }

    if (session.cycle !== cycle) {
      // Reset while the images were being stored
      await this.discard(session, stored);
      return this.refuse(session, "Session was reset during acquisition");
    }
    session.reserved -= claims.length;

    if (failures.length > 0) {
      await this.discard(session, stored);
      const error = toDocMatchError(failures[0]);
      this.logger.error(
        `Session ${session.id}: storing image failed – ${error.message}`,
      );
      return {
        ...this.refuse(session, `Error storing image: ${error.message}`),
        ignored,
        rejected,
        error,
      };
    }

    session.images = [...session.images, ...stored].sort(
      (a, b) => a.index - b.index,
    );
    const accepted = stored.length;

    if (accepted > 0 && imagesNeeded(session) === 0) {
      const outcome = await this.processImages(session);
      return { ...outcome, accepted, ignored, rejected };
    }

    return {
      ...this.result(session),
      accepted,
      ignored,
      rejected,
      message: this.progressMessage(session),
    };
  }

  /**
   * Direct-text entry: both documents' OCR text supplied by the caller.
   * Skips preprocessing and OCR, otherwise identical to the image path.
   */
  async submitTexts(
    session: Session,
    texts: readonly string[],
  ): Promise<TransitionResult> {
    if (
      session.state !== WorkflowState.ACQUIRING ||
      session.mode !== AcquisitionMode.TEXT
    ) {
      return this.refuse(
        session,
        `Not accepting text (state: ${session.state})`,
      );
    }

    if (texts.length < IMAGES_PER_COMPARISON) {
      const needed = IMAGES_PER_COMPARISON - texts.length;
      return {
        ...this.result(session),
        needed,
        message: `Received ${texts.length} text(s). Need ${needed} more.`,
      };
    }

    session.state = WorkflowState.PROCESSING;
    const result = this.pipeline.compareTexts([texts[0], texts[1]]);
    const outcome = await this.settle(session, result);
    return {
      ...outcome,
      accepted: IMAGES_PER_COMPARISON,
      ignored: texts.length - IMAGES_PER_COMPARISON,
    };
  }

  /**
   * acquiring | processing | comparison → home. Aborts an in-flight
   * comparison and resets the session.
   */
  async back(session: Session): Promise<TransitionResult> {
    if (session.state === WorkflowState.HOME) {
      return this.result(session);
    }
    await this.reset(session);
    return this.result(session);
  }

  /** comparison → home; valid from any state as a hard reset */
  async newScan(session: Session): Promise<TransitionResult> {
    await this.reset(session);
    return this.result(session);
  }

  /** Current state and how many more images are needed */
  status(session: Session): TransitionResult {
    return this.result(session);
  }

  // ─── Processing ───────────────────────────────────────────────────────────

  /**
   * Run the pipeline over the two held images. Reads images without
   * touching `session.images` and replaces documents/match wholesale, so
   * re-entering for the same pair recomputes the same result.
   */
  private async processImages(session: Session): Promise<TransitionResult> {
    const [first, second] = session.images;
    if (!first || !second) {
      return this.result(session);
    }

    session.state = WorkflowState.PROCESSING;
    session.documents = [];
    session.match = null;

    const cycle = session.cycle;
    const controller = new AbortController();
    session.inFlight = controller;
    this.logger.info(`Session ${session.id}: processing 2 images`);

    const result = await this.pipeline.compareImages(
      [first, second],
      controller.signal,
    );

    if (session.cycle !== cycle) {
      // Reset while OCR was running; the result belongs to a dead cycle.
      this.logger.debug(`Session ${session.id}: discarding stale result`);
      return this.result(session);
    }
    session.inFlight = null;
    return this.settle(session, result);
  }

  /** processing → comparison | home */
  private async settle(
    session: Session,
    result: PipelineResult,
  ): Promise<TransitionResult> {
    if (!result.ok) {
      await this.reset(session);
      session.lastError = result.error.message;
      this.logger.error(
        `Session ${session.id}: processing failed (${result.error.code}) – back to home`,
      );
      return {
        ...this.result(session),
        message: `Error processing images: ${result.error.message}`,
        error: result.error,
      };
    }

    session.documents = [...result.documents];
    session.match = result.match;
    session.state = WorkflowState.COMPARISON;
    this.logger.info(
      `Session ${session.id}: ${result.match.matched ? `match ${result.match.identifiers.join(", ")}` : "no match"}`,
    );
    return this.result(session);
  }

  // ─── Helpers ──────────────────────────────────────────────────────────────

  private async capture(
    session: Session,
    claim: ImageClaim,
  ): Promise<CapturedImage> {
    const { input, format, index } = claim;
    const storageKey = await this.store.put(session.id, {
      index,
      bytes: input.bytes,
      format,
    });
    return Object.freeze({
      index,
      bytes: input.bytes,
      format,
      source: input.source,
      storageKey,
      ...(input.fileName ? { fileName: input.fileName } : {}),
    });
  }

  private async discard(
    session: Session,
    images: readonly CapturedImage[],
  ): Promise<void> {
    for (const image of images) {
      if (image.storageKey) {
        await this.store.discard(session.id, image.storageKey);
      }
    }
  }

  /** Progress line while fewer than two images are held */
  private progressMessage(session: Session): string | undefined {
    const needed = imagesNeeded(session);
    if (needed === 0) return undefined;
    const held = session.images.length;
    if (session.mode === AcquisitionMode.CAMERA) {
      return held > 0
        ? `Captured image ${held}. Please capture one more.`
        : undefined;
    }
    return `Selected ${held} image(s). Need ${needed} more.`;
  }

  /** Clear everything the session holds and return it home */
  private async reset(session: Session): Promise<void> {
    session.inFlight?.abort();
    session.inFlight = null;
    session.cycle++;
    session.reserved = 0;
    session.images = [];
    session.documents = [];
    session.match = null;
    session.mode = null;
    session.lastError = null;
    session.state = WorkflowState.HOME;
    await this.store.release(session.id);
  }

  private refuse(session: Session, message: string): TransitionResult {
    this.logger.debug(`Session ${session.id}: ${message}`);
    return { ...this.result(session), message };
  }

  private result(session: Session): TransitionResult {
    return {
      state: session.state,
      accepted: 0,
      ignored: 0,
      rejected: [],
      needed:
        session.state === WorkflowState.ACQUIRING ? imagesNeeded(session) : 0,
    };
  }
}
