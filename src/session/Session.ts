/**
 * DocMatch – Session state
 *
 * One Session scopes one acquire → process → compare cycle for one user.
 * It is passed explicitly into every workflow transition; nothing here
 * is process-global.
 */

import { randomUUID } from "node:crypto";
import { WorkflowState } from "../types";
import type {
  AcquisitionMode,
  CapturedImage,
  ExtractedDocument,
  MatchResult,
} from "../types";

/** Images compared per cycle */
export const IMAGES_PER_COMPARISON = 2;

export interface Session {
  readonly id: string;
  state: WorkflowState;
  mode: AcquisitionMode | null;
  /** At most IMAGES_PER_COMPARISON, in acquisition order */
  images: CapturedImage[];
  /** Filled once both documents have been read */
  documents: ExtractedDocument[];
  /** Non-null only in the comparison state */
  match: MatchResult | null;
  /** Message of the failure that last sent the session home */
  lastError: string | null;
  /** Abort handle of the comparison in flight */
  inFlight: AbortController | null;
  /** Incremented on every reset; stale async work compares against it */
  cycle: number;
  /** Image slots claimed by captures that are still being stored */
  reserved: number;
}

export function createSession(id: string = randomUUID()): Session {
  return {
    id,
    state: WorkflowState.HOME,
    mode: null,
    images: [],
    documents: [],
    match: null,
    lastError: null,
    inFlight: null,
    cycle: 0,
    reserved: 0,
  };
}

/** Images still required before a comparison can run */
export function imagesNeeded(session: Session): number {
  return Math.max(0, IMAGES_PER_COMPARISON - session.images.length);
}
