/**
 * DocMatch – Presenter
 *
 * Maps a Session onto a render-agnostic view model. The verdict never
 * travels alone: both texts and both candidate lists are always part of
 * the comparison view so a person can confirm or override a "no match".
 */

import { AcquisitionMode, WorkflowState } from "../types";
import type { CapturedImage, ExtractedDocument } from "../types";
import type { Session } from "../session/Session";
import { IMAGES_PER_COMPARISON, imagesNeeded } from "../session/Session";

export type Verdict = "match" | "no-match";

export interface DocumentPanel {
  label: string;
  source: ExtractedDocument["source"];
  rawText: string;
  normalizedText: string;
  candidates: string[];
  ocrProvider?: string;
  /** Image the text was read from, so it can be shown beside it */
  image?: PanelImage;
}

export type PanelImage = Pick<CapturedImage, "format" | "fileName" | "storageKey">;

export interface ComparisonView {
  screen: WorkflowState;
  title: string;
  /** "Images Captured: 1/2" while acquiring */
  progress?: string;
  /** "Need 1 more" while acquiring */
  hint?: string;
  verdict?: Verdict;
  headline?: string;
  detail?: string;
  identifiers: string[];
  documents: DocumentPanel[];
  error?: string;
  actions: string[];
}

const TITLES: Record<string, string> = {
  home: "OCR Invoice Scanner",
  camera: "Camera Capture",
  upload: "Upload Images",
  text: "Enter Document Text",
  processing: "Processing Images...",
  comparison: "Document Comparison Results",
};

export class ComparisonPresenter {
  present(session: Session): ComparisonView {
    switch (session.state) {
      case WorkflowState.HOME:
        return {
          ...this.empty(session.state, TITLES.home),
          actions: ["OPEN CAMERA", "UPLOAD FROM GALLERY", "ENTER TEXT"],
          ...(session.lastError ? { error: session.lastError } : {}),
        };

      case WorkflowState.ACQUIRING:
        return this.presentAcquiring(session);

      case WorkflowState.PROCESSING:
        return {
          ...this.empty(session.state, TITLES.processing),
          actions: ["BACK"],
        };

      case WorkflowState.COMPARISON:
        return this.presentComparison(session);
    }
  }

  /** Plain-text rendering of a view, one entry per line */
  renderText(view: ComparisonView): string[] {
    const lines: string[] = [view.title];
    if (view.error) lines.push(`Error: ${view.error}`);
    if (view.progress) lines.push(view.progress);
    if (view.hint) lines.push(view.hint);
    if (view.headline) lines.push(view.headline);
    if (view.detail) lines.push(view.detail);

    for (const doc of view.documents) {
      lines.push(`${doc.label} Text:`);
      lines.push(doc.rawText.length > 0 ? doc.rawText : "(no text)");
      lines.push(
        `${doc.label} Candidates: ${doc.candidates.length > 0 ? doc.candidates.join(", ") : "(none)"}`,
      );
    }

    if (view.actions.length > 0) {
      lines.push(`[${view.actions.join("] [")}]`);
    }
    return lines;
  }

  private presentAcquiring(session: Session): ComparisonView {
    const mode = session.mode ?? AcquisitionMode.UPLOAD;
    const held = session.images.length;

    if (mode === AcquisitionMode.TEXT) {
      return {
        ...this.empty(session.state, TITLES.text),
        actions: ["BACK", "COMPARE"],
      };
    }

    const needed = imagesNeeded(session);
    const verb = mode === AcquisitionMode.CAMERA ? "Captured" : "Selected";
    return {
      ...this.empty(session.state, TITLES[mode]),
      progress: `Images ${verb}: ${held}/${IMAGES_PER_COMPARISON}`,
      ...(held > 0 && needed > 0 ? { hint: `Need ${needed} more` } : {}),
      actions: [
        "BACK",
        mode === AcquisitionMode.CAMERA ? "CAPTURE" : "SELECT IMAGES",
      ],
    };
  }

  private presentComparison(session: Session): ComparisonView {
    const match = session.match;
    const documents = session.documents.map((doc) =>
      this.panel(doc, session.images.find((img) => img.index === doc.index)),
    );

    if (match && match.matched) {
      const plural = match.identifiers.length > 1;
      return {
        screen: session.state,
        title: TITLES.comparison,
        verdict: "match",
        headline: "MATCH FOUND",
        detail: `Invoice Number${plural ? "s" : ""}: ${match.identifiers.join(", ")}`,
        identifiers: [...match.identifiers],
        documents,
        actions: ["NEW SCAN"],
      };
    }

    return {
      screen: session.state,
      title: TITLES.comparison,
      verdict: "no-match",
      headline: "NO MATCH FOUND",
      detail: "No matching invoice numbers between documents",
      identifiers: [],
      documents,
      actions: ["NEW SCAN"],
    };
  }

  private panel(doc: ExtractedDocument, image?: CapturedImage): DocumentPanel {
    return {
      label: `Document ${doc.index + 1}`,
      source: doc.source,
      rawText: doc.rawText,
      normalizedText: doc.normalizedText,
      candidates: doc.candidates.map((c) => c.value),
      ...(doc.ocrProvider ? { ocrProvider: doc.ocrProvider } : {}),
      ...(image
        ? {
            image: {
              format: image.format,
              ...(image.fileName ? { fileName: image.fileName } : {}),
              ...(image.storageKey ? { storageKey: image.storageKey } : {}),
            },
          }
        : {}),
    };
  }

  private empty(screen: WorkflowState, title: string): ComparisonView {
    return { screen, title, identifiers: [], documents: [], actions: [] };
  }
}
