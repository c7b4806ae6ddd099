/**
 * DocMatch – Transient image storage
 *
 * Holds the two images of a cycle for its duration. `release` is called
 * on every session reset and must leave nothing behind.
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ImageFormat } from "../types";

export interface StoredImage {
  index: number;
  bytes: Buffer;
  format: ImageFormat;
}

export interface ImageStore {
  readonly name: string;
  /** Persist one image and return its storage key */
  put(sessionId: string, image: StoredImage): Promise<string>;
  /** Drop one image previously returned by `put` */
  discard(sessionId: string, key: string): Promise<void>;
  /** Drop everything held for the session */
  release(sessionId: string): Promise<void>;
  /** Number of images currently held for the session */
  count(sessionId: string): number;
}

export class InMemoryImageStore implements ImageStore {
  readonly name = "memory";
  private readonly images = new Map<string, Map<string, Buffer>>();

  async put(sessionId: string, image: StoredImage): Promise<string> {
    const key = `${sessionId}/document-${image.index + 1}.${image.format}`;
    let held = this.images.get(sessionId);
    if (!held) {
      held = new Map();
      this.images.set(sessionId, held);
    }
    held.set(key, image.bytes);
    return key;
  }

  async discard(sessionId: string, key: string): Promise<void> {
    this.images.get(sessionId)?.delete(key);
  }

  async release(sessionId: string): Promise<void> {
    this.images.delete(sessionId);
  }

  count(sessionId: string): number {
    return this.images.get(sessionId)?.size ?? 0;
  }
}

/**
 * Writes images into one temporary directory per session under the OS
 * temp dir; the directory is removed on release.
 *
 * The directory is registered as a promise before its creation is awaited,
 * so concurrent puts for one session share it.
 */
export class TempFileImageStore implements ImageStore {
  readonly name = "tempfile";
  private readonly dirs = new Map<string, Promise<string>>();
  private readonly files = new Map<string, Set<string>>();

  constructor(private readonly root: string = tmpdir()) {}

  async put(sessionId: string, image: StoredImage): Promise<string> {
    let pending = this.dirs.get(sessionId);
    if (!pending) {
      pending = mkdtemp(join(this.root, "docmatch-"));
      this.dirs.set(sessionId, pending);
    }
    const dir = await pending;
    const ext = image.format === "jpeg" ? "jpg" : image.format;
    const path = join(dir, `document-${image.index + 1}.${ext}`);
    await writeFile(path, image.bytes);

    const held = this.files.get(sessionId) ?? new Set<string>();
    held.add(path);
    this.files.set(sessionId, held);
    return path;
  }

  async discard(sessionId: string, key: string): Promise<void> {
    this.files.get(sessionId)?.delete(key);
    await rm(key, { force: true });
  }

  async release(sessionId: string): Promise<void> {
    const pending = this.dirs.get(sessionId);
    this.dirs.delete(sessionId);
    this.files.delete(sessionId);
    if (!pending) return;

    let dir: string;
    try {
      dir = await pending;
    } catch {
      // mkdtemp failed; the put awaiting it reports the error
      return;
    }
    await rm(dir, { recursive: true, force: true });
  }

  count(sessionId: string): number {
    return this.files.get(sessionId)?.size ?? 0;
  }

  /** Directory used for the session, if any image was stored */
  async directoryOf(sessionId: string): Promise<string | undefined> {
    return this.dirs.get(sessionId);
  }
}
