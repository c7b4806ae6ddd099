/**
 * Session, SessionRegistry & image stores – unit tests
 */
import { existsSync, readdirSync, readFileSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createSession, imagesNeeded } from "../session/Session";
import { SessionRegistry } from "../session/SessionRegistry";
import { InMemoryImageStore, TempFileImageStore } from "../session/ImageStore";
import { WorkflowState } from "../types";

const BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47]);

// ─── Session ─────────────────────────────────────────────────────────────────

describe("createSession", () => {
  it("starts at home with nothing held", () => {
    const session = createSession("s1");
    expect(session).toEqual({
      id: "s1",
      state: WorkflowState.HOME,
      mode: null,
      images: [],
      documents: [],
      match: null,
      lastError: null,
      inFlight: null,
      cycle: 0,
      reserved: 0,
    });
    expect(imagesNeeded(session)).toBe(2);
  });

  it("generates distinct ids", () => {
    expect(createSession().id).not.toBe(createSession().id);
  });
});

// ─── Stores ──────────────────────────────────────────────────────────────────

describe("InMemoryImageStore", () => {
  it("keys images by session and position", async () => {
    const store = new InMemoryImageStore();
    const key = await store.put("s1", { index: 0, bytes: BYTES, format: "png" });
    expect(key).toBe("s1/document-1.png");
    expect(store.count("s1")).toBe(1);
    expect(store.count("s2")).toBe(0);
  });

  it("discards a single image", async () => {
    const store = new InMemoryImageStore();
    const key = await store.put("s1", { index: 0, bytes: BYTES, format: "png" });
    await store.put("s1", { index: 1, bytes: BYTES, format: "png" });
    await store.discard("s1", key);
    expect(store.count("s1")).toBe(1);
  });

  it("forgets everything on release", async () => {
    const store = new InMemoryImageStore();
    await store.put("s1", { index: 0, bytes: BYTES, format: "png" });
    await store.put("s1", { index: 1, bytes: BYTES, format: "jpeg" });
    await store.release("s1");
    expect(store.count("s1")).toBe(0);
  });
});

describe("TempFileImageStore", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "docmatch-test-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("writes images into a per-session directory", async () => {
    const store = new TempFileImageStore(root);
    const first = await store.put("s1", { index: 0, bytes: BYTES, format: "jpeg" });
    const second = await store.put("s1", { index: 1, bytes: BYTES, format: "png" });

    const dir = await store.directoryOf("s1");
    expect(dir).toBeDefined();
    expect(first).toBe(join(dir ?? "", "document-1.jpg"));
    expect(second).toBe(join(dir ?? "", "document-2.png"));
    expect(readFileSync(first)).toEqual(BYTES);
    expect(store.count("s1")).toBe(2);
  });

  it("separates sessions", async () => {
    const store = new TempFileImageStore(root);
    await store.put("s1", { index: 0, bytes: BYTES, format: "png" });
    await store.put("s2", { index: 0, bytes: BYTES, format: "png" });
    expect(await store.directoryOf("s1")).not.toBe(
      await store.directoryOf("s2"),
    );
  });

  it("removes the directory on release", async () => {
    const store = new TempFileImageStore(root);
    const path = await store.put("s1", { index: 0, bytes: BYTES, format: "png" });
    const dir = (await store.directoryOf("s1")) ?? "";

    await store.release("s1");

    expect(existsSync(path)).toBe(false);
    expect(existsSync(dir)).toBe(false);
    expect(store.count("s1")).toBe(0);
    expect(await store.directoryOf("s1")).toBeUndefined();
  });

  it("shares one directory between concurrent puts", async () => {
    const store = new TempFileImageStore(root);
    const [first, second] = await Promise.all([
      store.put("s1", { index: 0, bytes: BYTES, format: "png" }),
      store.put("s1", { index: 1, bytes: BYTES, format: "png" }),
    ]);
    const dir = (await store.directoryOf("s1")) ?? "";

    expect(first).toBe(join(dir, "document-1.png"));
    expect(second).toBe(join(dir, "document-2.png"));
    expect(readdirSync(root)).toHaveLength(1);

    await store.release("s1");
    expect(readdirSync(root)).toEqual([]);
  });

  it("discards a single image", async () => {
    const store = new TempFileImageStore(root);
    const first = await store.put("s1", { index: 0, bytes: BYTES, format: "png" });
    const second = await store.put("s1", { index: 1, bytes: BYTES, format: "png" });

    await store.discard("s1", second);

    expect(existsSync(first)).toBe(true);
    expect(existsSync(second)).toBe(false);
    expect(store.count("s1")).toBe(1);
  });

  it("tolerates releasing an unknown session", async () => {
    const store = new TempFileImageStore(root);
    await expect(store.release("nobody")).resolves.toBeUndefined();
  });
});

// ─── Registry ────────────────────────────────────────────────────────────────

describe("SessionRegistry", () => {
  it("returns the same session for the same user", () => {
    const registry = new SessionRegistry();
    expect(registry.get("alice")).toBe(registry.get("alice"));
    expect(registry.size).toBe(1);
  });

  it("gives each user their own session", () => {
    const registry = new SessionRegistry();
    expect(registry.get("alice")).not.toBe(registry.get("bob"));
    expect(registry.size).toBe(2);
  });

  it("disposes a user's session and stored images", async () => {
    const store = new InMemoryImageStore();
    const registry = new SessionRegistry(store);
    const session = registry.get("alice");
    const controller = new AbortController();
    session.inFlight = controller;
    await store.put(session.id, { index: 0, bytes: BYTES, format: "png" });

    await registry.dispose("alice");

    expect(registry.has("alice")).toBe(false);
    expect(controller.signal.aborted).toBe(true);
    expect(store.count(session.id)).toBe(0);
    expect(session.cycle).toBe(1);
    expect(session.reserved).toBe(0);
  });

  it("ignores disposing an unknown user", async () => {
    const registry = new SessionRegistry();
    await expect(registry.dispose("nobody")).resolves.toBeUndefined();
  });
});
