import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { StorageResult } from "../../src/common/errors.js";
import { FileCatalogStore, type CatalogSnapshot, type CatalogStore } from "../../src/storage/catalog.js";
import { FileBlobStore } from "../../src/storage/fileBlobStore.js";
import { StorageEngine } from "../../src/storage/storageEngine.js";

function unwrap<T>(result: StorageResult<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

class RejectingCatalogStore implements CatalogStore {
  async load(): Promise<CatalogSnapshot | undefined> {
    return undefined;
  }

  async save(): Promise<void> {
    throw new Error("read-only file system");
  }
}

describe("StorageEngine persistence", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "stowage-persist-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function openEngine(): StorageEngine {
    return new StorageEngine({
      blobStore: new FileBlobStore(join(root, "blobs")),
      catalog: new FileCatalogStore(join(root, "catalog.json")),
    });
  }

  it("brings buckets and objects back after a restart", async () => {
    const first = openEngine();
    await first.restore();
    await first.createBucket("docs");
    await first.createBucket("scratch");
    await first.putObject("docs", "readme.txt", Buffer.from("v1"), { contentType: "text/plain" });
    await first.putObject("docs", "readme.txt", Buffer.from("v2"), {
      contentType: "text/plain",
      metadata: { author: "tests" },
    });
    await first.putObject("docs", "gone.txt", Buffer.from("bye"));
    await first.deleteObject("docs", "gone.txt");
    await first.deleteBucket("scratch");

    const second = openEngine();
    await second.restore();

    expect(second.listBuckets().map((b) => b.name)).toEqual(["docs"]);
    expect(unwrap(second.listObjects("docs")).objects.map((o) => o.key)).toEqual(["readme.txt"]);
    const stored = unwrap(await second.getObject("docs", "readme.txt"));
    expect(stored.body.toString()).toBe("v2");
    expect(stored.metadata.contentType).toBe("text/plain");
    expect(stored.metadata.metadata).toEqual({ author: "tests" });
    expect(stored.metadata.lastModified).toBeInstanceOf(Date);
    expect(await second.blobStore.list()).toHaveLength(1);
  });

  it("releases blobs no catalog entry references", async () => {
    const first = openEngine();
    await first.restore();
    await first.createBucket("docs");
    await first.putObject("docs", "kept", Buffer.from("kept"));
    const stray = await first.blobStore.store(Buffer.from("written, never indexed"));

    const second = openEngine();
    await second.restore();

    const held = await second.blobStore.list();
    expect(held).toHaveLength(1);
    expect(held).not.toContain(stray.ref);
    expect(unwrap(await second.getObject("docs", "kept")).body.toString()).toBe("kept");
  });

  it("starts empty when no catalog was saved", async () => {
    const engine = openEngine();
    await engine.restore();

    expect(engine.listBuckets()).toEqual([]);
  });

  it("keeps serving a write whose catalog save failed", async () => {
    const engine = new StorageEngine({ catalog: new RejectingCatalogStore() });
    await engine.restore();

    expect((await engine.createBucket("docs")).ok).toBe(true);
    expect((await engine.putObject("docs", "k", Buffer.from("v"))).ok).toBe(true);
    expect(unwrap(await engine.getObject("docs", "k")).body.toString()).toBe("v");
  });
});
