import type { Dirent } from "node:fs";
import { mkdir, readFile, readdir, rename, rm, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { computeEtag, isBlobReference, newBlobReference, type BlobStore } from "./blobStore.js";
import type { BlobReference, StoredBlob } from "./storageTypes.js";

const FAN_OUT_PATTERN = /^[0-9a-f]{2}$/;

/**
 * Blob store backed by a directory: one file per blob, fanned out into
 * sub-directories by the first two characters of the reference.
 *
 * Payloads are written to a temporary sibling and renamed into place, so a
 * blob file is either absent or complete.
 */
export class FileBlobStore implements BlobStore {
  readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  async store(bytes: Buffer): Promise<StoredBlob> {
    const ref = newBlobReference();
    const target = this.pathFor(ref);
    const temp = `${target}.tmp`;

    await mkdir(join(this.root, ref.slice(0, 2)), { recursive: true });
    try {
      await writeFile(temp, bytes);
      await rename(temp, target);
    } catch (err) {
      await rm(temp, { force: true });
      throw err;
    }

    return { ref, contentLength: bytes.length, etag: computeEtag(bytes) };
  }

  async fetch(ref: BlobReference): Promise<Buffer | undefined> {
    if (!isBlobReference(ref)) return undefined;
    try {
      return await readFile(this.pathFor(ref));
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  }

  async release(ref: BlobReference): Promise<void> {
    if (!isBlobReference(ref)) {
      throw new Error(`Malformed blob reference: ${ref}`);
    }
    await unlink(this.pathFor(ref));
  }

  async list(): Promise<BlobReference[]> {
    let dirs: Dirent[];
    try {
      dirs = await readdir(this.root, { withFileTypes: true });
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const refs: BlobReference[] = [];
    for (const dir of dirs) {
      if (!dir.isDirectory() || !FAN_OUT_PATTERN.test(dir.name)) continue;
      for (const name of await readdir(join(this.root, dir.name))) {
        if (isBlobReference(name)) refs.push(name);
      }
    }
    return refs;
  }

  pathFor(ref: BlobReference): string {
    return join(this.root, ref.slice(0, 2), ref);
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
