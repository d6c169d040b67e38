import { createHash, randomUUID } from "node:crypto";
import type { BlobReference, StoredBlob } from "./storageTypes.js";

/**
 * Raw byte storage. Knows nothing about buckets or keys; every stored payload
 * gets a fresh reference, and each reference is released at most once by its
 * single owner.
 */
export interface BlobStore {
  store(bytes: Buffer): Promise<StoredBlob>;
  /** Resolves to `undefined` for a reference this store does not hold. */
  fetch(ref: BlobReference): Promise<Buffer | undefined>;
  /** Throws when `ref` is unknown or was already released. */
  release(ref: BlobReference): Promise<void>;
  /** Every reference currently held, in no particular order. */
  list(): Promise<BlobReference[]>;
}

const REF_PATTERN = /^[0-9a-f]{32}$/;

export function isBlobReference(value: string): value is BlobReference {
  return REF_PATTERN.test(value);
}

export function newBlobReference(): BlobReference {
  return randomUUID().replaceAll("-", "") as BlobReference;
}

export function computeEtag(bytes: Buffer): string {
  return `"${createHash("md5").update(bytes).digest("hex")}"`;
}

export class MemoryBlobStore implements BlobStore {
  private blobs = new Map<BlobReference, Buffer>();

  get blobCount(): number {
    return this.blobs.size;
  }

  async store(bytes: Buffer): Promise<StoredBlob> {
    const ref = newBlobReference();
    // private copy: the caller may reuse its buffer
    this.blobs.set(ref, Buffer.from(bytes));
    return { ref, contentLength: bytes.length, etag: computeEtag(bytes) };
  }

  async fetch(ref: BlobReference): Promise<Buffer | undefined> {
    const blob = this.blobs.get(ref);
    return blob ? Buffer.from(blob) : undefined;
  }

  async release(ref: BlobReference): Promise<void> {
    if (!this.blobs.delete(ref)) {
      throw new Error(`Blob ${ref} is not held by this store (double release?)`);
    }
  }

  async list(): Promise<BlobReference[]> {
    return Array.from(this.blobs.keys());
  }
}
