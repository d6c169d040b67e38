import { pino, type BaseLogger } from "pino";
import { fail, noSuchBucket, ok, type StorageResult } from "../common/errors.js";
import { KeyedReadWriteLock } from "../common/locks.js";
import { MAX_KEY_BYTES, MAX_LIST_KEYS } from "../common/types.js";
import { MemoryBlobStore, type BlobStore } from "./blobStore.js";
import { BucketRegistry } from "./bucketRegistry.js";
import type { CatalogSnapshot, CatalogStore } from "./catalog.js";
import type {
  BlobReference,
  BucketInfo,
  IndexEntry,
  ListObjectsOptions,
  ListObjectsResult,
  ObjectMetadata,
  PutObjectOptions,
  StoredBlob,
  StoredObject,
} from "./storageTypes.js";

export interface StorageEngineOptions {
  blobStore?: BlobStore;
  /** Where buckets and index entries are saved; kept in memory only when unset. */
  catalog?: CatalogStore;
  logger?: BaseLogger;
}

/**
 * Bucket and object operations over a registry, per-bucket indexes and a blob
 * store. Every method is one atomic unit that either fully succeeds or fails
 * with a typed `StorageError`.
 *
 * Locking: object operations hold their bucket's lock shared, bucket deletion
 * holds it exclusively. Writers of a key hold that key's lock exclusively,
 * readers of its bytes hold it shared, so a blob is never released under a
 * reader that already resolved it.
 *
 * With a catalog, every mutation saves the registry and indexes before the
 * blob it superseded is released, and `restore()` reloads them.
 */
export class StorageEngine {
  readonly blobStore: BlobStore;
  private readonly registry = new BucketRegistry();
  private readonly bucketLocks = new KeyedReadWriteLock();
  private readonly keyLocks = new KeyedReadWriteLock();
  private readonly catalog?: CatalogStore;
  private pendingSave: Promise<void> = Promise.resolve();
  private readonly logger: BaseLogger;

  constructor(options: StorageEngineOptions = {}) {
    this.blobStore = options.blobStore ?? new MemoryBlobStore();
    this.catalog = options.catalog;
    this.logger = options.logger ?? pino({ enabled: false });
  }

  /**
   * Reloads buckets and objects from the catalog, then releases every blob
   * no entry references. Call once, before serving requests.
   */
  async restore(): Promise<void> {
    if (!this.catalog) return;

    const snapshot = await this.catalog.load();
    const referenced = new Set<BlobReference>();
    for (const saved of snapshot?.buckets ?? []) {
      const bucket = this.registry.restore(saved.name, saved.creationDate);
      for (const entry of saved.objects) {
        bucket.index.put(entry);
        referenced.add(entry.blobRef);
      }
    }

    let orphans = 0;
    for (const ref of await this.blobStore.list()) {
      if (referenced.has(ref)) continue;
      await this.blobStore.release(ref);
      orphans++;
    }

    this.logger.info(
      { buckets: snapshot?.buckets.length ?? 0, objects: referenced.size, orphans },
      "Catalog restored",
    );
  }

  createBucket(name: string): Promise<StorageResult<BucketInfo>> {
    return this.bucketLocks.withExclusive(name, async (): Promise<StorageResult<BucketInfo>> => {
      const result = this.registry.create(name);
      if (!result.ok) return result;
      await this.persist();
      this.logger.info({ bucket: name }, "Bucket created");
      return ok({ name: result.value.name, creationDate: result.value.creationDate });
    });
  }

  deleteBucket(name: string): Promise<StorageResult<void>> {
    return this.bucketLocks.withExclusive(name, async () => {
      const result = this.registry.delete(name);
      if (result.ok) {
        await this.persist();
        this.logger.info({ bucket: name }, "Bucket deleted");
      }
      return result;
    });
  }

  hasBucket(name: string): boolean {
    return this.registry.exists(name);
  }

  listBuckets(): BucketInfo[] {
    return this.registry.list();
  }

  putObject(
    bucket: string,
    key: string,
    body: Buffer,
    options: PutObjectOptions = {},
  ): Promise<StorageResult<ObjectMetadata>> {
    return this.bucketLocks.withShared(bucket, () =>
      this.keyLocks.withExclusive(lockKey(bucket, key), () => this.writeObject(bucket, key, body, options)),
    );
  }

  getObject(bucket: string, key: string): Promise<StorageResult<StoredObject>> {
    return this.bucketLocks.withShared(bucket, () =>
      this.keyLocks.withShared(lockKey(bucket, key), async (): Promise<StorageResult<StoredObject>> => {
        const found = this.lookup(bucket, key);
        if (!found.ok) return found;
        const entry = found.value;

        let body: Buffer | undefined;
        try {
          body = await this.blobStore.fetch(entry.blobRef);
        } catch (err) {
          this.logger.error({ err, bucket, key }, "Failed to read object payload");
          return fail("InternalStorageFailure", "We encountered an internal error. Please try again.", `/${bucket}/${key}`, err);
        }
        if (!body) {
          this.logger.error({ bucket, key, blobRef: entry.blobRef }, "Index entry references a missing blob");
          return fail("InternalStorageFailure", "We encountered an internal error. Please try again.", `/${bucket}/${key}`);
        }

        return ok({ metadata: toMetadata(entry), body, contentLength: body.length });
      }),
    );
  }

  headObject(bucket: string, key: string): StorageResult<ObjectMetadata> {
    const found = this.lookup(bucket, key);
    return found.ok ? ok(toMetadata(found.value)) : found;
  }

  listObjects(bucket: string, options: ListObjectsOptions = {}): StorageResult<ListObjectsResult> {
    const target = this.registry.get(bucket);
    if (!target) return noSuchBucket(bucket);

    const prefix = options.prefix ?? "";
    const delimiter = options.delimiter;
    const maxKeys = Math.max(0, Math.min(options.maxKeys ?? MAX_LIST_KEYS, MAX_LIST_KEYS));

    const objects: ObjectMetadata[] = [];
    const commonPrefixes: string[] = [];
    const seenPrefixes = new Set<string>();
    let isTruncated = false;

    // Resuming after a common prefix skips every key rolled up into it
    const startAfter = options.startAfter;
    const skipPrefix =
      delimiter && startAfter && startAfter.length > prefix.length && startAfter.startsWith(prefix) && startAfter.endsWith(delimiter)
        ? startAfter
        : undefined;

    for (const entry of target.index.listSorted({ prefix, startAfter })) {
      if (skipPrefix && entry.key.startsWith(skipPrefix)) continue;
      if (delimiter) {
        const rest = entry.key.slice(prefix.length);
        const delimIdx = rest.indexOf(delimiter);
        if (delimIdx >= 0) {
          const commonPrefix = prefix + rest.slice(0, delimIdx + delimiter.length);
          if (seenPrefixes.has(commonPrefix)) continue;
          if (objects.length + commonPrefixes.length >= maxKeys) {
            isTruncated = true;
            break;
          }
          seenPrefixes.add(commonPrefix);
          commonPrefixes.push(commonPrefix);
          continue;
        }
      }

      if (objects.length + commonPrefixes.length >= maxKeys) {
        isTruncated = true;
        break;
      }
      objects.push(toMetadata(entry));
    }

    return ok({ objects, commonPrefixes, isTruncated });
  }

  deleteObject(bucket: string, key: string): Promise<StorageResult<void>> {
    return this.bucketLocks.withShared(bucket, () =>
      this.keyLocks.withExclusive(lockKey(bucket, key), async (): Promise<StorageResult<void>> => {
        const target = this.registry.get(bucket);
        if (!target) return noSuchBucket(bucket);

        const released = target.index.delete(key);
        if (!released) {
          this.logger.debug({ bucket, key }, "Delete of absent key, nothing to release");
          return ok(undefined);
        }
        await this.persist();
        await this.discard(released, bucket, key);
        return ok(undefined);
      }),
    );
  }

  private async writeObject(
    bucket: string,
    key: string,
    body: Buffer,
    options: PutObjectOptions,
  ): Promise<StorageResult<ObjectMetadata>> {
    const target = this.registry.get(bucket);
    if (!target) return noSuchBucket(bucket);

    const invalidKey = validateKey(bucket, key);
    if (invalidKey) return invalidKey;
    if (options.declaredLength !== undefined && options.declaredLength !== body.length) {
      return fail(
        "InvalidArgument",
        `Declared content length ${options.declaredLength} does not match the ${body.length} bytes received`,
        `/${bucket}/${key}`,
      );
    }

    if (options.signal?.aborted) return aborted(bucket, key);

    let stored: StoredBlob;
    try {
      stored = await this.blobStore.store(body);
    } catch (err) {
      this.logger.error({ err, bucket, key }, "Failed to store object payload");
      return fail("InternalStorageFailure", "We encountered an internal error. Please try again.", `/${bucket}/${key}`, err);
    }

    // The index has not been touched yet; an abort here only has to give the new blob back
    if (options.signal?.aborted) {
      await this.discard(stored.ref, bucket, key);
      return aborted(bucket, key);
    }

    const entry: IndexEntry = {
      key,
      blobRef: stored.ref,
      contentType: options.contentType ?? "application/octet-stream",
      contentLength: stored.contentLength,
      etag: stored.etag,
      lastModified: new Date(),
      metadata: options.metadata ?? {},
    };
    const previous = target.index.put(entry);
    await this.persist();
    if (previous) {
      await this.discard(previous, bucket, key);
    }

    return ok(toMetadata(entry));
  }

  /**
   * Saves a snapshot taken now. Saves run one at a time in call order, so the
   * last one written is the newest state.
   */
  private async persist(): Promise<void> {
    const catalog = this.catalog;
    if (!catalog) return;

    const snapshot = this.snapshot();
    const write = this.pendingSave.then(() => catalog.save(snapshot));
    // a failed save must not stall the ones queued behind it
    this.pendingSave = write.then(
      () => undefined,
      () => undefined,
    );
    try {
      await write;
    } catch (err) {
      this.logger.error({ err }, "Failed to save the catalog; the change is held in memory only");
    }
  }

  private snapshot(): CatalogSnapshot {
    return {
      version: 1,
      buckets: this.registry.all().map((bucket) => ({
        name: bucket.name,
        creationDate: bucket.creationDate,
        objects: Array.from(bucket.index.listSorted()),
      })),
    };
  }

  private lookup(bucket: string, key: string): StorageResult<IndexEntry> {
    const target = this.registry.get(bucket);
    if (!target) return noSuchBucket(bucket);
    const entry = target.index.get(key);
    if (!entry) {
      return fail("NoSuchKey", "The specified key does not exist.", `/${bucket}/${key}`);
    }
    return ok(entry);
  }

  private async discard(ref: BlobReference, bucket: string, key: string): Promise<void> {
    try {
      await this.blobStore.release(ref);
    } catch (err) {
      this.logger.warn({ err, bucket, key, blobRef: ref }, "Failed to release blob, storage leaked");
    }
  }
}

function lockKey(bucket: string, key: string): string {
  // bucket names never contain "/", so the pair is unambiguous
  return `${bucket}/${key}`;
}

function validateKey(bucket: string, key: string): StorageResult<never> | undefined {
  if (key.length === 0) {
    return fail("InvalidArgument", "Object key must not be empty", `/${bucket}`);
  }
  if (Buffer.byteLength(key, "utf-8") > MAX_KEY_BYTES) {
    return fail("InvalidArgument", `Object key must not exceed ${MAX_KEY_BYTES} bytes`, `/${bucket}/${key}`);
  }
  return undefined;
}

function aborted(bucket: string, key: string): StorageResult<never> {
  return fail("RequestAborted", "The request was aborted before the object was stored.", `/${bucket}/${key}`);
}

function toMetadata(entry: IndexEntry): ObjectMetadata {
  return {
    key: entry.key,
    contentType: entry.contentType,
    contentLength: entry.contentLength,
    etag: entry.etag,
    lastModified: entry.lastModified,
    metadata: { ...entry.metadata },
  };
}
