import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import * as v from "valibot";
import { isBlobReference } from "./blobStore.js";
import { isNotFound } from "./fileBlobStore.js";
import type { BlobReference } from "./storageTypes.js";

const DateSchema = v.pipe(
  v.string(),
  v.isoTimestamp(),
  v.transform((value) => new Date(value)),
);

const BlobReferenceSchema = v.custom<BlobReference>(
  (input) => typeof input === "string" && isBlobReference(input),
  "Invalid blob reference",
);

const CatalogEntrySchema = v.object({
  key: v.pipe(v.string(), v.nonEmpty()),
  blobRef: BlobReferenceSchema,
  contentType: v.string(),
  contentLength: v.pipe(v.number(), v.integer(), v.minValue(0)),
  etag: v.string(),
  lastModified: DateSchema,
  metadata: v.record(v.string(), v.string()),
});

const CatalogSchema = v.object({
  version: v.literal(1),
  buckets: v.array(
    v.object({
      name: v.string(),
      creationDate: DateSchema,
      objects: v.array(CatalogEntrySchema),
    }),
  ),
});

/** Every bucket with the index entries it held when the snapshot was taken. */
export type CatalogSnapshot = v.InferOutput<typeof CatalogSchema>;

/** Durable home of the bucket registry and object indexes. */
export interface CatalogStore {
  /** Resolves to `undefined` when nothing was saved yet. */
  load(): Promise<CatalogSnapshot | undefined>;
  save(snapshot: CatalogSnapshot): Promise<void>;
}

/**
 * Keeps the catalog as one JSON document, replaced atomically on each save.
 */
export class FileCatalogStore implements CatalogStore {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  async load(): Promise<CatalogSnapshot | undefined> {
    let content: string;
    try {
      content = await readFile(this.path, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
    return v.parse(CatalogSchema, JSON.parse(content));
  }

  async save(snapshot: CatalogSnapshot): Promise<void> {
    const temp = `${this.path}.tmp`;
    await mkdir(dirname(this.path), { recursive: true });
    try {
      await writeFile(temp, JSON.stringify(snapshot));
      await rename(temp, this.path);
    } catch (err) {
      await rm(temp, { force: true });
      throw err;
    }
  }
}
