/** Opaque handle into a `BlobStore`. */
export type BlobReference = string & { readonly __brand: "BlobReference" };

export interface StoredBlob {
  ref: BlobReference;
  contentLength: number;
  /** Quoted MD5 hex digest of the payload. */
  etag: string;
}

export interface ObjectMetadata {
  key: string;
  contentType: string;
  contentLength: number;
  etag: string;
  lastModified: Date;
  metadata: Record<string, string>;
}

export interface IndexEntry extends ObjectMetadata {
  blobRef: BlobReference;
}

export interface StoredObject {
  metadata: ObjectMetadata;
  body: Buffer;
  contentLength: number;
}

export interface BucketInfo {
  name: string;
  creationDate: Date;
}

export interface PutObjectOptions {
  contentType?: string;
  metadata?: Record<string, string>;
  /** Length the caller announced for the payload; a mismatch rejects the write. */
  declaredLength?: number;
  signal?: AbortSignal;
}

export interface ListObjectsOptions {
  prefix?: string;
  delimiter?: string;
  maxKeys?: number;
  startAfter?: string;
}

export interface ListObjectsResult {
  objects: ObjectMetadata[];
  commonPrefixes: string[];
  isTruncated: boolean;
}
