import { fail, noSuchBucket, ok, type StorageResult } from "../common/errors.js";
import { ObjectIndex, compareKeys } from "./objectIndex.js";
import type { BucketInfo } from "./storageTypes.js";

export interface Bucket extends BucketInfo {
  readonly index: ObjectIndex;
}

const BUCKET_NAME_PATTERN = /^[a-z0-9][a-z0-9.-]*[a-z0-9]$/;
const IPV4_PATTERN = /^\d{1,3}(\.\d{1,3}){3}$/;

// served as GET /health, so a bucket of that name could never be listed
const RESERVED_NAMES = new Set(["health"]);

export function validateBucketName(name: string): string | undefined {
  if (name.length < 3 || name.length > 63) {
    return "Bucket name must be between 3 and 63 characters long";
  }
  if (!BUCKET_NAME_PATTERN.test(name)) {
    return "Bucket name can only contain lowercase letters, numbers, periods and hyphens, and must begin and end with a letter or number";
  }
  if (name.includes("..")) {
    return "Bucket name must not contain two adjacent periods";
  }
  if (IPV4_PATTERN.test(name)) {
    return "Bucket name must not be formatted as an IP address";
  }
  if (RESERVED_NAMES.has(name)) {
    return `Bucket name ${name} is reserved by this server`;
  }
  return undefined;
}

export class BucketRegistry {
  private buckets = new Map<string, Bucket>();

  create(name: string): StorageResult<Bucket> {
    const invalid = validateBucketName(name);
    if (invalid) {
      return fail("InvalidBucketName", invalid, `/${name}`);
    }
    if (this.buckets.has(name)) {
      return fail(
        "BucketAlreadyExists",
        "The requested bucket name is not available. The bucket namespace is shared by all users of the system. Please select a different name and try again.",
        `/${name}`,
      );
    }

    const bucket: Bucket = { name, creationDate: new Date(), index: new ObjectIndex() };
    this.buckets.set(name, bucket);
    return ok(bucket);
  }

  /** Re-registers a bucket loaded from a catalog, skipping name checks. */
  restore(name: string, creationDate: Date): Bucket {
    const bucket: Bucket = { name, creationDate, index: new ObjectIndex() };
    this.buckets.set(name, bucket);
    return bucket;
  }

  exists(name: string): boolean {
    return this.buckets.has(name);
  }

  get(name: string): Bucket | undefined {
    return this.buckets.get(name);
  }

  delete(name: string): StorageResult<void> {
    const bucket = this.buckets.get(name);
    if (!bucket) {
      return noSuchBucket(name);
    }
    if (!bucket.index.isEmpty()) {
      return fail("BucketNotEmpty", "The bucket you tried to delete is not empty.", `/${name}`);
    }
    this.buckets.delete(name);
    return ok(undefined);
  }

  all(): Bucket[] {
    return Array.from(this.buckets.values());
  }

  list(): BucketInfo[] {
    return Array.from(this.buckets.values(), ({ name, creationDate }) => ({ name, creationDate })).sort(
      (a, b) => compareKeys(a.name, b.name),
    );
  }
}
