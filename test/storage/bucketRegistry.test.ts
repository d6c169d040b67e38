import { describe, expect, it } from "vitest";
import { newBlobReference } from "../../src/storage/blobStore.js";
import { BucketRegistry, validateBucketName } from "../../src/storage/bucketRegistry.js";

describe("BucketRegistry", () => {
  it("creates a bucket with an empty index", () => {
    const registry = new BucketRegistry();
    const result = registry.create("photos");

    expect(result.ok).toBe(true);
    expect(registry.exists("photos")).toBe(true);
    expect(registry.get("photos")?.index.isEmpty()).toBe(true);
  });

  it("rejects a second create of the same name", () => {
    const registry = new BucketRegistry();
    registry.create("photos");
    const result = registry.create("photos");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("BucketAlreadyExists");
      expect(result.error.resource).toBe("/photos");
    }
  });

  it("rejects an invalid name without registering it", () => {
    const registry = new BucketRegistry();
    const result = registry.create("Bad_Name");

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("InvalidBucketName");
    expect(registry.exists("Bad_Name")).toBe(false);
  });

  it("reports NoSuchBucket when deleting an unknown bucket", () => {
    const registry = new BucketRegistry();
    const result = registry.delete("missing");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("NoSuchBucket");
      expect(result.error.message).toBe("The specified bucket does not exist: missing");
    }
  });

  it("refuses to delete a bucket that still has objects", () => {
    const registry = new BucketRegistry();
    registry.create("full");
    registry.get("full")?.index.put({
      key: "k",
      blobRef: newBlobReference(),
      contentType: "text/plain",
      contentLength: 0,
      etag: '"x"',
      lastModified: new Date(),
      metadata: {},
    });

    const result = registry.delete("full");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("BucketNotEmpty");
    expect(registry.exists("full")).toBe(true);

    registry.get("full")?.index.delete("k");
    expect(registry.delete("full").ok).toBe(true);
    expect(registry.exists("full")).toBe(false);
  });

  it("lists buckets sorted by name", () => {
    const registry = new BucketRegistry();
    for (const name of ["zeta", "alpha", "mid-bucket"]) registry.create(name);

    expect(registry.list().map((b) => b.name)).toEqual(["alpha", "mid-bucket", "zeta"]);
  });
});

describe("validateBucketName", () => {
  it.each(["abc", "my-bucket", "my.bucket.v2", "a".repeat(63), "123bucket"])("accepts %s", (name) => {
    expect(validateBucketName(name)).toBeUndefined();
  });

  it.each([
    ["ab", "Bucket name must be between 3 and 63 characters long"],
    ["a".repeat(64), "Bucket name must be between 3 and 63 characters long"],
    ["-bucket", "Bucket name can only contain lowercase letters, numbers, periods and hyphens, and must begin and end with a letter or number"],
    ["Bucket", "Bucket name can only contain lowercase letters, numbers, periods and hyphens, and must begin and end with a letter or number"],
    ["my..bucket", "Bucket name must not contain two adjacent periods"],
    ["192.168.1.1", "Bucket name must not be formatted as an IP address"],
    ["health", "Bucket name health is reserved by this server"],
  ])("rejects %s", (name, message) => {
    expect(validateBucketName(name)).toBe(message);
  });
});
