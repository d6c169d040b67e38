import {
  CreateBucketCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
} from "@aws-sdk/client-s3";
import { createHash } from "node:crypto";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { MemoryBlobStore } from "../../src/storage/blobStore.js";
import { createS3Client } from "../helpers/clients.js";
import { startStowageTestServer, type StowageServer } from "../helpers/setup.js";

describe("S3 Object Operations", () => {
  let server: StowageServer;
  let s3: ReturnType<typeof createS3Client>;

  beforeAll(async () => {
    server = await startStowageTestServer();
    s3 = createS3Client(server.port);
    await s3.send(new CreateBucketCommand({ Bucket: "obj-bucket" }));
  });

  afterAll(async () => {
    s3.destroy();
    await server.stop();
  });

  it("stores, lists and deletes an object end to end", async () => {
    await s3.send(new CreateBucketCommand({ Bucket: "mybucket" }));
    await s3.send(new PutObjectCommand({ Bucket: "mybucket", Key: "hello.txt", Body: "Hello World from Python" }));

    const got = await s3.send(new GetObjectCommand({ Bucket: "mybucket", Key: "hello.txt" }));
    expect(got.ContentLength).toBe(23);
    expect(await got.Body?.transformToString()).toBe("Hello World from Python");

    const listed = await s3.send(new ListObjectsV2Command({ Bucket: "mybucket" }));
    expect(listed.Contents?.map((o) => o.Key)).toEqual(["hello.txt"]);

    await s3.send(new DeleteObjectCommand({ Bucket: "mybucket", Key: "hello.txt" }));
    const empty = await s3.send(new ListObjectsV2Command({ Bucket: "mybucket" }));
    expect(empty.KeyCount).toBe(0);
    expect(empty.Contents).toBeUndefined();
  });

  it("round-trips binary bytes", async () => {
    const data = Buffer.from(Array.from({ length: 256 }, (_, i) => i));
    await s3.send(new PutObjectCommand({ Bucket: "obj-bucket", Key: "data.bin", Body: data }));

    const result = await s3.send(new GetObjectCommand({ Bucket: "obj-bucket", Key: "data.bin" }));
    const body = await result.Body?.transformToByteArray();
    expect(Buffer.from(body ?? [])).toEqual(data);
  });

  it("round-trips an empty object", async () => {
    await s3.send(new PutObjectCommand({ Bucket: "obj-bucket", Key: "empty", Body: "" }));

    const result = await s3.send(new GetObjectCommand({ Bucket: "obj-bucket", Key: "empty" }));
    expect(result.ContentLength).toBe(0);
    expect(await result.Body?.transformToString()).toBe("");
  });

  it("returns the md5 ETag on put and get", async () => {
    const expected = `"${createHash("md5").update("etag me").digest("hex")}"`;
    const put = await s3.send(new PutObjectCommand({ Bucket: "obj-bucket", Key: "etag.txt", Body: "etag me" }));
    expect(put.ETag).toBe(expected);

    const got = await s3.send(new GetObjectCommand({ Bucket: "obj-bucket", Key: "etag.txt" }));
    expect(got.ETag).toBe(expected);
    await got.Body?.transformToString();
  });

  it("overwrites an existing key", async () => {
    await s3.send(new PutObjectCommand({ Bucket: "obj-bucket", Key: "twice", Body: "first version" }));
    await s3.send(new PutObjectCommand({ Bucket: "obj-bucket", Key: "twice", Body: "second" }));

    const result = await s3.send(new GetObjectCommand({ Bucket: "obj-bucket", Key: "twice" }));
    expect(await result.Body?.transformToString()).toBe("second");
    expect(result.ContentLength).toBe(6);
  });

  it("keeps the content type and user metadata", async () => {
    await s3.send(
      new PutObjectCommand({
        Bucket: "obj-bucket",
        Key: "report.json",
        Body: "{}",
        ContentType: "application/json",
        Metadata: { author: "tester", revision: "3" },
      }),
    );

    const head = await s3.send(new HeadObjectCommand({ Bucket: "obj-bucket", Key: "report.json" }));
    expect(head.ContentType).toBe("application/json");
    expect(head.ContentLength).toBe(2);
    expect(head.Metadata).toEqual({ author: "tester", revision: "3" });
    expect(head.LastModified).toBeInstanceOf(Date);
  });

  it("handles keys with slashes, spaces and non-ASCII characters", async () => {
    const key = "folder/sub folder/naïve résumé.txt";
    await s3.send(new PutObjectCommand({ Bucket: "obj-bucket", Key: key, Body: "unicode" }));

    const result = await s3.send(new GetObjectCommand({ Bucket: "obj-bucket", Key: key }));
    expect(await result.Body?.transformToString()).toBe("unicode");
  });

  it("returns NoSuchKey for a missing object", async () => {
    await expect(s3.send(new GetObjectCommand({ Bucket: "obj-bucket", Key: "missing" }))).rejects.toMatchObject({
      name: "NoSuchKey",
      $metadata: { httpStatusCode: 404 },
    });
  });

  it("returns 404 from HeadObject for a missing object", async () => {
    await expect(s3.send(new HeadObjectCommand({ Bucket: "obj-bucket", Key: "missing" }))).rejects.toMatchObject({
      $metadata: { httpStatusCode: 404 },
    });
  });

  it("returns NoSuchBucket when putting into a missing bucket", async () => {
    await expect(
      s3.send(new PutObjectCommand({ Bucket: "no-such-bucket", Key: "k", Body: "v" })),
    ).rejects.toMatchObject({ name: "NoSuchBucket", $metadata: { httpStatusCode: 404 } });
  });

  it("deletes idempotently", async () => {
    await s3.send(new PutObjectCommand({ Bucket: "obj-bucket", Key: "ephemeral", Body: "x" }));

    const first = await s3.send(new DeleteObjectCommand({ Bucket: "obj-bucket", Key: "ephemeral" }));
    const second = await s3.send(new DeleteObjectCommand({ Bucket: "obj-bucket", Key: "ephemeral" }));
    const never = await s3.send(new DeleteObjectCommand({ Bucket: "obj-bucket", Key: "never-existed" }));

    expect(first.$metadata.httpStatusCode).toBe(204);
    expect(second.$metadata.httpStatusCode).toBe(204);
    expect(never.$metadata.httpStatusCode).toBe(204);
    await expect(s3.send(new GetObjectCommand({ Bucket: "obj-bucket", Key: "ephemeral" }))).rejects.toMatchObject({
      name: "NoSuchKey",
    });
  });

  it("releases replaced and deleted payloads", async () => {
    const blobs = server.engine.blobStore;
    if (!(blobs instanceof MemoryBlobStore)) throw new Error("expected the in-memory blob store");
    await s3.send(new CreateBucketCommand({ Bucket: "accounting" }));
    const before = blobs.blobCount;

    await s3.send(new PutObjectCommand({ Bucket: "accounting", Key: "k", Body: "one" }));
    await s3.send(new PutObjectCommand({ Bucket: "accounting", Key: "k", Body: "two" }));
    expect(blobs.blobCount).toBe(before + 1);

    await s3.send(new DeleteObjectCommand({ Bucket: "accounting", Key: "k" }));
    expect(blobs.blobCount).toBe(before);
  });
});
