import { S3Error, unwrapOrThrow } from "../../common/errors.js";
import { MAX_LIST_KEYS } from "../../common/types.js";
import { S3_XMLNS, escapeXml } from "../../common/xml.js";
import { compareKeys } from "../../storage/objectIndex.js";
import type { StorageEngine } from "../../storage/storageEngine.js";
import type { ListObjectsResult } from "../../storage/storageTypes.js";
import { queryValue, type S3Reply, type S3Request } from "../s3Types.js";

export function listObjects(request: S3Request, reply: S3Reply, engine: StorageEngine): void {
  const bucket = request.params.bucket;
  const prefix = queryValue(request, "prefix") ?? "";
  const delimiter = queryValue(request, "delimiter") || undefined;
  const maxKeys = parseMaxKeys(queryValue(request, "max-keys"));

  const xml =
    queryValue(request, "list-type") === "2"
      ? listObjectsV2(request, engine, bucket, prefix, delimiter, maxKeys)
      : listObjectsV1(request, engine, bucket, prefix, delimiter, maxKeys);

  reply.header("content-type", "application/xml");
  reply.status(200).send(xml);
}

function listObjectsV1(
  request: S3Request,
  engine: StorageEngine,
  bucket: string,
  prefix: string,
  delimiter: string | undefined,
  maxKeys: number,
): string {
  const marker = queryValue(request, "marker") ?? "";
  const result = unwrapOrThrow(engine.listObjects(bucket, { prefix, delimiter, maxKeys, startAfter: marker }));
  const nextMarker = result.isTruncated ? lastListed(result) : undefined;

  const parts = [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<ListBucketResult xmlns="${S3_XMLNS}">`,
    `  <Name>${escapeXml(bucket)}</Name>`,
    `  <Prefix>${escapeXml(prefix)}</Prefix>`,
    `  <Marker>${escapeXml(marker)}</Marker>`,
    `  <MaxKeys>${maxKeys}</MaxKeys>`,
    `  <IsTruncated>${result.isTruncated}</IsTruncated>`,
  ];
  if (nextMarker) {
    parts.push(`  <NextMarker>${escapeXml(nextMarker)}</NextMarker>`);
  }
  if (delimiter) {
    parts.push(`  <Delimiter>${escapeXml(delimiter)}</Delimiter>`);
  }
  parts.push(...entriesXml(result));
  parts.push(`</ListBucketResult>`);
  return parts.join("\n");
}

function listObjectsV2(
  request: S3Request,
  engine: StorageEngine,
  bucket: string,
  prefix: string,
  delimiter: string | undefined,
  maxKeys: number,
): string {
  const startAfter = queryValue(request, "start-after") ?? "";
  const continuationToken = queryValue(request, "continuation-token");
  // The continuation token is the base64 of the last key or prefix returned
  const effectiveStartAfter = continuationToken
    ? Buffer.from(continuationToken, "base64").toString("utf-8")
    : startAfter;

  const result = unwrapOrThrow(
    engine.listObjects(bucket, { prefix, delimiter, maxKeys, startAfter: effectiveStartAfter }),
  );
  const keyCount = result.objects.length + result.commonPrefixes.length;
  const lastKey = result.isTruncated ? lastListed(result) : undefined;

  const parts = [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<ListBucketResult xmlns="${S3_XMLNS}">`,
    `  <Name>${escapeXml(bucket)}</Name>`,
    `  <Prefix>${escapeXml(prefix)}</Prefix>`,
    `  <KeyCount>${keyCount}</KeyCount>`,
    `  <MaxKeys>${maxKeys}</MaxKeys>`,
    `  <IsTruncated>${result.isTruncated}</IsTruncated>`,
  ];
  if (startAfter) {
    parts.push(`  <StartAfter>${escapeXml(startAfter)}</StartAfter>`);
  }
  if (continuationToken) {
    parts.push(`  <ContinuationToken>${escapeXml(continuationToken)}</ContinuationToken>`);
  }
  if (lastKey) {
    const nextToken = Buffer.from(lastKey, "utf-8").toString("base64");
    parts.push(`  <NextContinuationToken>${escapeXml(nextToken)}</NextContinuationToken>`);
  }
  if (delimiter) {
    parts.push(`  <Delimiter>${escapeXml(delimiter)}</Delimiter>`);
  }
  parts.push(...entriesXml(result));
  parts.push(`</ListBucketResult>`);
  return parts.join("\n");
}

function entriesXml(result: ListObjectsResult): string[] {
  const contents = result.objects.map(
    (obj) =>
      `  <Contents>` +
      `<Key>${escapeXml(obj.key)}</Key>` +
      `<Size>${obj.contentLength}</Size>` +
      `<ETag>${escapeXml(obj.etag)}</ETag>` +
      `<LastModified>${obj.lastModified.toISOString()}</LastModified>` +
      `<StorageClass>STANDARD</StorageClass>` +
      `</Contents>`,
  );
  const prefixes = result.commonPrefixes.map(
    (p) => `  <CommonPrefixes><Prefix>${escapeXml(p)}</Prefix></CommonPrefixes>`,
  );
  return [...contents, ...prefixes];
}

/** The greatest key or common prefix on this page; where the next page resumes. */
function lastListed(result: ListObjectsResult): string | undefined {
  const lastObject = result.objects.at(-1)?.key;
  const lastPrefix = result.commonPrefixes.at(-1);
  if (lastObject === undefined) return lastPrefix;
  if (lastPrefix === undefined) return lastObject;
  return compareKeys(lastObject, lastPrefix) > 0 ? lastObject : lastPrefix;
}

function parseMaxKeys(raw: string | undefined): number {
  if (raw === undefined) return MAX_LIST_KEYS;
  if (!/^\d+$/.test(raw)) {
    throw new S3Error("InvalidArgument", "Provided max-keys not an integer or within integer range", 400);
  }
  return Math.min(parseInt(raw, 10), MAX_LIST_KEYS);
}
