import { S3Error, unwrapOrThrow } from "../../common/errors.js";
import type { StorageEngine } from "../../storage/storageEngine.js";
import { decodeAwsChunked, isAwsChunked } from "../chunkedEncoding.js";
import { extractMetadata, headerValue, objectKey, type S3Reply, type S3Request } from "../s3Types.js";

export async function putObject(request: S3Request, reply: S3Reply, engine: StorageEngine): Promise<void> {
  const bucket = request.params.bucket;
  const key = objectKey(request);
  const headers = request.headers;

  if (headerValue(headers, "x-amz-copy-source")) {
    throw new S3Error("NotImplemented", "CopyObject is not supported by this server", 501);
  }

  let body = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);
  let declaredLength = parseLength(headerValue(headers, "content-length"));

  if (isAwsChunked(headerValue(headers, "content-encoding"), headerValue(headers, "x-amz-content-sha256"))) {
    const decoded = decodeAwsChunked(body);
    if (!decoded) {
      throw new S3Error(
        "IncompleteBody",
        "The request body terminated unexpectedly",
        400,
        `/${bucket}/${key}`,
      );
    }
    body = decoded;
    declaredLength = parseLength(headerValue(headers, "x-amz-decoded-content-length"));
  }

  // A client that goes away mid-upload must not leave a half-applied write
  const controller = new AbortController();
  const onClose = () => {
    if (!reply.raw.writableEnded) controller.abort();
  };
  reply.raw.once("close", onClose);

  try {
    const obj = unwrapOrThrow(
      await engine.putObject(bucket, key, body, {
        contentType: headerValue(headers, "content-type") ?? "application/octet-stream",
        metadata: extractMetadata(headers),
        declaredLength,
        signal: controller.signal,
      }),
    );
    reply.header("etag", obj.etag);
    reply.status(200).send();
  } finally {
    reply.raw.off("close", onClose);
  }
}

function parseLength(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new S3Error("InvalidArgument", `Invalid content length: ${raw}`, 400);
  }
  return parseInt(raw, 10);
}
