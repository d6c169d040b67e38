import { unwrapOrThrow } from "../../common/errors.js";
import type { StorageEngine } from "../../storage/storageEngine.js";
import type { ObjectMetadata } from "../../storage/storageTypes.js";
import { objectKey, type S3Reply, type S3Request } from "../s3Types.js";

export async function getObject(request: S3Request, reply: S3Reply, engine: StorageEngine): Promise<void> {
  const { metadata, body } = unwrapOrThrow(await engine.getObject(request.params.bucket, objectKey(request)));
  setObjectHeaders(reply, metadata);
  reply.status(200).send(body);
}

export function setObjectHeaders(reply: S3Reply, obj: ObjectMetadata): void {
  reply.header("content-type", obj.contentType);
  reply.header("content-length", String(obj.contentLength));
  reply.header("etag", obj.etag);
  reply.header("last-modified", obj.lastModified.toUTCString());
  for (const [metaKey, metaValue] of Object.entries(obj.metadata)) {
    reply.header(`x-amz-meta-${metaKey}`, metaValue);
  }
}
