import { unwrapOrThrow } from "../../common/errors.js";
import type { StorageEngine } from "../../storage/storageEngine.js";
import { objectKey, type S3Reply, type S3Request } from "../s3Types.js";

export async function deleteObject(request: S3Request, reply: S3Reply, engine: StorageEngine): Promise<void> {
  unwrapOrThrow(await engine.deleteObject(request.params.bucket, objectKey(request)));
  reply.status(204).send();
}
