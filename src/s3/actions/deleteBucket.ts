import { unwrapOrThrow } from "../../common/errors.js";
import type { StorageEngine } from "../../storage/storageEngine.js";
import type { S3Reply, S3Request } from "../s3Types.js";

export async function deleteBucket(request: S3Request, reply: S3Reply, engine: StorageEngine): Promise<void> {
  unwrapOrThrow(await engine.deleteBucket(request.params.bucket));
  reply.status(204).send();
}
