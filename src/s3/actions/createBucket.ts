import { unwrapOrThrow } from "../../common/errors.js";
import type { StorageEngine } from "../../storage/storageEngine.js";
import type { S3Reply, S3Request } from "../s3Types.js";

export async function createBucket(request: S3Request, reply: S3Reply, engine: StorageEngine): Promise<void> {
  const bucket = request.params.bucket;
  unwrapOrThrow(await engine.createBucket(bucket));
  reply.header("location", `/${bucket}`);
  reply.status(200).send();
}
