import { S3Error } from "../../common/errors.js";
import type { StorageEngine } from "../../storage/storageEngine.js";
import type { S3Reply, S3Request } from "../s3Types.js";

export function headBucket(request: S3Request, reply: S3Reply, engine: StorageEngine): void {
  const bucket = request.params.bucket;
  if (!engine.hasBucket(bucket)) {
    throw new S3Error("NoSuchBucket", "The specified bucket does not exist", 404, `/${bucket}`);
  }
  reply.status(200).send();
}
