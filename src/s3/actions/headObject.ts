import { unwrapOrThrow } from "../../common/errors.js";
import type { StorageEngine } from "../../storage/storageEngine.js";
import { objectKey, type S3Reply, type S3Request } from "../s3Types.js";
import { setObjectHeaders } from "./getObject.js";

export function headObject(request: S3Request, reply: S3Reply, engine: StorageEngine): void {
  const obj = unwrapOrThrow(engine.headObject(request.params.bucket, objectKey(request)));
  setObjectHeaders(reply, obj);
  reply.status(200).send();
}
