import type { FastifyInstance } from "fastify";
import { S3Error } from "../common/errors.js";
import type { StorageEngine } from "../storage/storageEngine.js";
import { createBucket } from "./actions/createBucket.js";
import { deleteBucket } from "./actions/deleteBucket.js";
import { deleteObject } from "./actions/deleteObject.js";
import { getObject } from "./actions/getObject.js";
import { headBucket } from "./actions/headBucket.js";
import { headObject } from "./actions/headObject.js";
import { listBuckets } from "./actions/listBuckets.js";
import { listObjects } from "./actions/listObjects.js";
import { putObject } from "./actions/putObject.js";
import { objectKey, type S3Action, type S3Reply, type S3Request, type S3RouteGeneric } from "./s3Types.js";

export function sendS3Error(err: S3Error, reply: S3Reply, isHead = false): void {
  if (isHead) {
    reply.status(err.statusCode).send();
    return;
  }
  reply.header("content-type", "application/xml");
  reply.status(err.statusCode).send(err.toXml());
}

export function registerS3Routes(app: FastifyInstance, engine: StorageEngine): void {
  const handle = (action: S3Action, isHead = false) =>
    async function s3Handler(request: S3Request, reply: S3Reply): Promise<void> {
      try {
        await action(request, reply, engine);
      } catch (err) {
        if (err instanceof S3Error) {
          sendS3Error(err, reply, isHead);
          return;
        }
        throw err;
      }
    };

  // The S3 SDK sends trailing slashes on bucket-level requests (e.g. PUT /bucket/),
  // which /:bucket/* matches with an empty key
  const byKey =
    (bucketAction: S3Action, objectAction: S3Action): S3Action =>
    (request, reply, storage) =>
      objectKey(request) ? objectAction(request, reply, storage) : bucketAction(request, reply, storage);

  app.route<S3RouteGeneric>({
    method: "GET",
    url: "/",
    exposeHeadRoute: false,
    handler: handle(listBuckets),
  });

  app.put<S3RouteGeneric>("/:bucket", handle(createBucket));
  app.head<S3RouteGeneric>("/:bucket", handle(headBucket, true));
  app.route<S3RouteGeneric>({
    method: "GET",
    url: "/:bucket",
    exposeHeadRoute: false,
    handler: handle(listObjects),
  });
  app.delete<S3RouteGeneric>("/:bucket", handle(deleteBucket));

  app.put<S3RouteGeneric>("/:bucket/*", handle(byKey(createBucket, putObject)));
  app.head<S3RouteGeneric>("/:bucket/*", handle(byKey(headBucket, headObject), true));
  app.route<S3RouteGeneric>({
    method: "GET",
    url: "/:bucket/*",
    exposeHeadRoute: false,
    handler: handle(byKey(listObjects, getObject)),
  });
  app.delete<S3RouteGeneric>("/:bucket/*", handle(byKey(deleteBucket, deleteObject)));
}
