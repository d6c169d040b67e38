import type { IncomingHttpHeaders } from "node:http";
import type { FastifyReply, FastifyRequest } from "fastify";
import type { StorageEngine } from "../storage/storageEngine.js";

export interface S3Params {
  bucket: string;
  /** Object key; absent on bucket routes and empty for a bucket path with a trailing slash. */
  "*"?: string;
}

export type S3Query = Record<string, string | string[] | undefined>;

export interface S3RouteGeneric {
  Params: S3Params;
  Querystring: S3Query;
}

export type S3Request = FastifyRequest<S3RouteGeneric>;

export function objectKey(request: S3Request): string {
  return request.params["*"] ?? "";
}

export function queryValue(request: S3Request, name: string): string | undefined {
  const value = request.query[name];
  return Array.isArray(value) ? value[0] : value;
}

export function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value.join(",") : value;
}

export function extractMetadata(headers: IncomingHttpHeaders): Record<string, string> {
  const metadata: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (name.startsWith("x-amz-meta-") && value !== undefined) {
      metadata[name.slice("x-amz-meta-".length)] = Array.isArray(value) ? value.join(",") : value;
    }
  }
  return metadata;
}

export type S3Reply = FastifyReply<S3RouteGeneric>;

export type S3Action = (request: S3Request, reply: S3Reply, engine: StorageEngine) => Promise<void> | void;
