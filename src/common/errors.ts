import { randomUUID } from "node:crypto";
import { escapeXml } from "./xml.js";

export type StorageErrorKind =
  | "BucketAlreadyExists"
  | "NoSuchBucket"
  | "NoSuchKey"
  | "BucketNotEmpty"
  | "InvalidArgument"
  | "InvalidBucketName"
  | "InternalStorageFailure"
  | "RequestAborted";

/**
 * Wire representation of each storage error kind: the S3 error code clients
 * branch on and the HTTP status it travels with.
 */
export const S3_ERROR_CODES = {
  BucketAlreadyExists: { code: "BucketAlreadyExists", statusCode: 409 },
  NoSuchBucket: { code: "NoSuchBucket", statusCode: 404 },
  NoSuchKey: { code: "NoSuchKey", statusCode: 404 },
  BucketNotEmpty: { code: "BucketNotEmpty", statusCode: 409 },
  InvalidArgument: { code: "InvalidArgument", statusCode: 400 },
  InvalidBucketName: { code: "InvalidBucketName", statusCode: 400 },
  InternalStorageFailure: { code: "InternalError", statusCode: 500 },
  RequestAborted: { code: "RequestTimeout", statusCode: 400 },
} as const satisfies Record<StorageErrorKind, { code: string; statusCode: number }>;

export class StorageError extends Error {
  readonly kind: StorageErrorKind;
  readonly resource?: string;

  constructor(kind: StorageErrorKind, message: string, resource?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StorageError";
    this.kind = kind;
    this.resource = resource;
  }
}

export type StorageResult<T> = { ok: true; value: T } | { ok: false; error: StorageError };

export function ok<T>(value: T): StorageResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(
  kind: StorageErrorKind,
  message: string,
  resource?: string,
  cause?: unknown,
): StorageResult<T> {
  return {
    ok: false,
    error: new StorageError(kind, message, resource, cause === undefined ? undefined : { cause }),
  };
}

export function noSuchBucket<T = never>(bucket: string): StorageResult<T> {
  return fail("NoSuchBucket", `The specified bucket does not exist: ${bucket}`, `/${bucket}`);
}

export class S3Error extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly resource?: string;

  constructor(code: string, message: string, statusCode: number = 400, resource?: string) {
    super(message);
    this.name = "S3Error";
    this.code = code;
    this.statusCode = statusCode;
    this.resource = resource;
  }

  static fromStorageError(error: StorageError): S3Error {
    const { code, statusCode } = S3_ERROR_CODES[error.kind];
    return new S3Error(code, error.message, statusCode, error.resource);
  }

  toXml(): string {
    const requestId = randomUUID().replaceAll("-", "").toUpperCase().slice(0, 16);
    const parts = [
      `<?xml version="1.0" encoding="UTF-8"?>`,
      `<Error>`,
      `  <Code>${this.code}</Code>`,
      `  <Message>${escapeXml(this.message)}</Message>`,
    ];
    if (this.resource) {
      parts.push(`  <Resource>${escapeXml(this.resource)}</Resource>`);
    }
    parts.push(`  <RequestId>${requestId}</RequestId>`);
    parts.push(`  <HostId>stowage</HostId>`);
    parts.push(`</Error>`);
    return parts.join("\n");
  }
}

/**
 * Returns the value of a successful result, or throws the equivalent
 * `S3Error` so the router's error handler can render it.
 */
export function unwrapOrThrow<T>(result: StorageResult<T>): T {
  if (!result.ok) {
    throw S3Error.fromStorageError(result.error);
  }
  return result.value;
}
