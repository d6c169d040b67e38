import { createHash, createHmac, timingSafeEqual } from "node:crypto";
import type { IncomingHttpHeaders } from "node:http";
import type { FastifyReply, FastifyRequest } from "fastify";
import { S3Error } from "../common/errors.js";
import { MAX_CLOCK_SKEW_MS } from "../common/types.js";
import { headerValue } from "./s3Types.js";

const ALGORITHM = "AWS4-HMAC-SHA256";
const EMPTY_SHA256 = createHash("sha256").digest("hex");

export interface S3Credentials {
  accessKeyId: string;
  secretAccessKey: string;
}

export interface SignedRequest {
  method: string;
  /** Raw request target: path plus query string, exactly as received. */
  url: string;
  headers: IncomingHttpHeaders;
  body?: Buffer;
}

interface ParsedAuthorization {
  accessKeyId: string;
  date: string;
  region: string;
  service: string;
  signedHeaders: string[];
  signature: string;
}

/**
 * Verifies an AWS Signature Version 4 `Authorization` header against the
 * configured credentials. Returns the error to answer with, or `undefined`
 * when the request is authentic.
 */
export function verifySignature(
  request: SignedRequest,
  credentials: S3Credentials,
  now: number = Date.now(),
): S3Error | undefined {
  const header = headerValue(request.headers, "authorization");
  if (!header) {
    return new S3Error("AccessDenied", "Access Denied", 403);
  }

  const auth = parseAuthorization(header);
  if (!auth) {
    return new S3Error("AccessDenied", "The authorization header is malformed", 403);
  }
  if (auth.accessKeyId !== credentials.accessKeyId) {
    return new S3Error(
      "InvalidAccessKeyId",
      "The AWS Access Key Id you provided does not exist in our records.",
      403,
    );
  }

  const amzDate = headerValue(request.headers, "x-amz-date");
  const timestamp = amzDate ? parseAmzDate(amzDate) : undefined;
  if (!amzDate || timestamp === undefined) {
    return new S3Error("AccessDenied", "AWS authentication requires a valid x-amz-date header", 403);
  }
  if (amzDate.slice(0, 8) !== auth.date) {
    return new S3Error("AccessDenied", "The credential scope date does not match x-amz-date", 403);
  }
  if (Math.abs(now - timestamp) > MAX_CLOCK_SKEW_MS) {
    return new S3Error(
      "RequestTimeTooSkewed",
      "The difference between the request time and the current time is too large.",
      403,
    );
  }

  const payloadHash = resolvePayloadHash(request);
  if (payloadHash === undefined) {
    return new S3Error(
      "XAmzContentSHA256Mismatch",
      "The provided 'x-amz-content-sha256' header does not match what was computed.",
      400,
    );
  }

  const canonicalHeaders = buildCanonicalHeaders(request.headers, auth.signedHeaders);
  const canonicalQuery = buildCanonicalQuery(request.url);
  if (canonicalHeaders === undefined || canonicalQuery === undefined) {
    return new S3Error("AccessDenied", "The request could not be canonicalized", 403);
  }

  const canonicalRequest = [
    request.method.toUpperCase(),
    canonicalPath(request.url),
    canonicalQuery,
    canonicalHeaders,
    auth.signedHeaders.join(";"),
    payloadHash,
  ].join("\n");

  const scope = `${auth.date}/${auth.region}/${auth.service}/aws4_request`;
  const stringToSign = [ALGORITHM, amzDate, scope, sha256Hex(canonicalRequest)].join("\n");
  const expected = createHmac("sha256", signingKey(credentials.secretAccessKey, auth))
    .update(stringToSign, "utf-8")
    .digest();

  const provided = Buffer.from(auth.signature, "hex");
  if (provided.length !== expected.length || !timingSafeEqual(provided, expected)) {
    return new S3Error(
      "SignatureDoesNotMatch",
      "The request signature we calculated does not match the signature you provided. Check your key and signing method.",
      403,
    );
  }

  return undefined;
}

/**
 * Fastify `preHandler` hook that rejects unsigned or badly signed requests.
 * Runs after body parsing so the payload hash can be checked.
 */
export function createSignatureVerifier(credentials: S3Credentials) {
  return async function signatureVerifier(request: FastifyRequest, reply: FastifyReply) {
    if (request.routeOptions.url === "/health") return;

    const error = verifySignature(
      {
        method: request.method,
        url: request.url,
        headers: request.headers,
        body: Buffer.isBuffer(request.body) ? request.body : undefined,
      },
      credentials,
    );
    if (!error) return;

    request.log.warn({ code: error.code, url: request.url }, "Rejected request signature");
    if (request.method === "HEAD") {
      return reply.status(error.statusCode).send();
    }
    reply.header("content-type", "application/xml");
    return reply.status(error.statusCode).send(error.toXml());
  };
}

export function parseAuthorization(header: string): ParsedAuthorization | undefined {
  if (!header.startsWith(`${ALGORITHM} `)) return undefined;

  const fields: Record<string, string> = {};
  for (const part of header.slice(ALGORITHM.length + 1).split(",")) {
    const eq = part.indexOf("=");
    if (eq === -1) continue;
    fields[part.slice(0, eq).trim()] = part.slice(eq + 1).trim();
  }

  const credential = fields["Credential"]?.split("/");
  const signedHeaders = fields["SignedHeaders"];
  const signature = fields["Signature"];
  if (!credential || credential.length !== 5 || !signedHeaders || !signature) return undefined;

  const [accessKeyId, date, region, service, terminal] = credential;
  if (terminal !== "aws4_request" || service !== "s3" || !/^\d{8}$/.test(date)) return undefined;
  if (!/^[0-9a-f]{64}$/.test(signature)) return undefined;

  return {
    accessKeyId,
    date,
    region,
    service,
    signedHeaders: signedHeaders.split(";").map((name) => name.trim().toLowerCase()),
    signature,
  };
}

export function parseAmzDate(value: string): number | undefined {
  const match = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/.exec(value);
  if (!match) return undefined;
  const [, year, month, day, hour, minute, second] = match;
  return Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hour), Number(minute), Number(second));
}

export function buildCanonicalQuery(url: string): string | undefined {
  const queryStart = url.indexOf("?");
  if (queryStart === -1) return "";

  const pairs: [string, string][] = [];
  for (const part of url.slice(queryStart + 1).split("&")) {
    if (!part) continue;
    const eq = part.indexOf("=");
    const name = safeDecode(eq === -1 ? part : part.slice(0, eq));
    const value = safeDecode(eq === -1 ? "" : part.slice(eq + 1));
    if (name === undefined || value === undefined) return undefined;
    pairs.push([uriEncode(name), uriEncode(value)]);
  }

  pairs.sort(([aName, aValue], [bName, bValue]) =>
    aName === bName ? compareStrings(aValue, bValue) : compareStrings(aName, bName),
  );
  return pairs.map(([name, value]) => `${name}=${value}`).join("&");
}

export function uriEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

function buildCanonicalHeaders(headers: IncomingHttpHeaders, signedHeaders: string[]): string | undefined {
  const lines: string[] = [];
  for (const name of signedHeaders) {
    const value = headerValue(headers, name);
    if (value === undefined) return undefined;
    lines.push(`${name}:${value.trim().replace(/\s+/g, " ")}\n`);
  }
  return lines.join("");
}

function canonicalPath(url: string): string {
  const queryStart = url.indexOf("?");
  const path = queryStart === -1 ? url : url.slice(0, queryStart);
  return path || "/";
}

/** The declared payload hash, or `undefined` when it contradicts the body. */
function resolvePayloadHash(request: SignedRequest): string | undefined {
  const declared = headerValue(request.headers, "x-amz-content-sha256");
  const actual = request.body && request.body.length > 0 ? sha256Hex(request.body) : EMPTY_SHA256;
  if (!declared) return actual;
  if (/^[0-9a-fA-F]{64}$/.test(declared)) {
    return declared.toLowerCase() === actual ? actual : undefined;
  }
  // UNSIGNED-PAYLOAD and STREAMING-* markers are signed as given
  return declared;
}

function signingKey(secretAccessKey: string, auth: ParsedAuthorization): Buffer {
  const kDate = createHmac("sha256", `AWS4${secretAccessKey}`).update(auth.date).digest();
  const kRegion = createHmac("sha256", kDate).update(auth.region).digest();
  const kService = createHmac("sha256", kRegion).update(auth.service).digest();
  return createHmac("sha256", kService).update("aws4_request").digest();
}

function sha256Hex(data: string | Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

function safeDecode(value: string): string | undefined {
  try {
    return decodeURIComponent(value);
  } catch {
    return undefined;
  }
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
