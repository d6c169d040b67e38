import { join } from "node:path";
import Fastify, { type FastifyError } from "fastify";
import { S3Error } from "./common/errors.js";
import { DEFAULT_BODY_LIMIT_BYTES, DEFAULT_PORT } from "./common/types.js";
import { readEnv } from "./config.js";
import { applyInitConfig, loadInitConfig, type StowageInitConfig } from "./initConfig.js";
import { createSignatureVerifier, type S3Credentials } from "./s3/auth.js";
import { registerS3Routes } from "./s3/s3Router.js";
import type { BlobStore } from "./storage/blobStore.js";
import { FileCatalogStore, type CatalogStore } from "./storage/catalog.js";
import { FileBlobStore } from "./storage/fileBlobStore.js";
import { StorageEngine } from "./storage/storageEngine.js";

declare module "fastify" {
  interface FastifyInstance {
    storageEngine: StorageEngine;
  }
}

export interface BuildAppOptions {
  logger?: boolean;
  /** Maximum accepted request body, in bytes. */
  bodyLimit?: number;
  /** Enables AWS Signature Version 4 verification on every S3 request. */
  credentials?: S3Credentials;
  blobStore?: BlobStore;
  catalog?: CatalogStore;
}

export function buildApp(options: BuildAppOptions = {}) {
  const app = Fastify({
    logger: options.logger ?? true,
    bodyLimit: options.bodyLimit ?? DEFAULT_BODY_LIMIT_BYTES,
    forceCloseConnections: true,
  });

  const engine = new StorageEngine({ blobStore: options.blobStore, catalog: options.catalog, logger: app.log });
  app.decorate("storageEngine", engine);

  // Object bodies are opaque bytes whatever their declared content type
  app.removeAllContentTypeParsers();
  app.addContentTypeParser("*", { parseAs: "buffer" }, (_req, body, done) => {
    done(null, body);
  });

  if (options.credentials) {
    app.addHook("preHandler", createSignatureVerifier(options.credentials));
  }

  app.setErrorHandler((err: FastifyError, request, reply) => {
    const s3Error =
      err.statusCode === 413
        ? new S3Error("EntityTooLarge", "Your proposed upload exceeds the maximum allowed object size.", 413)
        : err.statusCode !== undefined && err.statusCode < 500
          ? new S3Error("InvalidRequest", err.message, err.statusCode)
          : new S3Error("InternalError", "We encountered an internal error. Please try again.", 500);
    if (s3Error.statusCode >= 500) {
      request.log.error({ err }, "Unhandled error");
    }
    reply.header("content-type", "application/xml");
    reply.status(s3Error.statusCode).send(s3Error.toXml());
  });

  app.setNotFoundHandler((request, reply) => {
    const err = new S3Error(
      "MethodNotAllowed",
      "The specified method is not allowed against this resource.",
      405,
      request.url,
    );
    reply.header("content-type", "application/xml");
    reply.status(err.statusCode).send(err.toXml());
  });

  app.get("/health", async () => {
    return { status: "ok" };
  });

  registerS3Routes(app, engine);

  return app;
}

const CATALOG_FILE = "catalog.json";

export interface StowageServer {
  readonly port: number;
  readonly address: string;
  readonly engine: StorageEngine;
  /** Creates a bucket unless it already exists. */
  createBucket(name: string): Promise<void>;
  setup(config: StowageInitConfig): Promise<void>;
  stop(): Promise<void>;
}

export interface StartStowageOptions {
  port?: number;
  host?: string;
  logger?: boolean;
  bodyLimit?: number;
  /**
   * Directory for object payloads and the bucket catalog, which survive
   * restarts. Everything stays in memory when unset.
   */
  storageRoot?: string;
  credentials?: S3Credentials;
  /** Init config object, or the path of a JSON file holding one. */
  init?: StowageInitConfig | string;
}

/**
 * Starts a server. Explicit options win over `STOWAGE_*` environment
 * variables, which win over the defaults.
 */
export async function startStowage(options: StartStowageOptions = {}): Promise<StowageServer> {
  const env = readEnv();
  const port = options.port ?? env.STOWAGE_PORT ?? DEFAULT_PORT;
  const host = options.host ?? env.STOWAGE_HOST ?? "127.0.0.1";
  const storageRoot = options.storageRoot ?? env.STOWAGE_STORAGE_ROOT;
  const credentials =
    options.credentials ??
    (env.STOWAGE_ACCESS_KEY && env.STOWAGE_SECRET_KEY
      ? { accessKeyId: env.STOWAGE_ACCESS_KEY, secretAccessKey: env.STOWAGE_SECRET_KEY }
      : undefined);

  const app = buildApp({
    logger: options.logger ?? env.STOWAGE_LOGGER ?? true,
    bodyLimit: options.bodyLimit ?? env.STOWAGE_BODY_LIMIT,
    credentials,
    blobStore: storageRoot ? new FileBlobStore(storageRoot) : undefined,
    catalog: storageRoot ? new FileCatalogStore(join(storageRoot, CATALOG_FILE)) : undefined,
  });
  const engine = app.storageEngine;

  let listenAddress: string;
  try {
    await engine.restore();
    const init = options.init ?? env.STOWAGE_INIT;
    if (init !== undefined) {
      await applyInitConfig(typeof init === "string" ? loadInitConfig(init) : init, engine);
    }
    listenAddress = await app.listen({ port, host });
  } catch (err) {
    await app.close();
    throw err;
  }
  const url = new URL(listenAddress);

  return {
    get port() {
      return parseInt(url.port);
    },
    get address() {
      return listenAddress;
    },
    engine,
    async createBucket(name: string) {
      await applyInitConfig({ buckets: [name] }, engine);
    },
    setup(config: StowageInitConfig) {
      return applyInitConfig(config, engine);
    },
    stop() {
      return app.close();
    },
  };
}
