export { buildApp, startStowage } from "./app.js";
export type { BuildAppOptions, StartStowageOptions, StowageServer } from "./app.js";
export { readEnv } from "./config.js";
export type { StowageEnv } from "./config.js";
export { applyInitConfig, loadInitConfig, validateInitConfig } from "./initConfig.js";
export type { ResolvedInitConfig, StowageInitConfig } from "./initConfig.js";
export { S3Error, StorageError, S3_ERROR_CODES } from "./common/errors.js";
export type { StorageErrorKind, StorageResult } from "./common/errors.js";
export { verifySignature } from "./s3/auth.js";
export type { S3Credentials } from "./s3/auth.js";
export { MemoryBlobStore } from "./storage/blobStore.js";
export type { BlobStore } from "./storage/blobStore.js";
export { FileBlobStore } from "./storage/fileBlobStore.js";
export { FileCatalogStore } from "./storage/catalog.js";
export type { CatalogSnapshot, CatalogStore } from "./storage/catalog.js";
export { BucketRegistry } from "./storage/bucketRegistry.js";
export { ObjectIndex } from "./storage/objectIndex.js";
export { StorageEngine } from "./storage/storageEngine.js";
export type { StorageEngineOptions } from "./storage/storageEngine.js";
export type * from "./storage/storageTypes.js";
