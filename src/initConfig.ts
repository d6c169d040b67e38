import { readFileSync } from "node:fs";
import * as v from "valibot";
import type { StorageEngine } from "./storage/storageEngine.js";

const StringRecordSchema = v.record(v.string(), v.string());

const SeedObjectSchema = v.object({
  key: v.pipe(v.string(), v.nonEmpty()),
  body: v.string(),
  encoding: v.optional(v.picklist(["utf-8", "base64"]), "utf-8"),
  contentType: v.optional(v.string()),
  metadata: v.optional(StringRecordSchema),
});

const BucketSchema = v.union([
  v.string(),
  v.object({
    name: v.string(),
    objects: v.optional(v.array(SeedObjectSchema)),
  }),
]);

const InitConfigSchema = v.object({
  buckets: v.optional(v.array(BucketSchema)),
});

/** Init config as written by users; omitted fields take their defaults. */
export type StowageInitConfig = v.InferInput<typeof InitConfigSchema>;
export type ResolvedInitConfig = v.InferOutput<typeof InitConfigSchema>;

export function validateInitConfig(data: unknown): ResolvedInitConfig {
  return v.parse(InitConfigSchema, data);
}

export function loadInitConfig(path: string): ResolvedInitConfig {
  const content = readFileSync(path, "utf-8");
  return validateInitConfig(JSON.parse(content));
}

/**
 * Creates the configured buckets and seed objects. Buckets that already exist
 * are kept, so applying the same config twice is harmless; seed objects are
 * overwritten.
 */
export async function applyInitConfig(config: StowageInitConfig, engine: StorageEngine): Promise<void> {
  const resolved = validateInitConfig(config);
  for (const bucket of resolved.buckets ?? []) {
    const { name, objects } = typeof bucket === "string" ? { name: bucket, objects: [] } : bucket;

    const created = await engine.createBucket(name);
    if (!created.ok && created.error.kind !== "BucketAlreadyExists") {
      throw created.error;
    }

    for (const seed of objects ?? []) {
      const stored = await engine.putObject(name, seed.key, Buffer.from(seed.body, seed.encoding), {
        contentType: seed.contentType,
        metadata: seed.metadata,
      });
      if (!stored.ok) {
        throw stored.error;
      }
    }
  }
}
