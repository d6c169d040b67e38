import * as v from "valibot";

const NonEmptyString = v.pipe(v.string(), v.trim(), v.nonEmpty());

const BooleanString = v.pipe(
  v.string(),
  v.toLowerCase(),
  v.picklist(["true", "false", "1", "0"], "Expected one of true, false, 1, 0"),
  v.transform((value) => value === "true" || value === "1"),
);

const IntegerString = v.pipe(v.string(), v.regex(/^\d+$/, "Expected a non-negative integer"), v.transform(Number));

const EnvSchema = v.pipe(
  v.object({
    STOWAGE_PORT: v.optional(v.pipe(IntegerString, v.maxValue(65_535))),
    STOWAGE_HOST: v.optional(NonEmptyString),
    STOWAGE_LOGGER: v.optional(BooleanString),
    STOWAGE_STORAGE_ROOT: v.optional(NonEmptyString),
    STOWAGE_ACCESS_KEY: v.optional(NonEmptyString),
    STOWAGE_SECRET_KEY: v.optional(NonEmptyString),
    STOWAGE_BODY_LIMIT: v.optional(v.pipe(IntegerString, v.minValue(1))),
    STOWAGE_INIT: v.optional(NonEmptyString),
  }),
  v.check(
    (env) => (env.STOWAGE_ACCESS_KEY === undefined) === (env.STOWAGE_SECRET_KEY === undefined),
    "STOWAGE_ACCESS_KEY and STOWAGE_SECRET_KEY must be set together",
  ),
);

export type StowageEnv = v.InferOutput<typeof EnvSchema>;

/**
 * Reads `STOWAGE_*` settings from the environment. Unset variables stay
 * `undefined`; malformed ones throw a `v.ValiError`.
 */
export function readEnv(env: NodeJS.ProcessEnv = process.env): StowageEnv {
  return v.parse(EnvSchema, env);
}
