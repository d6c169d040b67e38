export const DEFAULT_OWNER_ID = "000000000000";
export const DEFAULT_OWNER_NAME = "local";
export const DEFAULT_PORT = 4566;

// S3 caps a single listing page at 1000 keys
export const MAX_LIST_KEYS = 1000;

// Object keys are limited to 1024 bytes of UTF-8
export const MAX_KEY_BYTES = 1024;

export const DEFAULT_BODY_LIMIT_BYTES = 50 * 1_048_576;

// Signed requests older or newer than this are rejected
export const MAX_CLOCK_SKEW_MS = 15 * 60 * 1000;
