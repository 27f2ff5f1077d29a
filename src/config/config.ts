import { homedir } from "node:os";
import { join } from "node:path";
import * as v from "valibot";
import type { ImageCacheConfig } from "../types/cache.types.js";
import { ConfigurationError } from "../types/errors.js";

const MiB = 1024 * 1024;

export const MIN_MEMORY_CACHE_SIZE = 2 * MiB;
export const MIN_DISK_CACHE_SIZE = 10 * MiB;

export const DEFAULT_CONFIG: ImageCacheConfig = {
  memoryCacheEnabled: true,
  memoryCacheSize: 32 * MiB,
  diskCacheEnabled: true,
  diskCacheSize: 50 * MiB,
  diskCachePath: join(homedir(), ".cache", "tiered-image-cache"),
  defaultExpiryMs: 30 * 24 * 60 * 60 * 1000, // 30 days
  debug: false,
};

const booleanFlag = v.optional(v.picklist(["true", "false"]));

// Environment variables validation schema
const EnvSchema = v.object({
  IMAGE_CACHE_MEMORY_ENABLED: booleanFlag,
  IMAGE_CACHE_MEMORY_SIZE: v.optional(
    v.pipe(
      v.string(),
      v.transform(Number),
      v.number(),
      v.integer(),
      v.minValue(MIN_MEMORY_CACHE_SIZE, "Memory cache must be at least 2 MiB"),
    ),
  ),
  IMAGE_CACHE_DISK_ENABLED: booleanFlag,
  IMAGE_CACHE_DISK_SIZE: v.optional(
    v.pipe(
      v.string(),
      v.transform(Number),
      v.number(),
      v.integer(),
      v.minValue(MIN_DISK_CACHE_SIZE, "Disk cache must be at least 10 MiB"),
    ),
  ),
  IMAGE_CACHE_DIR: v.optional(v.pipe(v.string(), v.trim(), v.minLength(1))),
  IMAGE_CACHE_DEFAULT_EXPIRY_MS: v.optional(
    v.pipe(v.string(), v.transform(Number), v.number(), v.integer(), v.minValue(1)),
  ),

  DEBUG: booleanFlag,
});

function formatValidationError(error: v.ValiError<typeof EnvSchema>): string {
  const issues = v.flatten<typeof EnvSchema>(error.issues);
  const messages: string[] = [];

  for (const [path, pathIssues] of Object.entries(issues.nested ?? {})) {
    for (const issue of pathIssues ?? []) {
      messages.push(`${path}: ${issue}`);
    }
  }

  for (const issue of issues.root ?? []) {
    messages.push(`Configuration: ${issue}`);
  }

  return messages.join(", ");
}

function firstInvalidKey(error: v.ValiError<typeof EnvSchema>): string | undefined {
  return Object.keys(v.flatten<typeof EnvSchema>(error.issues).nested ?? {})[0];
}

/**
 * Build the cache configuration from environment variables, with explicit
 * overrides taking precedence
 */
export function loadConfig(
  overrides: Partial<ImageCacheConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): ImageCacheConfig {
  let validatedEnv: v.InferOutput<typeof EnvSchema>;
  try {
    validatedEnv = v.parse(EnvSchema, env);
  } catch (error) {
    if (v.isValiError<typeof EnvSchema>(error)) {
      throw new ConfigurationError(
        `Configuration validation failed: ${formatValidationError(error)}`,
        firstInvalidKey(error),
        { operation: "loadConfig" },
      );
    }
    throw error;
  }

  const config: ImageCacheConfig = {
    memoryCacheEnabled: validatedEnv.IMAGE_CACHE_MEMORY_ENABLED !== "false",
    memoryCacheSize: validatedEnv.IMAGE_CACHE_MEMORY_SIZE ?? DEFAULT_CONFIG.memoryCacheSize,
    diskCacheEnabled: validatedEnv.IMAGE_CACHE_DISK_ENABLED !== "false",
    diskCacheSize: validatedEnv.IMAGE_CACHE_DISK_SIZE ?? DEFAULT_CONFIG.diskCacheSize,
    diskCachePath: validatedEnv.IMAGE_CACHE_DIR ?? DEFAULT_CONFIG.diskCachePath,
    defaultExpiryMs:
      validatedEnv.IMAGE_CACHE_DEFAULT_EXPIRY_MS ?? DEFAULT_CONFIG.defaultExpiryMs,
    debug: validatedEnv.DEBUG === "true",
    ...overrides,
  };

  if (config.memoryCacheSize < MIN_MEMORY_CACHE_SIZE) {
    throw new ConfigurationError("Memory cache must be at least 2 MiB", "memoryCacheSize");
  }
  if (config.diskCacheSize < MIN_DISK_CACHE_SIZE) {
    throw new ConfigurationError("Disk cache must be at least 10 MiB", "diskCacheSize");
  }
  return config;
}
