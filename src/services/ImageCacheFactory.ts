// Image cache factory
import { loadConfig } from "../config/config.js";
import type {
  DiskCacheFileNameGenerator,
  Downloader,
  ImageCacheConfig,
} from "../types/cache.types.js";
import { CacheCoordinator } from "./CacheCoordinator.js";
import { DefaultDownloader } from "./Downloader.js";
import { LogLevel, createLogger, describeError, logger } from "./Logger.js";

export interface CreateImageCacheOptions {
  config?: Partial<ImageCacheConfig>;
  downloader?: Downloader;
  fileNameGenerator?: DiskCacheFileNameGenerator;
}

/**
 * Build a cache from environment configuration. The memory tier is ready
 * on return; the disk tier opens in the background and lookups that need
 * it wait until it has.
 */
export function createImageCache(options: CreateImageCacheOptions = {}): CacheCoordinator {
  const config = loadConfig(options.config);
  if (config.debug) {
    logger.setMinLevel(LogLevel.DEBUG);
  }

  const factoryLogger = createLogger("ImageCacheFactory");
  const cache = new CacheCoordinator({
    config,
    downloader:
      options.downloader ?? new DefaultDownloader({ defaultExpiryMs: config.defaultExpiryMs }),
    fileNameGenerator: options.fileNameGenerator,
  });

  cache.initMemoryCache();
  cache.initDiskCache().catch((error: unknown) => {
    factoryLogger.error(
      "Disk cache initialization failed",
      { operation: "initDiskCache" },
      describeError(error),
    );
  });

  return cache;
}
