export { DEFAULT_CONFIG, loadConfig } from "./config/config.js";
export { CacheCoordinator, type CacheCoordinatorOptions } from "./services/CacheCoordinator.js";
export { DecodedImage, type DecodedImageInit } from "./services/DecodedImage.js";
export { DiskLruCache, type DiskLruCacheOptions, Editor, NEVER_EXPIRES, Snapshot } from "./services/DiskLruCache.js";
export { DefaultDownloader, type DefaultDownloaderOptions } from "./services/Downloader.js";
export { type CreateImageCacheOptions, createImageCache } from "./services/ImageCacheFactory.js";
export { LogLevel, type LogEntry, type LogSink, createLogger, logger } from "./services/Logger.js";
export { LruMemoryCache } from "./services/MemoryCache.js";
export { OrientationNormalizer, orientationToAngle } from "./services/OrientationNormalizer.js";
export { SampledDecoder, computeSampleSize } from "./services/SampledDecoder.js";
export type * from "./types/cache.types.js";
export * from "./types/errors.js";
export type * from "./types/image.types.js";
export { type Outcome, failure, success } from "./types/outcome.types.js";
export { cacheKeysEqual, cacheKeysMatch, createCacheKey } from "./utils/cacheKey.js";
export { HashFileNameGenerator } from "./utils/storage.js";
export {
  createDisplayConfig,
  displayConfigKey,
  parseIdentifier,
  validateDisplayConfig,
} from "./validation/schemas.js";
