import { mkdir } from "node:fs/promises";
import type { Writable } from "node:stream";
import type {
  CacheStats,
  DiskCacheFileNameGenerator,
  Downloader,
  ImageCacheConfig,
} from "../types/cache.types.js";
import { ErrorCode, toImageCacheError } from "../types/errors.js";
import type { DecodeOptions, DisplayConfig } from "../types/image.types.js";
import { AsyncLock, type ReleaseLock } from "../utils/AsyncLock.js";
import { ReadinessGate } from "../utils/ReadinessGate.js";
import { createCacheKey } from "../utils/cacheKey.js";
import { HashFileNameGenerator, MemorySink, getAvailableSpace } from "../utils/storage.js";
import { createDisplayConfig, displayConfigKey } from "../validation/schemas.js";
import type { DecodedImage } from "./DecodedImage.js";
import { DiskLruCache, type Editor, NEVER_EXPIRES, type Snapshot } from "./DiskLruCache.js";
import { type ChildLogger, createLogger, describeError } from "./Logger.js";
import { LruMemoryCache } from "./MemoryCache.js";
import { OrientationNormalizer } from "./OrientationNormalizer.js";
import { SampledDecoder } from "./SampledDecoder.js";

const DISK_CACHE_APP_VERSION = 1;
const DISK_CACHE_VALUE_COUNT = 1;
const BLOB_SLOT = 0;

export interface CacheCoordinatorOptions {
  config: ImageCacheConfig;
  downloader: Downloader;
  fileNameGenerator?: DiskCacheFileNameGenerator;
  decoder?: SampledDecoder;
  normalizer?: OrientationNormalizer;
  logger?: ChildLogger;
}

type DiskReservation =
  | { status: "cached"; snapshot: Snapshot }
  | { status: "editing"; disk: DiskLruCache; editor: Editor }
  | { status: "busy" }
  | { status: "unavailable" };

type WriteResult =
  | { status: "committed"; snapshot: Snapshot }
  | { status: "failed" }
  | { status: "unavailable" };

type DiskPopulation =
  | { status: "decoded"; image: DecodedImage; expiry: number }
  | { status: "busy" }
  | { status: "failed" }
  | { status: "unavailable" };

function decodeOptionsFor(display: DisplayConfig): DecodeOptions {
  return {
    maxSize: display.showOriginal ? undefined : display.maxSize,
    pixelFormat: display.pixelFormat,
  };
}

/**
 * Two-tier image cache: decoded images in memory, encoded payloads on disk.
 *
 * Structural disk operations run under one FIFO lock. Callers that need the
 * disk tier wait for initDiskCache() to finish first, and re-check readiness
 * once they hold the lock since clearDiskCache() may have reset it in
 * between. Downloads and decodes never run under the lock; concurrent
 * fetches of one identifier are collapsed by the disk store's edit lock.
 */
export class CacheCoordinator {
  private readonly logger: ChildLogger;
  private readonly config: ImageCacheConfig;
  private readonly downloader: Downloader;
  private readonly decoder: SampledDecoder;
  private readonly normalizer: OrientationNormalizer;
  private fileNameGenerator: DiskCacheFileNameGenerator;
  private memoryCache: LruMemoryCache<DecodedImage> | null = null;
  private diskCache: DiskLruCache | null = null;
  private readonly diskLock = new AsyncLock();
  private readonly diskReady = new ReadinessGate();

  constructor(options: CacheCoordinatorOptions) {
    this.config = { ...options.config };
    this.downloader = options.downloader;
    this.fileNameGenerator = options.fileNameGenerator ?? new HashFileNameGenerator();
    this.decoder = options.decoder ?? new SampledDecoder();
    this.normalizer = options.normalizer ?? new OrientationNormalizer();
    this.logger = options.logger ?? createLogger("CacheCoordinator");
  }

  // ---------------------------------------------------------------------------
  // Initialization
  // ---------------------------------------------------------------------------

  /**
   * Create (or recreate, dropping its contents) the memory tier
   */
  initMemoryCache(): void {
    if (!this.config.memoryCacheEnabled) {
      return;
    }

    if (this.memoryCache) {
      this.memoryCache.evictAll();
    }
    this.memoryCache = new LruMemoryCache<DecodedImage>({
      maxSize: this.config.memoryCacheSize,
      sizeOf: (_key, image) => image.byteSize,
    });
    this.logger.debug("Memory cache created", {
      operation: "initMemoryCache",
      metadata: { maxSize: this.config.memoryCacheSize },
    });
  }

  /**
   * Open the disk tier and mark it ready, waking every caller waiting for
   * it. When the store cannot be opened the cache keeps working without it.
   */
  async initDiskCache(): Promise<void> {
    if (!this.config.diskCacheEnabled) {
      return;
    }

    const release = await this.diskLock.acquire();
    try {
      if (!this.diskCache || this.diskCache.isClosed()) {
        this.diskCache = await this.openDiskCache();
      }
    } finally {
      this.diskReady.open();
      release();
    }
  }

  private async openDiskCache(): Promise<DiskLruCache | null> {
    const directory = this.config.diskCachePath;
    const timer = this.logger.startTimer("initDiskCache", { directory });
    try {
      await mkdir(directory, { recursive: true });
      const maxSize = await this.effectiveDiskCacheSize(directory);
      const cache = await DiskLruCache.open({
        directory,
        appVersion: DISK_CACHE_APP_VERSION,
        valueCount: DISK_CACHE_VALUE_COUNT,
        maxSize,
        fileNameGenerator: this.fileNameGenerator,
      });
      timer.end(true);
      this.logger.info(
        "Disk cache opened",
        { operation: "initDiskCache" },
        { directory, maxSize, size: cache.size() },
      );
      return cache;
    } catch (error) {
      const cacheError = toImageCacheError(error, { operation: "initDiskCache" });
      timer.end(false, cacheError.code);
      this.logger.error(
        "Disk cache unavailable, continuing with memory only",
        { operation: "initDiskCache" },
        { directory, code: cacheError.code, ...describeError(error) },
      );
      return null;
    }
  }

  /**
   * Configured capacity clamped to the free space of the device
   */
  private async effectiveDiskCacheSize(directory: string): Promise<number> {
    const available = await getAvailableSpace(directory);
    if (!available.ok) {
      this.logger.debug(
        "Free space unknown, using configured disk cache size",
        { operation: "initDiskCache" },
        describeError(available.error),
      );
      return this.config.diskCacheSize;
    }
    return Math.min(available.value, this.config.diskCacheSize);
  }

  /**
   * Take the disk lock once the disk tier is ready
   */
  private async acquireReadyDisk(): Promise<ReleaseLock> {
    for (;;) {
      await this.diskReady.wait();
      const release = await this.diskLock.acquire();
      if (this.diskReady.isReady()) {
        return release;
      }
      release();
    }
  }

  // ---------------------------------------------------------------------------
  // Lookup
  // ---------------------------------------------------------------------------

  getFromMemory(identifier: string, display: DisplayConfig = createDisplayConfig()): DecodedImage | null {
    if (!this.memoryCache) {
      return null;
    }

    const key = createCacheKey(identifier, displayConfigKey(display));
    const image = this.memoryCache.get(key);
    if (image?.isReleased()) {
      this.memoryCache.remove(key);
      return null;
    }
    return image;
  }

  /**
   * Decode the persisted payload of identifier and promote it to memory.
   * Waits until the disk tier is initialized.
   */
  async getFromDisk(
    identifier: string,
    display: DisplayConfig = createDisplayConfig(),
  ): Promise<DecodedImage | null> {
    if (!this.config.diskCacheEnabled) {
      return null;
    }

    let disk: DiskLruCache | null = null;
    let snapshot: Snapshot | null = null;
    const release = await this.acquireReadyDisk();
    try {
      disk = this.diskCache;
      snapshot = disk ? await disk.getSnapshot(identifier) : null;
    } catch (error) {
      this.logDiskFailure("getFromDisk", identifier, error);
    } finally {
      release();
    }

    if (!disk || !snapshot) {
      return null;
    }

    const population = await this.decodeSnapshot(identifier, snapshot, display);
    if (population.status !== "decoded") {
      return null;
    }
    this.remember(identifier, display, population.image, population.expiry);
    return population.image;
  }

  /**
   * Fetch identifier through the disk tier and cache the decoded result.
   *
   * Resolves to null when the download fails or is cancelled, the payload
   * cannot be written to disk or does not decode, or another caller is
   * already fetching the same identifier. Without a usable disk tier the
   * payload is fetched into memory and decoded from there.
   */
  async fetchAndCache(
    identifier: string,
    display: DisplayConfig = createDisplayConfig(),
    signal?: AbortSignal,
  ): Promise<DecodedImage | null> {
    const population: DiskPopulation = this.config.diskCacheEnabled
      ? await this.populateFromDisk(identifier, display, signal)
      : { status: "unavailable" };

    switch (population.status) {
      case "decoded":
        this.remember(identifier, display, population.image, population.expiry);
        return population.image;
      case "busy":
      case "failed":
        return null;
      case "unavailable":
        return this.fetchIntoMemory(identifier, display, signal);
    }
  }

  /**
   * Memory, then disk, then a fetch
   */
  async getImage(
    identifier: string,
    display: DisplayConfig = createDisplayConfig(),
    signal?: AbortSignal,
  ): Promise<DecodedImage | null> {
    const cached = this.getFromMemory(identifier, display);
    if (cached) {
      return cached;
    }

    const persisted = await this.getFromDisk(identifier, display);
    if (persisted) {
      return persisted;
    }

    return this.fetchAndCache(identifier, display, signal);
  }

  private async populateFromDisk(
    identifier: string,
    display: DisplayConfig,
    signal?: AbortSignal,
  ): Promise<DiskPopulation> {
    const reservation = await this.reserve(identifier);
    switch (reservation.status) {
      case "busy":
        this.logger.debug("Fetch already in progress", {
          operation: "fetchAndCache",
          identifier,
        });
        return reservation;
      case "unavailable":
        return reservation;
      case "cached":
        return this.decodeSnapshot(identifier, reservation.snapshot, display);
      case "editing": {
        const written = await this.writeThrough(reservation.disk, reservation.editor, identifier, signal);
        if (written.status !== "committed") {
          return written;
        }
        return this.decodeSnapshot(identifier, written.snapshot, display);
      }
    }
  }

  /**
   * Under the disk lock, find a committed record or claim the edit of one
   */
  private async reserve(identifier: string): Promise<DiskReservation> {
    const release = await this.acquireReadyDisk();
    try {
      const disk = this.diskCache;
      if (!disk) {
        return { status: "unavailable" };
      }

      const snapshot = await disk.getSnapshot(identifier);
      if (snapshot) {
        return { status: "cached", snapshot };
      }

      const editor = await disk.beginEdit(identifier);
      return editor ? { status: "editing", disk, editor } : { status: "busy" };
    } catch (error) {
      this.logDiskFailure("fetchAndCache", identifier, error);
      return { status: "unavailable" };
    } finally {
      release();
    }
  }

  /**
   * Download into the edit, commit it and reopen the record for reading.
   * The editor is aborted on every path that does not commit.
   */
  private async writeThrough(
    disk: DiskLruCache,
    editor: Editor,
    identifier: string,
    signal?: AbortSignal,
  ): Promise<WriteResult> {
    try {
      const expiry = await this.download(identifier, editor.newOutputStream(BLOB_SLOT), signal);
      if (expiry < 0 || signal?.aborted) {
        return { status: "failed" };
      }
      editor.setEntryExpiryTimestamp(expiry);

      const release = await this.diskLock.acquire();
      try {
        await editor.commit();
        const snapshot = await disk.getSnapshot(identifier);
        // Evicted at once when larger than the whole disk tier
        return snapshot ? { status: "committed", snapshot } : { status: "unavailable" };
      } finally {
        release();
      }
    } catch (error) {
      this.logDiskFailure("fetchAndCache", identifier, error);
      // A store closed mid-download falls back to memory; a failed write does not
      const closed = toImageCacheError(error).code === ErrorCode.DISK_CACHE_CLOSED;
      return { status: closed ? "unavailable" : "failed" };
    } finally {
      await this.abortQuietly(editor, identifier);
    }
  }

  /**
   * Decode a record; a record that does not decode is evicted
   */
  private async decodeSnapshot(
    identifier: string,
    snapshot: Snapshot,
    display: DisplayConfig,
  ): Promise<DiskPopulation> {
    try {
      const image = await this.decoder.decode(snapshot.reader(BLOB_SLOT), decodeOptionsFor(display));
      if (!image) {
        await this.evictUndecodable(identifier);
        return { status: "failed" };
      }

      // Read orientation from the open snapshot; the record may be gone by now
      const normalized = await this.normalizer.normalize(
        snapshot.reader(BLOB_SLOT),
        image,
        display.autoRotate,
      );
      return { status: "decoded", image: normalized, expiry: snapshot.expiryTimestamp };
    } finally {
      await this.closeQuietly(snapshot, identifier);
    }
  }

  private async fetchIntoMemory(
    identifier: string,
    display: DisplayConfig,
    signal?: AbortSignal,
  ): Promise<DecodedImage | null> {
    const sink = new MemorySink();
    const expiry = await this.download(identifier, sink, signal);
    if (expiry < 0 || signal?.aborted) {
      return null;
    }

    const payload = sink.toBuffer();
    const image = await this.decoder.decode(payload, decodeOptionsFor(display));
    if (!image) {
      return null;
    }

    const normalized = await this.normalizer.normalize(payload, image, display.autoRotate);
    this.remember(identifier, display, normalized, expiry);
    return normalized;
  }

  /**
   * Run the downloader; a thrown error or a cancellation counts as a
   * failed download
   */
  private async download(identifier: string, sink: Writable, signal?: AbortSignal): Promise<number> {
    if (signal?.aborted) {
      return -1;
    }
    try {
      return await this.downloader.downloadToStream(identifier, sink, signal);
    } catch (error) {
      this.logger.warning(
        "Downloader failed",
        { operation: "download", identifier },
        describeError(error),
      );
      return -1;
    }
  }

  private remember(identifier: string, display: DisplayConfig, image: DecodedImage, expiry: number): void {
    this.memoryCache?.put(
      createCacheKey(identifier, displayConfigKey(display)),
      image,
      expiry === NEVER_EXPIRES ? null : expiry,
    );
  }

  private async evictUndecodable(identifier: string): Promise<void> {
    const release = await this.diskLock.acquire();
    try {
      await this.diskCache?.remove(identifier);
      this.logger.info("Evicted undecodable disk record", {
        operation: "getFromDisk",
        identifier,
      });
    } catch (error) {
      this.logDiskFailure("evictUndecodable", identifier, error);
    } finally {
      release();
    }
  }

  private async abortQuietly(editor: Editor, identifier: string): Promise<void> {
    try {
      await editor.abort();
    } catch (error) {
      this.logDiskFailure("abortEdit", identifier, error);
    }
  }

  private async closeQuietly(snapshot: Snapshot, identifier: string): Promise<void> {
    try {
      await snapshot.close();
    } catch (error) {
      this.logDiskFailure("closeSnapshot", identifier, error);
    }
  }

  private logDiskFailure(operation: string, identifier: string | undefined, error: unknown): void {
    const cacheError = toImageCacheError(error, { operation, identifier });
    const log = cacheError.code === ErrorCode.DISK_CACHE_CLOSED ? "debug" : "warning";
    this.logger[log](
      "Disk cache operation failed",
      { operation, identifier },
      { code: cacheError.code, ...describeError(error) },
    );
  }

  // ---------------------------------------------------------------------------
  // Maintenance
  // ---------------------------------------------------------------------------

  /**
   * Clear both tiers, or only the entries of identifier
   */
  async clearCache(identifier?: string): Promise<void> {
    this.clearMemoryCache(identifier);
    await this.clearDiskCache(identifier);
  }

  /**
   * Drop every decoded image, or every variant of identifier
   */
  clearMemoryCache(identifier?: string): void {
    if (!this.memoryCache) {
      return;
    }
    if (identifier === undefined) {
      this.memoryCache.evictAll();
    } else {
      this.memoryCache.removeMatching(createCacheKey(identifier));
    }
  }

  /**
   * Remove the record of identifier, or delete the whole store and reopen
   * it empty before returning
   */
  async clearDiskCache(identifier?: string): Promise<void> {
    if (!this.config.diskCacheEnabled) {
      return;
    }

    if (identifier !== undefined) {
      const release = await this.acquireReadyDisk();
      try {
        await this.diskCache?.remove(identifier);
      } catch (error) {
        this.logDiskFailure("clearDiskCache", identifier, error);
      } finally {
        release();
      }
      return;
    }

    const release = await this.diskLock.acquire();
    try {
      if (this.diskCache) {
        try {
          await this.diskCache.delete();
        } catch (error) {
          this.logDiskFailure("clearDiskCache", undefined, error);
        }
        this.diskCache = null;
      }
      this.diskReady.reset();
    } finally {
      release();
    }

    await this.initDiskCache();
  }

  /**
   * Sync the disk journal
   */
  async flush(): Promise<void> {
    const release = await this.diskLock.acquire();
    try {
      await this.diskCache?.flush();
    } catch (error) {
      this.logDiskFailure("flush", undefined, error);
    } finally {
      release();
    }
  }

  /**
   * Close the disk tier; later lookups run without it
   */
  async close(): Promise<void> {
    const release = await this.diskLock.acquire();
    try {
      await this.diskCache?.close();
    } catch (error) {
      this.logDiskFailure("close", undefined, error);
    } finally {
      this.diskCache = null;
      release();
    }
  }

  setMemoryCacheSize(maxSize: number): void {
    this.config.memoryCacheSize = maxSize;
    this.memoryCache?.setMaxSize(maxSize);
  }

  /**
   * Change the disk capacity; it is clamped to the free space again
   */
  async setDiskCacheSize(maxSize: number): Promise<void> {
    this.config.diskCacheSize = maxSize;
    const release = await this.diskLock.acquire();
    try {
      if (this.diskCache) {
        await this.diskCache.setMaxSize(await this.effectiveDiskCacheSize(this.diskCache.getDirectory()));
      }
    } finally {
      release();
    }
  }

  setDiskCacheFileNameGenerator(generator: DiskCacheFileNameGenerator): void {
    this.fileNameGenerator = generator;
    this.diskCache?.setFileNameGenerator(generator);
  }

  /**
   * Path of the persisted payload of identifier, or null
   */
  getCacheFile(identifier: string): string | null {
    try {
      return this.diskCache?.getCacheFile(identifier, BLOB_SLOT) ?? null;
    } catch (error) {
      this.logDiskFailure("getCacheFile", identifier, error);
      return null;
    }
  }

  isDiskCacheReady(): boolean {
    return this.diskReady.isReady();
  }

  getStats(): CacheStats {
    return {
      memory: this.memoryCache?.getStats() ?? null,
      disk: this.diskCache?.getStats() ?? null,
      diskCacheReady: this.diskReady.isReady(),
    };
  }
}
