import { createReadStream } from "node:fs";
import { Readable, type Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { fileURLToPath } from "node:url";
import dayjs from "dayjs";
import type { Downloader } from "../types/cache.types.js";
import { ErrorCode, FetchError, toImageCacheError } from "../types/errors.js";
import { createLogger, describeError } from "./Logger.js";

export interface DefaultDownloaderOptions {
  /** Freshness of payloads whose response carries no expiry */
  defaultExpiryMs: number;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

const HTTP_URL = /^https?:\/\//i;
const MAX_AGE = /(?:^|,)\s*max-age\s*=\s*(\d+)/i;

/**
 * Downloads http(s) URLs with fetch and reads file:// URLs or plain paths
 * from the local file system
 */
export class DefaultDownloader implements Downloader {
  private readonly logger = createLogger("DefaultDownloader");
  private readonly defaultExpiryMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(options: DefaultDownloaderOptions) {
    this.defaultExpiryMs = options.defaultExpiryMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
  }

  async downloadToStream(identifier: string, sink: Writable, signal?: AbortSignal): Promise<number> {
    const timer = this.logger.startTimer("download", { identifier });
    try {
      signal?.throwIfAborted();
      const expiry = HTTP_URL.test(identifier)
        ? await this.downloadHttp(identifier, sink, signal)
        : await this.downloadFile(identifier, sink, signal);
      timer.end(true);
      return expiry;
    } catch (error) {
      const cacheError = toImageCacheError(error, { operation: "download", identifier });
      timer.end(false, cacheError.code);
      if (cacheError.code === ErrorCode.FETCH_CANCELLED) {
        this.logger.debug("Download cancelled", { operation: "download", identifier });
      } else {
        this.logger.warning(
          "Download failed",
          { operation: "download", identifier },
          { code: cacheError.code, ...describeError(cacheError) },
        );
      }
      return -1;
    }
  }

  private async downloadHttp(url: string, sink: Writable, signal?: AbortSignal): Promise<number> {
    const response = await this.fetchImpl(url, { signal });
    if (!response.ok) {
      throw new FetchError(
        `Unexpected response status ${response.status}`,
        ErrorCode.FETCH_HTTP_STATUS,
        response.status,
        { operation: "download", identifier: url },
      );
    }
    if (!response.body) {
      throw new FetchError("Response has no body", ErrorCode.FETCH_FAILED, response.status, {
        operation: "download",
        identifier: url,
      });
    }

    await pipeline(Readable.fromWeb(response.body), sink, { signal });
    return this.expiryFromHeaders(response.headers);
  }

  private async downloadFile(identifier: string, sink: Writable, signal?: AbortSignal): Promise<number> {
    const path = identifier.startsWith("file:") ? fileURLToPath(identifier) : identifier;
    await pipeline(createReadStream(path), sink, { signal });
    return this.defaultExpiry();
  }

  /**
   * Expiry from Cache-Control max-age, then Expires. Missing or past
   * values fall back to the default freshness.
   */
  expiryFromHeaders(headers: Headers): number {
    const now = this.now();

    const maxAge = MAX_AGE.exec(headers.get("cache-control") ?? "");
    if (maxAge?.[1] !== undefined) {
      return dayjs(now).add(Number(maxAge[1]), "second").valueOf();
    }

    const expires = headers.get("expires");
    if (expires) {
      const parsed = dayjs(expires);
      if (parsed.isValid() && parsed.valueOf() >= now) {
        return parsed.valueOf();
      }
    }

    return this.defaultExpiry();
  }

  private defaultExpiry(): number {
    return dayjs(this.now()).add(this.defaultExpiryMs, "millisecond").valueOf();
  }
}
