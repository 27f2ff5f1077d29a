import { createHash } from "node:crypto";
import { statfs } from "node:fs/promises";
import { Writable } from "node:stream";
import type { DiskCacheFileNameGenerator } from "../types/cache.types.js";
import { toImageCacheError } from "../types/errors.js";
import { type Outcome, failure, success } from "../types/outcome.types.js";

/**
 * Default file name strategy: SHA-256 of the identifier, hex encoded
 */
export class HashFileNameGenerator implements DiskCacheFileNameGenerator {
  generate(identifier: string): string {
    return createHash("sha256").update(identifier).digest("hex");
  }
}

/**
 * Bytes available to unprivileged users on the file system holding path
 */
export async function getAvailableSpace(path: string): Promise<Outcome<number>> {
  try {
    const stats = await statfs(path);
    return success(stats.bavail * stats.bsize);
  } catch (error) {
    return failure(
      toImageCacheError(error, { operation: "getAvailableSpace", details: { path } }),
    );
  }
}

/**
 * Writable that keeps everything written to it in memory
 */
export class MemorySink extends Writable {
  private chunks: Buffer[] = [];
  private length = 0;

  override _write(
    chunk: Buffer | string,
    encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk, encoding) : chunk;
    this.chunks.push(buffer);
    this.length += buffer.length;
    callback();
  }

  get byteLength(): number {
    return this.length;
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks, this.length);
  }
}
