import type { Readable } from "node:stream";

export type PixelFormat = "rgba" | "rgb" | "grey";

export type Channels = 1 | 2 | 3 | 4;

export type RotationAngle = 0 | 90 | 180 | 270;

export interface ImageBounds {
  width: number;
  height: number;
}

/**
 * A persisted blob that can be read more than once, each time from the start
 */
export interface BlobReader {
  createReadStream(): Readable;
}

/**
 * Anything the decoder can read: raw bytes, a file path or a re-readable blob
 */
export type ImageSource = Buffer | string | BlobReader;

export interface DecodeOptions {
  /** Bounding box the decoded image should cover; omitted means full size */
  maxSize?: ImageBounds;
  pixelFormat?: PixelFormat;
}

/**
 * How an image should be decoded for display. Its string form
 * (see displayConfigKey) is the variant part of the memory cache key.
 */
export interface DisplayConfig {
  maxSize?: ImageBounds;
  pixelFormat: PixelFormat;
  showOriginal: boolean;
  autoRotate: boolean;
}
