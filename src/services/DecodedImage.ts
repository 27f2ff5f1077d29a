import { ValidationError } from "../types/errors.js";
import type { Channels, PixelFormat } from "../types/image.types.js";

export interface DecodedImageInit {
  width: number;
  height: number;
  channels: Channels;
  pixelFormat: PixelFormat;
  data: Buffer;
}

export function toChannels(value: number): Channels {
  switch (value) {
    case 1:
    case 2:
    case 3:
    case 4:
      return value;
    default:
      throw new ValidationError(`Unsupported channel count ${value}`, "channels", value);
  }
}

/**
 * Raw, interleaved pixels ready for display. The pixel buffer is owned by
 * whoever holds the image; release() drops it.
 */
export class DecodedImage {
  readonly width: number;
  readonly height: number;
  readonly channels: Channels;
  readonly pixelFormat: PixelFormat;
  private pixels: Buffer | null;

  constructor(init: DecodedImageInit) {
    const expected = init.width * init.height * init.channels;
    if (init.data.length !== expected) {
      throw new ValidationError(
        `Pixel buffer holds ${init.data.length} bytes, expected ${expected}`,
        "data",
        init.data.length,
      );
    }
    this.width = init.width;
    this.height = init.height;
    this.channels = init.channels;
    this.pixelFormat = init.pixelFormat;
    this.pixels = init.data;
  }

  get rowBytes(): number {
    return this.width * this.channels;
  }

  /** Memory footprint used to weigh the image in the memory tier */
  get byteSize(): number {
    return this.rowBytes * this.height;
  }

  get data(): Buffer {
    if (!this.pixels) {
      throw new ValidationError("Image pixels have been released", "data");
    }
    return this.pixels;
  }

  /**
   * Channel values of one pixel
   */
  pixelAt(x: number, y: number): number[] {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new ValidationError(`Pixel (${x}, ${y}) is outside the image`, "position");
    }
    const offset = y * this.rowBytes + x * this.channels;
    return Array.from(this.data.subarray(offset, offset + this.channels));
  }

  isReleased(): boolean {
    return this.pixels === null;
  }

  release(): void {
    this.pixels = null;
  }
}
