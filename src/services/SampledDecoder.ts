import type { Readable } from "node:stream";
import sharp, { type Metadata, type Sharp } from "sharp";
import { DecodeError, ErrorCode } from "../types/errors.js";
import type {
  BlobReader,
  DecodeOptions,
  ImageBounds,
  ImageSource,
  PixelFormat,
} from "../types/image.types.js";
import { type Outcome, failure, success } from "../types/outcome.types.js";
import { DecodedImage, toChannels } from "./DecodedImage.js";
import { createLogger, describeError } from "./Logger.js";

/**
 * Integer downsampling ratio for decoding an image of the given bounds
 * into a reqWidth x reqHeight box. Rounds to the nearest ratio, then
 * grows it until the pixel count is at most twice the requested one.
 */
export function computeSampleSize(
  bounds: ImageBounds,
  reqWidth: number,
  reqHeight: number,
): number {
  if (reqWidth <= 0 || reqHeight <= 0) {
    return 1;
  }

  const { width, height } = bounds;
  if (width <= reqWidth && height <= reqHeight) {
    return 1;
  }

  let ratio = Math.max(1, Math.min(Math.round(height / reqHeight), Math.round(width / reqWidth)));
  const totalPixels = width * height;
  const reqPixelsCap = reqWidth * reqHeight * 2;
  while (totalPixels / (ratio * ratio) > reqPixelsCap) {
    ratio++;
  }
  return ratio;
}

function isBlobReader(source: ImageSource): source is BlobReader {
  return typeof source === "object" && !Buffer.isBuffer(source);
}

function boundsOf(metadata: Metadata): ImageBounds {
  if (!metadata.width || !metadata.height) {
    throw new DecodeError("Image header carries no dimensions", ErrorCode.UNSUPPORTED_FORMAT);
  }
  return { width: metadata.width, height: metadata.height };
}

function applyPixelFormat(image: Sharp, pixelFormat: PixelFormat): Sharp {
  switch (pixelFormat) {
    case "rgba":
      return image.ensureAlpha().toColourspace("srgb");
    case "rgb":
      return image.removeAlpha().toColourspace("srgb");
    case "grey":
      return image.removeAlpha().toColourspace("b-w");
  }
}

function toDecodeError(error: unknown, operation: string): DecodeError {
  if (error instanceof DecodeError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const code = /unsupported image format/i.test(message)
    ? ErrorCode.UNSUPPORTED_FORMAT
    : ErrorCode.DECODE_FAILED;
  return new DecodeError(message, code, { operation, service: "SampledDecoder" }, { cause: error });
}

/**
 * Decodes encoded image bytes into raw pixels, downsampling by an integer
 * ratio so large images never decode at full resolution for a small box
 */
export class SampledDecoder {
  private readonly logger = createLogger("SampledDecoder");

  /**
   * Dimensions from the image header, without decoding pixels
   */
  async readBounds(source: ImageSource): Promise<Outcome<ImageBounds, DecodeError>> {
    return this.withImage(source, "readBounds", async image => boundsOf(await image.metadata()));
  }

  async tryDecode(
    source: ImageSource,
    options: DecodeOptions = {},
  ): Promise<Outcome<DecodedImage, DecodeError>> {
    const pixelFormat = options.pixelFormat ?? "rgba";
    const timer = this.logger.startTimer("decode", { pixelFormat });

    const outcome = await this.withImage(source, "decode", async image => {
      let pipeline = image;
      if (options.maxSize) {
        const bounds = boundsOf(await image.metadata());
        const sampleSize = computeSampleSize(bounds, options.maxSize.width, options.maxSize.height);
        if (sampleSize > 1) {
          pipeline = pipeline.resize({
            width: Math.max(1, Math.floor(bounds.width / sampleSize)),
            height: Math.max(1, Math.floor(bounds.height / sampleSize)),
            fit: "fill",
          });
        }
      }

      const { data, info } = await applyPixelFormat(pipeline, pixelFormat)
        .raw()
        .toBuffer({ resolveWithObject: true });

      return new DecodedImage({
        width: info.width,
        height: info.height,
        channels: toChannels(info.channels),
        pixelFormat,
        data,
      });
    });

    timer.end(outcome.ok, outcome.ok ? undefined : outcome.error.code);
    return outcome;
  }

  /**
   * Decode source, or null when it is not a decodable image
   */
  async decode(source: ImageSource, options: DecodeOptions = {}): Promise<DecodedImage | null> {
    const outcome = await this.tryDecode(source, options);
    if (!outcome.ok) {
      this.logger.warning(
        "Image decode failed",
        { operation: "decode", service: "SampledDecoder" },
        { code: outcome.error.code, ...describeError(outcome.error) },
      );
      return null;
    }
    return outcome.value;
  }

  private async withImage<T>(
    source: ImageSource,
    operation: string,
    work: (image: Sharp) => Promise<T>,
  ): Promise<Outcome<T, DecodeError>> {
    let stream: Readable | null = null;
    try {
      if (!isBlobReader(source)) {
        return success(await work(sharp(source)));
      }

      const input = source.createReadStream();
      stream = input;
      const image = sharp();
      const streamFailed = new Promise<never>((_, reject) => {
        input.once("error", reject);
      });
      input.pipe(image);
      return success(await Promise.race([work(image), streamFailed]));
    } catch (error) {
      return failure(toDecodeError(error, operation));
    } finally {
      stream?.destroy();
    }
  }
}
