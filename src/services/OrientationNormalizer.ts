import { buffer } from "node:stream/consumers";
import sharp from "sharp";
import { DecodeError, ErrorCode, MetadataError } from "../types/errors.js";
import type { ImageSource, RotationAngle } from "../types/image.types.js";
import { type Outcome, failure, success } from "../types/outcome.types.js";
import { DecodedImage, toChannels } from "./DecodedImage.js";
import { createLogger, describeError } from "./Logger.js";

/**
 * Clockwise rotation for an EXIF orientation tag. Mirrored orientations
 * (2, 4, 5, 7) are not corrected.
 */
export function orientationToAngle(orientation: number | undefined): RotationAngle {
  switch (orientation) {
    case 6:
      return 90;
    case 3:
      return 180;
    case 8:
      return 270;
    default:
      return 0;
  }
}

export class OrientationNormalizer {
  private readonly logger = createLogger("OrientationNormalizer");

  /**
   * Rotation recorded in the EXIF metadata of an encoded image
   */
  async readRotation(source: ImageSource): Promise<Outcome<RotationAngle, MetadataError>> {
    try {
      const input =
        typeof source === "string" || Buffer.isBuffer(source)
          ? source
          : await buffer(source.createReadStream());
      const { orientation } = await sharp(input).metadata();
      return success(orientationToAngle(orientation));
    } catch (error) {
      return failure(
        new MetadataError(
          error instanceof Error ? error.message : String(error),
          { operation: "readRotation", service: "OrientationNormalizer" },
          { cause: error },
        ),
      );
    }
  }

  /**
   * New image rotated clockwise by angle; the input is left untouched
   */
  async rotate(image: DecodedImage, angle: RotationAngle): Promise<Outcome<DecodedImage, DecodeError>> {
    try {
      const { data, info } = await sharp(image.data, {
        raw: { width: image.width, height: image.height, channels: image.channels },
      })
        .rotate(angle)
        .raw()
        .toBuffer({ resolveWithObject: true });

      return success(
        new DecodedImage({
          width: info.width,
          height: info.height,
          channels: toChannels(info.channels),
          pixelFormat: image.pixelFormat,
          data,
        }),
      );
    } catch (error) {
      return failure(
        new DecodeError(
          error instanceof Error ? error.message : String(error),
          ErrorCode.DECODE_FAILED,
          { operation: "rotate", service: "OrientationNormalizer" },
          { cause: error },
        ),
      );
    }
  }

  /**
   * Apply the orientation recorded in source to image. Returns image itself
   * when rotation is off, not needed, or not possible; otherwise returns the
   * rotated copy and releases image.
   */
  async normalize(
    source: ImageSource | null,
    image: DecodedImage,
    shouldAutoRotate: boolean,
  ): Promise<DecodedImage> {
    if (!shouldAutoRotate || source === null) {
      return image;
    }

    const rotation = await this.readRotation(source);
    if (!rotation.ok) {
      this.logger.debug(
        "Orientation unreadable, keeping image as decoded",
        { operation: "normalize" },
        describeError(rotation.error),
      );
      return image;
    }
    if (rotation.value === 0) {
      return image;
    }

    const rotated = await this.rotate(image, rotation.value);
    if (!rotated.ok) {
      this.logger.warning(
        "Rotation failed, keeping image as decoded",
        { operation: "normalize", metadata: { angle: rotation.value } },
        describeError(rotated.error),
      );
      return image;
    }

    image.release();
    return rotated.value;
  }
}
