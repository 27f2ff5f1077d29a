import { describe, expect, it } from "vitest";
import { ErrorCode, ValidationError } from "../src/types/errors.js";
import {
  createDisplayConfig,
  displayConfigKey,
  parseIdentifier,
  validateDisplayConfig,
} from "../src/validation/schemas.js";

describe("Validation", () => {
  describe("createDisplayConfig", () => {
    it("should apply defaults", () => {
      expect(createDisplayConfig()).toEqual({
        pixelFormat: "rgba",
        showOriginal: false,
        autoRotate: false,
      });
    });

    it("should keep explicit values", () => {
      expect(
        createDisplayConfig({ maxSize: { width: 64, height: 48 }, pixelFormat: "grey", autoRotate: true }),
      ).toEqual({
        maxSize: { width: 64, height: 48 },
        pixelFormat: "grey",
        showOriginal: false,
        autoRotate: true,
      });
    });

    it("should reject dimensions below 1", () => {
      expect(() => createDisplayConfig({ maxSize: { width: 0, height: 10 } })).toThrow(
        "Validation failed: maxSize.width: Dimension must be at least 1",
      );
    });

    it("should reject fractional dimensions", () => {
      expect(() => createDisplayConfig({ maxSize: { width: 10, height: 2.5 } })).toThrow(
        "Validation failed: maxSize.height: Dimension must be an integer",
      );
    });

    it("should reject unknown pixel formats", () => {
      expect(() => validateDisplayConfig({ pixelFormat: "cmyk" })).toThrow(
        "Validation failed: pixelFormat: Pixel format must be one of rgba, rgb, grey",
      );
    });

    it("should throw a ValidationError naming the field", () => {
      try {
        validateDisplayConfig({ autoRotate: "yes" });
        expect.unreachable("validateDisplayConfig should have thrown");
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.field).toBe("displayConfig");
          expect(error.code).toBe(ErrorCode.VALIDATION_FAILED);
        }
      }
    });
  });

  describe("displayConfigKey", () => {
    it("should describe the decoded variant", () => {
      expect(displayConfigKey(createDisplayConfig())).toBe("original:rgba");
      expect(displayConfigKey(createDisplayConfig({ maxSize: { width: 64, height: 48 } }))).toBe(
        "64x48:rgba",
      );
      expect(displayConfigKey(createDisplayConfig({ pixelFormat: "grey", autoRotate: true }))).toBe(
        "original:grey:rotate",
      );
    });

    it("should ignore the size when the original is requested", () => {
      const config = createDisplayConfig({ maxSize: { width: 64, height: 48 }, showOriginal: true });

      expect(displayConfigKey(config)).toBe(displayConfigKey(createDisplayConfig()));
    });
  });

  describe("parseIdentifier", () => {
    it("should accept URLs and paths", () => {
      expect(parseIdentifier("https://img.test/a.png")).toEqual({
        ok: true,
        value: "https://img.test/a.png",
      });
      expect(parseIdentifier("/srv/images/a.png").ok).toBe(true);
    });

    it.each([
      ["", "Identifier cannot be empty"],
      ["a\nb", "Identifier contains control characters"],
      [42, "Identifier must be a string"],
      ["x".repeat(8193), "Identifier too long"],
    ])("should reject %j", (input, message) => {
      const parsed = parseIdentifier(input);

      expect(parsed.ok).toBe(false);
      if (!parsed.ok) {
        expect(parsed.error.code).toBe(ErrorCode.INVALID_KEY);
        expect(parsed.error.message).toBe(message);
      }
    });
  });
});
