import { describe, expect, it } from "vitest";
import {
  ConfigurationError,
  DecodeError,
  DiskCacheError,
  ErrorCode,
  FetchError,
  ImageCacheError,
  MetadataError,
  ValidationError,
  getErrorCode,
  getSystemErrorCode,
  getUserMessage,
  isRetryableError,
  toImageCacheError,
} from "../src/types/errors.js";

function systemError(code: string, message = `${code}: failure`): Error {
  return Object.assign(new Error(message), { code });
}

describe("Custom Error Types", () => {
  describe("DiskCacheError", () => {
    it("should default to a retryable I/O error", () => {
      const error = new DiskCacheError("write failed");

      expect(error.name).toBe("DiskCacheError");
      expect(error.code).toBe(ErrorCode.DISK_CACHE_IO);
      expect(error.isRetryable).toBe(true);
      expect(error.getUserMessage()).toBe("A disk cache operation failed.");
    });

    it("should not be retryable once the store is closed or not writable", () => {
      expect(new DiskCacheError("closed", ErrorCode.DISK_CACHE_CLOSED).isRetryable).toBe(false);
      expect(
        new DiskCacheError("denied", ErrorCode.DISK_CACHE_PERMISSION_DENIED).isRetryable,
      ).toBe(false);
    });

    it("should provide specific user messages per code", () => {
      expect(new DiskCacheError("full", ErrorCode.DISK_CACHE_FULL).getUserMessage()).toBe(
        "The disk cache device is out of space.",
      );
      expect(
        new DiskCacheError("bad", ErrorCode.DISK_CACHE_CORRUPT_JOURNAL).getUserMessage(),
      ).toBe("The disk cache journal was corrupt and has been rebuilt.");
    });

    it("should keep the cause and stamp the context", () => {
      const cause = new Error("EIO");
      const error = new DiskCacheError("read failed", ErrorCode.DISK_CACHE_IO, { operation: "read" }, { cause });

      expect(error.cause).toBe(cause);
      expect(error.context.operation).toBe("read");
      expect(error.context.timestamp).toBeInstanceOf(Date);
    });
  });

  describe("DecodeError and MetadataError", () => {
    it("should distinguish unsupported formats", () => {
      expect(new DecodeError("nope", ErrorCode.UNSUPPORTED_FORMAT).getUserMessage()).toBe(
        "The image format is not supported.",
      );
      expect(new DecodeError("broken").getUserMessage()).toBe("The image could not be decoded.");
    });

    it("should never be retryable", () => {
      expect(new DecodeError("broken").isRetryable).toBe(false);
      expect(new MetadataError("no exif").isRetryable).toBe(false);
      expect(new MetadataError("no exif").code).toBe(ErrorCode.METADATA_UNREADABLE);
    });
  });

  describe("FetchError", () => {
    it("should report the HTTP status", () => {
      const error = new FetchError("bad status", ErrorCode.FETCH_HTTP_STATUS, 404);

      expect(error.status).toBe(404);
      expect(error.isRetryable).toBe(true);
      expect(error.getUserMessage()).toBe("The server responded with status 404.");
    });

    it("should not retry cancelled downloads", () => {
      expect(new FetchError("aborted", ErrorCode.FETCH_CANCELLED).isRetryable).toBe(false);
    });
  });

  describe("ValidationError and ConfigurationError", () => {
    it("should mention the failing field", () => {
      const error = new ValidationError("must be positive", "maxSize", -1);

      expect(error.field).toBe("maxSize");
      expect(error.value).toBe(-1);
      expect(error.getUserMessage()).toBe("Invalid value for field 'maxSize': must be positive");
    });

    it("should accept a specific code", () => {
      const error = new ValidationError("bad key", "identifier", "", {}, ErrorCode.INVALID_KEY);
      expect(error.code).toBe(ErrorCode.INVALID_KEY);
    });

    it("should mention the failing configuration key", () => {
      const error = new ConfigurationError("too small", "IMAGE_CACHE_DISK_SIZE");
      expect(error.getUserMessage()).toBe(
        "Configuration error for 'IMAGE_CACHE_DISK_SIZE': too small",
      );
    });
  });

  describe("toJSON", () => {
    it("should serialize the structured fields", () => {
      const json = new DecodeError("broken", ErrorCode.DECODE_FAILED, { identifier: "a.png" }).toJSON();

      expect(json.name).toBe("DecodeError");
      expect(json.code).toBe(ErrorCode.DECODE_FAILED);
      expect(json.context.identifier).toBe("a.png");
      expect(json.isRetryable).toBe(false);
    });
  });
});

describe("Error helpers", () => {
  it("should read system error codes", () => {
    expect(getSystemErrorCode(systemError("ENOENT"))).toBe("ENOENT");
    expect(getSystemErrorCode(new Error("plain"))).toBeUndefined();
    expect(getSystemErrorCode("string")).toBeUndefined();
  });

  it("should decide retryability", () => {
    expect(isRetryableError(new DiskCacheError("io"))).toBe(true);
    expect(isRetryableError(systemError("EBUSY"))).toBe(true);
    expect(isRetryableError(new Error("plain"))).toBe(false);
  });

  it("should extract codes and user messages from any error", () => {
    expect(getErrorCode(new DecodeError("x"))).toBe(ErrorCode.DECODE_FAILED);
    expect(getErrorCode(new Error("x"))).toBe(ErrorCode.INTERNAL_ERROR);
    expect(getUserMessage(new Error("x"))).toBe("An unexpected error occurred. Please try again.");
  });

  describe("toImageCacheError", () => {
    it("should pass cache errors through", () => {
      const error = new DecodeError("x");
      expect(toImageCacheError(error)).toBe(error);
    });

    it.each([
      ["ENOSPC", ErrorCode.DISK_CACHE_FULL],
      ["EDQUOT", ErrorCode.DISK_CACHE_FULL],
      ["EACCES", ErrorCode.DISK_CACHE_PERMISSION_DENIED],
      ["EROFS", ErrorCode.DISK_CACHE_PERMISSION_DENIED],
      ["ENOENT", ErrorCode.DISK_CACHE_IO],
      ["ENOTDIR", ErrorCode.DISK_CACHE_IO],
    ])("should map %s to %s", (code, expected) => {
      const converted = toImageCacheError(systemError(code));

      expect(converted).toBeInstanceOf(DiskCacheError);
      expect(converted.code).toBe(expected);
    });

    it("should map aborts to cancelled fetches", () => {
      const abort = new Error("The operation was aborted");
      abort.name = "AbortError";

      const converted = toImageCacheError(abort, { identifier: "a.png" });

      expect(converted).toBeInstanceOf(FetchError);
      expect(converted.code).toBe(ErrorCode.FETCH_CANCELLED);
      expect(converted.context.identifier).toBe("a.png");
    });

    it("should wrap anything else as an internal error", () => {
      const converted = toImageCacheError("boom");

      expect(converted).toBeInstanceOf(ImageCacheError);
      expect(converted.code).toBe(ErrorCode.INTERNAL_ERROR);
      expect(converted.message).toBe("boom");
    });
  });
});
