import * as v from "valibot";
import { ErrorCode, ValidationError } from "../types/errors.js";
import type { DisplayConfig } from "../types/image.types.js";
import { type Outcome, failure, success } from "../types/outcome.types.js";

// =============================================================================
// BASE VALIDATION SCHEMAS
// =============================================================================

const dimensionSchema = v.pipe(
  v.number("Dimension must be a number"),
  v.integer("Dimension must be an integer"),
  v.minValue(1, "Dimension must be at least 1"),
  v.maxValue(65535, "Dimension too large"),
);

export const imageBoundsSchema = v.object({
  width: dimensionSchema,
  height: dimensionSchema,
});

export const pixelFormatSchema = v.picklist(
  ["rgba", "rgb", "grey"],
  "Pixel format must be one of rgba, rgb, grey",
);

// Identifiers end up in log lines and journal-derived file names
export const identifierSchema = v.pipe(
  v.string("Identifier must be a string"),
  v.minLength(1, "Identifier cannot be empty"),
  v.maxLength(8192, "Identifier too long"),
  v.regex(/^[^\u0000-\u001F\u007F]*$/, "Identifier contains control characters"),
);

// =============================================================================
// DISPLAY CONFIGURATION
// =============================================================================

export const displayConfigSchema = v.object({
  maxSize: v.optional(imageBoundsSchema),
  pixelFormat: v.optional(pixelFormatSchema, "rgba"),
  showOriginal: v.optional(v.boolean(), false),
  autoRotate: v.optional(v.boolean(), false),
});

export type DisplayConfigInput = v.InferInput<typeof displayConfigSchema>;

function toValidationError(
  issues: readonly v.BaseIssue<unknown>[],
  field: string,
  input: unknown,
): ValidationError {
  const messages = issues.map(issue => {
    const path = v.getDotPath(issue);
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  return new ValidationError(`Validation failed: ${messages.join("; ")}`, field, input);
}

/**
 * Validated display configuration with defaults applied
 */
export function createDisplayConfig(input: DisplayConfigInput = {}): DisplayConfig {
  return validateDisplayConfig(input);
}

export function validateDisplayConfig(input: unknown): DisplayConfig {
  const result = v.safeParse(displayConfigSchema, input);
  if (!result.success) {
    throw toValidationError(result.issues, "displayConfig", input);
  }
  return result.output;
}

/**
 * Variant string of a display configuration, used as the variant part of
 * memory cache keys. Two configurations that decode to the same pixels
 * share a key.
 */
export function displayConfigKey(config: DisplayConfig): string {
  const size =
    config.showOriginal || !config.maxSize
      ? "original"
      : `${config.maxSize.width}x${config.maxSize.height}`;
  return `${size}:${config.pixelFormat}${config.autoRotate ? ":rotate" : ""}`;
}

export function parseIdentifier(input: unknown): Outcome<string, ValidationError> {
  const result = v.safeParse(identifierSchema, input);
  if (!result.success) {
    const message = result.issues.map(issue => issue.message).join("; ");
    return failure(
      new ValidationError(message, "identifier", input, {}, ErrorCode.INVALID_KEY),
    );
  }
  return success(result.output);
}
