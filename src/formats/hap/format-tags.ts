/**
 * Format tags of extra fields and the value coercion they imply
 *
 * Supported tags:
 * - `d`: integer
 * - `s`: string
 * - `f`: float with six decimals
 * - `.Nf`: float with N decimals (0-20)
 *
 * Floats are written by rounding the exact binary value of the number to the
 * declared precision, with exact ties going to the even digit. `0.125` with
 * `.2f` becomes `0.12`, `0.375` becomes `0.38`, and `1.005` becomes `1.00`
 * because the double nearest to 1.005 lies just below the tie.
 */

import { TypeCoercionError, ValidationError } from "../../errors";
import type { ExtraValue, FieldDeclaration, FormatTag } from "../../types";

export const MAX_FLOAT_PRECISION = 20;
export const DEFAULT_FLOAT_PRECISION = 6;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const PRECISION_TAG_PATTERN = /^\.(\d{1,2})f$/;
const FORBIDDEN_STRING_CHARS = /[\t\n\r]/;

/**
 * Parse the textual format tag of a declaration
 *
 * @throws {ValidationError} If the tag is not one of the supported forms
 */
export function parseFormatTag(tag: string): FormatTag {
  if (tag === "d") return { kind: "integer", tag };
  if (tag === "s") return { kind: "string", tag };
  if (tag === "f") return { kind: "float", tag, precision: DEFAULT_FLOAT_PRECISION };

  const match = PRECISION_TAG_PATTERN.exec(tag);
  const digits = match?.[1];
  if (digits !== undefined) {
    const precision = Number(digits);
    if (precision <= MAX_FLOAT_PRECISION) {
      return { kind: "float", tag, precision };
    }
  }

  throw new ValidationError(
    `Unsupported format tag '${tag}': expected d, s, f or .Nf with N at most ${MAX_FLOAT_PRECISION}`,
    undefined,
    tag,
    "INVALID_FORMAT_TAG"
  );
}

/**
 * Coerce the text of one extra column by its declaration
 *
 * @throws {TypeCoercionError} If the text cannot be read under the format tag
 */
export function parseValue(
  text: string,
  field: FieldDeclaration,
  lineNumber?: number
): ExtraValue {
  switch (field.format.kind) {
    case "string":
      return text;

    case "integer": {
      const value = Number(text);
      if (!INTEGER_PATTERN.test(text) || !Number.isSafeInteger(value)) {
        throw coercionError(field, text, "an integer", lineNumber);
      }
      return value;
    }

    case "float": {
      const value = Number(text);
      if (!FLOAT_PATTERN.test(text) || !Number.isFinite(value)) {
        throw coercionError(field, text, "a finite number", lineNumber);
      }
      return value;
    }
  }
}

/**
 * Render one extra field value by its declaration
 *
 * @throws {TypeCoercionError} If the value does not fit the format tag
 */
export function formatValue(value: ExtraValue, field: FieldDeclaration, lineNumber?: number): string {
  switch (field.format.kind) {
    case "string":
      if (typeof value !== "string" || FORBIDDEN_STRING_CHARS.test(value)) {
        throw coercionError(field, String(value), "a string without tabs or line breaks", lineNumber);
      }
      return value;

    case "integer":
      if (typeof value !== "number" || !Number.isSafeInteger(value)) {
        throw coercionError(field, String(value), "a safe integer", lineNumber);
      }
      return String(value);

    case "float":
      if (typeof value !== "number" || !Number.isFinite(value) || Math.abs(value) >= 1e21) {
        throw coercionError(field, String(value), "a finite number below 1e21", lineNumber);
      }
      return formatFixed(value, field.format.precision);
  }
}

/**
 * Render a number with `precision` decimals, rounding ties to even
 *
 * `Number.prototype.toFixed` already rounds the exact binary value but
 * breaks ties away from zero; exact ties are detected from a 100-digit
 * expansion and resolved to the even digit instead.
 */
export function formatFixed(value: number, precision: number): string {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    throw new ValidationError(`Cannot render ${value} in fixed-point notation`);
  }

  const negative = value < 0 || Object.is(value, -0);
  const magnitude = Math.abs(value);
  const expanded = magnitude.toFixed(100);
  const point = expanded.indexOf(".");
  const kept = precision === 0 ? expanded.slice(0, point) : expanded.slice(0, point + 1 + precision);
  const tail = expanded.slice(point + 1 + precision);

  let digits = magnitude.toFixed(precision);
  if (/^50*$/.test(tail) && Number(kept.charAt(kept.length - 1)) % 2 === 0) {
    digits = kept;
  }

  return negative ? `-${digits}` : digits;
}

function coercionError(
  field: FieldDeclaration,
  text: string,
  expected: string,
  lineNumber?: number
): TypeCoercionError {
  return new TypeCoercionError(
    `Field '${field.name}' (${field.lineType} line, format '${field.format.tag}') expects ${expected}, got '${text}'`,
    field.name,
    field.format.tag,
    text,
    lineNumber
  );
}
