import { FormatError } from "../errors.js";

// A field made only of 9s (optionally signed) is the dataset's "no observation" marker,
// whatever the field width or scaling.
const MISSING = /^[+-]?9+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER = /^[+-]?\d+$/;

export type FieldValue = string | number | null;

/**
 * Decode one fixed-width field.
 *
 * @param raw The field's characters, as sliced from the record
 * @param scalingFactor Divisor applied to numeric fields (e.g. 10 for tenths of a degree)
 * @returns null for a missing value, the scaled number when `scalingFactor` is not 1,
 *   otherwise the trimmed text
 */
export function decodeField(raw: string, scalingFactor = 1): FieldValue {
  const value = raw.trim();
  if (MISSING.test(value)) return null;

  if (scalingFactor !== 1) {
    if (!DECIMAL.test(value)) {
      throw new FormatError(`Expected a number but found "${raw}"`);
    }
    return Number(value) / scalingFactor;
  }

  return value;
}

export function decodeScaled(raw: string, scalingFactor: number, field: string): number | null {
  let value: FieldValue;
  try {
    value = decodeField(raw, scalingFactor);
  } catch (err) {
    if (err instanceof FormatError) throw new FormatError(`${field}: ${err.message}`);
    throw err;
  }
  // a scaling factor of 1 leaves the text undecoded
  return typeof value === "string" ? decodeInteger(raw, field) : value;
}

export function decodeInteger(raw: string, field: string): number | null {
  const value = decodeField(raw);
  if (value === null) return null;
  const text = String(value);
  if (!INTEGER.test(text)) {
    throw new FormatError(`${field}: expected an integer but found "${raw}"`);
  }
  return parseInt(text, 10);
}

/** Short code field, at most `maxLength` characters once trimmed. */
export function decodeCode(raw: string, maxLength: number, field: string): string | null {
  const value = decodeField(raw);
  if (value === null) return null;
  const text = String(value);
  if (text.length > maxLength) {
    throw new FormatError(`${field}: "${text}" is longer than ${maxLength} characters`);
  }
  return text;
}
