import { Decimal } from 'decimal.js';

const FLOAT_PATTERN = /^[+-]?(NaN|Infinity|(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?)$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const INT32_MIN = -(2n ** 31n);
const INT32_MAX = 2n ** 31n - 1n;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Parse a double from text, or null when the text is not a number
 * Surrounding whitespace is ignored
 */
export function parseDouble(text: string): number | null {
  const trimmed = text.trim();
  if (!FLOAT_PATTERN.test(trimmed)) {
    return null;
  }
  return Number(trimmed);
}

/**
 * Parse an arbitrary-precision decimal from text, or null when the text is not a finite number
 */
export function parseDecimal(text: string): Decimal | null {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }
  return new Decimal(trimmed);
}

/**
 * Parse an integer within [min, max]
 * Fractional text is truncated toward zero; out of range text yields null
 */
function parseBoundedInteger(text: string, min: bigint, max: bigint): bigint | null {
  const trimmed = text.trim();
  let integral: bigint;
  if (INTEGER_PATTERN.test(trimmed)) {
    integral = BigInt(trimmed);
  } else {
    const decimal = parseDecimal(trimmed);
    if (decimal === null) {
      return null;
    }
    // Range check before toFixed: a large exponent would expand to that many digits
    const truncated = decimal.trunc();
    if (truncated.lt(min.toString()) || truncated.gt(max.toString())) {
      return null;
    }
    integral = BigInt(truncated.toFixed());
  }
  if (integral < min || integral > max) {
    return null;
  }
  return integral;
}

export function parseInt32(text: string): number | null {
  const parsed = parseBoundedInteger(text, INT32_MIN, INT32_MAX);
  return parsed === null ? null : Number(parsed);
}

export function parseInt64(text: string): bigint | null {
  return parseBoundedInteger(text, INT64_MIN, INT64_MAX);
}
