/**
 * Wire values the API uses for numbers. Both shapes are resolved to a plain
 * `number` at the decode boundary and never passed further.
 */
export type NumberOrString = number | string;

export interface MalformedValue {
  reason: 'MalformedNumber' | 'MalformedTimestamp';
  raw: string;
}

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: MalformedValue };

const DECIMAL_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INFINITY_LITERAL = /^([+-]?)inf(?:inity)?$/i;
const NAN_LITERAL = /^[+-]?nan$/i;

export function decoded<T>(value: T): DecodeResult<T> {
  return { ok: true, value };
}

export function malformed<T>(reason: MalformedValue['reason'], raw: string): DecodeResult<T> {
  return { ok: false, failure: { reason, raw } };
}

/**
 * Parses a floating-point literal in plain decimal notation. Returns null
 * for anything else: surrounding whitespace, hex, digit separators, and the
 * empty string are all rejected, unlike `Number()`.
 */
export function parseDecimal(raw: string): number | null {
  if (DECIMAL_LITERAL.test(raw)) {
    return Number(raw);
  }

  const infinity = INFINITY_LITERAL.exec(raw);
  if (infinity) {
    return infinity[1] === '-' ? -Infinity : Infinity;
  }

  return NAN_LITERAL.test(raw) ? NaN : null;
}

/** Mandatory numeric field: a JSON number or a numeric string. */
export function decodeNumber(value: NumberOrString): DecodeResult<number> {
  if (typeof value === 'number') {
    return decoded(value);
  }

  const parsed = parseDecimal(value);
  return parsed === null ? malformed('MalformedNumber', value) : decoded(parsed);
}

/**
 * Optional numeric field. Absent, null and the empty string all mean
 * "no value".
 */
export function decodeOptionalNumber(value: NumberOrString | null | undefined): DecodeResult<number | null> {
  if (value === undefined || value === null || value === '') {
    return decoded(null);
  }

  return decodeNumber(value);
}
