import { DecodeResult, decoded, malformed } from './numeric';

const RFC3339 =
  /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(?:([Zz])|([+-])(\d{2}):(\d{2}))$/;
const INTEGER_LITERAL = /^[+-]?\d+$/;

// ECMAScript Date range: +-100,000,000 days around the epoch.
const MAX_EPOCH_MS = 8.64e15;

function isLeapYear(year: number): boolean {
  return year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Strict RFC 3339 date-time parse. Fractional seconds beyond millisecond
 * precision are truncated, which is all a `Date` can hold.
 */
export function parseRfc3339(raw: string): Date | null {
  const match = RFC3339.exec(raw);
  if (!match) return null;

  const [, y, mo, d, h, mi, s, fraction, zulu, sign, offH, offM] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  // 60 is a leap second
  if (hour > 23 || minute > 59 || second > 60) return null;

  let offsetMinutes = 0;
  if (!zulu) {
    const offsetHours = Number(offH);
    const offsetMins = Number(offM);
    if (offsetHours > 23 || offsetMins > 59) return null;
    offsetMinutes = (offsetHours * 60 + offsetMins) * (sign === '-' ? -1 : 1);
  }

  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0;

  // Date.UTC would map years 0-99 onto 1900-1999
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);

  return epochMillisToDate(date.getTime() - offsetMinutes * 60_000);
}

export function epochMillisToDate(millis: number): Date | null {
  if (!Number.isInteger(millis) || Math.abs(millis) > MAX_EPOCH_MS) return null;
  return new Date(millis);
}

/**
 * Optional creation timestamp. Accepts epoch milliseconds as a JSON integer,
 * or a string holding either an RFC 3339 date-time or epoch milliseconds.
 * The structured form is tried first.
 */
export function decodeTimestamp(value: number | string | null | undefined): DecodeResult<Date | null> {
  if (value === undefined || value === null || value === '') {
    return decoded(null);
  }

  if (typeof value === 'number') {
    const date = epochMillisToDate(value);
    return date ? decoded(date) : malformed('MalformedTimestamp', String(value));
  }

  const attempts: Array<(raw: string) => Date | null> = [
    parseRfc3339,
    (raw) => (INTEGER_LITERAL.test(raw) ? epochMillisToDate(Number(raw)) : null)
  ];

  for (const attempt of attempts) {
    const date = attempt(value);
    if (date) return decoded(date);
  }

  return malformed('MalformedTimestamp', value);
}
