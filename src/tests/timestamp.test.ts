import { decodeTimestamp, parseRfc3339 } from '../decoding/timestamp';
import { DecodeResult } from '../decoding/numeric';

function millis(result: DecodeResult<Date | null>): number | null {
  if (!result.ok) {
    throw new Error(`unexpected failure: ${result.failure.raw}`);
  }
  return result.value ? result.value.getTime() : null;
}

describe('Timestamp decoding', () => {
  it('should read integers as epoch milliseconds', () => {
    const result = decodeTimestamp(1620250931000);
    expect(millis(result)).toBe(1620250931000);
    expect(Math.floor((millis(result) ?? 0) / 1000)).toBe(1620250931);
  });

  it('should keep millisecond precision', () => {
    expect(millis(decodeTimestamp(1620250931123))).toBe(1620250931123);
    expect(millis(decodeTimestamp(-1500))).toBe(-1500);
  });

  it('should read RFC 3339 and numeric strings as the same instant', () => {
    const structured = millis(decodeTimestamp('2021-05-05T21:42:11Z'));
    const numeric = millis(decodeTimestamp('1620250931000'));
    expect(structured).toBe(1620250931000);
    expect(numeric).toBe(structured);
  });

  it('should apply offsets and fractional seconds', () => {
    expect(millis(decodeTimestamp('2021-05-05T23:42:11+02:00'))).toBe(1620250931000);
    expect(millis(decodeTimestamp('2021-05-05T16:42:11-05:00'))).toBe(1620250931000);
    expect(millis(decodeTimestamp('2021-05-05T21:42:11.250Z'))).toBe(1620250931250);
    expect(millis(decodeTimestamp('2021-05-05T21:42:11.123456789Z'))).toBe(1620250931123);
  });

  it('should accept lowercase and space separators', () => {
    expect(millis(decodeTimestamp('2021-05-05t21:42:11z'))).toBe(1620250931000);
    expect(millis(decodeTimestamp('2021-05-05 21:42:11Z'))).toBe(1620250931000);
  });

  it('should map absent, null and blank to no value', () => {
    expect(decodeTimestamp(undefined)).toEqual({ ok: true, value: null });
    expect(decodeTimestamp(null)).toEqual({ ok: true, value: null });
    expect(decodeTimestamp('')).toEqual({ ok: true, value: null });
  });

  it('should fail with the original text when no format matches', () => {
    expect(decodeTimestamp('yesterday')).toEqual({
      ok: false,
      failure: { reason: 'MalformedTimestamp', raw: 'yesterday' }
    });
    expect(decodeTimestamp('2021-05-05')).toEqual({
      ok: false,
      failure: { reason: 'MalformedTimestamp', raw: '2021-05-05' }
    });
  });

  it('should reject fractional epoch numbers', () => {
    expect(decodeTimestamp(1.5)).toEqual({
      ok: false,
      failure: { reason: 'MalformedTimestamp', raw: '1.5' }
    });
  });

  describe('parseRfc3339', () => {
    it('should validate calendar dates', () => {
      expect(parseRfc3339('2024-02-29T00:00:00Z')?.getTime()).toBe(Date.UTC(2024, 1, 29));
      expect(parseRfc3339('2023-02-29T00:00:00Z')).toBeNull();
      expect(parseRfc3339('2021-02-30T00:00:00Z')).toBeNull();
      expect(parseRfc3339('2021-13-01T00:00:00Z')).toBeNull();
    });

    it('should handle years below 100 without a 1900 offset', () => {
      expect(parseRfc3339('0000-02-29T00:00:00Z')?.toISOString()).toBe('0000-02-29T00:00:00.000Z');
      expect(parseRfc3339('0099-12-31T23:59:59Z')?.toISOString()).toBe('0099-12-31T23:59:59.000Z');
    });

    it('should validate time and offset fields', () => {
      expect(parseRfc3339('2021-05-05T24:00:00Z')).toBeNull();
      expect(parseRfc3339('2021-05-05T12:60:00Z')).toBeNull();
      expect(parseRfc3339('2021-05-05T12:00:00+24:00')).toBeNull();
      expect(parseRfc3339('2021-05-05T12:00:00')).toBeNull();
    });
  });
});
