import { MalformedTimestampError } from '../errors';
import {
  isMalformedTimestamp,
  isMissing,
  monthBounds,
  parseTimestamp,
  toInstant,
} from './timestamps';

describe('timestamps', () => {
  describe('parseTimestamp', () => {
    it('should read a date without time as UTC midnight', () => {
      expect(parseTimestamp('2024-01-05')).toBe(Date.UTC(2024, 0, 5));
    });

    it('should read space and T separated datetimes as UTC', () => {
      expect(parseTimestamp('2024-01-05 10:30:00')).toBe(Date.UTC(2024, 0, 5, 10, 30, 0));
      expect(parseTimestamp('2024-01-05T10:30:00Z')).toBe(Date.UTC(2024, 0, 5, 10, 30, 0));
      expect(parseTimestamp('2024-01-05 10:30')).toBe(Date.UTC(2024, 0, 5, 10, 30));
    });

    it('should apply explicit offsets', () => {
      expect(parseTimestamp('2024-01-05T12:30:00+02:00')).toBe(Date.UTC(2024, 0, 5, 10, 30));
      expect(parseTimestamp('2024-01-05 05:30:00 -0500')).toBe(Date.UTC(2024, 0, 5, 10, 30));
    });

    it('should apply hour-only offsets', () => {
      expect(parseTimestamp('2024-01-05 10:00:00+00')).toBe(Date.UTC(2024, 0, 5, 10));
      expect(parseTimestamp('2024-03-17 10:00:00+01')).toBe(Date.UTC(2024, 2, 17, 9));
      expect(parseTimestamp('2024-01-05 05:00:00.25-05')).toBe(Date.UTC(2024, 0, 5, 10, 0, 0, 250));
      expect(toInstant('2024-01-05 10:00:00+00')).toBe(Date.UTC(2024, 0, 5, 10));
    });

    it('should keep years below 100 as written', () => {
      const instant = parseTimestamp('0050-01-01');

      expect(new Date(instant).getUTCFullYear()).toBe(50);
      expect(new Date(instant).getUTCMonth()).toBe(0);
      expect(new Date(instant).getUTCDate()).toBe(1);
      expect(new Date(parseTimestamp('0099-12-31 23:00:00')).getUTCFullYear()).toBe(99);
    });

    it('should use the proleptic leap year rules for early years', () => {
      expect(new Date(parseTimestamp('0004-02-29')).getUTCDate()).toBe(29);
      expect(() => parseTimestamp('0100-02-29')).toThrow(MalformedTimestampError);
    });

    it('should keep milliseconds and drop finer digits', () => {
      expect(parseTimestamp('2024-01-05 10:30:00.123456')).toBe(
        Date.UTC(2024, 0, 5, 10, 30, 0, 123),
      );
      expect(parseTimestamp('2024-01-05 10:30:00.5')).toBe(Date.UTC(2024, 0, 5, 10, 30, 0, 500));
    });

    it('should accept Date values', () => {
      const date = new Date(Date.UTC(2024, 5, 1, 12));
      expect(parseTimestamp(date)).toBe(date.getTime());
    });

    it('should throw MalformedTimestampError for unparsable values', () => {
      expect(() => parseTimestamp('not a date')).toThrow(MalformedTimestampError);
      expect(() => parseTimestamp('05/01/2024')).toThrow(MalformedTimestampError);
      expect(() => parseTimestamp(new Date('nope'))).toThrow(MalformedTimestampError);
    });

    it('should reject out-of-range calendar fields', () => {
      expect(() => parseTimestamp('2024-02-30')).toThrow(MalformedTimestampError);
      expect(() => parseTimestamp('2024-13-01')).toThrow(MalformedTimestampError);
      expect(() => parseTimestamp('2024-01-05 24:00:00')).toThrow(MalformedTimestampError);
    });

    it('should accept leap days', () => {
      expect(parseTimestamp('2024-02-29')).toBe(Date.UTC(2024, 1, 29));
      expect(() => parseTimestamp('2023-02-29')).toThrow(MalformedTimestampError);
    });

    it('should carry the offending value on the error', () => {
      let caught: unknown;
      try {
        parseTimestamp('yesterday');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(MalformedTimestampError);
      expect(caught).toMatchObject({ value: 'yesterday', code: 'MALFORMED_TIMESTAMP' });
    });
  });

  describe('toInstant', () => {
    it('should return null for missing values', () => {
      expect(toInstant(null)).toBeNull();
      expect(toInstant(undefined)).toBeNull();
      expect(toInstant('')).toBeNull();
      expect(toInstant('   ')).toBeNull();
    });

    it('should return null for malformed values instead of throwing', () => {
      expect(toInstant('garbage')).toBeNull();
    });

    it('should parse valid values', () => {
      expect(toInstant('2024-03-17 08:00:00')).toBe(Date.UTC(2024, 2, 17, 8));
    });
  });

  describe('isMalformedTimestamp', () => {
    it('should flag only present but unparsable values', () => {
      expect(isMalformedTimestamp('garbage')).toBe(true);
      expect(isMalformedTimestamp(null)).toBe(false);
      expect(isMalformedTimestamp('')).toBe(false);
      expect(isMalformedTimestamp('2024-01-01')).toBe(false);
    });
  });

  describe('isMissing', () => {
    it('should treat null, undefined, blank strings and NaN as missing', () => {
      expect(isMissing(null)).toBe(true);
      expect(isMissing(undefined)).toBe(true);
      expect(isMissing(' ')).toBe(true);
      expect(isMissing(Number.NaN)).toBe(true);
    });

    it('should treat zero and non-blank strings as present', () => {
      expect(isMissing(0)).toBe(false);
      expect(isMissing('a')).toBe(false);
    });
  });

  describe('monthBounds', () => {
    it('should truncate to the month start and add one month', () => {
      const { start, end } = monthBounds(Date.UTC(2024, 2, 17, 15, 45));
      expect(start.toISOString()).toBe('2024-03-01T00:00:00.000Z');
      expect(end.toISOString()).toBe('2024-04-01T00:00:00.000Z');
    });

    it('should roll December into the next year', () => {
      const { start, end } = monthBounds(Date.UTC(2025, 11, 31, 23, 59, 59));
      expect(start.toISOString()).toBe('2025-12-01T00:00:00.000Z');
      expect(end.toISOString()).toBe('2026-01-01T00:00:00.000Z');
    });
  });
});
