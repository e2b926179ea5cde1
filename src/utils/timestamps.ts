import { MalformedTimestampError } from '../errors';
import { Timestamp } from '../interfaces';

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

/**
 * Missing means null, undefined, a blank string or NaN
 */
export function isMissing(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (typeof value === 'number') return Number.isNaN(value);
  return false;
}

export function isPresent<T>(value: T | null | undefined): value is T {
  return !isMissing(value);
}

/**
 * Parse a timestamp into epoch milliseconds.
 * Values without an offset are UTC. Sub-millisecond digits are truncated.
 *
 * @throws MalformedTimestampError when the value is present but unparsable
 */
export function parseTimestamp(value: Timestamp): number {
  if (value instanceof Date) {
    const ms = value.getTime();
    if (Number.isNaN(ms)) {
      throw new MalformedTimestampError(String(value));
    }
    return ms;
  }

  const text = value.trim();
  const match = TIMESTAMP_PATTERN.exec(text);
  if (!match) {
    throw new MalformedTimestampError(value);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const hour = match[4] ? Number(match[4]) : 0;
  const minute = match[5] ? Number(match[5]) : 0;
  const second = match[6] ? Number(match[6]) : 0;
  const millis = match[7] ? Number(match[7].slice(0, 3).padEnd(3, '0')) : 0;

  if (
    month < 1 || month > 12 ||
    day < 1 || day > daysInMonth(year, month) ||
    hour > 23 || minute > 59 || second > 59
  ) {
    throw new MalformedTimestampError(value);
  }

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));
  // Date.UTC reads years 0-99 as 1900-1999
  date.setUTCFullYear(year, month - 1, day);
  return date.getTime() - offsetMinutes(match[8]) * 60_000;
}

/**
 * Parse a possibly missing timestamp. Missing and malformed values both give null.
 */
export function toInstant(value: Timestamp | null | undefined): number | null {
  if (!isPresent(value)) return null;
  try {
    return parseTimestamp(value);
  } catch (error) {
    if (error instanceof MalformedTimestampError) return null;
    throw error;
  }
}

/**
 * True when the value is present but cannot be parsed
 */
export function isMalformedTimestamp(value: Timestamp | null | undefined): boolean {
  return isPresent(value) && toInstant(value) === null;
}

/**
 * First instant of the UTC calendar month holding `instant`, and of the next one
 */
export function monthBounds(instant: number): { start: Date; end: Date } {
  const date = new Date(instant);
  const year = date.getUTCFullYear();
  const month = date.getUTCMonth();
  return {
    start: new Date(Date.UTC(year, month, 1)),
    end: new Date(Date.UTC(year, month + 1, 1)),
  };
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function daysInMonth(year: number, month: number): number {
  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  return month === 2 && leap ? 29 : DAYS_IN_MONTH[month - 1];
}

function offsetMinutes(zone: string | undefined): number {
  if (!zone || zone.toUpperCase() === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  // Postgres writes whole-hour offsets as +HH
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 60 + minutes);
}
