/**
 * Timestamp parsing and zone-aware formatting.
 *
 * Records keep `created` as an instant; the zone only affects how the instant
 * is printed (front matter dates, output folder names, CSV columns).
 */

import { InvalidDateFilterError, InvalidTimezoneError } from '../errors.js';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

// Wed Oct 10 20:19:24 +0000 2018
const ARCHIVE_TIMESTAMP_PATTERN =
  /^[A-Z][a-z]{2} ([A-Z][a-z]{2}) (\d{1,2}) (\d{2}):(\d{2}):(\d{2}) ([+-])(\d{2})(\d{2}) (\d{4})$/;

// 2018-10-10, 2018-10-10 20:19, 2018-10-10T20:19:24.500Z, 2018-10-10T20:19:24+02:00
const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

function offsetToMinutes(sign: string, hours: string, minutes: string): number {
  const total = Number(hours) * 60 + Number(minutes);
  return sign === '-' ? -total : total;
}

function buildInstant(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  millisecond: number,
  offsetMinutes: number
): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const local = Date.UTC(year, month - 1, day, hour, minute, second, millisecond);
  // Reject rollovers such as Feb 31
  if (new Date(local).getUTCDate() !== day) return null;
  return new Date(local - offsetMinutes * 60_000);
}

function parseIso(value: string): Date | null {
  const match = ISO_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, year, month, day, hour, minute, second, fraction, zone] = match;
  let offset = 0;
  if (zone && zone.toUpperCase() !== 'Z') {
    const digits = zone.replace(':', '');
    offset = offsetToMinutes(digits[0], digits.slice(1, 3), digits.slice(3, 5));
  }
  const millisecond = fraction ? Number(fraction.padEnd(3, '0').slice(0, 3)) : 0;

  return buildInstant(
    Number(year),
    Number(month),
    Number(day),
    Number(hour ?? 0),
    Number(minute ?? 0),
    Number(second ?? 0),
    millisecond,
    offset
  );
}

/**
 * Parse a post's `created_at`. Accepts the archive format and ISO-8601.
 */
export function parseTimestamp(value: string): Date | null {
  const match = ARCHIVE_TIMESTAMP_PATTERN.exec(value.trim());
  if (match) {
    const [, monthName, day, hour, minute, second, sign, offsetHours, offsetMinutes, year] = match;
    const month = MONTHS.indexOf(monthName) + 1;
    if (month === 0) return null;
    return buildInstant(
      Number(year),
      month,
      Number(day),
      Number(hour),
      Number(minute),
      Number(second),
      0,
      offsetToMinutes(sign, offsetHours, offsetMinutes)
    );
  }
  return parseIso(value);
}

/**
 * Parse an `after`/`before` filter. Values without an offset are read as UTC.
 */
export function parseDateBound(value: string): Date {
  const parsed = parseIso(value);
  if (!parsed) {
    throw new InvalidDateFilterError(value);
  }
  return parsed;
}

export function assertTimeZone(timeZone: string): string {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
  } catch (error) {
    if (error instanceof RangeError) {
      throw new InvalidTimezoneError(timeZone);
    }
    throw error;
  }
  return timeZone;
}

interface ZonedParts {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
  second: string;
  offsetMinutes: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

function zonedParts(date: Date, timeZone: string): ZonedParts {
  const values: Record<string, string> = {};
  for (const part of getFormatter(timeZone).formatToParts(date)) {
    values[part.type] = part.value;
  }

  const year = values.year.padStart(4, '0');
  const month = values.month;
  const day = values.day;
  const hour = values.hour;
  const minute = values.minute;
  const second = values.second;

  const wholeSeconds = date.getTime() - date.getUTCMilliseconds();
  const wallClock = Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hour), Number(minute), Number(second));

  return {
    year,
    month,
    day,
    hour,
    minute,
    second,
    offsetMinutes: Math.round((wallClock - wholeSeconds) / 60_000),
  };
}

function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const absolute = Math.abs(offsetMinutes);
  const hours = String(Math.floor(absolute / 60)).padStart(2, '0');
  const minutes = String(absolute % 60).padStart(2, '0');
  return `${sign}${hours}:${minutes}`;
}

/**
 * ISO-8601 with the zone's offset, e.g. `2018-10-10T22:19:24+02:00`.
 */
export function formatIsoInZone(date: Date, timeZone: string): string {
  const p = zonedParts(date, timeZone);
  const millis = date.getUTCMilliseconds();
  const fraction = millis > 0 ? `.${String(millis).padStart(3, '0')}` : '';
  return `${p.year}-${p.month}-${p.day}T${p.hour}:${p.minute}:${p.second}${fraction}${formatOffset(p.offsetMinutes)}`;
}

/** `YYYYMMDD` */
export function formatDateStamp(date: Date, timeZone: string): string {
  const p = zonedParts(date, timeZone);
  return `${p.year}${p.month}${p.day}`;
}

/** `YYYY-Mon-DD` */
export function formatShortDate(date: Date, timeZone: string): string {
  const p = zonedParts(date, timeZone);
  return `${p.year}-${MONTHS[Number(p.month) - 1]}-${p.day}`;
}

/** `HH:MM` */
export function formatClock(date: Date, timeZone: string): string {
  const p = zonedParts(date, timeZone);
  return `${p.hour}:${p.minute}`;
}
