/**
 * Published-at parsing. Every shape a source hands over ends up as a UTC Date, or null.
 */

import { CalendarParts, PublishedAtValue } from '../types';

const EPOCH_PATTERN = /^\d+(\.\d+)?$/;

// ISO-like date-time without an offset. JS would read these as local time.
const NAIVE_DATETIME_PATTERN = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

// A zone name, or a Z or numeric offset right after the time of day
const ZONE_PATTERN = /\b(?:GMT|UTC|UT|[ECMP][SD]T)\b|\d:\d{2}(?::\d{2}(?:\.\d+)?)?\s*(?:Z|[+-]\d{2}:?\d{2})\b/i;

// 0001-01-01T00:00:00Z .. 9999-12-31T23:59:59.999Z
const MIN_EPOCH_MS = -62135596800000;
const MAX_EPOCH_MS = 253402300799999;

function fromEpochSeconds(seconds: number): Date | null {
  if (!Number.isFinite(seconds)) {
    return null;
  }
  const millis = seconds * 1000;
  if (millis < MIN_EPOCH_MS || millis > MAX_EPOCH_MS) {
    return null;
  }
  return new Date(millis);
}

function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

function isCalendarParts(value: unknown): value is CalendarParts {
  if (typeof value !== 'object' || value === null || value instanceof Date) {
    return false;
  }
  return 'year' in value && 'month' in value && 'day' in value;
}

function fromCalendarParts(parts: CalendarParts): Date | null {
  const { year, month, day, hour = 0, minute = 0, second = 0 } = parts;
  const fields = [year, month, day, hour, minute, second];
  if (!fields.every(field => typeof field === 'number' && Number.isFinite(field))) {
    return null;
  }
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Date.UTC rolls 31 February over into March; reject that
  if (date.getUTCMonth() !== month - 1) {
    return null;
  }
  return date;
}

function fromString(raw: string): Date | null {
  const text = raw.trim();
  if (!text) {
    return null;
  }

  if (EPOCH_PATTERN.test(text)) {
    return fromEpochSeconds(parseFloat(text));
  }

  const naive = NAIVE_DATETIME_PATTERN.exec(text);
  if (naive) {
    return fromMillis(Date.parse(`${naive[1]}T${naive[2]}Z`));
  }

  // Free-form text without a zone would otherwise be read in the host's zone
  if (!ZONE_PATTERN.test(text)) {
    const asUtc = Date.parse(`${text} GMT`);
    if (!Number.isNaN(asUtc)) {
      return fromMillis(asUtc);
    }
  }
  return fromMillis(Date.parse(text));
}

function fromMillis(millis: number): Date | null {
  return Number.isNaN(millis) ? null : new Date(millis);
}

/**
 * Accepts a numeric epoch (seconds, as number or digit string), a free-form date
 * string, a Date, or calendar parts. Strings without an offset are taken as UTC.
 */
export function parsePublishedAt(value: PublishedAtValue | null | undefined): Date | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    return isValidDate(value) ? new Date(value.getTime()) : null;
  }
  if (typeof value === 'number') {
    return fromEpochSeconds(value);
  }
  if (typeof value === 'string') {
    return fromString(value);
  }
  if (isCalendarParts(value)) {
    return fromCalendarParts(value);
  }
  return null;
}
