/**
 * Timestamp parsing and canonical rendering.
 *
 * All rendering is in UTC so output never depends on the host time zone.
 */

import type { Value } from '../types/index.js';

const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[Tt ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?([Zz]|[+-]\d{2}:?\d{2})?$/;

const ZONE = '(GMT|UTC?|Z|[+-]\\d{2}:?\\d{2})';
const CLOCK = '(\\d{1,2}):(\\d{2})(?::(\\d{2}))?';

/** `Tue, 15 Nov 2022 08:12:31 GMT`, `15 November 2022` */
const DAY_MONTH_YEAR = new RegExp(
  `^(?:[A-Za-z]{3,9},?\\s+)?(\\d{1,2})\\s+([A-Za-z]{3,9})\\.?\\s+(\\d{4})(?:,?\\s+${CLOCK})?\\s*${ZONE}?$`,
  'i'
);
/** `November 15, 2022`, `Nov 15 2022 08:12` */
const MONTH_DAY_YEAR = new RegExp(
  `^(?:[A-Za-z]{3,9},?\\s+)?([A-Za-z]{3,9})\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+(\\d{4})(?:,?\\s+${CLOCK})?\\s*${ZONE}?$`,
  'i'
);
/** `2022/11/15 08:12:31` */
const SLASHED_YMD = new RegExp(`^(\\d{4})/(\\d{1,2})/(\\d{1,2})(?:[ T]${CLOCK})?$`);
/** `11/15/2022` (month first) */
const SLASHED_MDY = new RegExp(`^(\\d{1,2})/(\\d{1,2})/(\\d{4})(?:[ T]${CLOCK})?$`);

const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

interface CalendarParts {
  year: number;
  month: number;
  day: number;
  hour?: string;
  minute?: string;
  second?: string;
  millis?: number;
  zone?: string;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function offsetMinutes(zone: string | undefined): number {
  if (!zone || !/^[+-]/.test(zone)) return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes);
}

/** 1-based month for a full or abbreviated (at least three letters) English name */
function monthNumber(name: string): number {
  const lower = name.toLowerCase();
  const index = MONTH_NAMES.findIndex((month) => month.startsWith(lower));
  return lower.length >= 3 && index >= 0 ? index + 1 : 0;
}

/**
 * Calendar-checked instant. Parts without a zone are read as UTC.
 */
function toInstant(parts: CalendarParts): Date | null {
  const { year, month, day } = parts;
  const hour = Number(parts.hour ?? '0');
  const minute = Number(parts.minute ?? '0');
  const second = Number(parts.second ?? '0');

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const local = new Date(Date.UTC(year, month - 1, day, hour, minute, second, parts.millis ?? 0));
  local.setUTCFullYear(year);
  if (local.getUTCMonth() !== month - 1 || local.getUTCDate() !== day) {
    return null;
  }

  return new Date(local.getTime() - offsetMinutes(parts.zone) * 60_000);
}

/**
 * Parse an ISO-8601 date or date-time string.
 * Strings without an offset are read as UTC. Returns null when the string is
 * not a well-formed calendar date.
 */
export function parseIsoTimestamp(input: string): Date | null {
  const match = ISO_TIMESTAMP.exec(input.trim());
  if (!match) return null;

  const [, y, mo, d, hour, minute, second, frac, zone] = match;
  return toInstant({
    year: Number(y),
    month: Number(mo),
    day: Number(d),
    hour,
    minute,
    second,
    millis: frac ? Number(frac.padEnd(3, '0').slice(0, 3)) : 0,
    zone,
  });
}

/**
 * Parse the non-ISO forms APIs commonly send: RFC 2822, `Month D, YYYY`,
 * `D Month YYYY`, `YYYY/MM/DD` and `MM/DD/YYYY`, each with an optional
 * clock. Named zones other than GMT/UT/UTC are not recognised.
 */
export function parseDateText(input: string): Date | null {
  const text = input.trim();

  let match = DAY_MONTH_YEAR.exec(text);
  if (match) {
    const [, d, name, y, hour, minute, second, zone] = match;
    return toInstant({ year: Number(y), month: monthNumber(name ?? ''), day: Number(d), hour, minute, second, zone });
  }

  match = MONTH_DAY_YEAR.exec(text);
  if (match) {
    const [, name, d, y, hour, minute, second, zone] = match;
    return toInstant({ year: Number(y), month: monthNumber(name ?? ''), day: Number(d), hour, minute, second, zone });
  }

  match = SLASHED_YMD.exec(text);
  if (match) {
    const [, y, mo, d, hour, minute, second] = match;
    return toInstant({ year: Number(y), month: Number(mo), day: Number(d), hour, minute, second });
  }

  match = SLASHED_MDY.exec(text);
  if (match) {
    const [, mo, d, y, hour, minute, second] = match;
    return toInstant({ year: Number(y), month: Number(mo), day: Number(d), hour, minute, second });
  }

  return null;
}

/**
 * Interpret a value as a point in time: a valid Date, epoch milliseconds,
 * an ISO-8601 string, or one of the text forms `parseDateText` reads.
 */
export function parseTimestamp(value: Value | undefined): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? new Date(value) : null;
  }
  if (typeof value === 'string') {
    return parseIsoTimestamp(value) ?? parseDateText(value);
  }
  return null;
}

/**
 * Render as `YYYY-MM-DD HH:MM:SS` (UTC)
 */
export function formatTimestamp(date: Date): string {
  return (
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

export function isTimestampString(value: string): boolean {
  return parseIsoTimestamp(value) !== null;
}
