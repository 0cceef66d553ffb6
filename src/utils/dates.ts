// This module normalizes dataset time values and quota clock readings into YYYY-MM-DD calendar dates.

import type { DatasetValue } from '../dataset/source.js';

const DATE_PREFIX_REGEX = /^(\d{4})-(\d{2})-(\d{2})/;
const COMPACT_DATE_REGEX = /^(\d{4})(\d{2})(\d{2})$/;

// This cache stores Intl formatters so repeated timezone conversions stay efficient.
const calendarFormatterCache = new Map<string, Intl.DateTimeFormat>();

// This helper formats one date segment with two digits.
function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

// This helper validates one IANA timezone against the current runtime.
export function isValidTimeZone(value: string): boolean {
  try {
    Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

// This helper returns the process timezone used when no quota timezone is configured.
export function resolveDefaultTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

function getCalendarFormatter(timeZone: string): Intl.DateTimeFormat {
  const cached = calendarFormatterCache.get(timeZone);
  if (cached) {
    return cached;
  }

  const formatter = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit'
  });
  calendarFormatterCache.set(timeZone, formatter);
  return formatter;
}

// This helper returns the calendar date of one instant in one timezone.
export function calendarDateIn(now: Date, timeZone: string): string {
  const parts = getCalendarFormatter(timeZone).formatToParts(now);
  const byType = new Map<string, string>();
  for (const part of parts) {
    byType.set(part.type, part.value);
  }

  return `${byType.get('year') ?? '0000'}-${byType.get('month') ?? '01'}-${byType.get('day') ?? '01'}`;
}

// This helper returns the first day of the month that contains one calendar date.
export function firstOfMonth(calendarDate: string): string {
  return `${calendarDate.slice(0, 8)}01`;
}

function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }

  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

function fromEpochMs(value: number): string | null {
  if (!Number.isFinite(value)) {
    return null;
  }

  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return null;
  }

  return `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
}

// This helper maps one dataset time cell (string, epoch millis, bigint, or Date) to a calendar date, or null.
export function toCalendarDate(value: DatasetValue): string | null {
  if (value === null || typeof value === 'boolean') {
    return null;
  }

  if (value instanceof Date) {
    return fromEpochMs(value.getTime());
  }

  if (typeof value === 'number') {
    return fromEpochMs(value);
  }

  if (typeof value === 'bigint') {
    return fromEpochMs(Number(value));
  }

  const trimmed = value.trim();
  const match = DATE_PREFIX_REGEX.exec(trimmed) ?? COMPACT_DATE_REGEX.exec(trimmed);
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (!isValidCalendarDate(year, month, day)) {
    return null;
  }

  return `${match[1]}-${match[2]}-${match[3]}`;
}

// This helper returns a sortable numeric key for one time cell, with unparseable values last.
export function timeSortKey(value: DatasetValue): number {
  if (value instanceof Date) {
    return value.getTime();
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : Number.POSITIVE_INFINITY;
  }

  if (typeof value === 'bigint') {
    return Number(value);
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed.length <= 10) {
      const calendar = toCalendarDate(trimmed);
      return calendar ? Date.parse(`${calendar}T00:00:00.000Z`) : Number.POSITIVE_INFINITY;
    }

    const parsed = Date.parse(trimmed);
    return Number.isNaN(parsed) ? Number.POSITIVE_INFINITY : parsed;
  }

  return Number.POSITIVE_INFINITY;
}
