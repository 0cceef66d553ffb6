// This module serializes dataset rows into RFC 4180 CSV bytes in memory.

import type { DatasetRow, DatasetValue } from '../dataset/source.js';
import { toCalendarDate } from '../utils/dates.js';

const UTF8_BOM = '\uFEFF';
const NEEDS_QUOTING_REGEX = /[",\r\n]/;

export interface CsvOptions {
  columns: readonly string[];
  dateColumns?: readonly string[];
  includeBom?: boolean;
}

// This helper quotes one field when it contains separators, quotes, or line breaks.
export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTING_REGEX.test(value)) {
    return value;
  }

  return `"${value.replace(/"/g, '""')}"`;
}

// This helper renders one cell, printing date columns as calendar dates.
export function formatCsvValue(value: DatasetValue, asDate: boolean): string {
  if (value === null) {
    return '';
  }

  if (asDate) {
    const calendar = toCalendarDate(value);
    if (calendar) {
      return calendar;
    }
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  return String(value);
}

export function serializeCsv(rows: readonly DatasetRow[], options: CsvOptions): Uint8Array {
  const dateColumns = new Set(options.dateColumns ?? []);
  const lines: string[] = [options.columns.map(escapeCsvField).join(',')];

  for (const row of rows) {
    lines.push(
      options.columns
        .map((column) => escapeCsvField(formatCsvValue(row[column] ?? null, dateColumns.has(column))))
        .join(',')
    );
  }

  const text = `${options.includeBom ? UTF8_BOM : ''}${lines.join('\n')}\n`;
  return new TextEncoder().encode(text);
}
