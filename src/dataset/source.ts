// This module defines the read-only dataset contract the catalog index and export materializer depend on.

import { AppError } from '../utils/errors.js';

export type DatasetValue = string | number | bigint | boolean | Date | null;

export type DatasetRow = Record<string, DatasetValue>;

// This mapping names the dataset columns that carry catalog identity and time.
export interface DatasetColumns {
  regionId: string;
  regionName: string;
  stationId: string;
  stationName: string;
  time: string;
}

export const DEFAULT_DATASET_COLUMNS: DatasetColumns = {
  regionId: 'region_id',
  regionName: 'region_name',
  stationId: 'station_id',
  stationName: 'station_name',
  time: 'date'
};

// This projection is all the catalog build needs from one dataset row.
export interface CatalogRow {
  regionId: string;
  regionName: string;
  stationId: string;
  stationName: string;
  time: DatasetValue;
}

export interface DatasetSource {
  readonly columns: readonly string[];
  readonly keyColumns: DatasetColumns;
  readonly rowCount: number;
  scanCatalogRows(): Iterable<CatalogRow>;
  selectStationRows(regionId: string, stationId: string): DatasetRow[];
}

// This helper maps loosely-typed column values from storage engines into the dataset value union.
export function toDatasetValue(raw: unknown): DatasetValue {
  if (raw === null || raw === undefined) {
    return null;
  }

  if (
    typeof raw === 'string' ||
    typeof raw === 'number' ||
    typeof raw === 'bigint' ||
    typeof raw === 'boolean' ||
    raw instanceof Date
  ) {
    return raw;
  }

  return String(raw);
}

// This helper renders identity columns as trimmed strings, with null meaning "missing".
export function toKeyString(value: DatasetValue): string | null {
  if (value === null) {
    return null;
  }

  const text = value instanceof Date ? value.toISOString() : String(value).trim();
  return text.length > 0 ? text : null;
}

// This helper rejects sources whose schema lacks any required key column.
export function assertKeyColumns(available: readonly string[], keyColumns: DatasetColumns): void {
  const missing = Object.values(keyColumns).filter((column) => !available.includes(column));
  if (missing.length > 0) {
    throw new AppError(500, 'build_error', 'Dataset schema is missing required columns.', {
      missing,
      available
    });
  }
}
