// This module keeps a dataset fully in memory as plain row objects.

import {
  assertKeyColumns,
  DEFAULT_DATASET_COLUMNS,
  toKeyString,
  type CatalogRow,
  type DatasetColumns,
  type DatasetRow,
  type DatasetSource
} from './source.js';

export class InMemoryDatasetSource implements DatasetSource {
  public readonly columns: readonly string[];
  public readonly keyColumns: DatasetColumns;
  private readonly rows: readonly DatasetRow[];

  public constructor(rows: readonly DatasetRow[], keyColumns: DatasetColumns = DEFAULT_DATASET_COLUMNS, columns?: string[]) {
    this.rows = rows;
    this.keyColumns = keyColumns;
    this.columns = columns ?? (rows.length > 0 ? Object.keys(rows[0]) : Object.values(keyColumns));

    if (rows.length > 0) {
      assertKeyColumns(this.columns, keyColumns);
    }
  }

  public get rowCount(): number {
    return this.rows.length;
  }

  public *scanCatalogRows(): Iterable<CatalogRow> {
    const keys = this.keyColumns;
    for (const row of this.rows) {
      yield {
        regionId: toKeyString(row[keys.regionId] ?? null) ?? '',
        regionName: toKeyString(row[keys.regionName] ?? null) ?? '',
        stationId: toKeyString(row[keys.stationId] ?? null) ?? '',
        stationName: toKeyString(row[keys.stationName] ?? null) ?? '',
        time: row[keys.time] ?? null
      };
    }
  }

  public selectStationRows(regionId: string, stationId: string): DatasetRow[] {
    const keys = this.keyColumns;
    return this.rows.filter(
      (row) =>
        toKeyString(row[keys.regionId] ?? null) === regionId && toKeyString(row[keys.stationId] ?? null) === stationId
    );
  }
}

export const EMPTY_DATASET: DatasetSource = new InMemoryDatasetSource([]);
