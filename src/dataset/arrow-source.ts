// This module exposes an Apache Arrow table (decoded from Parquet) through the dataset contract with column-wise scans.

import { readFile } from 'node:fs/promises';
import { tableFromIPC, type Table, type Vector } from 'apache-arrow';
import {
  assertKeyColumns,
  toDatasetValue,
  toKeyString,
  type CatalogRow,
  type DatasetColumns,
  type DatasetRow,
  type DatasetSource
} from './source.js';

// Lazy-loaded parquet-wasm module (the Node build initializes its WASM on import).
let parquetModule: typeof import('parquet-wasm/node') | null = null;

async function getParquetModule(): Promise<typeof import('parquet-wasm/node')> {
  if (!parquetModule) {
    parquetModule = await import('parquet-wasm/node');
  }
  return parquetModule;
}

export class ArrowDatasetSource implements DatasetSource {
  public readonly columns: readonly string[];
  public readonly keyColumns: DatasetColumns;
  private readonly table: Table;
  private readonly vectors: Map<string, Vector>;

  public constructor(table: Table, keyColumns: DatasetColumns) {
    this.table = table;
    this.keyColumns = keyColumns;
    this.columns = table.schema.fields.map((field) => field.name);
    assertKeyColumns(this.columns, keyColumns);

    this.vectors = new Map();
    for (const name of this.columns) {
      const vector = table.getChild(name);
      if (vector) {
        this.vectors.set(name, vector);
      }
    }
  }

  public get rowCount(): number {
    return this.table.numRows;
  }

  // This helper reads one cell through the cached column vector.
  private cell(column: string, index: number): unknown {
    return this.vectors.get(column)?.get(index);
  }

  private keyAt(column: string, index: number): string | null {
    return toKeyString(toDatasetValue(this.cell(column, index)));
  }

  public *scanCatalogRows(): Iterable<CatalogRow> {
    const keys = this.keyColumns;
    for (let index = 0; index < this.table.numRows; index += 1) {
      yield {
        regionId: this.keyAt(keys.regionId, index) ?? '',
        regionName: this.keyAt(keys.regionName, index) ?? '',
        stationId: this.keyAt(keys.stationId, index) ?? '',
        stationName: this.keyAt(keys.stationName, index) ?? '',
        time: toDatasetValue(this.cell(keys.time, index))
      };
    }
  }

  public selectStationRows(regionId: string, stationId: string): DatasetRow[] {
    const keys = this.keyColumns;
    const rows: DatasetRow[] = [];

    for (let index = 0; index < this.table.numRows; index += 1) {
      if (this.keyAt(keys.stationId, index) !== stationId || this.keyAt(keys.regionId, index) !== regionId) {
        continue;
      }

      const row: DatasetRow = {};
      for (const column of this.columns) {
        row[column] = toDatasetValue(this.cell(column, index));
      }
      rows.push(row);
    }

    return rows;
  }
}

// This helper decodes one Parquet file into an Arrow-backed dataset source.
export async function loadParquetDataset(path: string, keyColumns: DatasetColumns): Promise<ArrowDatasetSource> {
  const parquet = await getParquetModule();
  const buffer = await readFile(path);
  const wasmTable = parquet.readParquet(new Uint8Array(buffer));
  const arrowTable = tableFromIPC(wasmTable.intoIPCStream());
  return new ArrowDatasetSource(arrowTable, keyColumns);
}
