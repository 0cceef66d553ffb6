// This test suite verifies the Arrow-backed dataset source used for Parquet input.

import { tableFromArrays } from 'apache-arrow';
import { describe, expect, it } from 'vitest';
import { buildCatalogSnapshot, validityKey } from '../src/catalog/catalog-index.js';
import { ArrowDatasetSource } from '../src/dataset/arrow-source.js';
import { DEFAULT_DATASET_COLUMNS } from '../src/dataset/source.js';
import { AppError } from '../src/utils/errors.js';

function makeTable() {
  return tableFromArrays({
    region_id: ['R1', 'R1', 'R2'],
    region_name: ['Alborz', 'Alborz', 'Tehran'],
    station_id: ['S10', 'S10', 'S20'],
    station_name: ['Karaj', 'Karaj', 'Mehrabad'],
    date: ['2019-01-02', '2019-01-01', '2020-03-01'],
    tmax: Float64Array.from([5, 3.5, 16])
  });
}

describe('arrow dataset source', () => {
  it('exposes schema columns and row count', () => {
    const source = new ArrowDatasetSource(makeTable(), DEFAULT_DATASET_COLUMNS);

    expect(source.columns).toEqual(['region_id', 'region_name', 'station_id', 'station_name', 'date', 'tmax']);
    expect(source.rowCount).toBe(3);
  });

  it('feeds the catalog build through column-wise scans', () => {
    const snapshot = buildCatalogSnapshot(new ArrowDatasetSource(makeTable(), DEFAULT_DATASET_COLUMNS), 1);

    expect(snapshot.regions.map((region) => region.name)).toEqual(['Alborz', 'Tehran']);
    expect(snapshot.validity.get(validityKey('R1', 'S10'))).toEqual({ start: '2019-01-01', end: '2019-01-02' });
  });

  it('selects full rows for one station', () => {
    const source = new ArrowDatasetSource(makeTable(), DEFAULT_DATASET_COLUMNS);

    expect(source.selectStationRows('R1', 'S10')).toEqual([
      { region_id: 'R1', region_name: 'Alborz', station_id: 'S10', station_name: 'Karaj', date: '2019-01-02', tmax: 5 },
      { region_id: 'R1', region_name: 'Alborz', station_id: 'S10', station_name: 'Karaj', date: '2019-01-01', tmax: 3.5 }
    ]);
    expect(source.selectStationRows('R2', 'S10')).toEqual([]);
  });

  it('rejects tables missing a key column', () => {
    const table = tableFromArrays({ region_id: ['R1'], station_id: ['S1'] });

    expect(() => new ArrowDatasetSource(table, DEFAULT_DATASET_COLUMNS)).toThrow(AppError);
  });
});
