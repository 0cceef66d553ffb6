// This module turns a confirmed station selection into CSV bytes using the snapshot's own dataset generation.

import type { FastifyBaseLogger } from 'fastify';
import { validityKey } from '../catalog/catalog-index.js';
import type { CatalogSnapshot } from '../types/domain.js';
import { timeSortKey } from '../utils/dates.js';
import { serializeCsv } from './csv.js';

export type MaterializeResult =
  | {
      status: 'ok';
      intervalStart: string;
      intervalEnd: string;
      fileName: string;
      bytes: Uint8Array;
      rowCount: number;
    }
  | { status: 'no_data' };

export interface ExportMaterializerOptions {
  logger: FastifyBaseLogger;
  includeBom?: boolean;
}

const UNSAFE_FILE_CHARS_REGEX = /[\s/\\:*?"<>|]+/g;

// This helper keeps generated file names portable across chat clients and file systems.
export function sanitizeFileSegment(value: string): string {
  const cleaned = value.replace(UNSAFE_FILE_CHARS_REGEX, '_').replace(/^_+|_+$/g, '');
  return cleaned.length > 0 ? cleaned : 'unknown';
}

export function buildExportFileName(regionName: string, stationName: string, start: string, end: string): string {
  return `${sanitizeFileSegment(regionName)}_${sanitizeFileSegment(stationName)}_${start}_${end}.csv`;
}

export class ExportMaterializer {
  private readonly logger: FastifyBaseLogger;
  private readonly includeBom: boolean;

  public constructor(options: ExportMaterializerOptions) {
    this.logger = options.logger.child({ component: 'export_materializer' });
    this.includeBom = options.includeBom ?? true;
  }

  public materialize(snapshot: CatalogSnapshot, regionId: string, stationId: string): MaterializeResult {
    const startedAt = Date.now();
    const interval = snapshot.validity.get(validityKey(regionId, stationId));
    const region = snapshot.regions.find((entry) => entry.id === regionId);
    const station = snapshot.stationsByRegion.get(regionId)?.find((entry) => entry.id === stationId);

    if (!interval || !region || !station) {
      this.logger.warn(
        {
          event: 'export_consistency_fault',
          generation: snapshot.generation,
          regionId,
          stationId,
          reason: interval ? 'station_not_indexed' : 'interval_missing'
        },
        'export_consistency_fault'
      );
      return { status: 'no_data' };
    }

    const source = snapshot.source;
    const timeColumn = source.keyColumns.time;
    const rows = source
      .selectStationRows(regionId, stationId)
      .map((row, index) => ({ row, index, key: timeSortKey(row[timeColumn] ?? null) }))
      .sort((left, right) => left.key - right.key || left.index - right.index)
      .map((entry) => entry.row);

    if (rows.length === 0) {
      this.logger.error(
        {
          event: 'export_consistency_fault',
          generation: snapshot.generation,
          regionId,
          stationId,
          reason: 'zero_rows'
        },
        'export_consistency_fault'
      );
      return { status: 'no_data' };
    }

    const bytes = serializeCsv(rows, {
      columns: source.columns,
      dateColumns: [timeColumn],
      includeBom: this.includeBom
    });

    this.logger.info(
      {
        event: 'export_materialized',
        generation: snapshot.generation,
        regionId,
        stationId,
        rowCount: rows.length,
        byteLength: bytes.byteLength,
        durationMs: Date.now() - startedAt
      },
      'export_materialized'
    );

    return {
      status: 'ok',
      intervalStart: interval.start,
      intervalEnd: interval.end,
      fileName: buildExportFileName(region.name, station.name, interval.start, interval.end),
      bytes,
      rowCount: rows.length
    };
  }
}
