// This module builds the immutable region/station catalog in one dataset pass and publishes it by atomic swap.

import type { FastifyBaseLogger } from 'fastify';
import { EMPTY_DATASET } from '../dataset/memory-source.js';
import type { DatasetSource } from '../dataset/source.js';
import { idDigest, type TokenIdResolver } from '../navigation/token-codec.js';
import type { CatalogSnapshot, DateInterval, Region, Station } from '../types/domain.js';
import { toCalendarDate } from '../utils/dates.js';
import { errorForLog } from '../utils/logger.js';

export interface CatalogIndexOptions {
  loadSource: () => Promise<DatasetSource>;
  logger: FastifyBaseLogger;
  now?: () => Date;
}

interface PairAccumulator {
  regionId: string;
  station: Station;
  minDate: string | null;
  maxDate: string | null;
}

// This helper builds the composite key used by the validity map.
export function validityKey(regionId: string, stationId: string): string {
  return `${regionId}\u0000${stationId}`;
}

// This comparator orders catalog entries by display name with the identifier as tie breaker.
function compareByName(left: { id: string; name: string }, right: { id: string; name: string }): number {
  if (left.name !== right.name) {
    return left.name < right.name ? -1 : 1;
  }

  if (left.id === right.id) {
    return 0;
  }

  return left.id < right.id ? -1 : 1;
}

// This helper returns a frozen catalog with no regions, used before the first build and after failed builds.
export function emptyCatalogSnapshot(generation: number, now = new Date()): CatalogSnapshot {
  return Object.freeze({
    generation,
    builtAt: now.toISOString(),
    regions: Object.freeze([]),
    stationsByRegion: new Map<string, readonly Station[]>(),
    validity: new Map<string, DateInterval>(),
    source: EMPTY_DATASET,
    rowCount: 0
  });
}

// This function scans the dataset exactly once, deduplicating pairs and aggregating min/max dates together.
export function buildCatalogSnapshot(source: DatasetSource, generation: number, now = new Date()): CatalogSnapshot {
  const regionNames = new Map<string, string>();
  const pairs = new Map<string, PairAccumulator>();
  let rowCount = 0;

  for (const row of source.scanCatalogRows()) {
    rowCount += 1;
    if (!row.regionId || !row.stationId) {
      continue;
    }

    if (!regionNames.has(row.regionId)) {
      regionNames.set(row.regionId, row.regionName || row.regionId);
    }

    const key = validityKey(row.regionId, row.stationId);
    let pair = pairs.get(key);
    if (!pair) {
      pair = {
        regionId: row.regionId,
        station: Object.freeze({
          id: row.stationId,
          name: row.stationName || row.stationId,
          regionId: row.regionId
        }),
        minDate: null,
        maxDate: null
      };
      pairs.set(key, pair);
    }

    const date = toCalendarDate(row.time);
    if (date === null) {
      continue;
    }

    if (pair.minDate === null || date < pair.minDate) {
      pair.minDate = date;
    }
    if (pair.maxDate === null || date > pair.maxDate) {
      pair.maxDate = date;
    }
  }

  const grouped = new Map<string, Station[]>();
  const validity = new Map<string, DateInterval>();

  for (const [key, pair] of pairs) {
    const list = grouped.get(pair.regionId) ?? [];
    list.push(pair.station);
    grouped.set(pair.regionId, list);

    if (pair.minDate !== null && pair.maxDate !== null) {
      validity.set(key, Object.freeze({ start: pair.minDate, end: pair.maxDate }));
    }
  }

  const stationsByRegion = new Map<string, readonly Station[]>();
  for (const [regionId, stations] of grouped) {
    stationsByRegion.set(regionId, Object.freeze([...stations].sort(compareByName)));
  }

  const regions: Region[] = [...regionNames.entries()]
    .map(([id, name]) => Object.freeze({ id, name }))
    .sort(compareByName);

  return Object.freeze({
    generation,
    builtAt: now.toISOString(),
    regions: Object.freeze(regions),
    stationsByRegion,
    validity,
    source,
    rowCount
  });
}

// This class owns the published snapshot; readers never see a partially built catalog.
export class CatalogIndex implements TokenIdResolver {
  private readonly loadSource: () => Promise<DatasetSource>;
  private readonly logger: FastifyBaseLogger;
  private readonly now: () => Date;
  private snapshot: CatalogSnapshot;
  private generation = 0;
  private pendingReload: Promise<CatalogSnapshot> | null = null;

  public constructor(options: CatalogIndexOptions) {
    this.loadSource = options.loadSource;
    this.logger = options.logger.child({ component: 'catalog_index' });
    this.now = options.now ?? (() => new Date());
    this.snapshot = emptyCatalogSnapshot(0, this.now());
  }

  public current(): CatalogSnapshot {
    return this.snapshot;
  }

  public regions(): readonly Region[] {
    return this.snapshot.regions;
  }

  public stations(regionId: string): readonly Station[] {
    return this.snapshot.stationsByRegion.get(regionId) ?? [];
  }

  public validity(regionId: string, stationId: string): DateInterval | null {
    return this.snapshot.validity.get(validityKey(regionId, stationId)) ?? null;
  }

  public findRegion(regionId: string): Region | null {
    return this.snapshot.regions.find((region) => region.id === regionId) ?? null;
  }

  public findStation(regionId: string, stationId: string): Station | null {
    return this.stations(regionId).find((station) => station.id === stationId) ?? null;
  }

  public regionIdForDigest(digest: string): string | null {
    return this.snapshot.regions.find((region) => idDigest(region.id) === digest)?.id ?? null;
  }

  public stationIdForDigest(regionId: string, digest: string): string | null {
    return this.stations(regionId).find((station) => idDigest(station.id) === digest)?.id ?? null;
  }

  // This method rebuilds a brand-new snapshot and swaps it in; concurrent callers share one rebuild.
  public reload(): Promise<CatalogSnapshot> {
    if (!this.pendingReload) {
      this.pendingReload = this.rebuild().finally(() => {
        this.pendingReload = null;
      });
    }

    return this.pendingReload;
  }

  private async rebuild(): Promise<CatalogSnapshot> {
    this.generation += 1;
    const generation = this.generation;
    const startedAt = Date.now();

    this.logger.info({ event: 'catalog_build_started', generation }, 'catalog_build_started');

    let next: CatalogSnapshot;
    try {
      const source = await this.loadSource();
      next = buildCatalogSnapshot(source, generation, this.now());
      this.logger.info(
        {
          event: 'catalog_build_completed',
          generation,
          rowCount: next.rowCount,
          regionCount: next.regions.length,
          pairCount: next.validity.size,
          durationMs: Date.now() - startedAt
        },
        'catalog_build_completed'
      );
    } catch (error) {
      next = emptyCatalogSnapshot(generation, this.now());
      this.logger.error(
        {
          event: 'catalog_build_failed',
          generation,
          durationMs: Date.now() - startedAt,
          error: errorForLog(error)
        },
        'catalog_build_failed'
      );
    }

    this.snapshot = next;
    return next;
  }
}
