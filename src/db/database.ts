// This module owns SQLite initialization and persistence operations for the append-only download ledger.

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { DownloadEvent, DownloadRequest, QuotaWindow, StationDownloadSummary } from '../types/domain.js';

interface DownloadRow {
  id: number;
  user_id: string | number;
  username: string | null;
  region_id: string;
  station_id: string;
  station_name: string | null;
  download_date: string;
  created_at: string;
}

interface ColumnInfoRow {
  name: string;
}

export interface SqliteStoreOptions {
  busyTimeoutMs?: number;
}

const DOWNLOAD_COLUMNS = `
  rowid AS id,
  user_id,
  username,
  region_id,
  station_id,
  station_name,
  download_date,
  created_at
`;

// This helper maps one SQLite row into the public event shape, including rows written by the legacy integer schema.
function mapDownloadRow(row: DownloadRow): DownloadEvent {
  return {
    id: Number(row.id),
    userId: String(row.user_id),
    displayName: row.username ?? '',
    regionId: row.region_id,
    stationId: row.station_id,
    stationName: row.station_name ?? '',
    eventDate: row.download_date,
    createdAt: row.created_at
  };
}

// This store is intentionally synchronous because SQLite calls are local and bounded by the busy timeout.
export class SqliteStore {
  private readonly db: Database.Database;

  public constructor(dbPath: string, options: SqliteStoreOptions = {}) {
    if (dbPath !== ':memory:' && !existsSync(dirname(dbPath))) {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath, { timeout: options.busyTimeoutMs ?? 5000 });
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.initializeSchema();
  }

  // This method creates the ledger table and upgrades tables created by the older single-table layout.
  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS downloads (
        user_id TEXT NOT NULL,
        username TEXT,
        station_name TEXT,
        download_date TEXT NOT NULL,
        region_id TEXT NOT NULL DEFAULT '',
        station_id TEXT NOT NULL DEFAULT '',
        created_at TEXT NOT NULL DEFAULT ''
      );
    `);

    const columns = this.db.prepare('PRAGMA table_info(downloads)').all() as ColumnInfoRow[];
    const hasColumn = (name: string): boolean => columns.some((column) => column.name === name);

    const tx = this.db.transaction(() => {
      if (!hasColumn('region_id')) {
        this.db.exec("ALTER TABLE downloads ADD COLUMN region_id TEXT NOT NULL DEFAULT ''");
      }
      if (!hasColumn('station_id')) {
        this.db.exec("ALTER TABLE downloads ADD COLUMN station_id TEXT NOT NULL DEFAULT ''");
      }
      if (!hasColumn('created_at')) {
        this.db.exec("ALTER TABLE downloads ADD COLUMN created_at TEXT NOT NULL DEFAULT ''");
      }
    });
    tx();

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_downloads_user_date ON downloads(user_id, download_date);
      CREATE INDEX IF NOT EXISTS idx_downloads_date ON downloads(download_date);
    `);
  }

  // This method runs one callback inside BEGIN IMMEDIATE so check-then-insert sequences are serialized across connections.
  public runImmediate<T>(work: () => T): T {
    return this.db.transaction(work).immediate();
  }

  // This method derives daily and monthly counts for one user in a single indexed query.
  public getQuotaWindow(userId: string, today: string, monthStart: string): QuotaWindow {
    const row = this.db
      .prepare(
        `
        SELECT
          COALESCE(SUM(CASE WHEN download_date = @today THEN 1 ELSE 0 END), 0) AS today_count,
          COUNT(1) AS month_count
        FROM downloads
        WHERE user_id = @userId AND download_date >= @monthStart
        `
      )
      .get({ userId, today, monthStart }) as { today_count: number; month_count: number } | undefined;

    return {
      todayCount: row?.today_count ?? 0,
      monthCount: row?.month_count ?? 0
    };
  }

  // This method appends one immutable download event and returns it.
  public insertDownload(request: DownloadRequest, eventDate: string, createdAt: string): DownloadEvent {
    const result = this.db
      .prepare(
        `
        INSERT INTO downloads (user_id, username, region_id, station_id, station_name, download_date, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
        `
      )
      .run(
        request.userId,
        request.displayName,
        request.regionId,
        request.stationId,
        request.stationName,
        eventDate,
        createdAt
      );

    return {
      id: Number(result.lastInsertRowid),
      userId: request.userId,
      displayName: request.displayName,
      regionId: request.regionId,
      stationId: request.stationId,
      stationName: request.stationName,
      eventDate,
      createdAt
    };
  }

  public listDownloadsOn(eventDate: string): DownloadEvent[] {
    const rows = this.db
      .prepare(`SELECT ${DOWNLOAD_COLUMNS} FROM downloads WHERE download_date = ? ORDER BY rowid ASC`)
      .all(eventDate) as DownloadRow[];
    return rows.map(mapDownloadRow);
  }

  public listDownloadsForUser(userId: string): DownloadEvent[] {
    const rows = this.db
      .prepare(`SELECT ${DOWNLOAD_COLUMNS} FROM downloads WHERE user_id = ? ORDER BY rowid ASC`)
      .all(userId) as DownloadRow[];
    return rows.map(mapDownloadRow);
  }

  // This method summarizes one user's lifetime downloads for admin lookups.
  public getUserDownloadSummary(userId: string): StationDownloadSummary | null {
    const events = this.listDownloadsForUser(userId);
    if (events.length === 0) {
      return null;
    }

    const stationNames: string[] = [];
    for (const event of events) {
      const name = event.stationName || event.stationId;
      if (!stationNames.includes(name)) {
        stationNames.push(name);
      }
    }

    return {
      userId,
      totalDownloads: events.length,
      stationNames
    };
  }

  public countDistinctUsers(): number {
    const row = this.db.prepare('SELECT COUNT(DISTINCT user_id) AS count FROM downloads').get() as { count: number };
    return row.count;
  }

  // This method performs a trivial read used by readiness checks.
  public ping(): boolean {
    const row = this.db.prepare('SELECT 1 AS ok').get() as { ok: number } | undefined;
    return row?.ok === 1;
  }

  public close(): void {
    this.db.close();
  }
}
