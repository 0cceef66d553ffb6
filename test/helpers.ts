// This module provides shared in-process stand-ins for bot tests: a capturing logger, temp ledgers, and a recording transport.

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import pino from 'pino';
import type { FastifyBaseLogger } from 'fastify';
import { SqliteStore } from '../src/db/database.js';
import type { DatasetRow } from '../src/dataset/source.js';
import type { ChatTransport, DocumentRequest, RenderRequest } from '../src/types/domain.js';

export interface CapturedLogger {
  logger: FastifyBaseLogger;
  entries: Array<Record<string, unknown>>;
  events: () => string[];
}

// This helper builds a real pino logger that writes parsed JSON lines into memory.
export function createCapturedLogger(): CapturedLogger {
  const entries: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(line: string) {
        entries.push(JSON.parse(line));
      }
    }
  );

  return {
    logger,
    entries,
    events: () => entries.map((entry) => String(entry.event))
  };
}

const tempDirs: string[] = [];

// This helper creates one isolated directory that cleanupTempDirs removes after each test.
export function createTempDir(prefix: string): string {
  const dir = mkdtempSync(join(tmpdir(), `station-export-bot-${prefix}-`));
  tempDirs.push(dir);
  return dir;
}

export function createStore(dir = createTempDir('ledger')): SqliteStore {
  return new SqliteStore(join(dir, 'downloads.db'));
}

export function cleanupTempDirs(): void {
  for (const dir of tempDirs.splice(0, tempDirs.length)) {
    rmSync(dir, { recursive: true, force: true });
  }
}

export type TransportCall =
  | { type: 'render'; request: RenderRequest }
  | { type: 'document'; request: DocumentRequest }
  | { type: 'acknowledge'; callbackId: string; notice?: { text: string; alert: boolean } };

// This transport records every outbound call in order and can be told to fail documents.
export class RecordingTransport implements ChatTransport {
  public readonly calls: TransportCall[] = [];
  public failDocuments = false;

  public async render(request: RenderRequest): Promise<void> {
    this.calls.push({ type: 'render', request });
  }

  public async sendDocument(request: DocumentRequest): Promise<void> {
    if (this.failDocuments) {
      throw new Error('document upload failed');
    }
    this.calls.push({ type: 'document', request });
  }

  public async acknowledge(callbackId: string, notice?: { text: string; alert: boolean }): Promise<void> {
    this.calls.push({ type: 'acknowledge', callbackId, notice });
  }

  public renders(): RenderRequest[] {
    return this.calls.flatMap((call) => (call.type === 'render' ? [call.request] : []));
  }

  public documents(): DocumentRequest[] {
    return this.calls.flatMap((call) => (call.type === 'document' ? [call.request] : []));
  }

  public acknowledgements(): Array<{ callbackId: string; notice?: { text: string; alert: boolean } }> {
    return this.calls.flatMap((call) =>
      call.type === 'acknowledge' ? [{ callbackId: call.callbackId, notice: call.notice }] : []
    );
  }
}

// This fixture has two regions, one station without dated rows, and rows deliberately out of time order.
export function sampleRows(): DatasetRow[] {
  return [
    { region_id: 'R2', region_name: 'Tehran', station_id: 'S20', station_name: 'Mehrabad', date: '2020-03-02', tmax: 18.5 },
    { region_id: 'R1', region_name: 'Alborz', station_id: 'S10', station_name: 'Karaj', date: '2019-01-05', tmax: 7 },
    { region_id: 'R1', region_name: 'Alborz', station_id: 'S10', station_name: 'Karaj', date: '2019-01-01', tmax: 4.25 },
    { region_id: 'R2', region_name: 'Tehran', station_id: 'S20', station_name: 'Mehrabad', date: '2020-03-01', tmax: 16 },
    { region_id: 'R1', region_name: 'Alborz', station_id: 'S11', station_name: 'Eshtehard', date: null, tmax: null },
    { region_id: 'R2', region_name: 'Tehran', station_id: 'S21', station_name: 'Geophysics', date: '2021-07-09', tmax: 35 }
  ];
}
