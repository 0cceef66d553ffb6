// This test suite verifies HTTP probes, webhook authentication, and dispatch wiring on the assembled server.

import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config/app-config.js';
import { InMemoryDatasetSource } from '../src/dataset/memory-source.js';
import { WEBHOOK_PATH } from '../src/http/webhook.js';
import { createServer, type ServerResources } from '../src/server.js';
import { messages } from '../src/services/messages.js';
import { SERVICE_NAME } from '../src/version.js';
import { cleanupTempDirs, createTempDir, RecordingTransport, sampleRows } from './helpers.js';

const opened: ServerResources[] = [];

async function startServer(
  env: Record<string, string> = {},
  rows = sampleRows()
): Promise<{ resources: ServerResources; transport: RecordingTransport }> {
  const dir = createTempDir('server');
  const config = loadConfig({
    TELEGRAM_BOT_TOKEN: 'test-token',
    LOG_LEVEL: 'silent',
    QUOTA_TIME_ZONE: 'UTC',
    DB_PATH: join(dir, 'downloads.db'),
    GUIDE_PATH: join(dir, 'missing-guide.pdf'),
    ...env
  });
  const transport = new RecordingTransport();
  const resources = await createServer(config, {
    transport,
    loadSource: async () => {
      if (rows.length === 0) {
        throw new Error('dataset unavailable');
      }
      return new InMemoryDatasetSource(rows);
    },
    now: () => new Date('2026-03-15T09:00:00.000Z')
  });
  opened.push(resources);
  return { resources, transport };
}

afterEach(async () => {
  for (const resources of opened.splice(0, opened.length)) {
    await resources.app.close();
    resources.store.close();
  }
  cleanupTempDirs();
});

describe('http surface', () => {
  it('reports liveness and service identity', async () => {
    const { resources } = await startServer();

    const health = await resources.app.inject({ method: 'GET', url: '/health' });
    const version = await resources.app.inject({ method: 'GET', url: '/version' });

    expect(health.statusCode).toBe(200);
    expect(health.json()).toMatchObject({ ok: true, status: 'alive' });
    expect(version.json()).toMatchObject({ ok: true, name: SERVICE_NAME });
  });

  it('reports readiness with catalog and ledger state', async () => {
    const { resources } = await startServer();

    const response = await resources.app.inject({ method: 'GET', url: '/ready' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      ok: true,
      catalog: {
        generation: 1,
        builtAt: '2026-03-15T09:00:00.000Z',
        regionCount: 2,
        stationCount: 4,
        rowCount: 6
      },
      ledgerReachable: true,
      pendingTriggers: 0,
      telegramMode: 'polling'
    });
    expect(resources.poller).not.toBeNull();
  });

  it('keeps serving with an empty catalog but reports not ready', async () => {
    const { resources } = await startServer({}, []);

    const response = await resources.app.inject({ method: 'GET', url: '/ready' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toMatchObject({ ok: false, catalog: { regionCount: 0 }, ledgerReachable: true });
  });

  it('returns structured 404 errors for unknown routes', async () => {
    const { resources } = await startServer();

    const response = await resources.app.inject({ method: 'GET', url: '/nope' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      ok: false,
      error: { code: 'not_found', message: 'Route not found: GET /nope' }
    });
  });

  it('does not expose the webhook route in polling mode', async () => {
    const { resources } = await startServer();

    const response = await resources.app.inject({ method: 'POST', url: WEBHOOK_PATH, payload: { update_id: 1 } });

    expect(response.statusCode).toBe(404);
  });
});

describe('telegram webhook', () => {
  const webhookEnv = { TELEGRAM_MODE: 'webhook', TELEGRAM_WEBHOOK_SECRET: 'test-secret' };
  const startUpdate = {
    update_id: 10,
    message: { message_id: 1, chat: { id: 42 }, from: { id: 42, username: 'sara' }, text: '/start' }
  };

  it('rejects requests without the shared secret', async () => {
    const { resources, transport } = await startServer(webhookEnv);

    const response = await resources.app.inject({
      method: 'POST',
      url: WEBHOOK_PATH,
      headers: { 'x-telegram-bot-api-secret-token': 'wrong-secret' },
      payload: startUpdate
    });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toMatchObject({ ok: false, error: { code: 'unauthorized' } });
    expect(transport.calls).toEqual([]);
    expect(resources.poller).toBeNull();
  });

  it('accepts authenticated updates and dispatches them to the bot', async () => {
    const { resources, transport } = await startServer(webhookEnv);

    const response = await resources.app.inject({
      method: 'POST',
      url: WEBHOOK_PATH,
      headers: { 'x-telegram-bot-api-secret-token': 'test-secret' },
      payload: startUpdate
    });
    await resources.service.drain();

    expect(response.json()).toEqual({ ok: true, accepted: true });
    expect(transport.renders().map((render) => [render.conversationId, render.text])).toEqual([
      ['42', messages.welcome('sara')]
    ]);
  });

  it('acknowledges updates it cannot act on', async () => {
    const { resources } = await startServer(webhookEnv);

    const response = await resources.app.inject({
      method: 'POST',
      url: WEBHOOK_PATH,
      headers: { 'x-telegram-bot-api-secret-token': 'test-secret' },
      payload: { update_id: 11, edited_message: { message_id: 1 } }
    });

    expect(response.json()).toEqual({ ok: true, accepted: false });
  });
});
