// This test suite verifies long-poll offset handling, pending-update skipping, and trigger dispatch.

import { afterEach, describe, expect, it, vi } from 'vitest';
import { TelegramClient } from '../src/telegram/client.js';
import { TelegramPoller } from '../src/telegram/poller.js';
import type { Trigger } from '../src/types/domain.js';
import { createCapturedLogger } from './helpers.js';

function updatesResponse(result: unknown[]): Response {
  return new Response(JSON.stringify({ ok: true, result }), { status: 200 });
}

function makePoller(dispatch: (trigger: Trigger) => Promise<void>): TelegramPoller {
  const client = new TelegramClient({
    baseUrl: 'https://telegram.test',
    token: 'test-token',
    requestTimeoutMs: 5000,
    maxRetries: 0,
    retryBaseDelayMs: 0
  });

  return new TelegramPoller({
    client,
    dispatch,
    logger: createCapturedLogger().logger,
    timeoutSeconds: 0,
    skipPending: true,
    restartDelayMs: 10
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('telegram poller', () => {
  it('dispatches actionable updates and requests the next offset afterwards', async () => {
    const bodies: unknown[] = [];
    const responses = [
      updatesResponse([
        { update_id: 20, message: { message_id: 1, chat: { id: 7 }, from: { id: 7, username: 'sara' }, text: '/start' } },
        { update_id: 21, message: { message_id: 2, chat: { id: 7 } } }
      ]),
      updatesResponse([])
    ];
    vi.stubGlobal(
      'fetch',
      vi.fn(async (_url: string, init?: RequestInit): Promise<Response> => {
        bodies.push(JSON.parse(String(init?.body)));
        const next = responses.shift();
        if (!next) {
          throw new Error('unexpected fetch');
        }
        return next;
      })
    );
    const dispatched: Trigger[] = [];
    const poller = makePoller(async (trigger) => {
      dispatched.push(trigger);
    });

    expect(await poller.pollOnce()).toBe(1);
    expect(await poller.pollOnce()).toBe(0);

    expect(dispatched.map((trigger) => trigger.payload)).toEqual(['/start']);
    expect(bodies).toEqual([
      { timeout: 0, allowed_updates: ['message', 'callback_query'] },
      { offset: 22, timeout: 0, allowed_updates: ['message', 'callback_query'] }
    ]);
  });

  it('skips pending updates by acknowledging the newest one', async () => {
    const bodies: unknown[] = [];
    vi.stubGlobal(
      'fetch',
      vi.fn(async (_url: string, init?: RequestInit): Promise<Response> => {
        bodies.push(JSON.parse(String(init?.body)));
        return updatesResponse([{ update_id: 99 }]);
      })
    );
    const poller = makePoller(async () => undefined);

    await poller.discardPending();
    await poller.pollOnce();

    expect(bodies[0]).toEqual({ offset: -1, timeout: 0, allowed_updates: ['message', 'callback_query'] });
    expect(bodies[1]).toEqual({ offset: 100, timeout: 0, allowed_updates: ['message', 'callback_query'] });
  });

  it('stops cleanly after it was started', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async (): Promise<Response> => updatesResponse([]))
    );
    const poller = makePoller(async () => undefined);

    poller.start();
    expect(poller.isRunning).toBe(true);
    await poller.stop();

    expect(poller.isRunning).toBe(false);
  });
});
