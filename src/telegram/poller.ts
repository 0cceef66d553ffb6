// This module long-polls the Bot API and hands every update to the bot service as its own task.

import { setTimeout as sleep } from 'node:timers/promises';
import type { FastifyBaseLogger } from 'fastify';
import type { Trigger } from '../types/domain.js';
import { errorForLog } from '../utils/logger.js';
import type { TelegramClient } from './client.js';
import { updateToTrigger } from './updates.js';

export interface TelegramPollerOptions {
  client: TelegramClient;
  dispatch: (trigger: Trigger) => Promise<void>;
  logger: FastifyBaseLogger;
  timeoutSeconds: number;
  skipPending: boolean;
  restartDelayMs?: number;
}

const DEFAULT_RESTART_DELAY_MS = 5000;

export class TelegramPoller {
  private readonly client: TelegramClient;
  private readonly dispatch: (trigger: Trigger) => Promise<void>;
  private readonly logger: FastifyBaseLogger;
  private readonly timeoutSeconds: number;
  private readonly skipPending: boolean;
  private readonly restartDelayMs: number;
  private offset: number | undefined;
  private running = false;
  private abortController: AbortController | null = null;
  private loop: Promise<void> | null = null;

  public constructor(options: TelegramPollerOptions) {
    this.client = options.client;
    this.dispatch = options.dispatch;
    this.logger = options.logger.child({ component: 'telegram_poller' });
    this.timeoutSeconds = options.timeoutSeconds;
    this.skipPending = options.skipPending;
    this.restartDelayMs = options.restartDelayMs ?? DEFAULT_RESTART_DELAY_MS;
  }

  public get isRunning(): boolean {
    return this.running;
  }

  public start(): void {
    if (this.running) {
      return;
    }

    this.running = true;
    this.abortController = new AbortController();
    this.loop = this.run(this.abortController.signal);
  }

  // This method stops after the in-flight long poll returns; dispatched triggers keep running.
  public async stop(): Promise<void> {
    this.running = false;
    this.abortController?.abort();
    await this.loop;
    this.loop = null;
  }

  // This method drops updates queued while the bot was offline by acknowledging the newest one.
  public async discardPending(): Promise<void> {
    const batch = await this.client.getUpdates({ offset: -1, timeoutSeconds: 0 });
    if (batch.lastUpdateId !== null) {
      this.offset = batch.lastUpdateId + 1;
    }

    this.logger.info(
      { event: 'telegram_pending_updates_skipped', lastUpdateId: batch.lastUpdateId },
      'telegram_pending_updates_skipped'
    );
  }

  // This method runs one getUpdates round and returns how many triggers were dispatched.
  public async pollOnce(): Promise<number> {
    const batch = await this.client.getUpdates({ offset: this.offset, timeoutSeconds: this.timeoutSeconds });
    if (batch.lastUpdateId !== null) {
      this.offset = batch.lastUpdateId + 1;
    }

    let dispatched = 0;
    for (const update of batch.updates) {
      const trigger = updateToTrigger(update);
      if (!trigger) {
        continue;
      }

      void this.dispatch(trigger);
      dispatched += 1;
    }

    return dispatched;
  }

  private async run(signal: AbortSignal): Promise<void> {
    this.logger.info({ event: 'telegram_polling_started', skipPending: this.skipPending }, 'telegram_polling_started');
    let pendingSkipped = !this.skipPending;

    while (this.running) {
      try {
        if (!pendingSkipped) {
          await this.discardPending();
          pendingSkipped = true;
        }
        await this.pollOnce();
      } catch (error) {
        if (!this.running) {
          break;
        }

        this.logger.error(
          { event: 'telegram_polling_failed', restartDelayMs: this.restartDelayMs, error: errorForLog(error) },
          'telegram_polling_failed'
        );

        try {
          await sleep(this.restartDelayMs, undefined, { signal });
        } catch {
          break;
        }
      }
    }

    this.logger.info({ event: 'telegram_polling_stopped' }, 'telegram_polling_stopped');
  }
}
