// This module runs one inbound trigger end to end: debounce, navigation, quota, export, and delivery.

import type { FastifyBaseLogger } from 'fastify';
import type { CatalogIndex } from '../catalog/catalog-index.js';
import type { SqliteStore } from '../db/database.js';
import type { ExportMaterializer } from '../export/export-materializer.js';
import type { NavigationMachine, NavigationOutcome } from '../navigation/state-machine.js';
import { decodeToken } from '../navigation/token-codec.js';
import type { DebounceFilter } from '../quota/debounce-filter.js';
import type { QuotaLedger } from '../quota/quota-ledger.js';
import type { ChatTransport, Region, Station, Trigger, UserRef } from '../types/domain.js';
import { isTransportError } from '../utils/errors.js';
import { errorForLog } from '../utils/logger.js';
import { messages } from './messages.js';
import type { ReferenceDocument } from './reference-document.js';

export interface BotServiceOptions {
  catalog: CatalogIndex;
  navigation: NavigationMachine;
  ledger: QuotaLedger;
  debounce: DebounceFilter;
  materializer: ExportMaterializer;
  store: SqliteStore;
  transport: ChatTransport;
  referenceDocument: ReferenceDocument | null;
  adminIds: ReadonlySet<string>;
  adminNotifyChatId?: string;
  monthlyCap: number;
  logger: FastifyBaseLogger;
  today: () => string;
  clock?: () => number;
}

export interface ParsedCommand {
  name: string;
  args: string[];
}

// This helper splits "/name@bot arg1 arg2" into a lowercase command name and its arguments.
export function parseCommand(text: string): ParsedCommand | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith('/')) {
    return null;
  }

  const [head, ...args] = trimmed.split(/\s+/);
  const name = head.slice(1).split('@')[0].toLowerCase();
  return name.length > 0 ? { name, args } : null;
}

export class BotService {
  private readonly catalog: CatalogIndex;
  private readonly navigation: NavigationMachine;
  private readonly ledger: QuotaLedger;
  private readonly debounce: DebounceFilter;
  private readonly materializer: ExportMaterializer;
  private readonly store: SqliteStore;
  private readonly transport: ChatTransport;
  private readonly referenceDocument: ReferenceDocument | null;
  private readonly adminIds: ReadonlySet<string>;
  private readonly adminNotifyChatId?: string;
  private readonly monthlyCap: number;
  private readonly logger: FastifyBaseLogger;
  private readonly today: () => string;
  private readonly clock: () => number;
  private readonly inFlight = new Set<Promise<void>>();

  public constructor(options: BotServiceOptions) {
    this.catalog = options.catalog;
    this.navigation = options.navigation;
    this.ledger = options.ledger;
    this.debounce = options.debounce;
    this.materializer = options.materializer;
    this.store = options.store;
    this.transport = options.transport;
    this.referenceDocument = options.referenceDocument;
    this.adminIds = options.adminIds;
    this.adminNotifyChatId = options.adminNotifyChatId;
    this.monthlyCap = options.monthlyCap;
    this.logger = options.logger.child({ component: 'bot_service' });
    this.today = options.today;
    this.clock = options.clock ?? (() => Date.now());
  }

  // This method starts one trigger as its own task and tracks it so shutdown can wait for it.
  public dispatch(trigger: Trigger): Promise<void> {
    const task: Promise<void> = this.handleTrigger(trigger).finally(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);
    return task;
  }

  public get pendingCount(): number {
    return this.inFlight.size;
  }

  // This method waits for every dispatched trigger to settle.
  public async drain(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
  }

  // This method is the error boundary for one trigger; it never rejects.
  public async handleTrigger(trigger: Trigger): Promise<void> {
    const startedAt = Date.now();
    const user: UserRef = { userId: trigger.userId, displayName: trigger.displayName };

    try {
      if (this.debounce.shouldSuppress(trigger.conversationId, trigger.messageId, trigger.payload, this.clock())) {
        this.logger.debug(
          {
            event: 'trigger_debounced',
            kind: trigger.kind,
            conversationId: trigger.conversationId,
            messageId: trigger.messageId,
            userId: trigger.userId
          },
          'trigger_debounced'
        );
        await this.acknowledge(trigger);
        return;
      }

      if (trigger.kind === 'command') {
        await this.handleCommand(trigger, user);
      } else {
        await this.handleCallback(trigger, user);
      }

      this.logger.info(
        {
          event: 'trigger_completed',
          kind: trigger.kind,
          userId: trigger.userId,
          durationMs: Date.now() - startedAt
        },
        'trigger_completed'
      );
    } catch (error) {
      this.logger.error(
        {
          event: isTransportError(error) ? 'trigger_transport_failed' : 'trigger_failed',
          kind: trigger.kind,
          conversationId: trigger.conversationId,
          userId: trigger.userId,
          durationMs: Date.now() - startedAt,
          error: errorForLog(error)
        },
        isTransportError(error) ? 'trigger_transport_failed' : 'trigger_failed'
      );

      if (!isTransportError(error)) {
        await this.sendQuietly(trigger.conversationId, messages.genericFailure);
      }
    }
  }

  private async handleCallback(trigger: Trigger, user: UserRef): Promise<void> {
    const outcome = await this.navigation.handle(decodeToken(trigger.payload, this.catalog), user);

    if (outcome.kind === 'alert') {
      await this.acknowledge(trigger, { text: outcome.text, alert: true });
      return;
    }

    await this.acknowledge(trigger);
    await this.applyOutcome(trigger, user, outcome);
  }

  private async applyOutcome(trigger: Trigger, user: UserRef, outcome: NavigationOutcome): Promise<void> {
    switch (outcome.kind) {
      case 'render':
        await this.transport.render({
          conversationId: trigger.conversationId,
          messageId: outcome.mode === 'edit' ? trigger.messageId : undefined,
          text: outcome.screen.text,
          buttons: outcome.screen.buttons
        });
        return;
      case 'notice':
      case 'alert':
        await this.transport.render({ conversationId: trigger.conversationId, text: outcome.text });
        return;
      case 'download':
        await this.runDownload(trigger, user, outcome.region, outcome.station);
        return;
      case 'admin_report':
        await this.sendDailyReport(trigger.conversationId);
        return;
      case 'ignore':
        this.logger.debug({ event: 'trigger_ignored', userId: user.userId, reason: outcome.reason }, 'trigger_ignored');
        return;
    }
  }

  // The event is logged only once CSV bytes exist, so a stored event always has a produced export behind it.
  private async runDownload(
    trigger: Trigger,
    user: UserRef,
    region: Region,
    station: Station
  ): Promise<void> {
    const conversationId = trigger.conversationId;
    const today = this.today();
    const exported = this.materializer.materialize(this.catalog.current(), region.id, station.id);

    if (exported.status === 'no_data') {
      await this.transport.render({ conversationId, text: messages.exportUnavailable });
      await this.renderRegionMenu(conversationId, user);
      return;
    }

    const reservation = await this.ledger.reserveAndLog(
      {
        userId: user.userId,
        displayName: user.displayName,
        regionId: region.id,
        stationId: station.id,
        stationName: station.name
      },
      today
    );

    if (reservation.status === 'denied') {
      await this.transport.render({
        conversationId,
        text: reservation.reason === 'ledger_unavailable' ? messages.ledgerUnavailable : messages.quotaReached(this.monthlyCap)
      });
      await this.renderRegionMenu(conversationId, user);
      return;
    }

    const shownInterval = { start: exported.intervalStart, end: exported.intervalEnd };
    try {
      await this.transport.render({ conversationId, text: messages.stationInfo(station.name, shownInterval) });
      await this.transport.sendDocument({
        conversationId,
        fileName: exported.fileName,
        contentType: 'text/csv; charset=utf-8',
        bytes: exported.bytes,
        caption: messages.csvCaption(station.name, shownInterval)
      });
      await this.sendReferenceDocument(conversationId);
    } catch (error) {
      this.logger.error(
        {
          event: 'export_delivery_failed',
          downloadId: reservation.event.id,
          userId: user.userId,
          stationId: station.id,
          error: errorForLog(error)
        },
        'export_delivery_failed'
      );
      throw error;
    }

    this.logger.info(
      {
        event: 'export_delivered',
        downloadId: reservation.event.id,
        userId: user.userId,
        regionId: region.id,
        stationId: station.id,
        rowCount: exported.rowCount,
        byteLength: exported.bytes.byteLength
      },
      'export_delivered'
    );

    await this.notifyAdmins(messages.adminNotification(user.displayName, user.userId, station.name));
    await this.renderRegionMenu(conversationId, user);
  }

  private async sendReferenceDocument(conversationId: string): Promise<void> {
    if (!this.referenceDocument) {
      await this.transport.render({ conversationId, text: messages.guideMissing });
      return;
    }

    await this.transport.sendDocument({
      conversationId,
      fileName: this.referenceDocument.fileName,
      contentType: this.referenceDocument.contentType,
      bytes: this.referenceDocument.bytes,
      caption: messages.guideCaption
    });
  }

  private async renderRegionMenu(conversationId: string, user: UserRef): Promise<void> {
    const screen = this.navigation.regionListScreen(0, user, messages.selectRegionAgain);
    await this.transport.render({ conversationId, text: screen.text, buttons: screen.buttons });
  }

  private async handleCommand(trigger: Trigger, user: UserRef): Promise<void> {
    const conversationId = trigger.conversationId;
    const command = parseCommand(trigger.payload);

    if (!command) {
      await this.transport.render({ conversationId, text: messages.unknownCommand });
      return;
    }

    switch (command.name) {
      case 'start':
        await this.applyOutcome(trigger, user, this.navigation.start(user));
        return;
      case 'help':
        await this.transport.render({ conversationId, text: messages.help(this.monthlyCap) });
        return;
      case 'report':
      case 'user':
      case 'users_count':
      case 'reload':
        await this.handleAdminCommand(trigger, user, command);
        return;
      default:
        await this.transport.render({ conversationId, text: messages.unknownCommand });
    }
  }

  private async handleAdminCommand(trigger: Trigger, user: UserRef, command: ParsedCommand): Promise<void> {
    const conversationId = trigger.conversationId;
    if (!this.adminIds.has(user.userId)) {
      this.logger.warn(
        { event: 'admin_command_rejected', userId: user.userId, command: command.name },
        'admin_command_rejected'
      );
      await this.transport.render({ conversationId, text: messages.notAuthorized });
      return;
    }

    switch (command.name) {
      case 'report':
        await this.sendDailyReport(conversationId);
        return;
      case 'user': {
        if (command.args.length !== 1) {
          await this.transport.render({ conversationId, text: messages.userUsage });
          return;
        }
        const summary = this.store.getUserDownloadSummary(command.args[0]);
        await this.transport.render({
          conversationId,
          text: summary ? messages.userSummary(summary) : messages.userNotFound(command.args[0])
        });
        return;
      }
      case 'users_count':
        await this.transport.render({ conversationId, text: messages.usersCount(this.store.countDistinctUsers()) });
        return;
      case 'reload': {
        await this.transport.render({ conversationId, text: messages.reloadStarted });
        const snapshot = await this.catalog.reload();
        let stationCount = 0;
        for (const stations of snapshot.stationsByRegion.values()) {
          stationCount += stations.length;
        }
        await this.transport.render({
          conversationId,
          text: messages.reloadCompleted(snapshot.regions.length, stationCount, snapshot.generation)
        });
        return;
      }
    }
  }

  private async sendDailyReport(conversationId: string): Promise<void> {
    const events = this.store.listDownloadsOn(this.today());
    const texts = events.length > 0 ? messages.report(events) : [messages.reportEmpty];
    for (const text of texts) {
      await this.transport.render({ conversationId, text });
    }
  }

  // Admin notifications are best effort; a failure is logged and never affects the user's export.
  private async notifyAdmins(text: string): Promise<void> {
    if (!this.adminNotifyChatId) {
      return;
    }

    try {
      await this.transport.render({ conversationId: this.adminNotifyChatId, text });
    } catch (error) {
      this.logger.warn({ event: 'admin_notification_failed', error: errorForLog(error) }, 'admin_notification_failed');
    }
  }

  private async acknowledge(trigger: Trigger, notice?: { text: string; alert: boolean }): Promise<void> {
    if (!trigger.callbackId) {
      return;
    }

    try {
      await this.transport.acknowledge(trigger.callbackId, notice);
    } catch (error) {
      this.logger.warn(
        { event: 'callback_acknowledge_failed', userId: trigger.userId, error: errorForLog(error) },
        'callback_acknowledge_failed'
      );
    }
  }

  private async sendQuietly(conversationId: string, text: string): Promise<void> {
    try {
      await this.transport.render({ conversationId, text });
    } catch (error) {
      this.logger.warn({ event: 'failure_notice_failed', error: errorForLog(error) }, 'failure_notice_failed');
    }
  }
}
