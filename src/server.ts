// This module wires the bot core, its collaborators, the HTTP routes, and lifecycle resources.

import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import type { AppConfig } from './config/app-config.js';
import { CatalogIndex } from './catalog/catalog-index.js';
import { loadParquetDataset } from './dataset/arrow-source.js';
import type { DatasetSource } from './dataset/source.js';
import { SqliteStore } from './db/database.js';
import { ExportMaterializer } from './export/export-materializer.js';
import { registerWebhookRoutes } from './http/webhook.js';
import { NavigationMachine } from './navigation/state-machine.js';
import { DebounceFilter } from './quota/debounce-filter.js';
import { QuotaLedger } from './quota/quota-ledger.js';
import { BotService } from './services/bot-service.js';
import { loadReferenceDocument } from './services/reference-document.js';
import { TelegramClient } from './telegram/client.js';
import { TelegramPoller } from './telegram/poller.js';
import { TelegramTransport } from './telegram/transport.js';
import type { ChatTransport } from './types/domain.js';
import { calendarDateIn } from './utils/dates.js';
import { AppError, normalizeError } from './utils/errors.js';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from './utils/logger.js';
import { SERVICE_NAME, SERVICE_VERSION } from './version.js';

export interface ServerOverrides {
  transport?: ChatTransport;
  loadSource?: () => Promise<DatasetSource>;
  now?: () => Date;
}

export interface ServerResources {
  app: FastifyInstance;
  store: SqliteStore;
  catalog: CatalogIndex;
  service: BotService;
  telegram: TelegramClient;
  poller: TelegramPoller | null;
}

// This map stores high-resolution request start time per Fastify request object.
const requestStartTimes = new WeakMap<FastifyRequest, bigint>();

// This function builds the full application; the catalog is built before it returns so the first click is served from the index.
export async function createServer(config: AppConfig, overrides: ServerOverrides = {}): Promise<ServerResources> {
  const now = overrides.now ?? (() => new Date());

  const app = Fastify({
    logger: buildLoggerOptions(config.logLevel),
    bodyLimit: 1024 * 1024
  });

  // Ledger initialization failure is the one fatal startup error, so it is allowed to throw.
  const store = new SqliteStore(config.ledger.dbPath, { busyTimeoutMs: config.ledger.busyTimeoutMs });

  const catalog = new CatalogIndex({
    loadSource: overrides.loadSource ?? (() => loadParquetDataset(config.dataset.path, config.dataset.columns)),
    logger: app.log,
    now
  });
  await catalog.reload();

  const today = (): string => calendarDateIn(now(), config.quota.timeZone);

  const ledger = new QuotaLedger({
    store,
    policy: {
      monthlyCap: config.quota.monthlyCap,
      exemptUserIds: config.quota.exemptUserIds,
      exemptScope: config.quota.exemptScope
    },
    logger: app.log,
    now
  });

  const telegram = new TelegramClient(
    {
      baseUrl: config.telegram.apiBaseUrl,
      token: config.telegram.botToken,
      requestTimeoutMs: config.telegram.requestTimeoutMs,
      maxRetries: config.telegram.maxRetries,
      retryBaseDelayMs: config.telegram.retryBaseDelayMs
    },
    app.log
  );

  const transport =
    overrides.transport ?? new TelegramTransport({ client: telegram, buttonsPerRow: config.telegram.buttonsPerRow });

  const service = new BotService({
    catalog,
    navigation: new NavigationMachine({
      catalog,
      ledger,
      pageSize: config.navigation.pageSize,
      adminIds: config.admin.adminIds,
      monthlyCap: config.quota.monthlyCap,
      today
    }),
    ledger,
    debounce: new DebounceFilter({ windowMs: config.debounceWindowMs }),
    materializer: new ExportMaterializer({ logger: app.log, includeBom: config.export.includeBom }),
    store,
    transport,
    referenceDocument: await loadReferenceDocument(config.referenceDocumentPath, app.log),
    adminIds: config.admin.adminIds,
    adminNotifyChatId: config.admin.notifyChatId,
    monthlyCap: config.quota.monthlyCap,
    logger: app.log,
    today,
    clock: () => now().getTime()
  });

  const poller =
    config.telegram.mode === 'polling'
      ? new TelegramPoller({
          client: telegram,
          dispatch: (trigger) => service.dispatch(trigger),
          logger: app.log,
          timeoutSeconds: config.telegram.pollTimeoutSeconds,
          skipPending: config.telegram.skipPending
        })
      : null;

  // This hook records request start time for duration logging.
  app.addHook('onRequest', async (request) => {
    requestStartTimes.set(request, process.hrtime.bigint());
  });

  // This hook logs response completion including status and duration for request tracing.
  app.addHook('onResponse', async (request, reply) => {
    const startTime = requestStartTimes.get(request);
    const durationMs = startTime ? Number(process.hrtime.bigint() - startTime) / 1_000_000 : undefined;

    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.routeOptions.url ?? request.url,
        durationMs
      },
      'http_request_complete'
    );
  });

  // This endpoint exposes a lightweight liveness signal.
  app.get('/health', async () => {
    return {
      ok: true,
      status: 'alive',
      ts: new Date().toISOString()
    };
  });

  // This endpoint reports catalog and ledger state; an empty catalog is served but reported as not ready.
  app.get('/ready', async (request, reply) => {
    const snapshot = catalog.current();
    let stationCount = 0;
    for (const stations of snapshot.stationsByRegion.values()) {
      stationCount += stations.length;
    }

    let ledgerReachable = false;
    try {
      ledgerReachable = store.ping();
    } catch (error) {
      request.log.warn({ event: 'readiness_ledger_unreachable', error: errorForLog(error) }, 'readiness_ledger_unreachable');
    }

    const ok = ledgerReachable && snapshot.regions.length > 0;
    reply.status(ok ? 200 : 503);
    return {
      ok,
      catalog: {
        generation: snapshot.generation,
        builtAt: snapshot.builtAt,
        regionCount: snapshot.regions.length,
        stationCount,
        rowCount: snapshot.rowCount
      },
      ledgerReachable,
      pendingTriggers: service.pendingCount,
      telegramMode: config.telegram.mode
    };
  });

  // This endpoint exposes service identity for monitoring.
  app.get('/version', async () => {
    return {
      ok: true,
      name: SERVICE_NAME,
      version: SERVICE_VERSION
    };
  });

  if (config.telegram.mode === 'webhook') {
    registerWebhookRoutes(app, {
      secret: config.telegram.webhookSecret,
      dispatch: (trigger) => service.dispatch(trigger)
    });
  }

  // This shutdown hook stops polling and lets in-flight triggers finish before storage closes.
  app.addHook('onClose', async () => {
    if (poller) {
      await poller.stop();
    }
    await service.drain();
  });

  // This handler maps internal exceptions into structured JSON errors.
  app.setErrorHandler((error, request, reply) => {
    const normalized = normalizeError(error);

    request.log.error(
      {
        event: 'http_request_failed',
        requestId: request.id,
        code: normalized.code,
        details: sanitizeForLog(normalized.details),
        error: errorForLog(error)
      },
      'http_request_failed'
    );

    reply.status(normalized.statusCode).send({
      ok: false,
      error: {
        code: normalized.code,
        message: normalized.message
      }
    });
  });

  app.setNotFoundHandler((request, reply) => {
    const error = new AppError(404, 'not_found', `Route not found: ${request.method} ${request.url}`);

    request.log.warn(
      {
        event: 'http_route_not_found',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_route_not_found'
    );

    reply.status(404).send({
      ok: false,
      error: {
        code: error.code,
        message: error.message
      }
    });
  });

  return {
    app,
    store,
    catalog,
    service,
    telegram,
    poller
  };
}
