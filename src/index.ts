// This is the process entrypoint that loads configuration, starts the bot, and handles graceful shutdown.

import pino from 'pino';
import { loadConfig } from './config/app-config.js';
import { createServer, type ServerResources } from './server.js';
import { buildLoggerOptions, errorForLog } from './utils/logger.js';

const bootLogger = pino(buildLoggerOptions());

// This helper connects the resources to Telegram in the configured mode.
async function connectTelegram(resources: ServerResources, webhookUrl: string | undefined, secret: string | undefined): Promise<void> {
  const { app, telegram, poller } = resources;

  if (poller) {
    await telegram.deleteWebhook();
    poller.start();
    return;
  }

  if (webhookUrl) {
    const registered = await telegram.setWebhook(webhookUrl, secret);
    app.log.info({ event: 'telegram_webhook_registered', registered, url: webhookUrl }, 'telegram_webhook_registered');
  }
}

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  const resources = await createServer(config);
  const { app, store } = resources;

  // This helper performs graceful shutdown to avoid SQLite corruption during container stop events.
  async function shutdown(signal: string): Promise<void> {
    app.log.info({ event: 'shutdown_started', signal }, 'shutdown_started');

    try {
      await app.close();
    } finally {
      store.close();
    }

    app.log.info({ event: 'shutdown_completed', signal }, 'shutdown_completed');
    process.exit(0);
  }

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  await app.listen({ host: config.host, port: config.port });
  app.log.info({ event: 'server_started', host: config.host, port: config.port }, 'server_started');

  await connectTelegram(resources, config.telegram.webhookUrl, config.telegram.webhookSecret);
}

main().catch((error: unknown) => {
  bootLogger.fatal({ event: 'server_start_failed', error: errorForLog(error) }, 'server_start_failed');
  process.exit(1);
});
