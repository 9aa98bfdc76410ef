import type { Server } from 'node:http';
import { logger } from './middleware/logger.js';
import { config } from './utils/config.js';
import { createApp, databasePath, type MarketplaceApp } from './app.js';
import { createHttpServer } from './platforms/http/server.js';

let app: MarketplaceApp | null = null;
let server: Server | null = null;
let sweepTimer: ReturnType<typeof setInterval> | null = null;

async function main(): Promise<void> {
  logger.info('🛍 Marketplace starting...');

  logger.info({
    databasePath: databasePath(config),
    adminCount: config.ADMIN_USER_IDS.length,
    superAdminConfigured: config.SUPER_ADMIN_ID !== undefined,
    transactionalModeration: config.TRANSACTIONAL_MODERATION,
    auditDeniedAttempts: config.AUDIT_DENIED_ATTEMPTS,
    sessionTtlMinutes: config.SESSION_TTL_MINUTES,
    logLevel: config.LOG_LEVEL,
  }, 'Configuration loaded');

  app = createApp(config);
  const sessions = app.sessions;

  // Abandoned sessions are already ignored on read; this only reclaims rows.
  const ttlMs = config.SESSION_TTL_MINUTES * 60_000;
  if (ttlMs > 0) {
    sweepTimer = setInterval(() => {
      sessions.sweepExpired(Date.now() - ttlMs)
        .then((removed) => {
          if (removed > 0) logger.info({ removed }, 'Expired sessions swept');
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'Session sweep failed');
        });
    }, ttlMs);
    sweepTimer.unref();
  }

  const httpServer = createHttpServer(app.engine);
  server = httpServer;
  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(config.HTTP_PORT, config.HTTP_HOST, () => resolve());
  });
  logger.info({ host: config.HTTP_HOST, port: config.HTTP_PORT }, '🛍 Marketplace is online and listening');
}

main().catch((err) => {
  logger.fatal({ err }, 'Fatal error, shutting down');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ err: reason }, 'Unhandled promise rejection, shutting down');
  process.exit(1);
});

process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception, shutting down');
  process.exit(1);
});

// Graceful shutdown
async function shutdown(signal: 'SIGINT' | 'SIGTERM'): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal, shutting down');
  if (sweepTimer) clearInterval(sweepTimer);

  const listening = server;
  if (listening) {
    await new Promise<void>((resolve) => {
      listening.close(() => resolve());
    });
  }

  try {
    await app?.close();
  } catch (err) {
    logger.error({ err, signal }, 'Failed to close database cleanly during shutdown');
  }

  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
