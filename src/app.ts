import { resolve } from 'path';
import { logger } from './middleware/logger.js';
import { PROJECT_ROOT, type AppConfig } from './utils/config.js';
import { IN_MEMORY, openDatabase } from './utils/db-schema.js';
import { SqliteMarketplaceStore } from './utils/db-sqlite.js';
import { SqliteSessionStore } from './utils/db-sessions.js';
import type { EngineSettings } from './core/conversation-types.js';
import type { AccessPolicy } from './core/principals.js';
import { createMarketplaceEngine, type MarketplaceEngine } from './engine.js';

export interface MarketplaceApp {
  engine: MarketplaceEngine;
  store: SqliteMarketplaceStore;
  sessions: SqliteSessionStore;
  close(): Promise<void>;
}

export function settingsFromConfig(cfg: AppConfig): EngineSettings {
  return {
    minPrice: cfg.MIN_PRICE,
    maxPrice: cfg.MAX_PRICE,
    maxPhotos: cfg.MAX_PHOTOS,
    minTitleLength: cfg.MIN_TITLE_LENGTH,
    maxTitleLength: cfg.MAX_TITLE_LENGTH,
    maxDescriptionLength: cfg.MAX_DESCRIPTION_LENGTH,
    maxMessageLength: cfg.MAX_MESSAGE_LENGTH,
    searchPageSize: cfg.SEARCH_PAGE_SIZE,
    currencySymbol: cfg.CURRENCY_SYMBOL,
    storeTimeoutMs: cfg.STORE_TIMEOUT_MS,
    sessionTtlMs: cfg.SESSION_TTL_MINUTES * 60_000,
  };
}

export function policyFromConfig(cfg: AppConfig): AccessPolicy {
  const adminIds = new Set(cfg.ADMIN_USER_IDS);
  // The super admin is always on the allow-list.
  if (cfg.SUPER_ADMIN_ID !== undefined) adminIds.add(cfg.SUPER_ADMIN_ID);
  return { adminIds, superAdminId: cfg.SUPER_ADMIN_ID };
}

export function databasePath(cfg: AppConfig): string {
  return cfg.DATABASE_PATH === IN_MEMORY ? IN_MEMORY : resolve(PROJECT_ROOT, cfg.DATABASE_PATH);
}

/** Open the database and build the engine on top of it. */
export function createApp(cfg: AppConfig): MarketplaceApp {
  const db = openDatabase(databasePath(cfg));
  const store = new SqliteMarketplaceStore(db);
  const sessions = new SqliteSessionStore(db);

  const engine = createMarketplaceEngine({
    store,
    sessions,
    settings: settingsFromConfig(cfg),
    policy: policyFromConfig(cfg),
    moderation: {
      transactional: cfg.TRANSACTIONAL_MODERATION,
      recordDenied: cfg.AUDIT_DENIED_ATTEMPTS,
      onAuditFailure: (report) => {
        logger.fatal({ ...report, err: report.error }, 'ALERT: moderation action has no audit record');
      },
    },
    hooks: {
      onUnknownState: (error, principalId) => {
        logger.fatal({ err: error, principalId }, 'ALERT: conversation registry is missing a rule');
      },
    },
  });

  return {
    engine,
    store,
    sessions,
    close: () => store.close(),
  };
}
