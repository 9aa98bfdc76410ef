import { logger } from '../middleware/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type { MarketplaceStore } from '../utils/db-backend.js';
import type { AuditEntry, AuditQuery, NewAuditEntry } from '../utils/db-types.js';
import { toStorageError } from './errors.js';

/**
 * Append-only audit trail for moderation actions. Entries are never
 * updated or deleted from here.
 */
export class AuditRecorder {
  constructor(private readonly timeoutMs: number) {}

  /**
   * Write one entry through `store`, which may be a transaction handle.
   * Throws a StorageError on failure.
   */
  async record(store: MarketplaceStore, entry: NewAuditEntry): Promise<AuditEntry> {
    try {
      const written = await withTimeout(
        store.appendAudit({ ...entry, detail: { ...entry.detail } }),
        this.timeoutMs,
        'appendAudit',
      );
      logger.info({ actorId: entry.actorId, action: entry.action, targetType: entry.targetType, targetId: entry.targetId }, 'Audit entry recorded');
      return written;
    } catch (err) {
      throw toStorageError(err, 'after-mutation');
    }
  }

  async recent(store: MarketplaceStore, query: AuditQuery = {}): Promise<AuditEntry[]> {
    return withTimeout(store.listAudit({ limit: 50, ...query }), this.timeoutMs, 'listAudit');
  }
}
