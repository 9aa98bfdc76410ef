import { logger } from '../middleware/logger.js';
import { withDeadline, withTimeout } from '../utils/timeout.js';
import type { MarketplaceStore } from '../utils/db-backend.js';
import type { AuditDetail, AuditEntry } from '../utils/db-types.js';
import type { AuditRecorder } from './audit-recorder.js';
import { StorageError, toStorageError } from './errors.js';
import {
  authorize,
  requiredPermission,
  type ModerationAction,
  type ModerationTargetType,
  type Permission,
} from './permissions.js';
import type { Principal } from './principals.js';

export interface ModerationRequest<T> {
  actor: Principal;
  action: ModerationAction;
  targetType: ModerationTargetType;
  targetId: number | null;
  detail: AuditDetail;
  mutate(store: MarketplaceStore): Promise<T>;
}

export type DispatchResult<T> =
  | { status: 'applied'; value: T; audit: AuditEntry }
  | { status: 'forbidden'; permission: Permission }
  | { status: 'storage-error'; error: StorageError }
  /** The mutation committed but its audit entry could not be written. */
  | { status: 'audit-failed'; value: T; error: StorageError };

export interface AuditFailureReport {
  actorId: number;
  action: ModerationAction;
  targetType: ModerationTargetType;
  targetId: number | null;
  error: StorageError;
}

export interface ModerationDispatcherOptions {
  store: MarketplaceStore;
  audit: AuditRecorder;
  timeoutMs: number;
  /** Wrap mutate + audit in one store transaction. */
  transactional: boolean;
  /** Also write an audit entry for denied attempts. */
  recordDenied: boolean;
  onAuditFailure?: (report: AuditFailureReport) => void;
}

/**
 * Every moderation mutation goes through here, in this order:
 * permission check → mutation → audit entry. Each step gates the next.
 */
export class ModerationDispatcher {
  constructor(private readonly options: ModerationDispatcherOptions) {}

  async dispatch<T>(request: ModerationRequest<T>): Promise<DispatchResult<T>> {
    const { actor, action, targetType, targetId, detail } = request;
    const permission = requiredPermission(action);

    if (!authorize(actor, permission)) {
      logger.warn({ actorId: actor.id, role: actor.role, action, permission, targetType, targetId }, 'Moderation action denied');
      await this.recordDenied(request, permission);
      return { status: 'forbidden', permission };
    }

    if (this.options.transactional) {
      return this.dispatchInTransaction(request);
    }

    let value: T;
    try {
      value = await withTimeout(request.mutate(this.options.store), this.options.timeoutMs, action);
    } catch (err) {
      const error = toStorageError(err);
      logger.error({ err, actorId: actor.id, action, targetType, targetId }, 'Moderation mutation failed');
      return { status: 'storage-error', error };
    }

    try {
      const audit = await this.options.audit.record(this.options.store, {
        actorId: actor.id,
        action,
        targetType,
        targetId,
        detail,
      });
      return { status: 'applied', value, audit };
    } catch (err) {
      const error = toStorageError(err, 'after-mutation');
      logger.fatal({ err, actorId: actor.id, action, targetType, targetId }, 'Moderation action applied but audit entry was not written');
      this.options.onAuditFailure?.({ actorId: actor.id, action, targetType, targetId, error });
      return { status: 'audit-failed', value, error };
    }
  }

  private async dispatchInTransaction<T>(request: ModerationRequest<T>): Promise<DispatchResult<T>> {
    const { actor, action, targetType, targetId, detail } = request;
    try {
      // The deadline travels into the transaction: a mutation still running
      // when the caller is told "timed out" is rolled back, not committed.
      const { value, audit } = await withDeadline(
        (signal) => this.options.store.withTransaction(async (tx) => {
          const value = await request.mutate(tx);
          const audit = await this.options.audit.record(tx, { actorId: actor.id, action, targetType, targetId, detail });
          return { value, audit };
        }, { signal }),
        this.options.timeoutMs,
        action,
      );
      return { status: 'applied', value, audit };
    } catch (err) {
      // Rolled back: neither the mutation nor the audit entry exists.
      const cause = toStorageError(err);
      const error = cause.phase === 'before-mutation'
        ? cause
        : new StorageError(cause.message, 'before-mutation', { cause });
      logger.error({ err, actorId: actor.id, action, targetType, targetId }, 'Moderation transaction rolled back');
      return { status: 'storage-error', error };
    }
  }

  private async recordDenied<T>(request: ModerationRequest<T>, permission: Permission): Promise<void> {
    if (!this.options.recordDenied) return;
    try {
      await this.options.audit.record(this.options.store, {
        actorId: request.actor.id,
        action: request.action,
        targetType: request.targetType,
        targetId: request.targetId,
        detail: { ...request.detail, outcome: 'denied', permission },
      });
    } catch (err) {
      logger.error({ err, actorId: request.actor.id, action: request.action }, 'Failed to record denied moderation attempt');
    }
  }
}
