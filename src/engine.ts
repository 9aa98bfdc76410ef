import { logger } from './middleware/logger.js';
import { sanitizeInput } from './middleware/sanitize.js';
import { withTimeout } from './utils/timeout.js';
import type { MarketplaceStore } from './utils/db-backend.js';
import { AuditRecorder } from './core/audit-recorder.js';
import {
  ConversationController,
  TEXT,
  type ControllerHooks,
} from './core/conversation-controller.js';
import type { EngineSettings } from './core/conversation-types.js';
import type { InboundEvent } from './core/inbound-event.js';
import { ModerationDispatcher, type AuditFailureReport } from './core/moderation-dispatcher.js';
import { reply, type OutboundAction } from './core/outbound-action.js';
import { authorize } from './core/permissions.js';
import { resolvePrincipal, type AccessPolicy, type Principal } from './core/principals.js';
import { ConversationRegistry } from './core/registry.js';
import type { SessionStore } from './core/session.js';
import { createMarketplaceCommands, registerConversations } from './features/index.js';

export interface ModerationOptions {
  /** Wrap mutation and audit entry in one store transaction. */
  transactional: boolean;
  /** Audit denied attempts as well as applied actions. */
  recordDenied: boolean;
  onAuditFailure?: (report: AuditFailureReport) => void;
}

export interface MarketplaceEngineOptions {
  store: MarketplaceStore;
  sessions: SessionStore;
  settings: EngineSettings;
  policy: AccessPolicy;
  moderation: ModerationOptions;
  hooks?: ControllerHooks;
  clock?: () => number;
}

export interface MarketplaceEngine {
  /** Sole entry point: one inbound event in, the actions to deliver out. */
  handle(event: InboundEvent): Promise<OutboundAction[]>;
  /** Resolve the principal behind a user id (creating the user on first contact). */
  principal(userId: number): Promise<Principal>;
  authorize(principal: Principal, permission: string): boolean;
  readonly registry: ConversationRegistry;
  readonly audit: AuditRecorder;
}

/**
 * Wire the registry, controller and moderation control plane around one
 * data store and session store.
 */
export function createMarketplaceEngine(options: MarketplaceEngineOptions): MarketplaceEngine {
  const { store, sessions, settings, policy } = options;
  const timeoutMs = settings.storeTimeoutMs;

  const registry = registerConversations(new ConversationRegistry());
  const audit = new AuditRecorder(timeoutMs);
  const dispatcher = new ModerationDispatcher({
    store,
    audit,
    timeoutMs,
    transactional: options.moderation.transactional,
    recordDenied: options.moderation.recordDenied,
    onAuditFailure: options.moderation.onAuditFailure,
  });
  const controller = new ConversationController({
    registry,
    sessions,
    store,
    dispatcher,
    settings,
    commands: createMarketplaceCommands(audit),
    hooks: options.hooks,
    clock: options.clock,
  });

  logger.info({ kinds: registry.kinds(), transactional: options.moderation.transactional }, 'Marketplace engine ready');

  return {
    registry,
    audit,
    authorize,

    principal: (userId) => withTimeout(resolvePrincipal(store, userId, policy), timeoutMs, 'resolvePrincipal'),

    async handle(event) {
      const { principalId } = event;
      const input = sanitizeInput(event.input);
      if (!input.ok) {
        return [reply(principalId, `⚠️ ${input.error}`, 'error')];
      }

      let principal: Principal;
      try {
        principal = await withTimeout(
          resolvePrincipal(store, principalId, policy, event.profile),
          timeoutMs,
          'resolvePrincipal',
        );
      } catch (err) {
        logger.error({ err, principalId }, 'Failed to resolve principal');
        return [reply(principalId, TEXT.storageError, 'error')];
      }

      return controller.handle(principal, input.value);
    },
  };
}
