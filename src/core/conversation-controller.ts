import { logger } from '../middleware/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type { MarketplaceStore } from '../utils/db-backend.js';
import {
  TERMINAL,
  isAdminKind,
  type ConversationKind,
  type EngineSettings,
  type RuleContext,
  type StartResult,
  type StartSignal,
  type StateRule,
  type Validation,
} from './conversation-types.js';
import { UnknownStateError, toStorageError } from './errors.js';
import { inputKeyword, type UserInput } from './inbound-event.js';
import type { ModerationDispatcher } from './moderation-dispatcher.js';
import {
  CANCEL_SUGGESTION,
  SKIP_SUGGESTION,
  promptAction,
  reply,
  type OutboundAction,
  type Prompt,
} from './outbound-action.js';
import { KeyedMutex } from './principal-lock.js';
import type { Principal } from './principals.js';
import { parseSelection } from './selection.js';
import type { ConversationRegistry } from './registry.js';
import type { Payload, Session, SessionStore } from './session.js';

export const TEXT = {
  cancelled: '❌ Operation cancelled.',
  nothingToCancel: 'There is no operation in progress to cancel.',
  noActiveOperation: 'There is no operation in progress. Send /help to see what you can do.',
  expired: '⌛ Your previous operation expired. Please start again.',
  blocked: '⛔ Your account has been blocked. Contact support if you think this is a mistake.',
  noAdminAccess: '⛔ You do not have access to the admin panel.',
  storageError: '⚠️ Something went wrong while saving. Please send that again.',
  internalError: '😔 Sorry, something went wrong on our side. The operation was reset; please start again.',
  declined: 'Nothing was changed.',
} as const;

/** Stateless command such as /help; never touches the session. */
export interface CommandBinding {
  commands: string[];
  selectionTags?: string[];
  /** `params` holds a selection's parameters, e.g. `['12']` for `add_favorite:12`; empty for slash commands. */
  run(ctx: RuleContext, params: readonly string[]): OutboundAction[] | Promise<OutboundAction[]>;
}

interface CommandMatch {
  command: CommandBinding;
  params: readonly string[];
}

export interface ControllerHooks {
  /** Called after an UnknownStateError has been logged and the session reset. */
  onUnknownState?(error: UnknownStateError, principalId: number): void;
}

export interface ConversationControllerOptions {
  registry: ConversationRegistry;
  sessions: SessionStore;
  store: MarketplaceStore;
  dispatcher: ModerationDispatcher;
  settings: EngineSettings;
  commands?: CommandBinding[];
  hooks?: ControllerHooks;
  clock?: () => number;
}

interface LoadedSession {
  session?: Session;
  expired: boolean;
}

/**
 * Drives every multi-step interaction:
 *
 * 1. cancel → drop the session
 * 2. start signal → open a new session, replacing any prior one once the
 *    new one has been resolved
 * 3. stateless commands (help, menus)
 * 4. otherwise validate the input against the current state's rule and
 *    advance, re-prompt, or finish the conversation
 *
 * All of it runs inside a per-principal critical section so two inputs
 * from the same principal never race on the same session.
 */
export class ConversationController {
  private readonly lock = new KeyedMutex<number>();
  private readonly clock: () => number;

  constructor(private readonly options: ConversationControllerOptions) {
    this.clock = options.clock ?? Date.now;
  }

  async handle(principal: Principal, input: UserInput): Promise<OutboundAction[]> {
    return this.lock.run(principal.id, async () => {
      try {
        return await this.handleExclusive(principal, input);
      } catch (err) {
        if (err instanceof UnknownStateError) {
          return this.handleUnknownState(err, principal.id);
        }
        throw err;
      }
    });
  }

  private async handleExclusive(principal: Principal, input: UserInput): Promise<OutboundAction[]> {
    const id = principal.id;
    const ctx = this.context(principal);

    if (!principal.active) {
      await this.discardSession(id);
      return [reply(id, TEXT.blocked, 'forbidden')];
    }

    const { session, expired } = await this.loadSession(id, ctx.now);

    if (isCancelInput(input)) {
      if (!session) return [reply(id, TEXT.nothingToCancel, 'notice')];
      await this.discardSession(id);
      logger.info({ principalId: id, kind: session.kind, state: session.state }, 'Conversation cancelled');
      return [reply(id, TEXT.cancelled, 'cancelled')];
    }

    const start = this.options.registry.matchStart(input);
    if (start?.type === 'malformed') {
      logger.debug({ principalId: id, tag: start.tag, reason: start.reason }, 'Malformed selection');
      return [reply(id, '⚠️ That action is no longer valid. Please open the menu again.', 'error')];
    }
    if (start) {
      return this.startConversation(start.kind, start.signal, session, ctx);
    }

    const command = this.matchCommand(input);
    if (command) return this.runCommand(command, ctx);

    if (!session) {
      return [reply(id, expired ? TEXT.expired : TEXT.noActiveOperation, 'notice')];
    }

    return this.advance(session, input, ctx);
  }

  // ── Start ─────────────────────────────────────────────────────────

  private async startConversation(
    kind: ConversationKind,
    signal: StartSignal,
    previous: Session | undefined,
    ctx: RuleContext,
  ): Promise<OutboundAction[]> {
    const id = ctx.principal.id;

    if (isAdminKind(kind) && ctx.principal.role === 'none') {
      logger.warn({ principalId: id, kind }, 'Admin conversation requested without an admin role');
      return [reply(id, TEXT.noAdminAccess, 'forbidden')];
    }

    const definition = this.options.registry.definition(kind);
    let started: StartResult;
    try {
      started = definition.start
        ? await withTimeout(definition.start(signal, ctx), this.options.settings.storeTimeoutMs, `start:${kind}`)
        : { ok: true, value: { state: definition.initialState, payload: {} } };
    } catch (err) {
      logger.error({ err, principalId: id, kind }, 'Failed to start conversation');
      return [reply(id, TEXT.storageError, 'error')];
    }

    if (!started.ok) {
      return [reply(id, `⚠️ ${started.error}`, 'error')];
    }

    // A start that was refused leaves the old conversation where it was.
    // One that succeeds replaces it; none of its collected steps are executed.
    if (previous) {
      logger.info({ principalId: id, discardedKind: previous.kind, discardedState: previous.state, kind }, 'Previous conversation discarded');
    }

    const { state, payload } = started.value;
    const rule = this.options.registry.rule(kind, state);
    const session: Session = {
      principalId: id,
      kind,
      state,
      payload,
      createdAt: ctx.now,
      updatedAt: ctx.now,
    };

    if (!(await this.saveSession(session))) {
      return [reply(id, TEXT.storageError, 'error')];
    }

    logger.info({ principalId: id, kind, state }, 'Conversation started');
    return [promptAction(id, decoratePrompt(rule, rule.prompt(payload, ctx)))];
  }

  // ── Advance ───────────────────────────────────────────────────────

  private async advance(session: Session, input: UserInput, ctx: RuleContext): Promise<OutboundAction[]> {
    const id = session.principalId;
    const rule = this.options.registry.rule(session.kind, session.state);

    let payload: Payload = session.payload;
    if (!(rule.skippable && isSkipInput(input))) {
      let validation: Validation;
      try {
        validation = await withTimeout(
          Promise.resolve(rule.validate(input, payload, ctx)),
          this.options.settings.storeTimeoutMs,
          `validate:${session.kind}:${session.state}`,
        );
      } catch (err) {
        if (err instanceof UnknownStateError) throw err;
        logger.error({ err, principalId: id, kind: session.kind, state: session.state }, 'Validation lookup failed');
        return [reply(id, TEXT.storageError, 'error')];
      }

      if (!validation.ok) {
        logger.debug({ principalId: id, kind: session.kind, state: session.state, error: validation.error }, 'Input rejected');
        const prompt = decoratePrompt(rule, rule.prompt(payload, ctx));
        return [reply(id, `⚠️ ${validation.error}\n\n${prompt.text}`, 'validation-error', prompt.suggestedInputs)];
      }

      payload = rule.apply(payload, validation.value);
    }

    const target = rule.next(payload);
    if (target === TERMINAL) {
      return this.finish(session, rule, payload, ctx);
    }

    const nextRule = this.options.registry.rule(session.kind, target);
    const updated: Session = { ...session, state: target, payload, updatedAt: ctx.now };
    if (!(await this.saveSession(updated))) {
      return [reply(id, TEXT.storageError, 'error')];
    }

    return [promptAction(id, decoratePrompt(nextRule, nextRule.prompt(payload, ctx)))];
  }

  // ── Finish ────────────────────────────────────────────────────────

  private async finish(session: Session, rule: StateRule, payload: Payload, ctx: RuleContext): Promise<OutboundAction[]> {
    const id = session.principalId;
    const effect = rule.terminal;
    if (!effect) {
      throw new UnknownStateError(session.kind, `${session.state} (terminal without effect)`);
    }

    if (effect.type === 'read' || effect.type === 'commit') {
      let actions: OutboundAction[];
      try {
        actions = await withTimeout(effect.run(payload, ctx), this.options.settings.storeTimeoutMs, `${effect.type}:${session.kind}`);
      } catch (err) {
        // Session stays as it was so the final step can simply be resent.
        logger.error({ err: toStorageError(err), principalId: id, kind: session.kind }, 'Conversation commit failed');
        return [reply(id, TEXT.storageError, 'error')];
      }
      await this.discardSession(id);
      logger.info({ principalId: id, kind: session.kind, effect: effect.type }, 'Conversation completed');
      return actions;
    }

    const plan = effect.plan(payload, ctx);
    if (!plan) {
      await this.discardSession(id);
      return [reply(id, effect.declined ?? TEXT.declined, 'cancelled')];
    }

    const result = await this.options.dispatcher.dispatch({
      actor: ctx.principal,
      action: plan.action,
      targetType: plan.targetType,
      targetId: plan.targetId,
      detail: plan.detail,
      mutate: (store) => plan.mutate(store),
    });

    switch (result.status) {
      case 'applied':
        await this.discardSession(id);
        return plan.onApplied(result.value);
      case 'forbidden':
        return [reply(id, `⛔ You do not have permission: ${result.permission}`, 'forbidden')];
      case 'storage-error':
        return [reply(id, TEXT.storageError, 'error')];
      case 'audit-failed': {
        // The action happened; say so, and say the record is missing.
        await this.discardSession(id);
        const [first, ...rest] = plan.onApplied(result.value);
        const warning = '⚠️ The audit record for this action could not be written. Operators have been alerted.';
        if (!first) return [reply(id, warning, 'error')];
        return [{ ...first, text: `${first.text}\n\n${warning}` }, ...rest];
      }
    }
  }

  // ── Helpers ───────────────────────────────────────────────────────

  private context(principal: Principal): RuleContext {
    return {
      principal,
      store: this.options.store,
      sessions: this.options.sessions,
      settings: this.options.settings,
      now: this.clock(),
    };
  }

  private async runCommand({ command, params }: CommandMatch, ctx: RuleContext): Promise<OutboundAction[]> {
    try {
      return await withTimeout(
        Promise.resolve(command.run(ctx, params)),
        this.options.settings.storeTimeoutMs,
        `command:${command.commands[0] ?? 'selection'}`,
      );
    } catch (err) {
      logger.error({ err, principalId: ctx.principal.id }, 'Command failed');
      return [reply(ctx.principal.id, TEXT.storageError, 'error')];
    }
  }

  private matchCommand(input: UserInput): CommandMatch | undefined {
    const commands = this.options.commands ?? [];
    if (input.type === 'selection') {
      const { tag, params } = parseSelection(input.data);
      const command = commands.find((candidate) => (candidate.selectionTags ?? []).includes(tag));
      return command ? { command, params } : undefined;
    }
    const keyword = inputKeyword(input);
    if (keyword === null) return undefined;
    const command = commands.find((candidate) => candidate.commands.includes(keyword));
    return command ? { command, params: [] } : undefined;
  }

  private async loadSession(principalId: number, now: number): Promise<LoadedSession> {
    let session: Session | undefined;
    try {
      session = await withTimeout(this.options.sessions.get(principalId), this.options.settings.storeTimeoutMs, 'sessions.get');
    } catch (err) {
      // Fail open: an unreadable session means the principal starts fresh.
      logger.warn({ err, principalId }, 'Session store unavailable, treating principal as having no session');
      return { expired: false };
    }

    const ttl = this.options.settings.sessionTtlMs;
    if (session && ttl > 0 && now - session.updatedAt > ttl) {
      logger.info({ principalId, kind: session.kind, state: session.state }, 'Session expired');
      await this.discardSession(principalId);
      return { expired: true };
    }

    return { session, expired: false };
  }

  private async saveSession(session: Session): Promise<boolean> {
    try {
      await withTimeout(this.options.sessions.put(session), this.options.settings.storeTimeoutMs, 'sessions.put');
      return true;
    } catch (err) {
      logger.error({ err, principalId: session.principalId, kind: session.kind, state: session.state }, 'Failed to persist session');
      return false;
    }
  }

  private async discardSession(principalId: number): Promise<void> {
    try {
      await withTimeout(this.options.sessions.delete(principalId), this.options.settings.storeTimeoutMs, 'sessions.delete');
    } catch (err) {
      logger.error({ err, principalId }, 'Failed to delete session');
    }
  }

  private async handleUnknownState(error: UnknownStateError, principalId: number): Promise<OutboundAction[]> {
    logger.fatal({ err: error, principalId, kind: error.kind, state: error.state }, 'Conversation reached an unregistered state');
    await this.discardSession(principalId);
    this.options.hooks?.onUnknownState?.(error, principalId);
    return [reply(principalId, TEXT.internalError, 'error')];
  }
}

// ── Input classification ────────────────────────────────────────────

const CANCEL_KEYWORDS = new Set(['/cancel', 'cancel']);
const SKIP_KEYWORDS = new Set(['/skip', 'skip']);

export function isCancelInput(input: UserInput): boolean {
  const keyword = inputKeyword(input);
  return keyword !== null && CANCEL_KEYWORDS.has(keyword);
}

export function isSkipInput(input: UserInput): boolean {
  const keyword = inputKeyword(input);
  return keyword !== null && SKIP_KEYWORDS.has(keyword);
}

function decoratePrompt(rule: StateRule, prompt: Prompt): Required<Prompt> {
  const suggestions = [...(prompt.suggestedInputs ?? [])];
  if (rule.skippable && !suggestions.some((s) => s.data === SKIP_SUGGESTION.data)) {
    suggestions.push(SKIP_SUGGESTION);
  }
  suggestions.push(CANCEL_SUGGESTION);
  return { text: prompt.text, suggestedInputs: suggestions };
}
