import type { MarketplaceStore } from '../utils/db-backend.js';
import type { MarketUser, UserWarning, WarningSeverity } from '../utils/db-types.js';
import { bold, type Result } from '../utils/formatting.js';
import {
  TERMINAL,
  moderationPlan,
  type ConversationDefinition,
  type RuleContext,
  type StartResult,
  type StateRuleSpec,
} from '../core/conversation-types.js';
import { TEXT } from '../core/conversation-controller.js';
import type { UserInput } from '../core/inbound-event.js';
import { reply, type SuggestedInput } from '../core/outbound-action.js';
import { formatSelection, parseIdParam, parseSelection } from '../core/selection.js';
import {
  mergeValue,
  payloadString,
  requireNumber,
  requireString,
  type JsonValue,
  type Payload,
} from '../core/session.js';
import { editStates, editedValue, resolveEdit, writeListingEdit } from './listings.js';
import { validateConfirmation, validateFreeText, validateId } from './validators.js';

/**
 * Admin moderation conversations. Each ends in a `moderate` effect, so the
 * mutation only happens after the dispatcher's permission check and is
 * always paired with an audit entry.
 *
 *   admin-block   target → reason               block_user
 *   admin-warn    target → reason → severity    warn_user
 *   admin-flag    target → reason               flag_listing
 *   admin-delete  target → confirm              delete_listing
 *   admin-edit    one field state               edit_listing
 *   admin-review-delete  target → confirm       delete_review
 */

export const MIN_REASON_LENGTH = 3;
export const MAX_REASON_LENGTH = 500;

const SEVERITIES: readonly WarningSeverity[] = ['low', 'medium', 'high'];

const SEVERITY_SUGGESTIONS: SuggestedInput[] = [
  { label: '🟢 Low', data: formatSelection('severity', 'low') },
  { label: '🟡 Medium', data: formatSelection('severity', 'medium') },
  { label: '🔴 High', data: formatSelection('severity', 'high') },
];

export function displayName(user: Pick<MarketUser, 'id' | 'username' | 'firstName'>): string {
  if (user.username) return `@${user.username}`;
  return user.firstName ?? `User ${user.id}`;
}

// ── Target resolution ───────────────────────────────────────────────

type TargetResolver = (store: MarketplaceStore, ctx: RuleContext, id: number) => Promise<Result<{ [key: string]: JsonValue }>>;

function userTarget(options: { rejectBlocked: boolean }): TargetResolver {
  return async (store, ctx, id) => {
    if (id === ctx.principal.id) return { ok: false, error: 'You cannot moderate your own account.' };
    const user = await store.getUser(id);
    if (!user) return { ok: false, error: `User ${id} was not found.` };
    if (options.rejectBlocked && !user.active) return { ok: false, error: `${displayName(user)} is already blocked.` };
    return { ok: true, value: { targetId: id, targetName: displayName(user) } };
  };
}

const listingTarget: TargetResolver = async (store, _ctx, id) => {
  const listing = await store.getListing(id);
  if (!listing || listing.status === 'deleted') return { ok: false, error: `Listing #${id} was not found.` };
  return { ok: true, value: { targetId: id, targetName: listing.title, sellerId: listing.sellerId } };
};

const reviewTarget: TargetResolver = async (store, _ctx, id) => {
  const review = await store.getReview(id);
  if (!review) return { ok: false, error: `Review #${id} was not found.` };
  return {
    ok: true,
    value: {
      targetId: id,
      targetName: `Review #${id}`,
      sellerId: review.sellerId,
      reviewerId: review.reviewerId,
      rating: review.rating,
      comment: review.comment,
    },
  };
};

function targetState(
  label: 'user' | 'listing' | 'review',
  heading: string,
  resolve: TargetResolver,
  next: string,
): StateRuleSpec {
  return {
    state: 'target',
    prompt: () => ({ text: `${heading}\n\nSend the ${label} id.` }),
    async validate(input, _payload, ctx) {
      const id = validateId(input, label);
      if (!id.ok) return id;
      return resolve(ctx.store, ctx, id.value);
    },
    apply: mergeValue,
    next: () => next,
  };
}

/** Optional id parameter on the start signal skips the target state. */
function startAt(resolve: TargetResolver, afterTarget: string) {
  return async (signal: { params: readonly string[] }, ctx: RuleContext): Promise<StartResult> => {
    if (signal.params.length === 0) return { ok: true, value: { state: 'target', payload: {} } };
    const id = parseIdParam(signal.params[0]);
    if (id === null) return { ok: false, error: 'That moderation link is not valid.' };
    const target = await resolve(ctx.store, ctx, id);
    if (!target.ok) return target;
    return { ok: true, value: { state: afterTarget, payload: target.value } };
  };
}

function reasonState(verb: string, next: StateRuleSpec['next'], terminal?: StateRuleSpec['terminal']): StateRuleSpec {
  return {
    state: 'reason',
    prompt: (payload) => ({
      text: `Why is ${bold(payloadString(payload, 'targetName') ?? 'the target')} being ${verb}? (${MIN_REASON_LENGTH}-${MAX_REASON_LENGTH} characters)`,
    }),
    validate: (input) => validateFreeText(input, 'reason', { min: MIN_REASON_LENGTH, max: MAX_REASON_LENGTH }),
    next,
    terminal,
  };
}

function validateSeverity(input: UserInput): Result<WarningSeverity> {
  let raw: string | undefined;
  if (input.type === 'text') raw = input.text.trim().toLowerCase();
  if (input.type === 'selection') {
    const { tag, params } = parseSelection(input.data);
    raw = tag === 'severity' ? params[0]?.toLowerCase() : undefined;
  }
  const severity = toSeverity(raw);
  return severity ? { ok: true, value: severity } : { ok: false, error: 'Please choose low, medium or high.' };
}

function toSeverity(raw: string | undefined): WarningSeverity | undefined {
  return SEVERITIES.find((candidate) => candidate === raw);
}

function sellerOf(payload: Payload): number | undefined {
  const sellerId = payload.sellerId;
  return typeof sellerId === 'number' ? sellerId : undefined;
}

// ── Block ───────────────────────────────────────────────────────────

const resolveBlockTarget = userTarget({ rejectBlocked: true });

export const adminBlock: ConversationDefinition = {
  kind: 'admin-block',
  initialState: 'target',
  trigger: { selections: [{ tag: 'admin_block', arity: [0, 1] }] },
  states: [
    targetState('user', `🚫 ${bold('Block a user')}`, resolveBlockTarget, 'reason'),
    reasonState('blocked', () => TERMINAL, {
      type: 'moderate',
      plan(payload, ctx) {
        const targetId = requireNumber(payload, 'targetId');
        const reason = requireString(payload, 'reason');
        const name = payloadString(payload, 'targetName') ?? `User ${targetId}`;
        return moderationPlan<void>({
          action: 'block_user',
          targetType: 'user',
          targetId,
          detail: { reason },
          async mutate(store) {
            if (!(await store.setUserActive(targetId, false))) {
              throw new Error(`User ${targetId} disappeared before it could be blocked`);
            }
            // Deleted outside the target's own per-principal lock, so an input
            // of theirs already in flight may still save a session after this.
            // That session is harmless: the controller checks `active` before
            // anything else and drops the session of a blocked principal.
            await ctx.sessions.delete(targetId);
          },
          onApplied: () => [
            reply(ctx.principal.id, `✅ ${bold(name)} has been blocked.\nReason: ${reason}`, 'success'),
            reply(targetId, TEXT.blocked, 'forbidden'),
          ],
        });
      },
    }),
  ],
  start: startAt(resolveBlockTarget, 'reason'),
};

// ── Warn ────────────────────────────────────────────────────────────

const resolveWarnTarget = userTarget({ rejectBlocked: false });

export const adminWarn: ConversationDefinition = {
  kind: 'admin-warn',
  initialState: 'target',
  trigger: { selections: [{ tag: 'admin_warn', arity: [0, 1] }] },
  states: [
    targetState('user', `⚠️ ${bold('Warn a user')}`, resolveWarnTarget, 'reason'),
    reasonState('warned', () => 'severity'),
    {
      state: 'severity',
      prompt: () => ({ text: 'How severe is this warning?', suggestedInputs: SEVERITY_SUGGESTIONS }),
      validate: (input) => validateSeverity(input),
      next: () => TERMINAL,
      terminal: {
        type: 'moderate',
        plan(payload, ctx) {
          const targetId = requireNumber(payload, 'targetId');
          const reason = requireString(payload, 'reason');
          const severity = toSeverity(requireString(payload, 'severity'));
          if (!severity) throw new Error('Session payload has an unknown severity');
          const name = payloadString(payload, 'targetName') ?? `User ${targetId}`;
          return moderationPlan<UserWarning>({
            action: 'warn_user',
            targetType: 'user',
            targetId,
            detail: { reason, severity },
            mutate: (store) => store.createWarning({
              userId: targetId,
              adminId: ctx.principal.id,
              reason,
              severity,
              expiresAt: null,
            }),
            onApplied: (warning) => [
              reply(ctx.principal.id, `✅ Warning #${warning.id} (${warning.severity}) issued to ${bold(name)}.`, 'success'),
              reply(targetId, `⚠️ ${bold('You have received a warning')} from the moderators.\nReason: ${reason}`, 'notice'),
            ],
          });
        },
      },
    },
  ],
  start: startAt(resolveWarnTarget, 'reason'),
};

// ── Flag ────────────────────────────────────────────────────────────

export const adminFlag: ConversationDefinition = {
  kind: 'admin-flag',
  initialState: 'target',
  trigger: { selections: [{ tag: 'admin_flag', arity: [0, 1] }] },
  states: [
    targetState('listing', `🚩 ${bold('Flag a listing')}`, listingTarget, 'reason'),
    reasonState('flagged', () => TERMINAL, {
      type: 'moderate',
      plan(payload, ctx) {
        const targetId = requireNumber(payload, 'targetId');
        const reason = requireString(payload, 'reason');
        const sellerId = sellerOf(payload);
        return moderationPlan<void>({
          action: 'flag_listing',
          targetType: 'listing',
          targetId,
          detail: { reason },
          async mutate(store) {
            if (!(await store.flagListing(targetId, reason, ctx.principal.id))) {
              throw new Error(`Listing ${targetId} disappeared before it could be flagged`);
            }
          },
          onApplied: () => {
            const actions = [reply(ctx.principal.id, `🚩 Listing #${targetId} has been flagged.\nReason: ${reason}`, 'success')];
            if (sellerId !== undefined) {
              actions.push(reply(sellerId, `🚩 Your listing #${targetId} was flagged for review.\nReason: ${reason}`, 'notice'));
            }
            return actions;
          },
        });
      },
    }),
  ],
  start: startAt(listingTarget, 'reason'),
};

// ── Delete ──────────────────────────────────────────────────────────

export const adminDelete: ConversationDefinition = {
  kind: 'admin-delete',
  initialState: 'target',
  trigger: { selections: [{ tag: 'admin_delete', arity: [0, 1] }] },
  states: [
    targetState('listing', `🗑 ${bold('Delete a listing')}`, listingTarget, 'confirm'),
    {
      state: 'confirm',
      prompt: (payload) => ({
        text: `Delete listing #${requireNumber(payload, 'targetId')} ${bold(payloadString(payload, 'targetName') ?? '')}? This cannot be undone.`,
        suggestedInputs: [
          { label: '🗑 Delete', data: formatSelection('confirm', 'yes') },
          { label: '↩️ Keep', data: formatSelection('confirm', 'no') },
        ],
      }),
      validate: (input) => validateConfirmation(input),
      next: () => TERMINAL,
      terminal: {
        type: 'moderate',
        declined: 'Listing was not deleted.',
        plan(payload, ctx) {
          if (payload.confirm !== true) return null;
          const targetId = requireNumber(payload, 'targetId');
          const title = payloadString(payload, 'targetName') ?? '';
          const sellerId = sellerOf(payload);
          return moderationPlan<void>({
            action: 'delete_listing',
            targetType: 'listing',
            targetId,
            detail: { title },
            async mutate(store) {
              if (!(await store.setListingStatus(targetId, 'deleted'))) {
                throw new Error(`Listing ${targetId} disappeared before it could be deleted`);
              }
            },
            onApplied: () => {
              const actions = [reply(ctx.principal.id, `🗑 Listing #${targetId} has been deleted.`, 'success')];
              if (sellerId !== undefined) {
                actions.push(reply(sellerId, `🗑 Your listing #${targetId} ${bold(title)} was removed by a moderator.`, 'notice'));
              }
              return actions;
            },
          });
        },
      },
    },
  ],
  start: startAt(listingTarget, 'confirm'),
};

// ── Edit any listing ────────────────────────────────────────────────

export const adminEdit: ConversationDefinition = {
  kind: 'admin-edit',
  initialState: 'title',
  trigger: { selections: [{ tag: 'admin_edit', arity: [2] }] },
  states: editStates((field) => ({
    type: 'moderate',
    plan(payload, ctx) {
      const listingId = requireNumber(payload, 'listingId');
      const sellerId = sellerOf(payload);
      return moderationPlan<void>({
        action: 'edit_listing',
        targetType: 'listing',
        targetId: listingId,
        detail: { field, old: payload.old ?? null, new: editedValue(field, payload) },
        async mutate(store) {
          if (!(await writeListingEdit(store, field, listingId, payload))) {
            throw new Error(`Listing ${listingId} disappeared before it could be edited`);
          }
        },
        onApplied: () => {
          const actions = [reply(ctx.principal.id, `✅ Listing #${listingId} updated (${field}).`, 'success')];
          if (sellerId !== undefined && sellerId !== ctx.principal.id) {
            actions.push(reply(sellerId, `✏️ A moderator changed the ${field} of your listing #${listingId}.`, 'notice'));
          }
          return actions;
        },
      });
    },
  })),
  async start(signal, ctx) {
    const resolved = await resolveEdit(signal.params, ctx);
    if (!resolved.ok) return resolved;
    const { listing, field, payload } = resolved.value;
    return { ok: true, value: { state: field, payload: { ...payload, sellerId: listing.sellerId } } };
  },
};

// ── Delete review ───────────────────────────────────────────────────

export const adminReviewDelete: ConversationDefinition = {
  kind: 'admin-review-delete',
  initialState: 'target',
  trigger: { selections: [{ tag: 'admin_review_delete', arity: [0, 1] }] },
  states: [
    targetState('review', `⭐ ${bold('Delete a review')}`, reviewTarget, 'confirm'),
    {
      state: 'confirm',
      prompt: (payload) => {
        const comment = payloadString(payload, 'comment');
        return {
          text: [
            `Delete review #${requireNumber(payload, 'targetId')} (${requireNumber(payload, 'rating')}/5)?`,
            ...(comment ? [`"${comment}"`] : []),
          ].join('\n'),
          suggestedInputs: [
            { label: '🗑 Delete', data: formatSelection('confirm', 'yes') },
            { label: '↩️ Keep', data: formatSelection('confirm', 'no') },
          ],
        };
      },
      validate: (input) => validateConfirmation(input),
      next: () => TERMINAL,
      terminal: {
        type: 'moderate',
        declined: 'Review was not deleted.',
        plan(payload, ctx) {
          if (payload.confirm !== true) return null;
          const targetId = requireNumber(payload, 'targetId');
          const sellerId = requireNumber(payload, 'sellerId');
          const reviewerId = requireNumber(payload, 'reviewerId');
          const rating = requireNumber(payload, 'rating');
          return moderationPlan<void>({
            action: 'delete_review',
            targetType: 'review',
            targetId,
            detail: { sellerId, reviewerId, rating },
            async mutate(store) {
              if (!(await store.deleteReview(targetId))) {
                throw new Error(`Review ${targetId} disappeared before it could be deleted`);
              }
            },
            onApplied: () => [reply(ctx.principal.id, `🗑 Review #${targetId} has been deleted.`, 'success')],
          });
        },
      },
    },
  ],
  start: startAt(reviewTarget, 'confirm'),
};
