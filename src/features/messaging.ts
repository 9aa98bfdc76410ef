import { logger } from '../middleware/logger.js';
import { bold, truncate } from '../utils/formatting.js';
import type { MarketplaceStore } from '../utils/db-backend.js';
import type { Result } from '../utils/formatting.js';
import { TERMINAL, type ConversationDefinition } from '../core/conversation-types.js';
import { reply } from '../core/outbound-action.js';
import type { Principal } from '../core/principals.js';
import { formatSelection, parseIdParam } from '../core/selection.js';
import { mergeValue, payloadNumber, payloadString, type Payload } from '../core/session.js';
import { validateFreeText, validateId } from './validators.js';

export const MIN_MESSAGE_LENGTH = 2;

interface MessageContext {
  listingId: number;
  recipientId: number;
  listingTitle: string;
}

/** Resolve the seller of a listing the principal wants to ask about. */
async function contextFromListing(
  store: MarketplaceStore,
  sender: Principal,
  listingId: number,
): Promise<Result<MessageContext>> {
  const listing = await store.getListing(listingId);
  if (!listing || listing.status !== 'active') {
    return { ok: false, error: `Listing #${listingId} is not available.` };
  }
  if (listing.sellerId === sender.id) {
    return { ok: false, error: 'You cannot message yourself about your own listing.' };
  }
  return { ok: true, value: { listingId, recipientId: listing.sellerId, listingTitle: listing.title } };
}

/** Resolve a reply to someone who wrote about a listing. */
async function contextFromReply(
  store: MarketplaceStore,
  sender: Principal,
  userId: number,
  listingId: number,
): Promise<Result<MessageContext>> {
  if (userId === sender.id) {
    return { ok: false, error: 'You cannot message yourself.' };
  }
  const [recipient, listing] = await Promise.all([store.getUser(userId), store.getListing(listingId)]);
  if (!recipient || !recipient.active) {
    return { ok: false, error: 'That user is not available.' };
  }
  if (!listing) {
    return { ok: false, error: `Listing #${listingId} was not found.` };
  }
  return { ok: true, value: { listingId, recipientId: userId, listingTitle: listing.title } };
}

function seeded(context: MessageContext): Payload {
  return { ...context };
}

export const messaging: ConversationDefinition = {
  kind: 'messaging',
  initialState: 'recipient-context',
  trigger: {
    commands: ['/message'],
    selections: [
      { tag: 'contact_seller', arity: [0, 1] },
      { tag: 'reply_to', arity: [2] },
    ],
  },
  states: [
    {
      state: 'recipient-context',
      prompt: () => ({ text: '💬 Which listing is your message about? Send the listing number.' }),
      async validate(input, _payload, ctx) {
        const id = validateId(input, 'listing');
        if (!id.ok) return id;
        const context = await contextFromListing(ctx.store, ctx.principal, id.value);
        return context.ok ? { ok: true, value: { ...context.value } } : context;
      },
      apply: mergeValue,
      next: () => 'body',
    },
    {
      state: 'body',
      prompt: (payload, ctx) => ({
        text: `✉️ Write your message about ${bold(payloadString(payload, 'listingTitle') ?? 'the listing')} (${MIN_MESSAGE_LENGTH}-${ctx.settings.maxMessageLength} characters).`,
      }),
      validate: (input, _payload, ctx) => validateFreeText(input, 'message', {
        min: MIN_MESSAGE_LENGTH,
        max: ctx.settings.maxMessageLength,
      }),
      next: () => TERMINAL,
      terminal: {
        type: 'commit',
        async run(payload, ctx) {
          const senderId = ctx.principal.id;
          const recipientId = payloadNumber(payload, 'recipientId');
          const listingId = payloadNumber(payload, 'listingId');
          const text = payloadString(payload, 'body');
          if (recipientId === undefined || listingId === undefined || text === undefined) {
            throw new Error('Message draft is incomplete');
          }

          const message = await ctx.store.createMessage({ listingId, senderId, receiverId: recipientId, text });
          logger.info({ principalId: senderId, recipientId, listingId, messageId: message.id }, 'Message sent');

          const title = truncate(payloadString(payload, 'listingTitle') ?? '', 60);
          return [
            reply(senderId, '✅ Your message was sent.', 'success'),
            reply(recipientId, `📩 ${bold('New message')} about ${bold(title)}:\n\n${text}`, 'notice', [
              { label: '↩️ Reply', data: formatSelection('reply_to', senderId, listingId) },
            ]),
          ];
        },
      },
    },
  ],
  async start(signal, ctx) {
    if (signal.tag === 'reply_to') {
      const userId = parseIdParam(signal.params[0]);
      const listingId = parseIdParam(signal.params[1]);
      if (userId === null || listingId === null) return { ok: false, error: 'That reply link is not valid.' };
      const context = await contextFromReply(ctx.store, ctx.principal, userId, listingId);
      return context.ok ? { ok: true, value: { state: 'body', payload: seeded(context.value) } } : context;
    }

    if (signal.tag === 'contact_seller' && signal.params.length === 1) {
      const listingId = parseIdParam(signal.params[0]);
      if (listingId === null) return { ok: false, error: 'That listing link is not valid.' };
      const context = await contextFromListing(ctx.store, ctx.principal, listingId);
      return context.ok ? { ok: true, value: { state: 'body', payload: seeded(context.value) } } : context;
    }

    return { ok: true, value: { state: 'recipient-context', payload: {} } };
  },
};
