import { logger } from '../middleware/logger.js';
import { bold, italic, type Result } from '../utils/formatting.js';
import type { Review, SellerRating } from '../utils/db-types.js';
import type { CommandBinding } from '../core/conversation-controller.js';
import { TERMINAL, type ConversationDefinition } from '../core/conversation-types.js';
import type { UserInput } from '../core/inbound-event.js';
import { reply, type SuggestedInput } from '../core/outbound-action.js';
import { formatSelection, parseIdParam, parseSelection } from '../core/selection.js';
import { payloadString, requireNumber, type Payload } from '../core/session.js';
import { displayName } from './moderation.js';
import { validateFreeText } from './validators.js';

/**
 * Seller reviews: leave one per listing (rating, then an optional comment)
 * and read a seller's average and latest reviews.
 */

export const MAX_REVIEW_COMMENT_LENGTH = 500;
export const REVIEWS_VIEW_LIMIT = 10;

const RATING_SUGGESTIONS: SuggestedInput[] = [1, 2, 3, 4, 5].map((rating) => ({
  label: '⭐'.repeat(rating),
  data: formatSelection('review_rating', rating),
}));

export function stars(rating: number): string {
  return '⭐'.repeat(Math.max(0, Math.min(5, Math.round(rating))));
}

/** `review_rating:<n>` or a typed digit, 1 to 5. */
export function validateRating(input: UserInput): Result<number> {
  let raw: string | undefined;
  if (input.type === 'text') raw = input.text.trim();
  if (input.type === 'selection') {
    const { tag, params } = parseSelection(input.data);
    if (tag === 'review_rating') raw = params[0];
  }
  const rating = raw !== undefined && /^[1-5]$/.test(raw) ? Number(raw) : null;
  return rating === null ? { ok: false, error: 'Please choose a rating from 1 to 5 stars.' } : { ok: true, value: rating };
}

export function formatRating({ average, count }: SellerRating): string {
  if (average === null) return 'No reviews yet.';
  return `Average rating: ${stars(average)} ${average.toFixed(1)} (${count} review${count === 1 ? '' : 's'})`;
}

function formatReview(review: Review): string {
  const line = `${stars(review.rating)} ${review.rating}/5 from user ${review.reviewerId}`;
  return review.comment ? `${line}\n  ${italic(review.comment)}` : line;
}

function savedText(payload: Payload): string {
  const rating = requireNumber(payload, 'rating');
  const comment = payloadString(payload, 'comment');
  const lines = [`✅ ${bold('Review saved!')}`, '', `Rating: ${stars(rating)} (${rating}/5)`];
  if (comment) lines.push(`Comment: ${comment}`);
  return lines.join('\n');
}

export const reviewCreate: ConversationDefinition = {
  kind: 'review-create',
  initialState: 'rating',
  trigger: { selections: [{ tag: 'leave_review', arity: [1] }] },
  states: [
    {
      state: 'rating',
      prompt: (payload) => ({
        text: `⭐ ${bold('Review the seller')}\n\nListing: ${bold(payloadString(payload, 'title') ?? '')}\n\nChoose a rating from 1 to 5 stars:`,
        suggestedInputs: RATING_SUGGESTIONS,
      }),
      validate: (input) => validateRating(input),
      next: () => 'comment',
    },
    {
      state: 'comment',
      skippable: true,
      prompt: (payload) => ({
        text: `Your rating: ${stars(requireNumber(payload, 'rating'))}\n\nAdd a comment (up to ${MAX_REVIEW_COMMENT_LENGTH} characters), or skip.`,
      }),
      validate: (input) => validateFreeText(input, 'comment', { max: MAX_REVIEW_COMMENT_LENGTH }),
      next: () => TERMINAL,
      terminal: {
        type: 'commit',
        async run(payload, ctx) {
          const reviewerId = ctx.principal.id;
          const review = await ctx.store.createReview({
            listingId: requireNumber(payload, 'listingId'),
            sellerId: requireNumber(payload, 'sellerId'),
            reviewerId,
            rating: requireNumber(payload, 'rating'),
            comment: payloadString(payload, 'comment') ?? null,
          });
          if (!review) {
            return [reply(reviewerId, '⚠️ You have already reviewed this listing.', 'error')];
          }
          logger.info({ principalId: reviewerId, reviewId: review.id, sellerId: review.sellerId, rating: review.rating }, 'Review created');
          return [reply(reviewerId, savedText(payload), 'success', [
            { label: '⭐ Seller reviews', data: formatSelection('seller_reviews', review.sellerId) },
          ])];
        },
      },
    },
  ],
  async start(signal, ctx) {
    const listingId = parseIdParam(signal.params[0]);
    if (listingId === null) return { ok: false, error: 'That review link is not valid.' };

    const listing = await ctx.store.getListing(listingId);
    if (!listing || listing.status === 'deleted') {
      return { ok: false, error: `Listing #${listingId} was not found.` };
    }
    if (listing.sellerId === ctx.principal.id) {
      return { ok: false, error: 'You cannot review your own listing.' };
    }
    if (await ctx.store.findReview(ctx.principal.id, listingId)) {
      return { ok: false, error: 'You have already reviewed this listing.' };
    }
    return { ok: true, value: { state: 'rating', payload: { listingId, sellerId: listing.sellerId, title: listing.title } } };
  },
};

export function createReviewCommands(): CommandBinding[] {
  return [
    {
      commands: [],
      selectionTags: ['seller_reviews'],
      async run({ principal, store }, params) {
        const sellerId = parseIdParam(params[0]);
        if (sellerId === null) return [reply(principal.id, '⚠️ That action is not valid.', 'error')];

        const seller = await store.getUser(sellerId);
        if (!seller) return [reply(principal.id, `⚠️ User ${sellerId} was not found.`, 'error')];

        const [rating, reviews] = await Promise.all([
          store.sellerRating(sellerId),
          store.listSellerReviews(sellerId, REVIEWS_VIEW_LIMIT),
        ]);
        const header = `⭐ ${bold(`Reviews for ${displayName(seller)}`)}\n${formatRating(rating)}`;
        const body = reviews.map(formatReview).join('\n');
        return [reply(principal.id, body ? `${header}\n\n${body}` : header, 'results')];
      },
    },
  ];
}
