import { logger } from '../middleware/logger.js';
import { bold, formatPrice, truncate } from '../utils/formatting.js';
import type { ListingQuery } from '../utils/db-types.js';
import { TERMINAL, type ConversationDefinition, type EngineSettings } from '../core/conversation-types.js';
import { reply, type SuggestedInput } from '../core/outbound-action.js';
import { formatSelection } from '../core/selection.js';
import { payloadNumber, payloadString, type Payload } from '../core/session.js';
import { categoryLabel } from './catalog.js';
import { CATEGORY_SUGGESTIONS } from './listings.js';
import { parsePrice, textOf, validateCategory } from './validators.js';

/**
 * Search with optional filters: keyword → category-filter → min-price →
 * max-price, then the query runs. Every step can be skipped.
 */

export const MIN_KEYWORD_LENGTH = 2;

const ALL_CATEGORIES: SuggestedInput = { label: '🌐 All categories', data: formatSelection('category', 'all') };

/** Build the store query from whatever filters were collected. */
export function searchQuery(payload: Payload, settings: EngineSettings): ListingQuery {
  const category = payloadString(payload, 'category-filter');
  return {
    keyword: payloadString(payload, 'keyword'),
    category: category && category !== 'all' ? category : undefined,
    minPrice: payloadNumber(payload, 'min-price'),
    maxPrice: payloadNumber(payload, 'max-price'),
    status: 'active',
    limit: settings.searchPageSize,
    offset: 0,
  };
}

function describeFilters(query: ListingQuery, settings: EngineSettings): string {
  const filters: string[] = [];
  if (query.keyword) filters.push(`"${query.keyword}"`);
  if (query.category) filters.push(categoryLabel(query.category));
  if (query.minPrice !== undefined) filters.push(`from ${formatPrice(query.minPrice, settings.currencySymbol)}`);
  if (query.maxPrice !== undefined) filters.push(`up to ${formatPrice(query.maxPrice, settings.currencySymbol)}`);
  return filters.length > 0 ? filters.join(', ') : 'no filters';
}

export const search: ConversationDefinition = {
  kind: 'search',
  initialState: 'keyword',
  trigger: { commands: ['/search'], selections: [{ tag: 'search' }] },
  states: [
    {
      state: 'keyword',
      skippable: true,
      prompt: () => ({ text: `🔍 ${bold('Search')}\n\nWhat are you looking for? Send a keyword, or skip.` }),
      validate: (input) => {
        const text = textOf(input)?.trim() ?? '';
        if (text.length < MIN_KEYWORD_LENGTH) {
          return { ok: false, error: `The keyword must be at least ${MIN_KEYWORD_LENGTH} characters.` };
        }
        return { ok: true, value: text };
      },
      next: () => 'category-filter',
    },
    {
      state: 'category-filter',
      skippable: true,
      prompt: () => ({ text: '🏷 Filter by category:', suggestedInputs: [ALL_CATEGORIES, ...CATEGORY_SUGGESTIONS] }),
      validate: (input) => validateCategory(input, { allowAll: true }),
      next: () => 'min-price',
    },
    {
      state: 'min-price',
      skippable: true,
      prompt: () => ({ text: '💰 Minimum price? Send a number, or skip.' }),
      validate: (input, _payload, ctx) => parsePrice(textOf(input) ?? '', ctx.settings),
      next: () => 'max-price',
    },
    {
      state: 'max-price',
      skippable: true,
      prompt: () => ({ text: '💰 Maximum price? Send a number, or skip.' }),
      validate: (input, payload, ctx) => {
        const parsed = parsePrice(textOf(input) ?? '', ctx.settings);
        if (!parsed.ok) return parsed;
        const min = payloadNumber(payload, 'min-price');
        if (min !== undefined && parsed.value < min) {
          return { ok: false, error: `The maximum price cannot be lower than the minimum (${formatPrice(min, ctx.settings.currencySymbol)}).` };
        }
        return parsed;
      },
      next: () => TERMINAL,
      terminal: {
        type: 'read',
        async run(payload, ctx) {
          const principalId = ctx.principal.id;
          const query = searchQuery(payload, ctx.settings);
          const { listings, total } = await ctx.store.searchListings(query);
          logger.debug({ principalId, total, returned: listings.length }, 'Search executed');

          const header = `🔍 ${bold('Search results')} (${describeFilters(query, ctx.settings)})`;
          if (listings.length === 0) {
            return [reply(principalId, `${header}\n\nNo listings found. Try different filters.`, 'results', [
              { label: '🔍 New search', data: 'search' },
            ])];
          }

          const lines = listings.map((listing) => (
            `#${listing.id} ${bold(truncate(listing.title, 60))} - ${formatPrice(listing.price, ctx.settings.currencySymbol)} (${categoryLabel(listing.category)})`
          ));
          const shown = total > listings.length ? `Showing ${listings.length} of ${total}` : `${total} found`;
          const contacts = listings
            .filter((listing) => listing.sellerId !== principalId)
            .map((listing) => ({ label: `💬 Contact seller #${listing.id}`, data: formatSelection('contact_seller', listing.id) }));

          return [reply(principalId, `${header}\n${shown}\n\n${lines.join('\n')}`, 'results', [
            ...contacts,
            { label: '🔍 New search', data: 'search' },
          ])];
        },
      },
    },
  ],
};
