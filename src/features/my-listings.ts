import { logger } from '../middleware/logger.js';
import { bold, formatPrice, truncate } from '../utils/formatting.js';
import type { Listing, SellerListingStatus } from '../utils/db-types.js';
import type { CommandBinding } from '../core/conversation-controller.js';
import type { EngineSettings, RuleContext } from '../core/conversation-types.js';
import { reply, type OutboundAction, type SuggestedInput } from '../core/outbound-action.js';
import { formatSelection, parseIdParam } from '../core/selection.js';

/**
 * The seller's own listings (active and sold), marking one as sold, and
 * the favorites list. All stateless: each is a single request and reply.
 */

export const MY_LISTINGS_LIMIT = 10;
export const FAVORITES_LIMIT = 20;

const MY_LISTINGS_MENU: SuggestedInput[] = [
  { label: '🟢 Active', data: 'my_active' },
  { label: '✅ Sold', data: 'my_sold' },
];

function listingLine(listing: Listing, settings: EngineSettings): string {
  return `#${listing.id} ${bold(truncate(listing.title, 60))} - ${formatPrice(listing.price, settings.currencySymbol)}`;
}

async function showOwnListings(ctx: RuleContext, status: SellerListingStatus): Promise<OutboundAction[]> {
  const { principal, store, settings } = ctx;
  const listings = await store.listSellerListings(principal.id, status, MY_LISTINGS_LIMIT);
  const heading = status === 'active' ? '🟢 Your active listings' : '✅ Your sold listings';
  if (listings.length === 0) {
    return [reply(principal.id, `${bold(heading)}\n\nNothing here yet.`, 'results', [
      { label: '➕ Sell something', data: 'add_listing' },
    ])];
  }

  const actions: SuggestedInput[] = status === 'active'
    ? listings.flatMap((listing) => [
      { label: `✅ Sold #${listing.id}`, data: formatSelection('mark_sold', listing.id) },
      { label: `🗑 Delete #${listing.id}`, data: formatSelection('delete_listing', listing.id) },
    ])
    : [];
  const lines = listings.map((listing) => listingLine(listing, settings));
  return [reply(principal.id, `${bold(heading)}\n\n${lines.join('\n')}`, 'results', actions)];
}

async function markSold(ctx: RuleContext, params: readonly string[]): Promise<OutboundAction[]> {
  const { principal, store } = ctx;
  const listingId = parseIdParam(params[0]);
  if (listingId === null) return [reply(principal.id, '⚠️ That action is not valid.', 'error')];

  const listing = await store.getListing(listingId);
  if (!listing || listing.status === 'deleted') {
    return [reply(principal.id, `⚠️ Listing #${listingId} was not found.`, 'error')];
  }
  if (listing.sellerId !== principal.id) {
    return [reply(principal.id, '⚠️ You can only change your own listings.', 'error')];
  }
  if (listing.status === 'sold') {
    return [reply(principal.id, `Listing #${listingId} is already marked as sold.`, 'notice')];
  }

  if (!(await store.setListingStatus(listingId, 'sold'))) {
    return [reply(principal.id, `⚠️ Listing #${listingId} no longer exists.`, 'error')];
  }
  logger.info({ principalId: principal.id, listingId }, 'Listing marked as sold');
  return [reply(principal.id, `✅ ${bold(listing.title)} is marked as sold. Congratulations on the sale! 🎉`, 'success', [
    { label: '📦 My listings', data: 'my_listings' },
  ])];
}

async function showFavorites({ principal, store, settings }: RuleContext): Promise<OutboundAction[]> {
  const listings = await store.listFavorites(principal.id, FAVORITES_LIMIT);
  if (listings.length === 0) {
    return [reply(principal.id, `⭐ ${bold('Favorites')}\n\nYou have no favorites yet.`, 'results', [
      { label: '🔍 Search', data: 'search' },
    ])];
  }
  const lines = listings.map((listing) => {
    const line = listingLine(listing, settings);
    return listing.status === 'active' ? line : `${line} [${listing.status}]`;
  });
  const removals = listings.map((listing) => ({
    label: `💔 Remove #${listing.id}`,
    data: formatSelection('remove_favorite', listing.id),
  }));
  return [reply(principal.id, `⭐ ${bold('Favorites')}\n\n${lines.join('\n')}`, 'results', removals)];
}

async function addFavorite({ principal, store }: RuleContext, params: readonly string[]): Promise<OutboundAction[]> {
  const listingId = parseIdParam(params[0]);
  if (listingId === null) return [reply(principal.id, '⚠️ That action is not valid.', 'error')];

  const listing = await store.getListing(listingId);
  if (!listing || listing.status !== 'active') {
    return [reply(principal.id, `⚠️ Listing #${listingId} is not available.`, 'error')];
  }
  if (!(await store.addFavorite(principal.id, listingId))) {
    return [reply(principal.id, `Listing #${listingId} is already in your favorites.`, 'notice')];
  }
  return [reply(principal.id, `⭐ Listing #${listingId} was added to your favorites.`, 'success')];
}

async function removeFavorite({ principal, store }: RuleContext, params: readonly string[]): Promise<OutboundAction[]> {
  const listingId = parseIdParam(params[0]);
  if (listingId === null) return [reply(principal.id, '⚠️ That action is not valid.', 'error')];

  if (!(await store.removeFavorite(principal.id, listingId))) {
    return [reply(principal.id, `Listing #${listingId} was not in your favorites.`, 'notice')];
  }
  return [reply(principal.id, `💔 Listing #${listingId} was removed from your favorites.`, 'success')];
}

export function createMyListingsCommands(): CommandBinding[] {
  return [
    {
      commands: ['/mylistings'],
      selectionTags: ['my_listings'],
      run: ({ principal }) => [reply(principal.id, `📦 ${bold('My listings')}\n\nWhich listings do you want to see?`, 'notice', MY_LISTINGS_MENU)],
    },
    { commands: [], selectionTags: ['my_active'], run: (ctx) => showOwnListings(ctx, 'active') },
    { commands: [], selectionTags: ['my_sold'], run: (ctx) => showOwnListings(ctx, 'sold') },
    { commands: [], selectionTags: ['mark_sold'], run: markSold },
    { commands: ['/favorites'], selectionTags: ['favorites'], run: showFavorites },
    { commands: [], selectionTags: ['add_favorite'], run: addFavorite },
    { commands: [], selectionTags: ['remove_favorite'], run: removeFavorite },
  ];
}
