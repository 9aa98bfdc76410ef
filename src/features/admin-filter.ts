import { bold, formatPrice, truncate } from '../utils/formatting.js';
import type { Listing, ListingFilter, MarketUser, UserFilter } from '../utils/db-types.js';
import { TERMINAL, moderationPlan, type ConversationDefinition, type ModerationPlan } from '../core/conversation-types.js';
import { reply, type SuggestedInput } from '../core/outbound-action.js';
import type { ModerationTargetType } from '../core/permissions.js';
import { formatSelection, parseSelection } from '../core/selection.js';
import { requireString, type Payload } from '../core/session.js';
import type { UserInput } from '../core/inbound-event.js';
import type { Result } from '../utils/formatting.js';
import { displayName } from './moderation.js';

/**
 * Admin filter views: scope (users / listings) → filter. Read-only, but it
 * still goes through the dispatcher so that `view_analytics` is checked and
 * every lookup leaves an audit entry.
 */

export const FILTER_RESULT_LIMIT = 20;

const USER_FILTERS: readonly UserFilter[] = ['all', 'active', 'blocked', 'warned'];
const LISTING_FILTERS: readonly ListingFilter[] = ['all', 'active', 'flagged', 'deleted'];

type FilterScope = Extract<ModerationTargetType, 'users' | 'listings'>;

function choice(input: UserInput, tag: string): string | undefined {
  if (input.type === 'text') return input.text.trim().toLowerCase();
  if (input.type === 'selection') {
    const selection = parseSelection(input.data);
    return selection.tag === tag ? selection.params[0]?.toLowerCase() : undefined;
  }
  return undefined;
}

function validateScope(input: UserInput): Result<FilterScope> {
  const raw = choice(input, 'scope');
  if (raw === 'users' || raw === 'listings') return { ok: true, value: raw };
  return { ok: false, error: 'Please choose users or listings.' };
}

function filtersFor(scope: FilterScope): readonly string[] {
  return scope === 'users' ? USER_FILTERS : LISTING_FILTERS;
}

function scopeOf(payload: Payload): FilterScope {
  const scope = requireString(payload, 'scope');
  if (scope !== 'users' && scope !== 'listings') throw new Error(`Unknown filter scope "${scope}"`);
  return scope;
}

function suggestions(scope: FilterScope): SuggestedInput[] {
  return filtersFor(scope).map((filter) => ({ label: filter, data: formatSelection('filter', filter) }));
}

function userPlan(actorId: number, filter: UserFilter): ModerationPlan<MarketUser[]> {
  return moderationPlan<MarketUser[]>({
    action: 'filter_analytics',
    targetType: 'users',
    targetId: null,
    detail: { scope: 'users', filter },
    mutate: (store) => store.listUsers(filter, FILTER_RESULT_LIMIT),
    onApplied: (users) => {
      const lines = users.map((user) => (
        `${user.id} ${displayName(user)}${user.active ? '' : ' ⛔'}${user.warningCount > 0 ? ` ⚠️${user.warningCount}` : ''}`
      ));
      const body = lines.length > 0 ? lines.join('\n') : 'No users match.';
      return [reply(actorId, `👥 ${bold(`Users: ${filter}`)}\n\n${body}`, 'results')];
    },
  });
}

function listingPlan(actorId: number, filter: ListingFilter, currencySymbol: string): ModerationPlan<Listing[]> {
  return moderationPlan<Listing[]>({
    action: 'filter_analytics',
    targetType: 'listings',
    targetId: null,
    detail: { scope: 'listings', filter },
    mutate: (store) => store.listListings(filter, FILTER_RESULT_LIMIT),
    onApplied: (listings) => {
      const lines = listings.map((listing) => (
        `#${listing.id} ${truncate(listing.title, 40)} - ${formatPrice(listing.price, currencySymbol)} [${listing.status}${listing.flagged ? ', flagged' : ''}]`
      ));
      const body = lines.length > 0 ? lines.join('\n') : 'No listings match.';
      const edits = listings
        .filter((listing) => listing.status !== 'deleted')
        .map((listing) => ({ label: `✏️ Edit #${listing.id}`, data: formatSelection('admin_edit', listing.id, 'title') }));
      return [reply(actorId, `📦 ${bold(`Listings: ${filter}`)}\n\n${body}`, 'results', edits)];
    },
  });
}

export const adminFilter: ConversationDefinition = {
  kind: 'admin-filter',
  initialState: 'scope',
  trigger: { selections: [{ tag: 'admin_filter' }] },
  states: [
    {
      state: 'scope',
      prompt: () => ({
        text: `🔎 ${bold('Filter')}\n\nWhat do you want to look at?`,
        suggestedInputs: [
          { label: '👥 Users', data: formatSelection('scope', 'users') },
          { label: '📦 Listings', data: formatSelection('scope', 'listings') },
        ],
      }),
      validate: (input) => validateScope(input),
      next: () => 'filter',
    },
    {
      state: 'filter',
      prompt: (payload) => {
        const scope = scopeOf(payload);
        return { text: `Which ${scope}? (${filtersFor(scope).join(', ')})`, suggestedInputs: suggestions(scope) };
      },
      validate: (input, payload) => {
        const raw = choice(input, 'filter');
        const filter = filtersFor(scopeOf(payload)).find((candidate) => candidate === raw);
        return filter ? { ok: true, value: filter } : { ok: false, error: 'Please choose one of the listed filters.' };
      },
      next: () => TERMINAL,
      terminal: {
        type: 'moderate',
        plan(payload, ctx) {
          const raw = requireString(payload, 'filter');
          if (scopeOf(payload) === 'users') {
            const filter = USER_FILTERS.find((candidate) => candidate === raw);
            if (!filter) throw new Error(`Unknown user filter "${raw}"`);
            return userPlan(ctx.principal.id, filter);
          }
          const filter = LISTING_FILTERS.find((candidate) => candidate === raw);
          if (!filter) throw new Error(`Unknown listing filter "${raw}"`);
          return listingPlan(ctx.principal.id, filter, ctx.settings.currencySymbol);
        },
      },
    },
  ],
};
