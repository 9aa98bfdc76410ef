import { logger } from '../middleware/logger.js';
import { bold, formatPrice, italic, type Result } from '../utils/formatting.js';
import type { MarketplaceStore } from '../utils/db-backend.js';
import type { Listing, ListingPhoto } from '../utils/db-types.js';
import {
  TERMINAL,
  type ConversationDefinition,
  type EngineSettings,
  type RuleContext,
  type StateRuleSpec,
  type TerminalEffect,
} from '../core/conversation-types.js';
import { reply, type OutboundAction, type SuggestedInput } from '../core/outbound-action.js';
import { formatSelection, parseIdParam } from '../core/selection.js';
import {
  isJsonObject,
  payloadArray,
  payloadNumber,
  payloadString,
  requireNumber,
  requireString,
  withValue,
  type JsonValue,
  type Payload,
} from '../core/session.js';
import { CATEGORIES, categoryLabel } from './catalog.js';
import {
  validateCategory,
  validateConfirmation,
  validateDescription,
  validateFreeText,
  validatePrice,
  validateTitle,
} from './validators.js';

/**
 * Listing creation and single-field editing.
 *
 * Create: title → description → price → category → photos → location → confirm
 * Edit:   one state per field, entered directly and committed on valid input
 * Delete: confirm, for the seller's own listing
 */

export const MAX_LOCATION_LENGTH = 100;

export const CATEGORY_SUGGESTIONS: SuggestedInput[] = CATEGORIES.map((category) => ({
  label: `${category.emoji} ${category.name}`,
  data: formatSelection('category', category.id),
}));

const PHOTOS_DONE: SuggestedInput = { label: '✅ Done', data: 'photos_done' };

// ── Rendering ───────────────────────────────────────────────────────

export function formatListing(listing: Listing, settings: EngineSettings): string {
  const lines = [
    bold(listing.title),
    `💰 ${formatPrice(listing.price, settings.currencySymbol)}`,
    `🏷 ${categoryLabel(listing.category)}`,
  ];
  if (listing.location) lines.push(`📍 ${listing.location}`);
  if (listing.photos.length > 0) lines.push(`🖼 ${listing.photos.length} photo(s)`);
  if (listing.description) lines.push('', listing.description);
  lines.push('', italic(`Listing #${listing.id}`));
  return lines.join('\n');
}

function draftSummary(payload: Payload, settings: EngineSettings): string {
  const price = payloadNumber(payload, 'price');
  const lines = [
    bold(payloadString(payload, 'title') ?? ''),
    `💰 ${price === undefined ? '-' : formatPrice(price, settings.currencySymbol)}`,
    `🏷 ${categoryLabel(payloadString(payload, 'category') ?? '')}`,
    `📍 ${payloadString(payload, 'location') ?? 'No location'}`,
    `🖼 ${payloadArray(payload, 'photos').length} photo(s)`,
  ];
  const description = payloadString(payload, 'description');
  if (description) lines.push('', description);
  return lines.join('\n');
}

// ── Payload helpers ─────────────────────────────────────────────────

function toPhoto(value: JsonValue): ListingPhoto | null {
  if (!isJsonObject(value)) return null;
  const { fileId, uniqueId } = value;
  return typeof fileId === 'string' && typeof uniqueId === 'string' ? { fileId, uniqueId } : null;
}

function photosOf(payload: Payload): ListingPhoto[] {
  return payloadArray(payload, 'photos')
    .map(toPhoto)
    .filter((photo): photo is ListingPhoto => photo !== null);
}

// ── Listing creation ────────────────────────────────────────────────

const commitListing: TerminalEffect = {
  type: 'commit',
  async run(payload, ctx) {
    const sellerId = ctx.principal.id;
    if (payload.confirm !== true) {
      return [reply(sellerId, '🗑 Listing discarded. Nothing was published.', 'cancelled')];
    }

    const listing = await ctx.store.createListing({
      sellerId,
      title: requireString(payload, 'title'),
      description: payloadString(payload, 'description') ?? '',
      price: requireNumber(payload, 'price'),
      category: requireString(payload, 'category'),
      location: payloadString(payload, 'location') ?? null,
      photos: photosOf(payload),
    });

    logger.info({ principalId: sellerId, listingId: listing.id, category: listing.category }, 'Listing created');
    return [reply(sellerId, `✅ Your listing is live!\n\n${formatListing(listing, ctx.settings)}`, 'success', [
      { label: '✏️ Edit title', data: formatSelection('edit_field', listing.id, 'title') },
      { label: '➕ New listing', data: 'add_listing' },
    ])];
  },
};

export const listingCreate: ConversationDefinition = {
  kind: 'listing-create',
  initialState: 'title',
  trigger: { commands: ['/sell'], selections: [{ tag: 'add_listing' }] },
  states: [
    {
      state: 'title',
      prompt: (_payload, ctx) => ({
        text: `📝 ${bold('New listing')}\n\nWhat are you selling? Send a title (${ctx.settings.minTitleLength}-${ctx.settings.maxTitleLength} characters).`,
      }),
      validate: (input, _payload, ctx) => validateTitle(input, ctx.settings),
      next: () => 'description',
    },
    {
      state: 'description',
      skippable: true,
      prompt: (_payload, ctx) => ({
        text: `Describe the item (up to ${ctx.settings.maxDescriptionLength} characters), or skip.`,
      }),
      validate: (input, _payload, ctx) => validateDescription(input, ctx.settings),
      next: () => 'price',
    },
    {
      state: 'price',
      prompt: (_payload, ctx) => ({
        text: `💰 What is the price? Send a number, e.g. ${ctx.settings.currencySymbol}49.99`,
      }),
      validate: (input, _payload, ctx) => validatePrice(input, ctx.settings),
      next: () => 'category',
    },
    {
      state: 'category',
      prompt: () => ({ text: '🏷 Choose a category:', suggestedInputs: CATEGORY_SUGGESTIONS }),
      validate: (input) => validateCategory(input),
      next: () => 'photos',
    },
    {
      state: 'photos',
      prompt: (payload, ctx) => {
        const count = payloadArray(payload, 'photos').length;
        const text = count === 0
          ? `🖼 Send up to ${ctx.settings.maxPhotos} photos, or press Done to continue without photos.`
          : `🖼 ${count} of ${ctx.settings.maxPhotos} photos added. Send another or press Done.`;
        return { text, suggestedInputs: [PHOTOS_DONE] };
      },
      validate: (input, payload, ctx) => {
        // Anything that is not a photo ends photo collection.
        if (input.type !== 'media') return { ok: true, value: null };
        if (payloadArray(payload, 'photos').length >= ctx.settings.maxPhotos) {
          return { ok: false, error: `You can add at most ${ctx.settings.maxPhotos} photos. Press Done to continue.` };
        }
        return { ok: true, value: { fileId: input.media.fileId, uniqueId: input.media.uniqueId } };
      },
      apply: (payload, value) => (value === null
        ? withValue(payload, 'photosDone', true)
        : withValue(payload, 'photos', [...payloadArray(payload, 'photos'), value])),
      next: (payload) => (payload.photosDone === true ? 'location' : 'photos'),
    },
    {
      state: 'location',
      skippable: true,
      prompt: () => ({ text: `📍 Where is the item? (up to ${MAX_LOCATION_LENGTH} characters), or skip.` }),
      validate: (input) => validateFreeText(input, 'location', { max: MAX_LOCATION_LENGTH }),
      next: () => 'confirm',
    },
    {
      state: 'confirm',
      prompt: (payload, ctx) => ({
        text: `Please review your listing:\n\n${draftSummary(payload, ctx.settings)}\n\nPublish it?`,
        suggestedInputs: [
          { label: '✅ Publish', data: formatSelection('confirm', 'yes') },
          { label: '🗑 Discard', data: formatSelection('confirm', 'no') },
        ],
      }),
      validate: (input) => validateConfirmation(input),
      next: () => TERMINAL,
      terminal: commitListing,
    },
  ],
};

// ── Listing edit ────────────────────────────────────────────────────

export const EDITABLE_FIELDS = ['title', 'description', 'price', 'category', 'photos'] as const;
export type EditableField = (typeof EDITABLE_FIELDS)[number];

function isEditableField(value: string): value is EditableField {
  return EDITABLE_FIELDS.some((field) => field === value);
}

/** What a field holds before the edit, as recorded in audit entries. */
export function storedValue(listing: Listing, field: EditableField): JsonValue {
  switch (field) {
    case 'title':
      return listing.title;
    case 'description':
      return listing.description;
    case 'price':
      return listing.price;
    case 'category':
      return listing.category;
    case 'photos':
      return listing.photos.length;
  }
}

/** The collected value of an edit, in the same shape as storedValue. */
export function editedValue(field: EditableField, payload: Payload): JsonValue {
  if (field === 'photos') return requireNumber(payload, 'old') + 1;
  return payload[field] ?? null;
}

/** Write one edited field. False when the listing no longer exists. */
export async function writeListingEdit(
  store: MarketplaceStore,
  field: EditableField,
  listingId: number,
  payload: Payload,
): Promise<boolean> {
  switch (field) {
    case 'title':
      return store.updateListing(listingId, { title: requireString(payload, 'title') });
    case 'description':
      return store.updateListing(listingId, { description: requireString(payload, 'description') });
    case 'category':
      return store.updateListing(listingId, { category: requireString(payload, 'category') });
    case 'price':
      return store.updateListing(listingId, { price: requireNumber(payload, 'price') });
    case 'photos': {
      const photo = toPhoto(payload.photos ?? null);
      if (!photo) throw new Error('Listing edit is missing the photo');
      return store.addListingPhoto(listingId, photo);
    }
  }
}

function currentValue(payload: Payload): string {
  const current = payloadString(payload, 'current');
  return current ? `\nCurrent: ${current}` : '';
}

/**
 * One state per editable field, each finishing with the effect `finish`
 * returns for it. Shared by the seller's own edit and the staff edit.
 */
export function editStates(finish: (field: EditableField) => TerminalEffect): StateRuleSpec[] {
  const state = (field: EditableField, spec: Pick<StateRuleSpec, 'prompt' | 'validate'>): StateRuleSpec => ({
    state: field,
    ...spec,
    next: () => TERMINAL,
    terminal: finish(field),
  });

  return [
    state('title', {
      prompt: (payload) => ({ text: `✏️ Send the new title.${currentValue(payload)}` }),
      validate: (input, _payload, ctx) => validateTitle(input, ctx.settings),
    }),
    state('description', {
      prompt: (payload) => ({ text: `✏️ Send the new description.${currentValue(payload)}` }),
      validate: (input, _payload, ctx) => validateDescription(input, ctx.settings),
    }),
    state('price', {
      prompt: (payload) => ({ text: `✏️ Send the new price.${currentValue(payload)}` }),
      validate: (input, _payload, ctx) => validatePrice(input, ctx.settings),
    }),
    state('category', {
      prompt: (payload) => ({
        text: `✏️ Choose the new category.${currentValue(payload)}`,
        suggestedInputs: CATEGORY_SUGGESTIONS,
      }),
      validate: (input) => validateCategory(input),
    }),
    state('photos', {
      prompt: (payload) => ({ text: `🖼 Send a photo to add to the listing.${currentValue(payload)}` }),
      validate: (input) => (input.type === 'media'
        ? { ok: true, value: { fileId: input.media.fileId, uniqueId: input.media.uniqueId } }
        : { ok: false, error: 'Please send a photo.' }),
    }),
  ];
}

/** Resolve `<listingId>:<field>` to an editable listing and the first state's payload. */
export async function resolveEdit(
  params: readonly string[],
  ctx: RuleContext,
): Promise<Result<{ listing: Listing; field: EditableField; payload: Payload }>> {
  const [rawId, rawField = ''] = params;
  const listingId = parseIdParam(rawId);
  const field = rawField.toLowerCase();
  if (listingId === null || !isEditableField(field)) {
    return { ok: false, error: 'That edit action is not valid.' };
  }

  const listing = await ctx.store.getListing(listingId);
  if (!listing || listing.status === 'deleted') {
    return { ok: false, error: `Listing #${listingId} was not found.` };
  }
  if (field === 'photos' && listing.photos.length >= ctx.settings.maxPhotos) {
    return { ok: false, error: `This listing already has ${ctx.settings.maxPhotos} photos.` };
  }

  const payload: Payload = {
    listingId,
    current: editableValue(listing, field, ctx.settings),
    old: storedValue(listing, field),
  };
  return { ok: true, value: { listing, field, payload } };
}

async function applyOwnEdit(field: EditableField, payload: Payload, ctx: RuleContext): Promise<OutboundAction[]> {
  const principalId = ctx.principal.id;
  const listingId = requireNumber(payload, 'listingId');

  if (!(await writeListingEdit(ctx.store, field, listingId, payload))) {
    return [reply(principalId, `⚠️ Listing #${listingId} no longer exists.`, 'error')];
  }
  logger.info({ principalId, listingId, field }, 'Listing updated');
  return [reply(principalId, `✅ Listing #${listingId} updated.`, 'success')];
}

/**
 * A seller editing their own listing. Staff changing someone else's listing
 * use `admin_edit` instead, which is permission-checked and audited.
 */
export const listingEdit: ConversationDefinition = {
  kind: 'listing-edit',
  initialState: 'title',
  trigger: { selections: [{ tag: 'edit_field', arity: [2] }] },
  states: editStates((field) => ({ type: 'commit', run: (payload, ctx) => applyOwnEdit(field, payload, ctx) })),
  async start(signal, ctx) {
    const resolved = await resolveEdit(signal.params, ctx);
    if (!resolved.ok) return resolved;
    const { listing, field, payload } = resolved.value;
    if (listing.sellerId !== ctx.principal.id) {
      return { ok: false, error: 'You can only edit your own listings.' };
    }
    return { ok: true, value: { state: field, payload } };
  },
};

function editableValue(listing: Listing, field: EditableField, settings: EngineSettings): string {
  switch (field) {
    case 'title':
      return listing.title;
    case 'description':
      return listing.description;
    case 'price':
      return formatPrice(listing.price, settings.currencySymbol);
    case 'category':
      return categoryLabel(listing.category);
    case 'photos':
      return `${listing.photos.length} of ${settings.maxPhotos} photos`;
  }
}

// ── Listing delete (own) ────────────────────────────────────────────

export const listingDelete: ConversationDefinition = {
  kind: 'listing-delete',
  initialState: 'confirm',
  trigger: { selections: [{ tag: 'delete_listing', arity: [1] }] },
  states: [
    {
      state: 'confirm',
      prompt: (payload) => ({
        text: `🗑 Delete your listing ${bold(payloadString(payload, 'title') ?? '')}? This cannot be undone.`,
        suggestedInputs: [
          { label: '🗑 Delete', data: formatSelection('confirm', 'yes') },
          { label: '↩️ Keep', data: formatSelection('confirm', 'no') },
        ],
      }),
      validate: (input) => validateConfirmation(input),
      next: () => TERMINAL,
      terminal: {
        type: 'commit',
        async run(payload, ctx) {
          const principalId = ctx.principal.id;
          const listingId = requireNumber(payload, 'listingId');
          if (payload.confirm !== true) {
            return [reply(principalId, 'Listing was not deleted.', 'cancelled')];
          }
          if (!(await ctx.store.setListingStatus(listingId, 'deleted'))) {
            return [reply(principalId, `⚠️ Listing #${listingId} no longer exists.`, 'error')];
          }
          logger.info({ principalId, listingId }, 'Listing deleted by its seller');
          return [reply(principalId, `🗑 Listing #${listingId} was deleted.`, 'success', [
            { label: '📦 My listings', data: 'my_listings' },
          ])];
        },
      },
    },
  ],
  async start(signal, ctx) {
    const listingId = parseIdParam(signal.params[0]);
    if (listingId === null) return { ok: false, error: 'That action is not valid.' };
    const listing = await ctx.store.getListing(listingId);
    if (!listing || listing.status === 'deleted') {
      return { ok: false, error: `Listing #${listingId} was not found.` };
    }
    if (listing.sellerId !== ctx.principal.id) {
      return { ok: false, error: 'You can only delete your own listings.' };
    }
    return { ok: true, value: { state: 'confirm', payload: { listingId, title: listing.title } } };
  },
};
