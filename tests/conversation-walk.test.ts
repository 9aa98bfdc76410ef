import { describe, it, expect } from 'vitest';

import { TEXT } from '../src/core/conversation-controller.js';
import type { ConversationKind } from '../src/core/conversation-types.js';
import type { UserInput } from '../src/core/inbound-event.js';
import { ADMIN, BUYER, MODERATOR, SELLER, createTestEngine, media, only, selection, text } from './helpers/engine.js';

/**
 * Every conversation, walked to every one of its states. At each stop,
 * cancel must end the conversation and a rejected input must leave the
 * session exactly as it was, however often it is repeated.
 */

interface Step {
  state: string;
  /** Rejected by this state. Absent where the state accepts anything. */
  invalid?: UserInput;
  /** Accepted by this state, moving on to the next step. */
  next?: UserInput;
}

interface Walk {
  principalId: number;
  start: UserInput;
  steps: Step[];
}

function editWalks(principalId: number, tag: string): Walk[] {
  return [
    { principalId, start: selection(`${tag}:50:title`), steps: [{ state: 'title', invalid: text('x') }] },
    { principalId, start: selection(`${tag}:50:description`), steps: [{ state: 'description', invalid: media('d') }] },
    { principalId, start: selection(`${tag}:50:price`), steps: [{ state: 'price', invalid: text('abc') }] },
    { principalId, start: selection(`${tag}:50:category`), steps: [{ state: 'category', invalid: text('spaceships') }] },
    { principalId, start: selection(`${tag}:50:photos`), steps: [{ state: 'photos', invalid: text('no photo') }] },
  ];
}

const WALKS: Record<ConversationKind, Walk[]> = {
  'listing-create': [{
    principalId: SELLER,
    start: text('/sell'),
    steps: [
      { state: 'title', invalid: text('x'), next: text('Mountain bike') },
      { state: 'description', invalid: media('d'), next: text('A sturdy bike.') },
      { state: 'price', invalid: text('abc'), next: text('120') },
      { state: 'category', invalid: text('spaceships'), next: selection('category:electronics') },
      // Anything but a photo ends collection, so only a photo past the limit is refused.
      { state: 'photos', next: media('1') },
      { state: 'photos', next: media('2') },
      { state: 'photos', next: media('3') },
      { state: 'photos', invalid: media('4'), next: selection('photos_done') },
      { state: 'location', invalid: text('l'.repeat(101)), next: text('Lisbon') },
      { state: 'confirm', invalid: text('maybe') },
    ],
  }],
  'listing-edit': editWalks(SELLER, 'edit_field'),
  search: [{
    principalId: BUYER,
    start: text('/search'),
    steps: [
      { state: 'keyword', invalid: text('a'), next: text('lamp') },
      { state: 'category-filter', invalid: text('spaceships'), next: text('skip') },
      { state: 'min-price', invalid: text('abc'), next: text('5') },
      { state: 'max-price', invalid: text('1') },
    ],
  }],
  messaging: [{
    principalId: BUYER,
    start: text('/message'),
    steps: [
      { state: 'recipient-context', invalid: text('abc'), next: text('50') },
      { state: 'body', invalid: text('x') },
    ],
  }],
  'listing-delete': [{
    principalId: SELLER,
    start: selection('delete_listing:50'),
    steps: [{ state: 'confirm', invalid: text('maybe') }],
  }],
  'review-create': [{
    principalId: BUYER,
    start: selection('leave_review:50'),
    steps: [
      { state: 'rating', invalid: text('6'), next: selection('review_rating:4') },
      { state: 'comment', invalid: text('x'.repeat(501)) },
    ],
  }],
  'profile-edit': [
    { principalId: BUYER, start: selection('edit_profile:phone'), steps: [{ state: 'phone', invalid: text('abc') }] },
    { principalId: BUYER, start: selection('edit_profile:location'), steps: [{ state: 'location', invalid: media('l') }] },
    { principalId: BUYER, start: selection('edit_profile:bio'), steps: [{ state: 'bio', invalid: media('b') }] },
  ],
  'admin-block': [{
    principalId: ADMIN,
    start: selection('admin_block'),
    steps: [
      { state: 'target', invalid: text('abc'), next: text(String(SELLER)) },
      { state: 'reason', invalid: text('x') },
    ],
  }],
  'admin-warn': [{
    principalId: MODERATOR,
    start: selection('admin_warn'),
    steps: [
      { state: 'target', invalid: text('abc'), next: text(String(SELLER)) },
      { state: 'reason', invalid: text('x'), next: text('late payment') },
      { state: 'severity', invalid: text('extreme') },
    ],
  }],
  'admin-flag': [{
    principalId: MODERATOR,
    start: selection('admin_flag'),
    steps: [
      { state: 'target', invalid: text('abc'), next: text('50') },
      { state: 'reason', invalid: text('x') },
    ],
  }],
  'admin-delete': [{
    principalId: ADMIN,
    start: selection('admin_delete'),
    steps: [
      { state: 'target', invalid: text('abc'), next: text('50') },
      { state: 'confirm', invalid: text('maybe') },
    ],
  }],
  'admin-edit': editWalks(MODERATOR, 'admin_edit'),
  'admin-review-delete': [{
    principalId: MODERATOR,
    start: selection('admin_review_delete'),
    steps: [
      { state: 'target', invalid: text('abc'), next: text('40') },
      { state: 'confirm', invalid: text('maybe') },
    ],
  }],
  'admin-filter': [{
    principalId: ADMIN,
    start: selection('admin_filter'),
    steps: [
      { state: 'scope', invalid: text('planets'), next: selection('scope:users') },
      { state: 'filter', invalid: text('flagged') },
    ],
  }],
};

function withMarket() {
  const t = createTestEngine();
  t.store.seedListing({ id: 50, sellerId: SELLER, title: 'Desk lamp', price: 15 });
  t.store.seedReview({ id: 40, listingId: 50, sellerId: SELLER, reviewerId: 103, rating: 2 });
  return t;
}

/** A fresh engine with `walk` advanced to its step at `index`. */
async function reach(walk: Walk, index: number) {
  const t = withMarket();
  await t.send(walk.principalId, walk.start);
  for (const step of walk.steps.slice(0, index)) {
    if (!step.next) throw new Error(`Nothing leads on from ${step.state}`);
    await t.send(walk.principalId, step.next);
  }
  return t;
}

interface Stop {
  name: string;
  kind: ConversationKind;
  walk: Walk;
  index: number;
  step: Step;
}

const kinds = createTestEngine().engine.registry.kinds();

const stops: Stop[] = kinds.flatMap((kind) => WALKS[kind].flatMap((walk, w) => walk.steps.map((step, index) => ({
  name: `${kind} #${w + 1} step ${index + 1} (${step.state})`,
  kind,
  walk,
  index,
  step,
}))));

const rejections = stops.flatMap((stop) => (stop.step.invalid ? [{ ...stop, invalid: stop.step.invalid }] : []));

describe('Conversation walk', () => {
  it('visits every state of every registered conversation', () => {
    const { registry } = createTestEngine().engine;
    expect(Object.keys(WALKS).sort()).toEqual([...registry.kinds()].sort());
    for (const kind of registry.kinds()) {
      const visited = new Set(WALKS[kind].flatMap((walk) => walk.steps.map((step) => step.state)));
      expect([...visited].sort()).toEqual([...registry.states(kind)].sort());
    }
  });

  for (const { name, kind, walk, index, step } of stops) {
    it(`cancel at ${name} leaves no session`, async () => {
      const t = await reach(walk, index);
      expect(await t.sessions.get(walk.principalId)).toMatchObject({ kind, state: step.state });

      expect(only(await t.send(walk.principalId, 'cancel'))).toEqual({
        principalId: walk.principalId,
        tone: 'cancelled',
        text: TEXT.cancelled,
        suggestedInputs: [],
      });
      expect(await t.sessions.get(walk.principalId)).toBeUndefined();
      expect(t.store.writes).toEqual([]);
    });
  }

  for (const { name, walk, index, step, invalid } of rejections) {
    it(`repeated invalid input at ${name} leaves the session unchanged`, async () => {
      const t = await reach(walk, index);
      const before = await t.sessions.get(walk.principalId);
      expect(before?.state).toBe(step.state);

      for (let attempt = 0; attempt < 3; attempt++) {
        expect(only(await t.send(walk.principalId, invalid)).tone).toBe('validation-error');
        expect(await t.sessions.get(walk.principalId)).toEqual(before);
      }
      expect(t.store.writes).toEqual([]);
    });
  }
});
