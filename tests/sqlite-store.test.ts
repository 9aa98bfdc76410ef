import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { IN_MEMORY, openDatabase } from '../src/utils/db-schema.js';
import { SqliteMarketplaceStore } from '../src/utils/db-sqlite.js';
import type { ListingPhoto, NewListing } from '../src/utils/db-types.js';

const lampPhoto: ListingPhoto = { fileId: 'file-a', uniqueId: 'unique-a' };
const shadePhoto: ListingPhoto = { fileId: 'file-b', uniqueId: 'unique-b' };

function draft(patch: Partial<NewListing> = {}): NewListing {
  return {
    sellerId: 1,
    title: 'Desk lamp',
    description: 'Brass, works fine',
    price: 12.5,
    category: 'home',
    location: null,
    photos: [],
    ...patch,
  };
}

describe('SQLite marketplace store', () => {
  let now: number;
  let store: SqliteMarketplaceStore;

  beforeEach(async () => {
    now = 1_000;
    store = new SqliteMarketplaceStore(openDatabase(IN_MEMORY), { clock: () => now });
    await store.ensureUser(1, { username: 'seller' });
    await store.ensureUser(2, { username: 'buyer' });
    await store.ensureUser(9, { username: 'staff' });
  });

  afterEach(async () => {
    await store.close();
  });

  describe('users', () => {
    it('creates users on first contact and keeps known fields', async () => {
      expect(await store.getUser(1)).toEqual({
        id: 1,
        username: 'seller',
        firstName: null,
        lastName: null,
        phone: null,
        location: null,
        bio: null,
        active: true,
        warningCount: 0,
        createdAt: 1_000,
        updatedAt: 1_000,
      });

      now = 2_000;
      const again = await store.ensureUser(1, { firstName: 'Sam' });
      expect(again).toMatchObject({ username: 'seller', firstName: 'Sam', createdAt: 1_000, updatedAt: 2_000 });
    });

    it('updates profile fields and activity', async () => {
      expect(await store.updateUserProfile(1, 'bio', 'Vintage lamps')).toBe(true);
      expect(await store.updateUserProfile(404, 'bio', 'Nobody')).toBe(false);
      expect(await store.setUserActive(2, false)).toBe(true);

      expect((await store.getUser(1))?.bio).toBe('Vintage lamps');
      expect((await store.listUsers('blocked')).map((user) => user.id)).toEqual([2]);
    });

    it('stores admin records', async () => {
      expect(await store.upsertAdmin(9, 'moderator')).toMatchObject({ userId: 9, role: 'moderator', active: true });
      expect(await store.upsertAdmin(9, 'admin', false)).toMatchObject({ userId: 9, role: 'admin', active: false });
      expect(await store.getAdmin(2)).toBeUndefined();
    });
  });

  describe('listings', () => {
    it('round-trips a listing with ordered photos', async () => {
      const listing = await store.createListing(draft({ photos: [lampPhoto] }));
      expect(listing).toEqual({
        id: 1,
        sellerId: 1,
        title: 'Desk lamp',
        description: 'Brass, works fine',
        price: 12.5,
        category: 'home',
        location: null,
        status: 'active',
        photos: [lampPhoto],
        flagged: false,
        flagReason: null,
        flaggedBy: null,
        createdAt: 1_000,
        updatedAt: 1_000,
      });

      expect(await store.addListingPhoto(1, shadePhoto)).toBe(true);
      expect(await store.addListingPhoto(404, shadePhoto)).toBe(false);
      expect((await store.getListing(1))?.photos).toEqual([lampPhoto, shadePhoto]);
    });

    it('refuses listings from unknown sellers', async () => {
      await expect(store.createListing(draft({ sellerId: 404 }))).rejects.toThrow(/FOREIGN KEY/);
    });

    it('applies partial updates', async () => {
      await store.createListing(draft());
      now = 5_000;
      expect(await store.updateListing(1, { price: 20, title: 'Brass lamp' })).toBe(true);
      expect(await store.updateListing(404, { price: 20 })).toBe(false);
      expect(await store.getListing(1)).toMatchObject({ title: 'Brass lamp', price: 20, description: 'Brass, works fine', updatedAt: 5_000 });
    });

    it('flags and deletes listings', async () => {
      await store.createListing(draft());
      expect(await store.flagListing(1, 'spam', 9)).toBe(true);
      expect(await store.getListing(1)).toMatchObject({ flagged: true, flagReason: 'spam', flaggedBy: 9 });
      expect((await store.listListings('flagged')).map((listing) => listing.id)).toEqual([1]);

      await store.setListingStatus(1, 'deleted');
      expect((await store.searchListings({})).total).toBe(0);
      expect((await store.listListings('deleted')).map((listing) => listing.id)).toEqual([1]);
    });
  });

  describe('search', () => {
    beforeEach(async () => {
      now = 1_000;
      await store.createListing(draft({ title: '100% cotton shirt', category: 'clothing', price: 15 }));
      now = 2_000;
      await store.createListing(draft({ title: 'Cotton shirt, size 1000', category: 'clothing', price: 25 }));
      now = 3_000;
      await store.createListing(draft({ title: 'Garden chair', description: 'Cotton cushion included', price: 40 }));
    });

    it('matches keywords case-insensitively in titles and descriptions, newest first', async () => {
      const page = await store.searchListings({ keyword: 'COTTON' });
      expect(page.total).toBe(3);
      expect(page.listings.map((listing) => listing.id)).toEqual([3, 2, 1]);
    });

    it('treats LIKE wildcards in keywords literally', async () => {
      const page = await store.searchListings({ keyword: '100%' });
      expect(page.listings.map((listing) => listing.id)).toEqual([1]);
    });

    it('combines category and price bounds', async () => {
      const page = await store.searchListings({ category: 'clothing', minPrice: 20, maxPrice: 30 });
      expect(page.listings.map((listing) => listing.id)).toEqual([2]);
    });

    it('pages results and reports the full total', async () => {
      const page = await store.searchListings({ limit: 1, offset: 1 });
      expect(page.total).toBe(3);
      expect(page.listings.map((listing) => listing.id)).toEqual([2]);
    });
  });

  describe('messages and warnings', () => {
    it('stores direct messages', async () => {
      await store.createListing(draft());
      expect(await store.createMessage({ listingId: 1, senderId: 2, receiverId: 1, text: 'Still available?' })).toEqual({
        id: 1,
        listingId: 1,
        senderId: 2,
        receiverId: 1,
        text: 'Still available?',
        createdAt: 1_000,
      });
    });

    it('counts warnings and filters expired ones', async () => {
      await store.createWarning({ userId: 2, adminId: 9, reason: 'rude', severity: 'medium', expiresAt: null });
      await store.createWarning({ userId: 2, adminId: 9, reason: 'spam', severity: 'low', expiresAt: 500 });

      expect((await store.getUser(2))?.warningCount).toBe(2);
      expect((await store.getWarnings(2)).map((warning) => warning.reason)).toEqual(['spam', 'rude']);
      expect((await store.getWarnings(2, true)).map((warning) => warning.reason)).toEqual(['rude']);
      expect((await store.listUsers('warned')).map((user) => user.id)).toEqual([2]);
    });
  });

  describe('seller listings and favorites', () => {
    beforeEach(async () => {
      now = 1_000;
      await store.createListing(draft());
      now = 2_000;
      await store.createListing(draft({ title: 'Bookshelf' }));
      await store.createListing(draft({ title: 'Radio' }));
      await store.setListingStatus(3, 'sold');
    });

    it('lists a seller\'s listings by status, newest first', async () => {
      expect((await store.listSellerListings(1, 'active')).map((listing) => listing.id)).toEqual([2, 1]);
      expect((await store.listSellerListings(1, 'sold')).map((listing) => listing.id)).toEqual([3]);
      expect(await store.listSellerListings(2, 'active')).toEqual([]);
    });

    it('adds each favorite once and hides deleted listings', async () => {
      expect(await store.addFavorite(2, 1)).toBe(true);
      expect(await store.addFavorite(2, 1)).toBe(false);
      now = 3_000;
      await store.addFavorite(2, 3);
      expect((await store.listFavorites(2)).map((listing) => listing.id)).toEqual([3, 1]);

      await store.setListingStatus(1, 'deleted');
      expect((await store.listFavorites(2)).map((listing) => listing.id)).toEqual([3]);

      expect(await store.removeFavorite(2, 3)).toBe(true);
      expect(await store.removeFavorite(2, 3)).toBe(false);
      expect(await store.listFavorites(2)).toEqual([]);
    });
  });

  describe('reviews', () => {
    beforeEach(async () => {
      await store.createListing(draft());
    });

    it('stores one review per reviewer and listing', async () => {
      expect(await store.createReview({ listingId: 1, sellerId: 1, reviewerId: 2, rating: 4, comment: 'Good' })).toEqual({
        id: 1,
        listingId: 1,
        sellerId: 1,
        reviewerId: 2,
        rating: 4,
        comment: 'Good',
        createdAt: 1_000,
      });
      expect(await store.createReview({ listingId: 1, sellerId: 1, reviewerId: 2, rating: 1, comment: null })).toBeUndefined();
      expect((await store.findReview(2, 1))?.rating).toBe(4);
      expect(await store.findReview(9, 1)).toBeUndefined();
    });

    it('rejects ratings outside 1 to 5', async () => {
      await expect(store.createReview({ listingId: 1, sellerId: 1, reviewerId: 2, rating: 6, comment: null })).rejects.toThrow(/CHECK/);
    });

    it('averages a seller\'s ratings and deletes single reviews', async () => {
      expect(await store.sellerRating(1)).toEqual({ average: null, count: 0 });
      await store.createReview({ listingId: 1, sellerId: 1, reviewerId: 2, rating: 5, comment: null });
      now = 2_000;
      await store.createReview({ listingId: 1, sellerId: 1, reviewerId: 9, rating: 2, comment: null });

      expect(await store.sellerRating(1)).toEqual({ average: 3.5, count: 2 });
      expect((await store.listSellerReviews(1)).map((review) => review.id)).toEqual([2, 1]);

      expect(await store.deleteReview(2)).toBe(true);
      expect(await store.deleteReview(2)).toBe(false);
      expect(await store.getReview(2)).toBeUndefined();
      expect(await store.sellerRating(1)).toEqual({ average: 5, count: 1 });
    });
  });

  describe('audit log', () => {
    it('appends entries and lists them newest first', async () => {
      const first = await store.appendAudit({ actorId: 9, action: 'flag_listing', targetType: 'listing', targetId: 1, detail: { reason: 'spam' } });
      await store.appendAudit({ actorId: 9, action: 'filter_analytics', targetType: 'users', targetId: null, detail: { scope: 'users', filter: 'all' } });

      expect(first).toEqual({
        id: 1,
        actorId: 9,
        action: 'flag_listing',
        targetType: 'listing',
        targetId: 1,
        detail: { reason: 'spam' },
        createdAt: 1_000,
      });
      expect((await store.listAudit()).map((entry) => entry.id)).toEqual([2, 1]);
      expect((await store.listAudit({ action: 'flag_listing' })).map((entry) => entry.id)).toEqual([1]);
      expect((await store.listAudit({ limit: 1, offset: 1 })).map((entry) => entry.id)).toEqual([1]);
    });
  });

  describe('transactions', () => {
    it('commits work done through the transaction handle', async () => {
      await store.createListing(draft());
      await store.withTransaction(async (tx) => {
        await tx.flagListing(1, 'spam', 9);
        await tx.appendAudit({ actorId: 9, action: 'flag_listing', targetType: 'listing', targetId: 1, detail: {} });
      });
      expect((await store.getListing(1))?.flagged).toBe(true);
      expect(await store.listAudit()).toHaveLength(1);
    });

    it('rolls back everything when the work throws', async () => {
      await store.createListing(draft());
      await expect(store.withTransaction(async (tx) => {
        await tx.flagListing(1, 'spam', 9);
        await tx.appendAudit({ actorId: 9, action: 'flag_listing', targetType: 'listing', targetId: 1, detail: {} });
        throw new Error('audit rejected');
      })).rejects.toThrow('audit rejected');

      expect((await store.getListing(1))?.flagged).toBe(false);
      expect(await store.listAudit()).toEqual([]);
    });

    it('makes other callers wait for an open transaction', async () => {
      await store.createListing(draft());
      const order: string[] = [];
      let release: () => void = () => undefined;
      const held = new Promise<void>((resolve) => {
        release = resolve;
      });

      const transaction = store.withTransaction(async (tx) => {
        await tx.flagListing(1, 'spam', 9);
        await held;
        order.push('commit');
      });
      const read = store.getListing(1).then((listing) => {
        order.push(`read flagged=${String(listing?.flagged)}`);
      });

      release();
      await Promise.all([transaction, read]);
      expect(order).toEqual(['commit', 'read flagged=true']);
    });

    it('rolls back instead of committing once the signal is aborted', async () => {
      await store.createListing(draft());
      const controller = new AbortController();
      await expect(store.withTransaction(async (tx) => {
        await tx.flagListing(1, 'spam', 9);
        await tx.appendAudit({ actorId: 9, action: 'flag_listing', targetType: 'listing', targetId: 1, detail: {} });
        controller.abort(new Error('deadline passed'));
      }, { signal: controller.signal })).rejects.toThrow('deadline passed');

      expect((await store.getListing(1))?.flagged).toBe(false);
      expect(await store.listAudit()).toEqual([]);
    });

    it('does not start a transaction whose signal is already aborted', async () => {
      await store.createListing(draft());
      const controller = new AbortController();
      controller.abort(new Error('too late'));
      let ran = false;
      await expect(store.withTransaction(async () => {
        ran = true;
      }, { signal: controller.signal })).rejects.toThrow('too late');
      expect(ran).toBe(false);
    });

    it('does not let a transaction close the database', async () => {
      await store.withTransaction(async (tx) => {
        await expect(tx.close()).rejects.toThrow('Cannot close the database from inside a transaction');
      });
    });
  });
});
