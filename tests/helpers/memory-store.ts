import type { MarketplaceStore, TransactionOptions } from '../../src/utils/db-backend.js';
import type {
  AdminRecord,
  AuditEntry,
  AuditQuery,
  DirectMessage,
  Listing,
  ListingFilter,
  ListingPage,
  ListingPatch,
  ListingPhoto,
  ListingQuery,
  ListingStatus,
  MarketUser,
  NewAuditEntry,
  NewDirectMessage,
  NewListing,
  NewReview,
  NewUserWarning,
  ProfileField,
  Review,
  Role,
  SellerListingStatus,
  SellerRating,
  UserFilter,
  UserProfileHint,
  UserWarning,
} from '../../src/utils/db-types.js';

export const FIXED_NOW = Date.UTC(2026, 0, 15, 12, 0, 0);

/** Store calls that change domain data. ensureUser runs on every event and is not listed. */
export type WriteOp =
  | 'setUserActive'
  | 'updateUserProfile'
  | 'upsertAdmin'
  | 'createListing'
  | 'updateListing'
  | 'addListingPhoto'
  | 'setListingStatus'
  | 'flagListing'
  | 'createMessage'
  | 'createWarning'
  | 'addFavorite'
  | 'removeFavorite'
  | 'createReview'
  | 'deleteReview'
  | 'appendAudit';

export type StoreOp =
  | WriteOp
  | 'ensureUser'
  | 'getUser'
  | 'getListing'
  | 'searchListings'
  | 'listUsers'
  | 'listListings'
  | 'listSellerListings'
  | 'listFavorites'
  | 'getReview'
  | 'listSellerReviews'
  | 'getAdmin';

export interface RecordedWrite {
  op: WriteOp;
  args: unknown[];
}

interface State {
  users: Map<number, MarketUser>;
  admins: Map<number, AdminRecord>;
  listings: Map<number, Listing>;
  messages: DirectMessage[];
  warnings: UserWarning[];
  favorites: Array<{ userId: number; listingId: number }>;
  reviews: Review[];
  audit: AuditEntry[];
  nextId: number;
}

/**
 * In-process MarketplaceStore for tests. Records every committed write in
 * order, can be told to fail a given operation, and rolls back on a failed
 * transaction.
 */
export class MemoryMarketplaceStore implements MarketplaceStore {
  writes: RecordedWrite[] = [];
  transactions = 0;
  rollbacks = 0;
  private state: State = emptyState();
  private readonly failures = new Map<StoreOp, Error>();
  private readonly delays = new Map<StoreOp, number>();

  constructor(private readonly clock: () => number = () => FIXED_NOW) {}

  // ── Test controls ─────────────────────────────────────────────────

  fail(op: StoreOp, error: Error = new Error(`${op} failed`)): void {
    this.failures.set(op, error);
  }

  heal(op: StoreOp): void {
    this.failures.delete(op);
    this.delays.delete(op);
  }

  /** Make a write take `ms` of wall-clock time before it applies. */
  delay(op: WriteOp, ms: number): void {
    this.delays.set(op, ms);
  }

  writeOps(): WriteOp[] {
    return this.writes.map((write) => write.op);
  }

  seedUser(id: number, patch: Partial<MarketUser> = {}): MarketUser {
    const now = this.clock();
    const user: MarketUser = {
      id,
      username: null,
      firstName: null,
      lastName: null,
      phone: null,
      location: null,
      bio: null,
      active: true,
      warningCount: 0,
      createdAt: now,
      updatedAt: now,
      ...patch,
    };
    this.state.users.set(id, user);
    return user;
  }

  seedAdmin(userId: number, role: Exclude<Role, 'none'>, active = true): AdminRecord {
    if (!this.state.users.has(userId)) this.seedUser(userId);
    const now = this.clock();
    const admin: AdminRecord = { userId, role, active, createdAt: now, updatedAt: now };
    this.state.admins.set(userId, admin);
    return admin;
  }

  seedListing(patch: Partial<Listing> & { id: number; sellerId: number }): Listing {
    if (!this.state.users.has(patch.sellerId)) this.seedUser(patch.sellerId);
    const now = this.clock();
    const listing: Listing = {
      title: 'Test listing',
      description: '',
      price: 10,
      category: 'other',
      location: null,
      status: 'active',
      photos: [],
      flagged: false,
      flagReason: null,
      flaggedBy: null,
      createdAt: now,
      updatedAt: now,
      ...patch,
    };
    this.state.listings.set(listing.id, listing);
    this.state.nextId = Math.max(this.state.nextId, listing.id + 1);
    return listing;
  }

  seedReview(patch: Partial<Review> & Pick<Review, 'id' | 'listingId' | 'sellerId' | 'reviewerId'>): Review {
    const review: Review = { rating: 5, comment: null, createdAt: this.clock(), ...patch };
    this.state.reviews.push(review);
    return review;
  }

  get reviews(): Review[] {
    return [...this.state.reviews];
  }

  get auditEntries(): AuditEntry[] {
    return [...this.state.audit];
  }

  get messages(): DirectMessage[] {
    return [...this.state.messages];
  }

  get warnings(): UserWarning[] {
    return [...this.state.warnings];
  }

  listing(id: number): Listing | undefined {
    return this.state.listings.get(id);
  }

  user(id: number): MarketUser | undefined {
    return this.state.users.get(id);
  }

  // ── MarketplaceStore ──────────────────────────────────────────────

  async ensureUser(userId: number, hint: UserProfileHint = {}): Promise<MarketUser> {
    this.check('ensureUser');
    const existing = this.state.users.get(userId);
    if (existing) {
      const updated: MarketUser = {
        ...existing,
        username: hint.username ?? existing.username,
        firstName: hint.firstName ?? existing.firstName,
        lastName: hint.lastName ?? existing.lastName,
      };
      this.state.users.set(userId, updated);
      return { ...updated };
    }
    return { ...this.seedUser(userId, { username: hint.username ?? null, firstName: hint.firstName ?? null, lastName: hint.lastName ?? null }) };
  }

  async getUser(userId: number): Promise<MarketUser | undefined> {
    this.check('getUser');
    const user = this.state.users.get(userId);
    return user ? { ...user } : undefined;
  }

  async setUserActive(userId: number, active: boolean): Promise<boolean> {
    await this.write('setUserActive', [userId, active]);
    const user = this.state.users.get(userId);
    if (!user) return false;
    this.state.users.set(userId, { ...user, active, updatedAt: this.clock() });
    return true;
  }

  async updateUserProfile(userId: number, field: ProfileField, value: string): Promise<boolean> {
    await this.write('updateUserProfile', [userId, field, value]);
    const user = this.state.users.get(userId);
    if (!user) return false;
    const updated: MarketUser = { ...user, updatedAt: this.clock() };
    updated[field] = value;
    this.state.users.set(userId, updated);
    return true;
  }

  async listUsers(filter: UserFilter, limit = 20): Promise<MarketUser[]> {
    this.check('listUsers');
    const matches = (user: MarketUser): boolean => {
      switch (filter) {
        case 'all':
          return true;
        case 'active':
          return user.active;
        case 'blocked':
          return !user.active;
        case 'warned':
          return user.warningCount > 0;
      }
    };
    return [...this.state.users.values()].filter(matches).slice(0, limit);
  }

  async getAdmin(userId: number): Promise<AdminRecord | undefined> {
    this.check('getAdmin');
    return this.state.admins.get(userId);
  }

  async upsertAdmin(userId: number, role: Exclude<Role, 'none'>, active = true): Promise<AdminRecord> {
    await this.write('upsertAdmin', [userId, role, active]);
    return this.seedAdmin(userId, role, active);
  }

  async createListing(input: NewListing): Promise<Listing> {
    await this.write('createListing', [input]);
    const now = this.clock();
    const listing: Listing = {
      id: this.state.nextId++,
      ...input,
      photos: [...input.photos],
      status: 'active',
      flagged: false,
      flagReason: null,
      flaggedBy: null,
      createdAt: now,
      updatedAt: now,
    };
    this.state.listings.set(listing.id, listing);
    return listing;
  }

  async getListing(listingId: number): Promise<Listing | undefined> {
    this.check('getListing');
    return this.state.listings.get(listingId);
  }

  async updateListing(listingId: number, patch: ListingPatch): Promise<boolean> {
    await this.write('updateListing', [listingId, patch]);
    const listing = this.state.listings.get(listingId);
    if (!listing) return false;
    this.state.listings.set(listingId, { ...listing, ...patch, updatedAt: this.clock() });
    return true;
  }

  async addListingPhoto(listingId: number, photo: ListingPhoto): Promise<boolean> {
    await this.write('addListingPhoto', [listingId, photo]);
    const listing = this.state.listings.get(listingId);
    if (!listing) return false;
    this.state.listings.set(listingId, { ...listing, photos: [...listing.photos, photo], updatedAt: this.clock() });
    return true;
  }

  async setListingStatus(listingId: number, status: ListingStatus): Promise<boolean> {
    await this.write('setListingStatus', [listingId, status]);
    const listing = this.state.listings.get(listingId);
    if (!listing) return false;
    this.state.listings.set(listingId, { ...listing, status, updatedAt: this.clock() });
    return true;
  }

  async flagListing(listingId: number, reason: string, adminId: number): Promise<boolean> {
    await this.write('flagListing', [listingId, reason, adminId]);
    const listing = this.state.listings.get(listingId);
    if (!listing) return false;
    this.state.listings.set(listingId, { ...listing, flagged: true, flagReason: reason, flaggedBy: adminId });
    return true;
  }

  async searchListings(query: ListingQuery): Promise<ListingPage> {
    this.check('searchListings');
    const keyword = query.keyword?.toLowerCase();
    const matches = [...this.state.listings.values()]
      .filter((listing) => listing.status === (query.status ?? 'active'))
      .filter((listing) => !keyword
        || listing.title.toLowerCase().includes(keyword)
        || listing.description.toLowerCase().includes(keyword))
      .filter((listing) => !query.category || listing.category === query.category)
      .filter((listing) => query.minPrice === undefined || listing.price >= query.minPrice)
      .filter((listing) => query.maxPrice === undefined || listing.price <= query.maxPrice)
      .sort((a, b) => b.createdAt - a.createdAt || b.id - a.id);
    const offset = query.offset ?? 0;
    return { listings: matches.slice(offset, offset + (query.limit ?? 10)), total: matches.length };
  }

  async listListings(filter: ListingFilter, limit = 20): Promise<Listing[]> {
    this.check('listListings');
    const matches = (listing: Listing): boolean => {
      switch (filter) {
        case 'all':
          return true;
        case 'active':
          return listing.status === 'active';
        case 'flagged':
          return listing.flagged;
        case 'deleted':
          return listing.status === 'deleted';
      }
    };
    return [...this.state.listings.values()].filter(matches).slice(0, limit);
  }

  async listSellerListings(sellerId: number, status: SellerListingStatus, limit = 20): Promise<Listing[]> {
    this.check('listSellerListings');
    return [...this.state.listings.values()]
      .filter((listing) => listing.sellerId === sellerId && listing.status === status)
      .sort((a, b) => b.createdAt - a.createdAt || b.id - a.id)
      .slice(0, limit);
  }

  async addFavorite(userId: number, listingId: number): Promise<boolean> {
    if (this.state.favorites.some((f) => f.userId === userId && f.listingId === listingId)) return false;
    await this.write('addFavorite', [userId, listingId]);
    this.state.favorites.push({ userId, listingId });
    return true;
  }

  async removeFavorite(userId: number, listingId: number): Promise<boolean> {
    const before = this.state.favorites.length;
    await this.write('removeFavorite', [userId, listingId]);
    this.state.favorites = this.state.favorites.filter((f) => f.userId !== userId || f.listingId !== listingId);
    return this.state.favorites.length < before;
  }

  async listFavorites(userId: number, limit = 20): Promise<Listing[]> {
    this.check('listFavorites');
    return this.state.favorites
      .filter((f) => f.userId === userId)
      .reverse()
      .map((f) => this.state.listings.get(f.listingId))
      .filter((listing): listing is Listing => listing !== undefined && listing.status !== 'deleted')
      .slice(0, limit);
  }

  async createReview(input: NewReview): Promise<Review | undefined> {
    if (this.state.reviews.some((r) => r.reviewerId === input.reviewerId && r.listingId === input.listingId)) return undefined;
    await this.write('createReview', [input]);
    const review: Review = { id: this.state.nextId++, ...input, createdAt: this.clock() };
    this.state.reviews.push(review);
    return review;
  }

  async getReview(reviewId: number): Promise<Review | undefined> {
    this.check('getReview');
    return this.state.reviews.find((review) => review.id === reviewId);
  }

  async findReview(reviewerId: number, listingId: number): Promise<Review | undefined> {
    return this.state.reviews.find((review) => review.reviewerId === reviewerId && review.listingId === listingId);
  }

  async listSellerReviews(sellerId: number, limit = 10): Promise<Review[]> {
    this.check('listSellerReviews');
    return this.state.reviews
      .filter((review) => review.sellerId === sellerId)
      .sort((a, b) => b.createdAt - a.createdAt || b.id - a.id)
      .slice(0, limit);
  }

  async sellerRating(sellerId: number): Promise<SellerRating> {
    const ratings = this.state.reviews.filter((review) => review.sellerId === sellerId).map((review) => review.rating);
    if (ratings.length === 0) return { average: null, count: 0 };
    return { average: ratings.reduce((sum, rating) => sum + rating, 0) / ratings.length, count: ratings.length };
  }

  async deleteReview(reviewId: number): Promise<boolean> {
    await this.write('deleteReview', [reviewId]);
    const before = this.state.reviews.length;
    this.state.reviews = this.state.reviews.filter((review) => review.id !== reviewId);
    return this.state.reviews.length < before;
  }

  async createMessage(input: NewDirectMessage): Promise<DirectMessage> {
    await this.write('createMessage', [input]);
    const message: DirectMessage = { id: this.state.nextId++, ...input, createdAt: this.clock() };
    this.state.messages.push(message);
    return message;
  }

  async createWarning(input: NewUserWarning): Promise<UserWarning> {
    await this.write('createWarning', [input]);
    const warning: UserWarning = { id: this.state.nextId++, ...input, active: true, createdAt: this.clock() };
    this.state.warnings.push(warning);
    const user = this.state.users.get(input.userId);
    if (user) this.state.users.set(user.id, { ...user, warningCount: user.warningCount + 1 });
    return warning;
  }

  async getWarnings(userId: number, activeOnly = false): Promise<UserWarning[]> {
    return this.state.warnings.filter((warning) => warning.userId === userId && (!activeOnly || warning.active));
  }

  async appendAudit(entry: NewAuditEntry): Promise<AuditEntry> {
    await this.write('appendAudit', [entry]);
    const written: AuditEntry = { id: this.state.audit.length + 1, ...entry, createdAt: this.clock() };
    this.state.audit.push(written);
    return written;
  }

  async listAudit(query: AuditQuery = {}): Promise<AuditEntry[]> {
    const offset = query.offset ?? 0;
    return [...this.state.audit]
      .reverse()
      .filter((entry) => query.actorId === undefined || entry.actorId === query.actorId)
      .filter((entry) => query.action === undefined || entry.action === query.action)
      .filter((entry) => query.targetType === undefined || entry.targetType === query.targetType)
      .filter((entry) => query.targetId === undefined || entry.targetId === query.targetId)
      .slice(offset, offset + (query.limit ?? 50));
  }

  async withTransaction<T>(work: (tx: MarketplaceStore) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
    const { signal } = options;
    signal?.throwIfAborted();
    this.transactions++;
    const snapshot = structuredClone(this.state);
    const writeCount = this.writes.length;
    try {
      const result = await work(this);
      signal?.throwIfAborted();
      return result;
    } catch (err) {
      this.rollbacks++;
      this.state = snapshot;
      this.writes = this.writes.slice(0, writeCount);
      throw err;
    }
  }

  async close(): Promise<void> {
    this.state = emptyState();
  }

  private check(op: StoreOp): void {
    const failure = this.failures.get(op);
    if (failure) throw failure;
  }

  private async write(op: WriteOp, args: unknown[]): Promise<void> {
    this.check(op);
    const delayMs = this.delays.get(op);
    if (delayMs !== undefined) await new Promise((resolve) => setTimeout(resolve, delayMs));
    this.writes.push({ op, args });
  }
}

function emptyState(): State {
  return {
    users: new Map(),
    admins: new Map(),
    listings: new Map(),
    messages: [],
    warnings: [],
    favorites: [],
    reviews: [],
    audit: [],
    nextId: 1,
  };
}
