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
} from './db-types.js';

export interface TransactionOptions {
  /** Once aborted, the transaction rolls back instead of committing. */
  signal?: AbortSignal;
}

/**
 * Capability interface for marketplace entities.
 *
 * The conversation engine only ever talks to storage through this contract,
 * so the sqlite store and the in-process test store are interchangeable.
 */
export interface MarketplaceStore {
  // Users
  ensureUser(userId: number, hint?: UserProfileHint): Promise<MarketUser>;
  getUser(userId: number): Promise<MarketUser | undefined>;
  setUserActive(userId: number, active: boolean): Promise<boolean>;
  updateUserProfile(userId: number, field: ProfileField, value: string): Promise<boolean>;
  listUsers(filter: UserFilter, limit?: number): Promise<MarketUser[]>;

  // Admins
  getAdmin(userId: number): Promise<AdminRecord | undefined>;
  upsertAdmin(userId: number, role: Exclude<Role, 'none'>, active?: boolean): Promise<AdminRecord>;

  // Listings
  createListing(input: NewListing): Promise<Listing>;
  getListing(listingId: number): Promise<Listing | undefined>;
  updateListing(listingId: number, patch: ListingPatch): Promise<boolean>;
  addListingPhoto(listingId: number, photo: ListingPhoto): Promise<boolean>;
  setListingStatus(listingId: number, status: Listing['status']): Promise<boolean>;
  flagListing(listingId: number, reason: string, adminId: number): Promise<boolean>;
  searchListings(query: ListingQuery): Promise<ListingPage>;
  listListings(filter: ListingFilter, limit?: number): Promise<Listing[]>;
  listSellerListings(sellerId: number, status: SellerListingStatus, limit?: number): Promise<Listing[]>;

  // Favorites
  /** False when the listing was already a favorite. */
  addFavorite(userId: number, listingId: number): Promise<boolean>;
  removeFavorite(userId: number, listingId: number): Promise<boolean>;
  /** Favorited listings that are not deleted, most recently added first. */
  listFavorites(userId: number, limit?: number): Promise<Listing[]>;

  // Reviews
  /** Undefined when this reviewer already reviewed this listing. */
  createReview(input: NewReview): Promise<Review | undefined>;
  getReview(reviewId: number): Promise<Review | undefined>;
  findReview(reviewerId: number, listingId: number): Promise<Review | undefined>;
  listSellerReviews(sellerId: number, limit?: number): Promise<Review[]>;
  sellerRating(sellerId: number): Promise<SellerRating>;
  deleteReview(reviewId: number): Promise<boolean>;

  // Messages
  createMessage(input: NewDirectMessage): Promise<DirectMessage>;

  // Warnings
  createWarning(input: NewUserWarning): Promise<UserWarning>;
  getWarnings(userId: number, activeOnly?: boolean): Promise<UserWarning[]>;

  // Audit log (append only)
  appendAudit(entry: NewAuditEntry): Promise<AuditEntry>;
  listAudit(query?: AuditQuery): Promise<AuditEntry[]>;

  /**
   * Run `work` inside one storage transaction. `work` must use the store it is
   * handed; a rejection rolls every write back, and so does an aborted
   * `signal`: the store checks it again right before committing.
   */
  withTransaction<T>(work: (tx: MarketplaceStore) => Promise<T>, options?: TransactionOptions): Promise<T>;

  // Lifecycle
  close(): Promise<void>;
}
