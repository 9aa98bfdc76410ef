/**
 * SQLite implementation of MarketplaceStore.
 *
 * better-sqlite3 is synchronous, so every call runs to completion on the
 * event loop. The only thing that needs guarding is withTransaction: while
 * a transaction is open, other callers queue behind it instead of writing
 * into it.
 */

import { z } from 'zod';
import { KeyedMutex } from '../core/principal-lock.js';
import type { MarketplaceStore, TransactionOptions } from './db-backend.js';
import { closeDatabase, type SqliteHandle } from './db-schema.js';
import type {
  AdminRecord,
  AuditDetail,
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
  WarningSeverity,
} from './db-types.js';

// ── Rows ────────────────────────────────────────────────────────────

interface UserRow {
  id: number;
  username: string | null;
  first_name: string | null;
  last_name: string | null;
  phone: string | null;
  location: string | null;
  bio: string | null;
  is_active: number;
  warning_count: number;
  created_at: number;
  updated_at: number;
}

interface AdminRow {
  user_id: number;
  role: string;
  is_active: number;
  created_at: number;
  updated_at: number;
}

interface ListingRow {
  id: number;
  seller_id: number;
  title: string;
  description: string;
  price: number;
  category: string;
  location: string | null;
  status: string;
  is_flagged: number;
  flag_reason: string | null;
  flagged_by: number | null;
  created_at: number;
  updated_at: number;
}

interface PhotoRow {
  file_id: string;
  unique_id: string;
}

interface WarningRow {
  id: number;
  user_id: number;
  admin_id: number;
  reason: string;
  severity: string;
  is_active: number;
  created_at: number;
  expires_at: number | null;
}

interface ReviewRow {
  id: number;
  listing_id: number;
  seller_id: number;
  reviewer_id: number;
  rating: number;
  comment: string | null;
  created_at: number;
}

interface AuditRow {
  id: number;
  actor_id: number;
  action: string;
  target_type: string;
  target_id: number | null;
  detail: string;
  created_at: number;
}

type SqlParam = string | number | null;

const adminRoleSchema = z.enum(['moderator', 'admin', 'super_admin']);
const listingStatusSchema = z.enum(['active', 'sold', 'reserved', 'deleted']);
const severitySchema = z.enum(['low', 'medium', 'high']);
const auditDetailSchema = z.record(z.unknown());

// ── Prepared statements ─────────────────────────────────────────────

function prepareStatements(db: SqliteHandle) {
  return {
    upsertUser: db.prepare<[number, string | null, string | null, string | null, number, number]>(
      `INSERT INTO users (id, username, first_name, last_name, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET
         username = COALESCE(excluded.username, users.username),
         first_name = COALESCE(excluded.first_name, users.first_name),
         last_name = COALESCE(excluded.last_name, users.last_name),
         updated_at = excluded.updated_at`,
    ),
    selectUser: db.prepare<[number], UserRow>(`SELECT * FROM users WHERE id = ?`),
    setUserActive: db.prepare<[number, number, number]>(
      `UPDATE users SET is_active = ?, updated_at = ? WHERE id = ?`,
    ),
    profileField: {
      phone: db.prepare<[string, number, number]>(`UPDATE users SET phone = ?, updated_at = ? WHERE id = ?`),
      location: db.prepare<[string, number, number]>(`UPDATE users SET location = ?, updated_at = ? WHERE id = ?`),
      bio: db.prepare<[string, number, number]>(`UPDATE users SET bio = ?, updated_at = ? WHERE id = ?`),
    } satisfies Record<ProfileField, unknown>,
    incrementWarnings: db.prepare<[number, number]>(
      `UPDATE users SET warning_count = warning_count + 1, updated_at = ? WHERE id = ?`,
    ),

    selectAdmin: db.prepare<[number], AdminRow>(`SELECT * FROM admin_users WHERE user_id = ?`),
    upsertAdmin: db.prepare<[number, string, number, number, number]>(
      `INSERT INTO admin_users (user_id, role, is_active, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(user_id) DO UPDATE SET
         role = excluded.role,
         is_active = excluded.is_active,
         updated_at = excluded.updated_at`,
    ),

    insertListing: db.prepare<[number, string, string, number, string, string | null, number, number]>(
      `INSERT INTO listings (seller_id, title, description, price, category, location, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    ),
    insertPhoto: db.prepare<[number, string, string, number]>(
      `INSERT INTO listing_photos (listing_id, file_id, unique_id, position) VALUES (?, ?, ?, ?)`,
    ),
    selectListing: db.prepare<[number], ListingRow>(`SELECT * FROM listings WHERE id = ?`),
    selectPhotos: db.prepare<[number], PhotoRow>(
      `SELECT file_id, unique_id FROM listing_photos WHERE listing_id = ? ORDER BY position ASC, id ASC`,
    ),
    nextPhotoPosition: db.prepare<[number], { position: number }>(
      `SELECT COALESCE(MAX(position) + 1, 0) AS position FROM listing_photos WHERE listing_id = ?`,
    ),
    touchListing: db.prepare<[number, number]>(`UPDATE listings SET updated_at = ? WHERE id = ?`),
    setListingStatus: db.prepare<[string, number, number]>(
      `UPDATE listings SET status = ?, updated_at = ? WHERE id = ?`,
    ),
    flagListing: db.prepare<[string, number, number, number]>(
      `UPDATE listings SET is_flagged = 1, flag_reason = ?, flagged_by = ?, updated_at = ? WHERE id = ?`,
    ),

    selectSellerListings: db.prepare<[number, string, number], ListingRow>(
      `SELECT * FROM listings WHERE seller_id = ? AND status = ? ORDER BY created_at DESC, id DESC LIMIT ?`,
    ),

    insertFavorite: db.prepare<[number, number, number]>(
      `INSERT INTO favorites (user_id, listing_id, created_at) VALUES (?, ?, ?)
       ON CONFLICT(user_id, listing_id) DO NOTHING`,
    ),
    deleteFavorite: db.prepare<[number, number]>(`DELETE FROM favorites WHERE user_id = ? AND listing_id = ?`),
    selectFavorites: db.prepare<[number, number], ListingRow>(
      `SELECT listings.* FROM favorites
       JOIN listings ON listings.id = favorites.listing_id
       WHERE favorites.user_id = ? AND listings.status != 'deleted'
       ORDER BY favorites.created_at DESC, favorites.id DESC
       LIMIT ?`,
    ),

    insertReview: db.prepare<[number, number, number, number, string | null, number]>(
      `INSERT INTO reviews (listing_id, seller_id, reviewer_id, rating, comment, created_at)
       VALUES (?, ?, ?, ?, ?, ?)
       ON CONFLICT(reviewer_id, listing_id) DO NOTHING`,
    ),
    selectReview: db.prepare<[number], ReviewRow>(`SELECT * FROM reviews WHERE id = ?`),
    selectReviewBy: db.prepare<[number, number], ReviewRow>(
      `SELECT * FROM reviews WHERE reviewer_id = ? AND listing_id = ?`,
    ),
    selectSellerReviews: db.prepare<[number, number], ReviewRow>(
      `SELECT * FROM reviews WHERE seller_id = ? ORDER BY created_at DESC, id DESC LIMIT ?`,
    ),
    sellerRating: db.prepare<[number], { average: number | null; count: number }>(
      `SELECT AVG(rating) AS average, COUNT(*) AS count FROM reviews WHERE seller_id = ?`,
    ),
    deleteReview: db.prepare<[number]>(`DELETE FROM reviews WHERE id = ?`),

    insertMessage: db.prepare<[number | null, number, number, string, number]>(
      `INSERT INTO messages (listing_id, sender_id, receiver_id, text, created_at) VALUES (?, ?, ?, ?, ?)`,
    ),

    insertWarning: db.prepare<[number, number, string, string, number, number | null]>(
      `INSERT INTO user_warnings (user_id, admin_id, reason, severity, created_at, expires_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
    ),
    selectWarnings: db.prepare<[number], WarningRow>(
      `SELECT * FROM user_warnings WHERE user_id = ? ORDER BY created_at DESC, id DESC`,
    ),
    selectActiveWarnings: db.prepare<[number, number], WarningRow>(
      `SELECT * FROM user_warnings
       WHERE user_id = ? AND is_active = 1 AND (expires_at IS NULL OR expires_at > ?)
       ORDER BY created_at DESC, id DESC`,
    ),

    insertAudit: db.prepare<[number, string, string, number | null, string, number]>(
      `INSERT INTO admin_audit_log (actor_id, action, target_type, target_id, detail, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
    ),
    selectAudit: db.prepare<[number], AuditRow>(`SELECT * FROM admin_audit_log WHERE id = ?`),
  };
}

type Statements = ReturnType<typeof prepareStatements>;

/** Runs a synchronous statement batch on behalf of a store view. */
type Executor = <T>(operation: () => T) => Promise<T>;

// ── Store view ──────────────────────────────────────────────────────

/**
 * Every query lives here. The public store runs them through its queue;
 * the handle given to a transaction's `work` runs them directly, inside
 * the open transaction.
 */
class SqliteStoreView implements MarketplaceStore {
  constructor(
    protected readonly db: SqliteHandle,
    private readonly sql: Statements,
    private readonly clock: () => number,
    private readonly execute: Executor,
  ) {}

  // Users

  ensureUser(userId: number, hint: UserProfileHint = {}): Promise<MarketUser> {
    return this.execute(() => {
      const now = this.clock();
      this.sql.upsertUser.run(userId, hint.username ?? null, hint.firstName ?? null, hint.lastName ?? null, now, now);
      const row = this.sql.selectUser.get(userId);
      if (!row) throw new Error(`User ${userId} missing after upsert`);
      return toUser(row);
    });
  }

  getUser(userId: number): Promise<MarketUser | undefined> {
    return this.execute(() => {
      const row = this.sql.selectUser.get(userId);
      return row ? toUser(row) : undefined;
    });
  }

  setUserActive(userId: number, active: boolean): Promise<boolean> {
    return this.execute(() => this.sql.setUserActive.run(active ? 1 : 0, this.clock(), userId).changes > 0);
  }

  updateUserProfile(userId: number, field: ProfileField, value: string): Promise<boolean> {
    return this.execute(() => this.sql.profileField[field].run(value, this.clock(), userId).changes > 0);
  }

  listUsers(filter: UserFilter, limit = 20): Promise<MarketUser[]> {
    const where: Record<UserFilter, string> = {
      all: '1 = 1',
      active: 'is_active = 1',
      blocked: 'is_active = 0',
      warned: 'warning_count > 0',
    };
    return this.execute(() => this.db
      .prepare<[number], UserRow>(`SELECT * FROM users WHERE ${where[filter]} ORDER BY created_at DESC, id DESC LIMIT ?`)
      .all(limit)
      .map(toUser));
  }

  // Admins

  getAdmin(userId: number): Promise<AdminRecord | undefined> {
    return this.execute(() => {
      const row = this.sql.selectAdmin.get(userId);
      return row ? toAdmin(row) : undefined;
    });
  }

  upsertAdmin(userId: number, role: Exclude<Role, 'none'>, active = true): Promise<AdminRecord> {
    return this.execute(() => {
      const now = this.clock();
      this.sql.upsertAdmin.run(userId, role, active ? 1 : 0, now, now);
      const row = this.sql.selectAdmin.get(userId);
      if (!row) throw new Error(`Admin ${userId} missing after upsert`);
      return toAdmin(row);
    });
  }

  // Listings

  createListing(input: NewListing): Promise<Listing> {
    return this.execute(() => {
      const now = this.clock();
      const insert = this.db.transaction(() => {
        const { lastInsertRowid } = this.sql.insertListing.run(
          input.sellerId,
          input.title,
          input.description,
          input.price,
          input.category,
          input.location,
          now,
          now,
        );
        const listingId = Number(lastInsertRowid);
        input.photos.forEach((photo, position) => {
          this.sql.insertPhoto.run(listingId, photo.fileId, photo.uniqueId, position);
        });
        return listingId;
      });
      const listing = this.loadListing(insert());
      if (!listing) throw new Error('Listing missing after insert');
      return listing;
    });
  }

  getListing(listingId: number): Promise<Listing | undefined> {
    return this.execute(() => this.loadListing(listingId));
  }

  updateListing(listingId: number, patch: ListingPatch): Promise<boolean> {
    const columns: Array<[string, SqlParam]> = [];
    if (patch.title !== undefined) columns.push(['title', patch.title]);
    if (patch.description !== undefined) columns.push(['description', patch.description]);
    if (patch.price !== undefined) columns.push(['price', patch.price]);
    if (patch.category !== undefined) columns.push(['category', patch.category]);
    if (patch.location !== undefined) columns.push(['location', patch.location]);

    return this.execute(() => {
      if (columns.length === 0) return this.sql.selectListing.get(listingId) !== undefined;
      const assignments = columns.map(([column]) => `${column} = ?`).join(', ');
      const params: SqlParam[] = [...columns.map(([, value]) => value), this.clock(), listingId];
      return this.db
        .prepare<SqlParam[]>(`UPDATE listings SET ${assignments}, updated_at = ? WHERE id = ?`)
        .run(...params).changes > 0;
    });
  }

  addListingPhoto(listingId: number, photo: ListingPhoto): Promise<boolean> {
    return this.execute(() => {
      const append = this.db.transaction(() => {
        if (this.sql.touchListing.run(this.clock(), listingId).changes === 0) return false;
        const position = this.sql.nextPhotoPosition.get(listingId)?.position ?? 0;
        this.sql.insertPhoto.run(listingId, photo.fileId, photo.uniqueId, position);
        return true;
      });
      return append();
    });
  }

  setListingStatus(listingId: number, status: ListingStatus): Promise<boolean> {
    return this.execute(() => this.sql.setListingStatus.run(status, this.clock(), listingId).changes > 0);
  }

  flagListing(listingId: number, reason: string, adminId: number): Promise<boolean> {
    return this.execute(() => this.sql.flagListing.run(reason, adminId, this.clock(), listingId).changes > 0);
  }

  searchListings(query: ListingQuery): Promise<ListingPage> {
    const clauses = ['status = ?'];
    const params: SqlParam[] = [query.status ?? 'active'];

    const keyword = query.keyword?.trim();
    if (keyword) {
      const pattern = `%${escapeLike(keyword)}%`;
      clauses.push(`(title LIKE ? ESCAPE '\\' OR description LIKE ? ESCAPE '\\')`);
      params.push(pattern, pattern);
    }
    if (query.category) {
      clauses.push('category = ?');
      params.push(query.category);
    }
    if (query.minPrice !== undefined) {
      clauses.push('price >= ?');
      params.push(query.minPrice);
    }
    if (query.maxPrice !== undefined) {
      clauses.push('price <= ?');
      params.push(query.maxPrice);
    }

    const where = clauses.join(' AND ');
    const limit = query.limit ?? 10;
    const offset = query.offset ?? 0;

    return this.execute(() => {
      const total = this.db
        .prepare<SqlParam[], { total: number }>(`SELECT COUNT(*) AS total FROM listings WHERE ${where}`)
        .get(...params)?.total ?? 0;
      const rows = this.db
        .prepare<SqlParam[], ListingRow>(
          `SELECT * FROM listings WHERE ${where} ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?`,
        )
        .all(...params, limit, offset);
      return { listings: rows.map((row) => this.withPhotos(row)), total };
    });
  }

  listListings(filter: ListingFilter, limit = 20): Promise<Listing[]> {
    const where: Record<ListingFilter, string> = {
      all: '1 = 1',
      active: `status = 'active'`,
      flagged: 'is_flagged = 1',
      deleted: `status = 'deleted'`,
    };
    return this.execute(() => this.db
      .prepare<[number], ListingRow>(`SELECT * FROM listings WHERE ${where[filter]} ORDER BY created_at DESC, id DESC LIMIT ?`)
      .all(limit)
      .map((row) => this.withPhotos(row)));
  }

  listSellerListings(sellerId: number, status: SellerListingStatus, limit = 20): Promise<Listing[]> {
    return this.execute(() => this.sql.selectSellerListings
      .all(sellerId, status, limit)
      .map((row) => this.withPhotos(row)));
  }

  // Favorites

  addFavorite(userId: number, listingId: number): Promise<boolean> {
    return this.execute(() => this.sql.insertFavorite.run(userId, listingId, this.clock()).changes > 0);
  }

  removeFavorite(userId: number, listingId: number): Promise<boolean> {
    return this.execute(() => this.sql.deleteFavorite.run(userId, listingId).changes > 0);
  }

  listFavorites(userId: number, limit = 20): Promise<Listing[]> {
    return this.execute(() => this.sql.selectFavorites
      .all(userId, limit)
      .map((row) => this.withPhotos(row)));
  }

  // Reviews

  createReview(input: NewReview): Promise<Review | undefined> {
    return this.execute(() => {
      const { changes, lastInsertRowid } = this.sql.insertReview.run(
        input.listingId,
        input.sellerId,
        input.reviewerId,
        input.rating,
        input.comment,
        this.clock(),
      );
      if (changes === 0) return undefined;
      const row = this.sql.selectReview.get(Number(lastInsertRowid));
      if (!row) throw new Error('Review missing after insert');
      return toReview(row);
    });
  }

  getReview(reviewId: number): Promise<Review | undefined> {
    return this.execute(() => {
      const row = this.sql.selectReview.get(reviewId);
      return row ? toReview(row) : undefined;
    });
  }

  findReview(reviewerId: number, listingId: number): Promise<Review | undefined> {
    return this.execute(() => {
      const row = this.sql.selectReviewBy.get(reviewerId, listingId);
      return row ? toReview(row) : undefined;
    });
  }

  listSellerReviews(sellerId: number, limit = 10): Promise<Review[]> {
    return this.execute(() => this.sql.selectSellerReviews.all(sellerId, limit).map(toReview));
  }

  sellerRating(sellerId: number): Promise<SellerRating> {
    return this.execute(() => {
      const row = this.sql.sellerRating.get(sellerId);
      return { average: row?.average ?? null, count: row?.count ?? 0 };
    });
  }

  deleteReview(reviewId: number): Promise<boolean> {
    return this.execute(() => this.sql.deleteReview.run(reviewId).changes > 0);
  }

  // Messages

  createMessage(input: NewDirectMessage): Promise<DirectMessage> {
    return this.execute(() => {
      const createdAt = this.clock();
      const { lastInsertRowid } = this.sql.insertMessage.run(
        input.listingId,
        input.senderId,
        input.receiverId,
        input.text,
        createdAt,
      );
      return { id: Number(lastInsertRowid), ...input, createdAt };
    });
  }

  // Warnings

  createWarning(input: NewUserWarning): Promise<UserWarning> {
    return this.execute(() => {
      const createdAt = this.clock();
      const insert = this.db.transaction(() => {
        const { lastInsertRowid } = this.sql.insertWarning.run(
          input.userId,
          input.adminId,
          input.reason,
          input.severity,
          createdAt,
          input.expiresAt,
        );
        this.sql.incrementWarnings.run(createdAt, input.userId);
        return Number(lastInsertRowid);
      });
      return { id: insert(), ...input, active: true, createdAt };
    });
  }

  getWarnings(userId: number, activeOnly = false): Promise<UserWarning[]> {
    return this.execute(() => {
      const rows = activeOnly
        ? this.sql.selectActiveWarnings.all(userId, this.clock())
        : this.sql.selectWarnings.all(userId);
      return rows.map(toWarning);
    });
  }

  // Audit log

  appendAudit(entry: NewAuditEntry): Promise<AuditEntry> {
    return this.execute(() => {
      const { lastInsertRowid } = this.sql.insertAudit.run(
        entry.actorId,
        entry.action,
        entry.targetType,
        entry.targetId,
        JSON.stringify(entry.detail),
        this.clock(),
      );
      const row = this.sql.selectAudit.get(Number(lastInsertRowid));
      if (!row) throw new Error('Audit entry missing after insert');
      return toAudit(row);
    });
  }

  listAudit(query: AuditQuery = {}): Promise<AuditEntry[]> {
    const clauses: string[] = [];
    const params: SqlParam[] = [];
    if (query.actorId !== undefined) {
      clauses.push('actor_id = ?');
      params.push(query.actorId);
    }
    if (query.action !== undefined) {
      clauses.push('action = ?');
      params.push(query.action);
    }
    if (query.targetType !== undefined) {
      clauses.push('target_type = ?');
      params.push(query.targetType);
    }
    if (query.targetId !== undefined) {
      clauses.push('target_id = ?');
      params.push(query.targetId);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';

    return this.execute(() => this.db
      .prepare<SqlParam[], AuditRow>(
        `SELECT * FROM admin_audit_log ${where} ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?`,
      )
      .all(...params, query.limit ?? 50, query.offset ?? 0)
      .map(toAudit));
  }

  // Nested transactions join the one already open; the outer one owns the commit.
  withTransaction<T>(work: (tx: MarketplaceStore) => Promise<T>): Promise<T> {
    return work(this);
  }

  async close(): Promise<void> {
    throw new Error('Cannot close the database from inside a transaction');
  }

  private loadListing(listingId: number): Listing | undefined {
    const row = this.sql.selectListing.get(listingId);
    return row ? this.withPhotos(row) : undefined;
  }

  private withPhotos(row: ListingRow): Listing {
    const photos: ListingPhoto[] = this.sql.selectPhotos
      .all(row.id)
      .map((photo) => ({ fileId: photo.file_id, uniqueId: photo.unique_id }));
    return toListing(row, photos);
  }
}

// ── Public store ────────────────────────────────────────────────────

const GATE = 'db';

export interface SqliteStoreOptions {
  clock?: () => number;
}

export class SqliteMarketplaceStore extends SqliteStoreView {
  private readonly gate: KeyedMutex<string>;
  private readonly transactionView: SqliteStoreView;

  constructor(db: SqliteHandle, options: SqliteStoreOptions = {}) {
    const gate = new KeyedMutex<string>();
    const statements = prepareStatements(db);
    const clock = options.clock ?? Date.now;
    super(db, statements, clock, (operation) => gate.run(GATE, async () => operation()));
    this.gate = gate;
    this.transactionView = new SqliteStoreView(db, statements, clock, async (operation) => operation());
  }

  override withTransaction<T>(
    work: (tx: MarketplaceStore) => Promise<T>,
    options: TransactionOptions = {},
  ): Promise<T> {
    const { signal } = options;
    return this.gate.run(GATE, async () => {
      signal?.throwIfAborted();
      this.db.exec('BEGIN IMMEDIATE');
      try {
        const result = await work(this.transactionView);
        // The caller may have given up while `work` ran.
        signal?.throwIfAborted();
        this.db.exec('COMMIT');
        return result;
      } catch (err) {
        if (this.db.inTransaction) this.db.exec('ROLLBACK');
        throw err;
      }
    });
  }

  override async close(): Promise<void> {
    await this.gate.run(GATE, async () => closeDatabase(this.db));
  }
}

// ── Row mapping ─────────────────────────────────────────────────────

function toUser(row: UserRow): MarketUser {
  return {
    id: row.id,
    username: row.username,
    firstName: row.first_name,
    lastName: row.last_name,
    phone: row.phone,
    location: row.location,
    bio: row.bio,
    active: row.is_active === 1,
    warningCount: row.warning_count,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toAdmin(row: AdminRow): AdminRecord {
  return {
    userId: row.user_id,
    role: adminRoleSchema.parse(row.role),
    active: row.is_active === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toListing(row: ListingRow, photos: ListingPhoto[]): Listing {
  return {
    id: row.id,
    sellerId: row.seller_id,
    title: row.title,
    description: row.description,
    price: row.price,
    category: row.category,
    location: row.location,
    status: listingStatusSchema.parse(row.status),
    photos,
    flagged: row.is_flagged === 1,
    flagReason: row.flag_reason,
    flaggedBy: row.flagged_by,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toWarning(row: WarningRow): UserWarning {
  const severity: WarningSeverity = severitySchema.parse(row.severity);
  return {
    id: row.id,
    userId: row.user_id,
    adminId: row.admin_id,
    reason: row.reason,
    severity,
    active: row.is_active === 1,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
  };
}

function toReview(row: ReviewRow): Review {
  return {
    id: row.id,
    listingId: row.listing_id,
    sellerId: row.seller_id,
    reviewerId: row.reviewer_id,
    rating: row.rating,
    comment: row.comment,
    createdAt: row.created_at,
  };
}

function toAudit(row: AuditRow): AuditEntry {
  const detail: AuditDetail = auditDetailSchema.parse(JSON.parse(row.detail));
  return {
    id: row.id,
    actorId: row.actor_id,
    action: row.action,
    targetType: row.target_type,
    targetId: row.target_id,
    detail,
    createdAt: row.created_at,
  };
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}
