/**
 * Shared marketplace domain types used by every store implementation.
 *
 * Keep this file backend-agnostic so the sqlite store and the in-process
 * test store share the exact same contract.
 */

export type Role = 'none' | 'moderator' | 'admin' | 'super_admin';

export type ListingStatus = 'active' | 'sold' | 'reserved' | 'deleted';

export type WarningSeverity = 'low' | 'medium' | 'high';

export interface MarketUser {
  id: number;
  username: string | null;
  firstName: string | null;
  lastName: string | null;
  phone: string | null;
  location: string | null;
  bio: string | null;
  active: boolean;
  warningCount: number;
  createdAt: number;
  updatedAt: number;
}

/** Profile fields reported by the transport on each inbound event. */
export interface UserProfileHint {
  username?: string;
  firstName?: string;
  lastName?: string;
}

export type ProfileField = 'phone' | 'location' | 'bio';

export interface AdminRecord {
  userId: number;
  role: Exclude<Role, 'none'>;
  active: boolean;
  createdAt: number;
  updatedAt: number;
}

export interface ListingPhoto {
  fileId: string;
  uniqueId: string;
}

export interface Listing {
  id: number;
  sellerId: number;
  title: string;
  description: string;
  price: number;
  category: string;
  location: string | null;
  status: ListingStatus;
  photos: ListingPhoto[];
  flagged: boolean;
  flagReason: string | null;
  flaggedBy: number | null;
  createdAt: number;
  updatedAt: number;
}

export interface NewListing {
  sellerId: number;
  title: string;
  description: string;
  price: number;
  category: string;
  location: string | null;
  photos: ListingPhoto[];
}

export type ListingPatch = Partial<Pick<Listing, 'title' | 'description' | 'price' | 'category' | 'location'>>;

export interface ListingQuery {
  keyword?: string;
  category?: string;
  minPrice?: number;
  maxPrice?: number;
  status?: ListingStatus;
  limit?: number;
  offset?: number;
}

export interface ListingPage {
  listings: Listing[];
  total: number;
}

export type ListingFilter = 'all' | 'active' | 'flagged' | 'deleted';
export type UserFilter = 'all' | 'active' | 'blocked' | 'warned';

export interface DirectMessage {
  id: number;
  listingId: number | null;
  senderId: number;
  receiverId: number;
  text: string;
  createdAt: number;
}

export interface NewDirectMessage {
  listingId: number | null;
  senderId: number;
  receiverId: number;
  text: string;
}

export interface UserWarning {
  id: number;
  userId: number;
  adminId: number;
  reason: string;
  severity: WarningSeverity;
  active: boolean;
  createdAt: number;
  expiresAt: number | null;
}

export interface NewUserWarning {
  userId: number;
  adminId: number;
  reason: string;
  severity: WarningSeverity;
  expiresAt: number | null;
}

export interface Review {
  id: number;
  listingId: number;
  sellerId: number;
  reviewerId: number;
  /** 1 to 5 stars. */
  rating: number;
  comment: string | null;
  createdAt: number;
}

export type NewReview = Omit<Review, 'id' | 'createdAt'>;

export interface SellerRating {
  /** Mean of every review the seller received; null without reviews. */
  average: number | null;
  count: number;
}

/** Listings a seller sees under "my listings". */
export type SellerListingStatus = Extract<ListingStatus, 'active' | 'sold'>;

export type AuditDetail = Record<string, unknown>;

export interface AuditEntry {
  id: number;
  actorId: number;
  action: string;
  targetType: string;
  targetId: number | null;
  detail: AuditDetail;
  createdAt: number;
}

export type NewAuditEntry = Omit<AuditEntry, 'id' | 'createdAt'>;

export interface AuditQuery {
  actorId?: number;
  action?: string;
  targetType?: string;
  targetId?: number;
  limit?: number;
  offset?: number;
}
