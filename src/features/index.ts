import type { AuditRecorder } from '../core/audit-recorder.js';
import type { CommandBinding } from '../core/conversation-controller.js';
import type { ConversationRegistry } from '../core/registry.js';
import { adminFilter } from './admin-filter.js';
import { createCommands } from './help.js';
import { listingCreate, listingDelete, listingEdit } from './listings.js';
import { messaging } from './messaging.js';
import { adminBlock, adminDelete, adminEdit, adminFlag, adminReviewDelete, adminWarn } from './moderation.js';
import { createMyListingsCommands } from './my-listings.js';
import { profileEdit } from './profile.js';
import { createReviewCommands, reviewCreate } from './reviews.js';
import { search } from './search.js';

export const CONVERSATIONS = [
  listingCreate,
  listingEdit,
  search,
  messaging,
  listingDelete,
  reviewCreate,
  profileEdit,
  adminBlock,
  adminWarn,
  adminFlag,
  adminDelete,
  adminEdit,
  adminReviewDelete,
  adminFilter,
] as const;

/** Register every marketplace conversation. Call once at startup. */
export function registerConversations(registry: ConversationRegistry): ConversationRegistry {
  for (const definition of CONVERSATIONS) {
    registry.register(definition);
  }
  return registry;
}

/** Every stateless command: help and menus, own listings, favorites, reviews. */
export function createMarketplaceCommands(audit: AuditRecorder): CommandBinding[] {
  return [...createCommands(audit), ...createMyListingsCommands(), ...createReviewCommands()];
}
