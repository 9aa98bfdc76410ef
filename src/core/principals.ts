import type { MarketplaceStore } from '../utils/db-backend.js';
import type { Role, UserProfileHint } from '../utils/db-types.js';

export interface Principal {
  id: number;
  role: Role;
  /** False once the user has been blocked. */
  active: boolean;
}

/** Environment-level admin allow-list. */
export interface AccessPolicy {
  adminIds: ReadonlySet<number>;
  superAdminId?: number;
}

/**
 * Load (or create, on first contact) the user behind an inbound event and
 * derive its role. Ids outside the allow-list never get a role, whatever
 * the admin table says.
 */
export async function resolvePrincipal(
  store: MarketplaceStore,
  userId: number,
  policy: AccessPolicy,
  hint?: UserProfileHint,
): Promise<Principal> {
  const user = await store.ensureUser(userId, hint);
  const role = await resolveRole(store, userId, policy);
  return { id: userId, role, active: user.active };
}

async function resolveRole(store: MarketplaceStore, userId: number, policy: AccessPolicy): Promise<Role> {
  if (!policy.adminIds.has(userId)) return 'none';
  if (policy.superAdminId !== undefined && policy.superAdminId === userId) return 'super_admin';

  const admin = await store.getAdmin(userId);
  if (!admin || !admin.active) return 'none';
  return admin.role;
}
