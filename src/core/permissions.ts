import type { Role } from '../utils/db-types.js';
import type { Principal } from './principals.js';

export const PERMISSIONS = [
  'manage_users',
  'manage_listings',
  'manage_transactions',
  'view_analytics',
  'manage_admins',
  'view_audit_log',
  'edit_any_listing',
  'delete_any_listing',
  'block_users',
  'warn_users',
] as const;

export type Permission = (typeof PERMISSIONS)[number];

// Each role's set is spelled out in full. Do not derive one role from
// another: editing one table must never widen a different role.
const ROLE_PERMISSIONS: Readonly<Record<Role, ReadonlySet<Permission>>> = {
  super_admin: new Set<Permission>([
    'manage_users',
    'manage_listings',
    'manage_transactions',
    'view_analytics',
    'manage_admins',
    'view_audit_log',
    'edit_any_listing',
    'delete_any_listing',
    'block_users',
    'warn_users',
  ]),
  admin: new Set<Permission>([
    'manage_users',
    'manage_listings',
    'manage_transactions',
    'view_analytics',
    'view_audit_log',
    'edit_any_listing',
    'delete_any_listing',
    'block_users',
    'warn_users',
  ]),
  moderator: new Set<Permission>([
    'manage_listings',
    'warn_users',
    'view_analytics',
    'edit_any_listing',
  ]),
  none: new Set<Permission>(),
};

export function isPermission(name: string): name is Permission {
  return PERMISSIONS.some((permission) => permission === name);
}

export function permissionsForRole(role: Role): ReadonlySet<Permission> {
  return ROLE_PERMISSIONS[role];
}

/**
 * Answer "may this principal do X". Inactive principals and principals
 * without a role are denied everything; an unknown permission name is denied.
 */
export function authorize(principal: Principal, permission: string): boolean {
  if (!principal.active) return false;
  if (principal.role === 'none') return false;
  if (!isPermission(permission)) return false;
  return ROLE_PERMISSIONS[principal.role].has(permission);
}

// ── Moderation actions ──────────────────────────────────────────────

export type ModerationAction =
  | 'block_user'
  | 'warn_user'
  | 'flag_listing'
  | 'delete_listing'
  | 'edit_listing'
  | 'delete_review'
  | 'filter_analytics';

export type ModerationTargetType = 'user' | 'listing' | 'review' | 'users' | 'listings';

/** Permission each moderation action requires. */
export const ACTION_PERMISSIONS: Readonly<Record<ModerationAction, Permission>> = {
  block_user: 'manage_users',
  warn_user: 'warn_users',
  flag_listing: 'manage_listings',
  delete_listing: 'delete_any_listing',
  edit_listing: 'edit_any_listing',
  delete_review: 'manage_listings',
  filter_analytics: 'view_analytics',
};

export function requiredPermission(action: ModerationAction): Permission {
  return ACTION_PERMISSIONS[action];
}
