import { bold, italic } from '../utils/formatting.js';
import type { AuditEntry } from '../utils/db-types.js';
import type { AuditRecorder } from '../core/audit-recorder.js';
import { TEXT, type CommandBinding } from '../core/conversation-controller.js';
import type { RuleContext } from '../core/conversation-types.js';
import { reply, type SuggestedInput } from '../core/outbound-action.js';
import { authorize, type Permission } from '../core/permissions.js';
import type { Principal } from '../core/principals.js';
import { formatSelection } from '../core/selection.js';

/**
 * Stateless commands: help, the main menu, the admin menu and the audit
 * log view. None of them touch the principal's session.
 */

export const AUDIT_VIEW_LIMIT = 10;

interface AdminMenuEntry {
  label: string;
  data: string;
  permission: Permission;
}

export const ADMIN_MENU: readonly AdminMenuEntry[] = [
  { label: '🚫 Block user', data: 'admin_block', permission: 'manage_users' },
  { label: '⚠️ Warn user', data: 'admin_warn', permission: 'warn_users' },
  { label: '🚩 Flag listing', data: 'admin_flag', permission: 'manage_listings' },
  { label: '🗑 Delete listing', data: 'admin_delete', permission: 'delete_any_listing' },
  { label: '⭐ Delete review', data: 'admin_review_delete', permission: 'manage_listings' },
  { label: '🔎 Filter users / listings', data: 'admin_filter', permission: 'view_analytics' },
  { label: '📜 Audit log', data: 'audit_log', permission: 'view_audit_log' },
];

/** Admin menu entries this principal may use. */
export function adminMenuFor(principal: Principal): SuggestedInput[] {
  return ADMIN_MENU
    .filter((entry) => authorize(principal, entry.permission))
    .map(({ label, data }) => ({ label, data }));
}

export function getHelpMessage(): string {
  return [
    `${bold('Welcome to the marketplace!')} 🛍`,
    'Here\'s what you can do:',
    '',
    `${bold('Selling')}`,
    '  /sell: create a listing step by step',
    '  /mylistings: see, mark as sold or delete your listings',
    '',
    `${bold('Buying')}`,
    '  /search: find listings by keyword, category and price',
    '  /message: write to a seller about a listing',
    '  /favorites: listings you saved',
    '',
    `${bold('Anytime')}`,
    '  /cancel: stop the current operation',
    '  skip: skip an optional step',
    '',
    italic('Pick an option below to get started.'),
  ].join('\n');
}

function mainMenu(principal: Principal): SuggestedInput[] {
  const entries: SuggestedInput[] = [
    { label: '➕ Sell something', data: 'add_listing' },
    { label: '🔍 Search', data: 'search' },
    { label: '📦 My listings', data: 'my_listings' },
    { label: '⭐ Favorites', data: 'favorites' },
    { label: '📞 Edit phone', data: formatSelection('edit_profile', 'phone') },
    { label: '📍 Edit location', data: formatSelection('edit_profile', 'location') },
    { label: '📝 Edit bio', data: formatSelection('edit_profile', 'bio') },
  ];
  if (adminMenuFor(principal).length > 0) {
    entries.push({ label: '🛡 Admin', data: 'admin_menu' });
  }
  return entries;
}

function formatAuditEntry(entry: AuditEntry): string {
  const target = entry.targetId === null ? entry.targetType : `${entry.targetType} ${entry.targetId}`;
  const when = new Date(entry.createdAt).toISOString().replace('T', ' ').slice(0, 16);
  return `${when} ${bold(entry.action)} by ${entry.actorId} on ${target}`;
}

export function createCommands(audit: AuditRecorder): CommandBinding[] {
  return [
    {
      commands: ['/start', '/help'],
      selectionTags: ['help', 'main_menu'],
      run: ({ principal }: RuleContext) => [reply(principal.id, getHelpMessage(), 'notice', mainMenu(principal))],
    },
    {
      commands: ['/admin'],
      selectionTags: ['admin_menu'],
      run: ({ principal }: RuleContext) => {
        const entries = adminMenuFor(principal);
        if (entries.length === 0) return [reply(principal.id, TEXT.noAdminAccess, 'forbidden')];
        return [reply(principal.id, `🛡 ${bold('Admin panel')}\n\nChoose an action:`, 'notice', entries)];
      },
    },
    {
      commands: ['/audit'],
      selectionTags: ['audit_log'],
      run: async ({ principal, store }: RuleContext) => {
        if (!authorize(principal, 'view_audit_log')) {
          return [reply(principal.id, '⛔ You do not have permission: view_audit_log', 'forbidden')];
        }
        const entries = await audit.recent(store, { limit: AUDIT_VIEW_LIMIT });
        const body = entries.length > 0 ? entries.map(formatAuditEntry).join('\n') : 'No moderation actions recorded yet.';
        return [reply(principal.id, `📜 ${bold('Recent moderation actions')}\n\n${body}`, 'results')];
      },
    },
  ];
}
