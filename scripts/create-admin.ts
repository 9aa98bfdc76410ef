/**
 * Grant, change or revoke an admin role.
 *
 *   npm run create-admin -- <userId> <moderator|admin|super_admin> [--inactive]
 *
 * The user must also be on ADMIN_USER_IDS for the role to take effect.
 */

import { z } from 'zod';
import { logger } from '../src/middleware/logger.js';
import { config } from '../src/utils/config.js';
import { databasePath } from '../src/app.js';
import { openDatabase } from '../src/utils/db-schema.js';
import { SqliteMarketplaceStore } from '../src/utils/db-sqlite.js';

const argsSchema = z.tuple([
  z.coerce.number().int().positive(),
  z.enum(['moderator', 'admin', 'super_admin']),
]);

async function main(argv: string[]): Promise<void> {
  const positional = argv.filter((arg) => !arg.startsWith('--'));
  const parsed = argsSchema.safeParse(positional);
  if (!parsed.success) {
    console.error('Usage: create-admin <userId> <moderator|admin|super_admin> [--inactive]');
    process.exit(1);
  }

  const [userId, role] = parsed.data;
  const active = !argv.includes('--inactive');

  const store = new SqliteMarketplaceStore(openDatabase(databasePath(config)));
  try {
    await store.ensureUser(userId);
    const admin = await store.upsertAdmin(userId, role, active);
    logger.info({ userId: admin.userId, role: admin.role, active: admin.active }, 'Admin record saved');

    if (!config.ADMIN_USER_IDS.includes(userId) && config.SUPER_ADMIN_ID !== userId) {
      console.warn(`⚠️  ${userId} is not in ADMIN_USER_IDS; the role stays inactive until it is added.`);
    }
    console.log(`✅ ${userId} is now ${admin.role}${admin.active ? '' : ' (inactive)'}`);
  } finally {
    await store.close();
  }
}

main(process.argv.slice(2)).catch((err) => {
  logger.fatal({ err }, 'create-admin failed');
  process.exit(1);
});
