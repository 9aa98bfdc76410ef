import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = resolve(__dirname, '../..');

loadDotenv({ path: resolve(PROJECT_ROOT, '.env') });

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  // Infrastructure
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  DATABASE_PATH: z.string().min(1).default('data/marketplace.db'),
  HTTP_HOST: z.string().default('127.0.0.1'),
  HTTP_PORT: z.coerce.number().int().min(0).max(65535).default(3000),

  // Admin allow-list: comma-separated numeric user ids
  ADMIN_USER_IDS: z.string().default(''),
  SUPER_ADMIN_ID: z.coerce.number().int().positive().optional(),

  // Listing limits
  MIN_PRICE: z.coerce.number().positive().default(0.01),
  MAX_PRICE: z.coerce.number().positive().default(1_000_000),
  MAX_PHOTOS: z.coerce.number().int().min(0).default(5),
  MIN_TITLE_LENGTH: z.coerce.number().int().min(1).default(3),
  MAX_TITLE_LENGTH: z.coerce.number().int().min(1).default(100),
  MAX_DESCRIPTION_LENGTH: z.coerce.number().int().min(1).default(2000),
  MAX_MESSAGE_LENGTH: z.coerce.number().int().min(2).default(1000),
  SEARCH_PAGE_SIZE: z.coerce.number().int().min(1).default(5),
  CURRENCY_SYMBOL: z.string().default('$'),

  // Engine behaviour
  STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  SESSION_TTL_MINUTES: z.coerce.number().min(0).default(30),
  AUDIT_DENIED_ATTEMPTS: booleanFlag.default('false'),
  TRANSACTIONAL_MODERATION: booleanFlag.default('true'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:');
  for (const issue of parsed.error.issues) {
    console.error(`   ${issue.path.join('.')}: ${issue.message}`);
  }
  process.exit(1);
}

const adminIds = parsed.data.ADMIN_USER_IDS
  .split(',')
  .map((id) => id.trim())
  .filter(Boolean);

const invalidAdminIds = adminIds.filter((id) => !/^\d+$/.test(id));
if (invalidAdminIds.length > 0) {
  console.error(`❌ ADMIN_USER_IDS contains non-numeric ids: ${invalidAdminIds.join(', ')}`);
  process.exit(1);
}

if (parsed.data.MIN_PRICE >= parsed.data.MAX_PRICE) {
  console.error('❌ MIN_PRICE must be lower than MAX_PRICE');
  process.exit(1);
}

export const config = {
  ...parsed.data,
  ADMIN_USER_IDS: Array.from(new Set(adminIds.map(Number))),
};
export { PROJECT_ROOT };
export type AppConfig = typeof config;
