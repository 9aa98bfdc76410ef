import pino from 'pino';
import { config } from '../utils/config.js';

/**
 * Shared structured logger. Call as `logger.info({ principalId }, 'message')`.
 * Silent under the test runner so test output stays readable.
 */
const underTest = Boolean(process.env.VITEST) || process.env.NODE_ENV === 'test';

export const logger = pino({
  name: 'bazaar',
  level: underTest ? 'silent' : config.LOG_LEVEL,
  base: { pid: process.pid },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof logger;
