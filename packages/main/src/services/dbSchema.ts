import { withClient } from './db';
import { logger } from '../logger';
import { CREATE_TABLES_SQL } from '../db/schema';

// No migration runner: tables are created additively at startup.
export async function ensureSchema(): Promise<void> {
  await withClient(async (c) => {
    await c.query(CREATE_TABLES_SQL);
  });
  logger.info('dbSchema: jobs and roll_tracking tables ready');
}
