import type { Env } from '../env.js';
import type { ConfigStore } from './ConfigStore.js';
import { DatabaseAdapter } from '../DatabaseAdapter.js';
import { runMigrations } from '../migrations.js';
import { InMemoryConfigStore } from './InMemoryConfigStore.js';
import { SqliteConfigStore } from './SqliteConfigStore.js';
import { logger } from '../logger.js';

/**
 * Factory function to create the configured store
 * The SQLite store is migrated before its connection is opened
 *
 * @returns A ready store; the caller owns it and must close() it
 */
export async function createConfigStore(env: Env): Promise<ConfigStore> {
  logger.info('Initializing config store', { driver: env.CONFIG_STORE });

  if (env.CONFIG_STORE === 'memory') {
    logger.warn('Using in-memory config store, changes are lost on restart');
    return new InMemoryConfigStore();
  }

  await runMigrations(env.SQLITE_DB_PATH);
  return new SqliteConfigStore(new DatabaseAdapter(env.SQLITE_DB_PATH));
}
