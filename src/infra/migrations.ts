import { knex, type Knex } from 'knex';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { logger } from './logger.js';
import * as createConfigTables from './db/migrations/20260101000000_create_config_tables.js';

/**
 * Migrations are bundled as modules rather than discovered on disk, so the
 * same list runs from sources under tsx/vitest and from the compiled build.
 */
const MIGRATIONS: Record<string, Knex.Migration> = {
  '20260101000000_create_config_tables': createConfigTables,
};

class BundledMigrationSource implements Knex.MigrationSource<string> {
  getMigrations(): Promise<string[]> {
    return Promise.resolve(Object.keys(MIGRATIONS).sort());
  }

  getMigrationName(migration: string): string {
    return migration;
  }

  getMigration(migration: string): Promise<Knex.Migration> {
    const found = MIGRATIONS[migration];
    if (!found) {
      return Promise.reject(new Error(`Unknown migration ${migration}`));
    }
    return Promise.resolve(found);
  }
}

export async function runMigrations(dbPath: string): Promise<void> {
  mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });

  const migrationRunner = knex({
    client: 'better-sqlite3',
    connection: {
      filename: dbPath,
    },
    migrations: {
      migrationSource: new BundledMigrationSource(),
    },
    useNullAsDefault: true,
  });

  try {
    const [batch, log] = await migrationRunner.migrate.latest();
    if (log.length > 0) {
      logger.info('Database migrations applied', { batch, migrations: log });
    } else {
      logger.info('Database migrations up to date');
    }
  } finally {
    await migrationRunner.destroy();
  }
}
