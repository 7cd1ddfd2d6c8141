import { promises as fs } from 'fs';
import { join } from 'path';
import { Pool } from 'pg';
import { pool, withTransaction } from './client';
import { logger } from '../utils/logger';

export const MIGRATIONS_DIR = join(__dirname, 'migrations');

/**
 * Applies every .sql file in name order that is not yet recorded in
 * schema_migration. Each file runs in its own transaction.
 */
async function runMigrations(db: Pool = pool, migrationsDir: string = MIGRATIONS_DIR): Promise<string[]> {
     const files = await fs.readdir(migrationsDir);
     const sqlFiles = files.filter((f) => f.endsWith('.sql')).sort();

     await db.query(`
    CREATE TABLE IF NOT EXISTS schema_migration (
      name       TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
     const { rows } = await db.query<{ name: string }>('SELECT name FROM schema_migration');
     const applied = new Set(rows.map((row) => row.name));

     const pending = sqlFiles.filter((file) => !applied.has(file));
     logger.info({ total: sqlFiles.length, pending: pending.length }, 'Running database migrations');

     for (const file of pending) {
          const sql = await fs.readFile(join(migrationsDir, file), 'utf-8');

          logger.info({ file }, 'Executing migration');
          await withTransaction(async (client) => {
               await client.query(sql);
               await client.query('INSERT INTO schema_migration (name) VALUES ($1)', [file]);
          }, db);
          logger.info({ file }, 'Migration completed');
     }

     logger.info('All migrations completed successfully');
     return pending;
}

// Run if executed directly
if (require.main === module) {
     runMigrations()
          .catch((err) => {
               logger.error({ err }, 'Migration failed');
               process.exitCode = 1;
          })
          .finally(() => pool.end());
}

export { runMigrations };
