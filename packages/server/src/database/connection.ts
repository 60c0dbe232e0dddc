import { Kysely, SqliteDialect, sql } from 'kysely';
import SQLite from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';
import type { Database } from './schema.js';
import { createLogger } from '../lib/logger.js';

const logger = createLogger('database');

/**
 * Open a Kysely instance over a SQLite file.
 * Creates the parent directory if needed. Does not touch the schema;
 * see runMigrations().
 *
 * @param dbPath - File path, or ':memory:' for an in-memory database (tests)
 */
export function createDatabase(dbPath: string): Kysely<Database> {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  logger.info({ dbPath }, 'Opening SQLite database');

  return new Kysely<Database>({
    dialect: new SqliteDialect({ database: new SQLite(dbPath) }),
  });
}

/**
 * Run database migrations based on PRAGMA user_version.
 * Each migration increments the version number. Safe to call repeatedly.
 */
export async function runMigrations(database: Kysely<Database>): Promise<void> {
  // Get current schema version using PRAGMA user_version
  const result = await sql<{ user_version: number }>`PRAGMA user_version`.execute(database);
  const currentVersion = result.rows[0]?.user_version ?? 0;

  logger.debug({ currentVersion }, 'Current database schema version');

  if (currentVersion < 1) {
    await migrateToV1(database);
  }
}

/**
 * Migration v1: Create test_results table.
 */
async function migrateToV1(database: Kysely<Database>): Promise<void> {
  logger.info('Running migration to v1: Creating test_results table');

  // stored_at is ISO 8601 UTC text so lexicographic order is chronological
  await database.schema
    .createTable('test_results')
    .ifNotExists()
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('job_id', 'text', (col) => col.notNull())
    .addColumn('build_url', 'text', (col) => col.notNull())
    .addColumn('build_hash', 'text', (col) => col.notNull())
    .addColumn('original_branch', 'text', (col) => col.notNull())
    .addColumn('normalized_branch', 'text', (col) => col.notNull())
    .addColumn('commit_hash', 'text', (col) => col.notNull())
    .addColumn('test_id', 'text', (col) => col.notNull())
    .addColumn('runs', 'integer', (col) => col.notNull())
    .addColumn('run_index', 'integer', (col) => col.notNull())
    .addColumn('wall_time', 'real')
    .addColumn('user_time', 'real')
    .addColumn('system_time', 'real')
    .addColumn('max_memory', 'real')
    .addColumn('stored_at', 'text', (col) =>
      col.notNull().defaultTo(sql`(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`)
    )
    .addCheckConstraint('test_results_stored_at_iso8601', sql`stored_at GLOB '????-??-??T??:??:??*Z'`)
    .execute();

  await database.schema
    .createIndex('idx_test_results_job_id')
    .ifNotExists()
    .on('test_results')
    .column('job_id')
    .execute();

  // Update schema version
  await sql`PRAGMA user_version = 1`.execute(database);

  logger.info('Migration to v1 completed');
}
