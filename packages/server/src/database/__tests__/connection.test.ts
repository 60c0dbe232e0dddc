import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { sql, type Kysely } from 'kysely';
import { createDatabase, runMigrations } from '../connection.js';
import type { Database } from '../schema.js';

describe('runMigrations', () => {
  let db: Kysely<Database>;

  beforeEach(() => {
    db = createDatabase(':memory:');
  });

  afterEach(async () => {
    await db.destroy();
  });

  async function userVersion(): Promise<number> {
    const result = await sql<{ user_version: number }>`PRAGMA user_version`.execute(db);
    return result.rows[0]?.user_version ?? 0;
  }

  it('should create the test_results table and set the schema version', async () => {
    await runMigrations(db);

    expect(await userVersion()).toBe(1);
    const rows = await db.selectFrom('test_results').selectAll().execute();
    expect(rows).toEqual([]);
  });

  it('should be safe to run repeatedly', async () => {
    await runMigrations(db);
    await runMigrations(db);

    expect(await userVersion()).toBe(1);
  });

  it('should default stored_at to the current UTC time in ISO 8601', async () => {
    await runMigrations(db);

    const row = await db
      .insertInto('test_results')
      .values({
        job_id: 'test_job_id',
        build_url: 'file:///tmp/build.tgz',
        build_hash: '',
        original_branch: 'master',
        normalized_branch: 'master-local-1700000000',
        commit_hash: '',
        test_id: 'test-id',
        runs: 1,
        run_index: 1,
        wall_time: null,
        user_time: null,
        system_time: null,
        max_memory: null,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    expect(row.stored_at).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it('should reject stored_at values that are not ISO 8601', async () => {
    await runMigrations(db);

    await expect(
      sql`INSERT INTO test_results (job_id, build_url, build_hash, original_branch, normalized_branch, commit_hash, test_id, runs, run_index, stored_at)
          VALUES ('j', 'file:///b', '', 'm', 'm-local-1', '', 't', 1, 1, 'yesterday')`.execute(db)
    ).rejects.toThrow(/CHECK constraint failed/);
  });
});
