import type { Kysely } from 'kysely';
import type { JobRequest, StoredRow, TestDefinition, TestResult } from '@benchmark-gateway/shared';
import type { ResultStore } from './result-store.js';
import type { Database, TestResultRow } from '../database/schema.js';
import { runMigrations } from '../database/connection.js';
import { createLogger } from '../lib/logger.js';

const logger = createLogger('sqlite-result-store');

/**
 * Convert a database result row (snake_case) to a domain record (camelCase).
 */
function toStoredRow(row: TestResultRow): StoredRow {
  return {
    id: row.id,
    jobId: row.job_id,
    buildUrl: row.build_url,
    buildHash: row.build_hash,
    originalBranch: row.original_branch,
    normalizedBranch: row.normalized_branch,
    commit: row.commit_hash,
    testId: row.test_id,
    runs: row.runs,
    runIndex: row.run_index,
    wallTime: row.wall_time,
    userTime: row.user_time,
    systemTime: row.system_time,
    maxMemory: row.max_memory,
    storedAt: row.stored_at,
  };
}

export class SqliteResultStore implements ResultStore {
  /**
   * Promise-based mutex so concurrent first calls share one schema setup.
   */
  private schemaReady: Promise<void> | null = null;

  constructor(private db: Kysely<Database>) {}

  async store(job: JobRequest, test: TestDefinition, result: TestResult): Promise<StoredRow> {
    await this.ensureSchema();

    const row = await this.db.transaction().execute(async (trx) =>
      trx
        .insertInto('test_results')
        .values({
          job_id: job.jobId,
          build_url: job.buildUrl,
          build_hash: job.buildHash,
          original_branch: job.originalBranch,
          normalized_branch: job.normalizedBranch,
          commit_hash: job.commit,
          test_id: test.testId,
          runs: test.runs,
          run_index: result.runIndex,
          wall_time: result.wallTime,
          user_time: result.userTime,
          system_time: result.systemTime,
          max_memory: result.maxMemory,
        })
        .returningAll()
        .executeTakeFirstOrThrow()
    );

    logger.debug(
      { jobId: job.jobId, testId: test.testId, runIndex: result.runIndex, rowId: row.id },
      'Test result stored'
    );
    return toStoredRow(row);
  }

  async listAll(): Promise<StoredRow[]> {
    await this.ensureSchema();
    const rows = await this.db.selectFrom('test_results').selectAll().orderBy('id').execute();
    return rows.map(toStoredRow);
  }

  async findByJobId(jobId: string): Promise<StoredRow[]> {
    await this.ensureSchema();
    const rows = await this.db
      .selectFrom('test_results')
      .where('job_id', '=', jobId)
      .selectAll()
      .orderBy('id')
      .execute();
    return rows.map(toStoredRow);
  }

  private ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = runMigrations(this.db).catch((error: unknown) => {
        // Allow retry on next call if initialization failed
        this.schemaReady = null;
        throw error;
      });
    }
    return this.schemaReady;
  }
}
