import type { Selectable, Generated } from 'kysely';

/**
 * Database table definitions for Kysely.
 * Represents the SQLite result store schema.
 */
export interface Database {
  test_results: TestResultsTable;
}

/**
 * Test results table schema.
 * One append-only row per parsed benchmark timing line, joined with the
 * job and test identity it belongs to.
 */
export interface TestResultsTable {
  /** Primary key - autoincrement, gives insertion order */
  id: Generated<number>;
  /** Job queue ID of the benchmark job */
  job_id: string;
  /** Build artifact URL or file:// reference */
  build_url: string;
  /** Build artifact hash (empty for local builds) */
  build_hash: string;
  /** Sanitized branch name */
  original_branch: string;
  /** Sanitized branch name plus uniqueness suffix */
  normalized_branch: string;
  /** Commit the build was made from (empty when not supplied) */
  commit_hash: string;
  /** Benchmark test identity */
  test_id: string;
  /** Number of runs the test was configured with */
  runs: number;
  /** 1-based position of the timing line in the test output */
  run_index: number;
  wall_time: number | null;
  user_time: number | null;
  system_time: number | null;
  max_memory: number | null;
  /** Insert timestamp as ISO 8601 string */
  stored_at: Generated<string>;
}

// Helper types for queries

/** Result row as returned from SELECT queries */
export type TestResultRow = Selectable<TestResultsTable>;
