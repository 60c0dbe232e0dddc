import type { JobRequest, StoredRow, TestDefinition, TestResult } from '@benchmark-gateway/shared';

/**
 * Repository interface for benchmark result persistence.
 * Append-only: there is no update or delete.
 */
export interface ResultStore {
  /**
   * Persist one parsed result with its job and test identity.
   * Atomic per call; repeated calls with the same input append new rows.
   * @returns The stored row
   */
  store(job: JobRequest, test: TestDefinition, result: TestResult): Promise<StoredRow>;

  /**
   * Read every stored row in insertion order.
   */
  listAll(): Promise<StoredRow[]>;

  /**
   * Read the rows stored for one job in insertion order.
   */
  findByJobId(jobId: string): Promise<StoredRow[]>;
}
