/**
 * Benchmark Job Type Definitions
 *
 * Records that flow from build admission through the job queue to the
 * result store. Records that cross a process boundary (HTTP query, queue
 * payload, benchmark config) are derived from the valibot schemas in
 * ../schemas/benchmark.ts.
 */
import type { BuildRequest } from '../schemas/benchmark.js';

/**
 * Benchmark kinds, one per trigger endpoint and job type.
 */
export const BENCHMARK_KINDS = ['zeek', 'broker'] as const;

export type BenchmarkKind = (typeof BENCHMARK_KINDS)[number];

/**
 * An admitted build request after the dispatch channel assigned its job ID.
 */
export interface JobRequest extends BuildRequest {
  jobId: string;
}

/**
 * Handle returned to the caller once a build request is enqueued.
 */
export interface JobHandle {
  id: string;
  /** ISO 8601 UTC */
  enqueuedAt: string;
}

/**
 * Measurements extracted from one benchmark timing line.
 * A measurement the line did not report is null.
 */
export interface TestResult {
  /** 1-based position among the timing lines of one test output */
  runIndex: number;
  /** Elapsed wall-clock seconds */
  wallTime: number | null;
  userTime: number | null;
  systemTime: number | null;
  /** Maximum resident set size as reported by the tool */
  maxMemory: number | null;
}

/**
 * A persisted result row: the test result joined with its job and test identity.
 */
export interface StoredRow {
  id: number;
  jobId: string;
  buildUrl: string;
  buildHash: string;
  originalBranch: string;
  normalizedBranch: string;
  commit: string;
  testId: string;
  runs: number;
  runIndex: number;
  wallTime: number | null;
  userTime: number | null;
  systemTime: number | null;
  maxMemory: number | null;
  storedAt: string;
}
