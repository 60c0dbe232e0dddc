/**
 * Job handlers for the benchmark worker.
 *
 * Registers one handler per benchmark kind:
 * - benchmark:zeek
 * - benchmark:broker
 *
 * Each handler runs every configured test for the build, parses the tool
 * output into timing results and appends them to the result store.
 */
import {
  BENCHMARK_KINDS,
  BuildRequestSchema,
  type BenchmarkKind,
  type JobRequest,
  type StoredRow,
} from '@benchmark-gateway/shared';
import type { JobContext, JobQueue } from './job-queue.js';
import { jobTypeForKind } from './job-types.js';
import type { BenchmarkRunner } from '../services/benchmark/benchmark-runner.js';
import { parseTestResults } from '../services/benchmark/result-parser.js';
import type { ResultStore } from '../repositories/result-store.js';
import type { BenchmarkConfig } from '../lib/benchmark-config.js';
import { parseOrThrow } from '../lib/validation.js';
import { createLogger } from '../lib/logger.js';

const logger = createLogger('job-handlers');

export interface BenchmarkJobDependencies {
  runner: BenchmarkRunner;
  resultStore: ResultStore;
  tests: BenchmarkConfig;
}

/**
 * Run one benchmark job end to end.
 * Parse and store errors propagate and fail the job. Stops at the next
 * test or row once the job's signal is aborted.
 * @returns The rows stored for this job
 */
export async function runBenchmarkJob(
  kind: BenchmarkKind,
  payload: unknown,
  context: JobContext,
  deps: BenchmarkJobDependencies
): Promise<StoredRow[]> {
  const job: JobRequest = {
    ...parseOrThrow(BuildRequestSchema, payload),
    jobId: context.jobId,
  };

  const { signal } = context;
  const stored: StoredRow[] = [];
  for (const test of deps.tests[kind]) {
    signal.throwIfAborted();
    logger.debug({ jobId: job.jobId, kind, testId: test.testId }, 'Running benchmark test');
    const output = await deps.runner.run(kind, job, test, signal);
    const results = parseTestResults(output, test.runs);

    if (results.length !== test.runs) {
      logger.warn(
        { jobId: job.jobId, testId: test.testId, expectedRuns: test.runs, foundRuns: results.length },
        'Benchmark output run count does not match test definition'
      );
    }

    for (const result of results) {
      // A timed-out job is already failed; it must not gain rows
      signal.throwIfAborted();
      stored.push(await deps.resultStore.store(job, test, result));
    }
  }

  logger.info({ jobId: job.jobId, kind, rows: stored.length }, 'Benchmark results stored');
  return stored;
}

/**
 * Register all job handlers with the job queue.
 * @param jobQueue The JobQueue instance to register handlers with
 */
export function registerJobHandlers(jobQueue: JobQueue, deps: BenchmarkJobDependencies): void {
  for (const kind of BENCHMARK_KINDS) {
    jobQueue.registerHandler(jobTypeForKind(kind), async (payload, context) => {
      await runBenchmarkJob(kind, payload, context, deps);
    });
  }

  logger.info('Job handlers registered');
}
