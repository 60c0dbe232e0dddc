import { execFile } from 'child_process';
import type { BenchmarkKind, JobRequest, TestDefinition } from '@benchmark-gateway/shared';
import { createLogger } from '../../lib/logger.js';

const logger = createLogger('benchmark-runner');

/** Output above this size fails the run instead of being truncated */
const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

/**
 * Runs one benchmark test for a job and returns the tool's raw output.
 * Executing benchmarks is outside this service; implementations adapt an
 * external tool and stop it when `signal` aborts.
 */
export interface BenchmarkRunner {
  run(
    kind: BenchmarkKind,
    job: JobRequest,
    test: TestDefinition,
    signal?: AbortSignal
  ): Promise<Buffer>;
}

/**
 * Runs an external script as `<script> <kind> <testId> <runs>` with the job
 * described in the environment. Returns stdout followed by stderr.
 * Aborting the signal kills the script.
 */
export class ScriptBenchmarkRunner implements BenchmarkRunner {
  constructor(private readonly script: string) {}

  run(
    kind: BenchmarkKind,
    job: JobRequest,
    test: TestDefinition,
    signal?: AbortSignal
  ): Promise<Buffer> {
    const args = [kind, test.testId, String(test.runs)];
    const env = {
      ...process.env,
      JOB_ID: job.jobId,
      BUILD_URL: job.buildUrl,
      BUILD_HASH: job.buildHash,
      BRANCH: job.normalizedBranch,
      COMMIT: job.commit,
    };

    logger.debug({ jobId: job.jobId, kind, testId: test.testId }, 'Running benchmark script');

    return new Promise((resolve, reject) => {
      execFile(
        this.script,
        args,
        { env, encoding: 'buffer', maxBuffer: MAX_OUTPUT_BYTES, signal },
        (error, stdout, stderr) => {
          if (error) {
            logger.error(
              { jobId: job.jobId, testId: test.testId, err: error, stderr: stderr.toString('utf8') },
              'Benchmark script failed'
            );
            reject(error);
            return;
          }
          resolve(Buffer.concat([stdout, stderr]));
        }
      );
    });
  }
}
