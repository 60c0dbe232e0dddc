import type { BuildRequest, JobHandle } from '@benchmark-gateway/shared';
import { JobQueue, type JobStatus } from './job-queue.js';
import type { BenchmarkJobPayload, JobType } from './job-types.js';
import { createLogger } from '../lib/logger.js';

const logger = createLogger('dispatcher');

export interface DispatcherOptions {
  /** SQLite file shared with the worker */
  queueDbPath: string;
  queueName: string;
  /** Seconds the worker may spend on one job */
  defaultTimeoutSeconds: number;
}

/**
 * Job status as exposed by GET /jobs/:id.
 */
export interface JobStatusView {
  id: string;
  type: string;
  queue: string;
  status: JobStatus;
  attempts: number;
  lastError: string | null;
  enqueuedAt: string;
  startedAt: string | null;
  completedAt: string | null;
}

function toIso(timestamp: number | null): string | null {
  return timestamp === null ? null : new Date(timestamp).toISOString();
}

/**
 * Hands admitted build requests to the worker queue.
 *
 * Each call opens its own queue connection and closes it before returning,
 * also on error. There is no pooling; fine at admission rates of a few
 * requests per minute, a limit at higher rates.
 */
export class Dispatcher {
  constructor(private readonly options: DispatcherOptions) {}

  /**
   * Enqueue a build request for the given job type.
   */
  async dispatch(jobType: JobType, request: BuildRequest): Promise<JobHandle> {
    const payload: BenchmarkJobPayload = request;
    const job = this.withQueue((queue) =>
      queue.enqueue(jobType, payload, { timeoutSeconds: this.options.defaultTimeoutSeconds })
    );

    logger.info(
      { jobId: job.id, jobType, queue: this.options.queueName, branch: request.normalizedBranch },
      'Build request dispatched'
    );
    return { id: job.id, enqueuedAt: job.enqueuedAt };
  }

  /**
   * Look up a dispatched job.
   * @returns null if no job has this ID
   */
  async lookup(id: string): Promise<JobStatusView | null> {
    const job = this.withQueue((queue) => queue.getJob(id));
    if (!job) {
      return null;
    }
    return {
      id: job.id,
      type: job.type,
      queue: job.queue,
      status: job.status,
      attempts: job.attempts,
      lastError: job.last_error,
      enqueuedAt: new Date(job.created_at).toISOString(),
      startedAt: toIso(job.started_at),
      completedAt: toIso(job.completed_at),
    };
  }

  private withQueue<T>(use: (queue: JobQueue) => T): T {
    const queue = new JobQueue(this.options.queueDbPath, {
      queueName: this.options.queueName,
      defaultTimeoutSeconds: this.options.defaultTimeoutSeconds,
    });
    try {
      return use(queue);
    } finally {
      queue.close();
    }
  }
}
