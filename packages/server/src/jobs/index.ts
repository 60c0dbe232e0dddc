/**
 * Local Job Queue module.
 *
 * Provides the SQLite-backed queue between the admission gateway and the
 * benchmark worker, the dispatcher that writes to it and the worker's
 * job handlers.
 */
export {
  JobQueue,
  JOB_STATUS,
  type JobHandler,
  type JobContext,
  type JobStatus,
  type JobRecord,
  type EnqueuedJob,
  type EnqueueOptions,
  type JobQueueOptions,
} from './job-queue.js';

export { Dispatcher, type DispatcherOptions, type JobStatusView } from './dispatcher.js';
export { registerJobHandlers, runBenchmarkJob, type BenchmarkJobDependencies } from './handlers.js';
export { JOB_TYPES, jobTypeForKind, type JobType, type BenchmarkJobPayload } from './job-types.js';
