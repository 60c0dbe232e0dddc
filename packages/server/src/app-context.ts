/**
 * Application Context for Dependency Injection.
 *
 * Gateway and worker processes each build one context at startup and pass
 * it explicitly to routes and handlers. Configuration is handed in here;
 * nothing below reads the environment.
 */

import type { Kysely } from 'kysely';
import type { Database } from './database/schema.js';
import { createDatabase } from './database/connection.js';
import {
  AdmissionGateway,
  GitRefNameValidator,
  RequestAuthenticator,
  RequestNormalizer,
  type RefNameValidator,
} from './services/admission/index.js';
import type { BenchmarkRunner } from './services/benchmark/benchmark-runner.js';
import { Dispatcher, JobQueue, registerJobHandlers } from './jobs/index.js';
import type { ResultStore } from './repositories/result-store.js';
import { SqliteResultStore } from './repositories/sqlite-result-store.js';
import type { BenchmarkConfig } from './lib/benchmark-config.js';
import { createLogger } from './lib/logger.js';

const logger = createLogger('app-context');

/**
 * Gateway context containing all stateful dependencies of the HTTP side.
 */
export interface AppContext {
  /** Admission of inbound build triggers */
  gateway: AdmissionGateway;

  /** Hands admitted requests to the worker queue */
  dispatcher: Dispatcher;
}

/**
 * Options for creating the gateway context.
 */
export interface CreateAppContextOptions {
  /** HMAC signing secret shared with trusted callers */
  hmacKey: string;
  /** Trusted build artifact URL prefixes */
  allowedBuildUrls: readonly string[];
  /** Job queue SQLite file */
  queueDbPath: string;
  queueName: string;
  /** Job timeout in seconds */
  defaultTimeoutSeconds: number;
  /** Branch name validator. Default: git check-ref-format */
  refNameValidator?: RefNameValidator;
  /** Clock in milliseconds, for tests. Default: Date.now */
  now?: () => number;
}

/**
 * Create the gateway context.
 */
export function createAppContext(options: CreateAppContextOptions): AppContext {
  if (!options.hmacKey) {
    logger.warn('HMAC key not configured, remote builds will be rejected');
  }
  if (options.allowedBuildUrls.length === 0) {
    logger.warn('No allowed build URLs configured, only local builds will be accepted');
  }

  const authenticator = new RequestAuthenticator({
    hmacKey: options.hmacKey,
    now: options.now,
  });
  const normalizer = new RequestNormalizer({
    validator: options.refNameValidator ?? new GitRefNameValidator(),
    now: options.now,
  });
  const gateway = new AdmissionGateway({
    allowedBuildUrls: options.allowedBuildUrls,
    authenticator,
    normalizer,
  });
  const dispatcher = new Dispatcher({
    queueDbPath: options.queueDbPath,
    queueName: options.queueName,
    defaultTimeoutSeconds: options.defaultTimeoutSeconds,
  });

  logger.info(
    { queue: options.queueName, allowedBuildUrls: options.allowedBuildUrls },
    'Gateway context initialized'
  );

  return { gateway, dispatcher };
}

/**
 * Worker context: the consuming side of the queue and the result store.
 */
export interface WorkerContext {
  /** Kysely database instance of the result store */
  db: Kysely<Database>;

  /** Consuming job queue with benchmark handlers registered */
  jobQueue: JobQueue;

  resultStore: ResultStore;
}

/**
 * Options for creating the worker context.
 */
export interface CreateWorkerContextOptions {
  queueDbPath: string;
  queueName: string;
  /** Result store SQLite file. Use ':memory:' for tests. */
  resultsDbPath: string;
  /** Job queue concurrency (default: 1) */
  concurrency?: number;
  /** Interval for picking up jobs the gateway enqueued (default: 1000) */
  pollIntervalMs?: number;
  runner: BenchmarkRunner;
  tests: BenchmarkConfig;
}

/**
 * Create the worker context and start consuming the queue.
 *
 * Initializes in order:
 * 1. Result store database (schema is created on first write)
 * 2. Job queue with handlers registered
 */
export async function createWorkerContext(
  options: CreateWorkerContextOptions
): Promise<WorkerContext> {
  const db = createDatabase(options.resultsDbPath);
  const resultStore = new SqliteResultStore(db);

  const jobQueue = new JobQueue(options.queueDbPath, {
    queueName: options.queueName,
    concurrency: options.concurrency ?? 1,
    pollIntervalMs: options.pollIntervalMs ?? 1000,
  });
  registerJobHandlers(jobQueue, {
    runner: options.runner,
    resultStore,
    tests: options.tests,
  });
  await jobQueue.start();
  logger.info({ queue: options.queueName }, 'Worker context initialized');

  return { db, jobQueue, resultStore };
}

/**
 * Stop the job queue and close both databases.
 */
export async function shutdownWorkerContext(context: WorkerContext): Promise<void> {
  await context.jobQueue.stop();
  context.jobQueue.close();
  await context.db.destroy();
  logger.info('Worker context shut down');
}

/**
 * Hono bindings for AppContext.
 *
 * Usage:
 * ```ts
 * app.post('/zeek', (c) => {
 *   const { gateway, dispatcher } = c.get('appContext');
 *   // ...
 * });
 * ```
 */
export interface AppBindings {
  Variables: {
    appContext: AppContext;
    /** Caller's network address, used for the loopback check */
    remoteAddress: string | undefined;
  };
}
