/**
 * Local Job Queue with SQLite persistence.
 *
 * Stands in for the queue broker between the admission gateway and the
 * benchmark worker. Producers and consumers open the same SQLite file;
 * each queue name is consumed in FIFO order.
 *
 * Features:
 * - SQLite persistence via better-sqlite3
 * - Named queues with a per-job timeout
 * - Event-driven processing within one process, optional polling for
 *   jobs enqueued by other processes
 * - One attempt per job; a failed or timed-out job stays failed
 * - Concurrency control
 */
import SQLite from 'better-sqlite3';
import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { createLogger } from '../lib/logger.js';

const logger = createLogger('job-queue');

// =============================================================================
// Types
// =============================================================================

/**
 * Context passed to a handler alongside the payload.
 */
export interface JobContext {
  jobId: string;
  queue: string;
  /** Aborted when the job exceeds its timeout */
  signal: AbortSignal;
}

/**
 * Handler function for processing jobs.
 * The payload is the parsed JSON the job was enqueued with; handlers
 * validate it before use.
 */
export type JobHandler = (payload: unknown, context: JobContext) => Promise<void>;

/**
 * Job status constants.
 * Use these instead of raw strings (e.g., JOB_STATUS.PENDING instead of 'pending').
 */
export const JOB_STATUS = {
  PENDING: 'pending',
  PROCESSING: 'processing',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const;

/**
 * Job status in the lifecycle.
 */
export type JobStatus = (typeof JOB_STATUS)[keyof typeof JOB_STATUS];

/**
 * Job record as stored in SQLite.
 */
export interface JobRecord {
  id: string;
  queue: string;
  type: string;
  payload: string;
  status: JobStatus;
  timeout_seconds: number;
  /** Times the job was claimed; above 1 only after crash recovery */
  attempts: number;
  last_error: string | null;
  created_at: number;
  started_at: number | null;
  completed_at: number | null;
}

/**
 * Result of enqueuing a job.
 */
export interface EnqueuedJob {
  id: string;
  /** ISO 8601 UTC */
  enqueuedAt: string;
}

/**
 * Options for enqueuing a job.
 */
export interface EnqueueOptions {
  /** Seconds the handler may run. Default: the queue's defaultTimeoutSeconds */
  timeoutSeconds?: number;
}

/**
 * Options for creating a JobQueue instance.
 */
export interface JobQueueOptions {
  /** Queue this instance enqueues on and consumes. Default: 'default' */
  queueName?: string;
  /** Default job timeout in seconds. Default: 1800 */
  defaultTimeoutSeconds?: number;
  /** Maximum concurrent job processing. Default: 1 */
  concurrency?: number;
  /**
   * Check for new jobs at this interval while running. Needed when another
   * process enqueues. Default: no polling
   */
  pollIntervalMs?: number;
}

// =============================================================================
// JobQueue Class
// =============================================================================

export class JobQueue {
  private db: SQLite.Database;
  private handlers = new Map<string, JobHandler>();
  private emitter = new EventEmitter();
  private processing = 0;
  private pollTimer: NodeJS.Timeout | null = null;
  private running = false;

  readonly queueName: string;
  private readonly defaultTimeoutSeconds: number;
  private readonly concurrency: number;
  private readonly pollIntervalMs: number | undefined;

  /**
   * @param dbPath - File path, or ':memory:' for tests. The parent directory
   * is created if needed.
   */
  constructor(dbPath: string, options?: JobQueueOptions) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new SQLite(dbPath);
    this.queueName = options?.queueName ?? 'default';
    this.defaultTimeoutSeconds = options?.defaultTimeoutSeconds ?? 1800;
    this.concurrency = options?.concurrency ?? 1;
    this.pollIntervalMs = options?.pollIntervalMs;
    this.initSchema();
    logger.debug({ dbPath, queue: this.queueName }, 'JobQueue opened');
  }

  /**
   * Initialize the database schema for jobs.
   */
  private initSchema(): void {
    // Producer and worker processes share the file
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 5000');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS jobs (
        id TEXT PRIMARY KEY,
        queue TEXT NOT NULL,
        type TEXT NOT NULL,
        payload TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending',
        timeout_seconds INTEGER NOT NULL,
        attempts INTEGER NOT NULL DEFAULT 0,
        last_error TEXT,
        created_at INTEGER NOT NULL,
        started_at INTEGER,
        completed_at INTEGER
      )
    `);
    this.db.exec(
      `CREATE INDEX IF NOT EXISTS idx_jobs_pending ON jobs(queue, status, created_at)`
    );
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Register a handler for a job type.
   * @param type - The job type identifier
   * @param handler - The function to process jobs of this type
   */
  registerHandler(type: string, handler: JobHandler): void {
    this.handlers.set(type, handler);
    logger.debug({ type }, 'Job handler registered');
  }

  /**
   * Add a job to this instance's queue.
   * @param type - The job type (the consumer must have a registered handler)
   * @param payload - The job payload (will be JSON serialized)
   * @param options - Optional enqueue options
   */
  enqueue(type: string, payload: unknown, options?: EnqueueOptions): EnqueuedJob {
    const id = randomUUID();
    const now = Date.now();

    this.db
      .prepare(
        `
      INSERT INTO jobs (id, queue, type, payload, timeout_seconds, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `
      )
      .run(
        id,
        this.queueName,
        type,
        JSON.stringify(payload),
        options?.timeoutSeconds ?? this.defaultTimeoutSeconds,
        now
      );

    logger.info({ jobId: id, type, queue: this.queueName }, 'Job enqueued');
    this.emitter.emit('job:added');
    return { id, enqueuedAt: new Date(now).toISOString() };
  }

  /**
   * Start processing jobs.
   * Recovers any jobs of this queue that were processing when a worker crashed.
   */
  async start(): Promise<void> {
    if (this.running) {
      logger.warn('JobQueue already running');
      return;
    }

    this.running = true;

    const recovered = this.db
      .prepare(
        `
      UPDATE jobs
      SET status = 'pending', started_at = NULL
      WHERE status = 'processing' AND queue = ?
    `
      )
      .run(this.queueName);

    if (recovered.changes > 0) {
      logger.info({ count: recovered.changes }, 'Recovered crashed jobs');
    }

    this.emitter.on('job:added', () => this.tryProcess());
    this.emitter.on('job:completed', () => this.tryProcess());

    if (this.pollIntervalMs !== undefined) {
      this.pollTimer = setInterval(() => this.tryProcess(), this.pollIntervalMs);
    }
    this.tryProcess();

    logger.info({ queue: this.queueName }, 'JobQueue started');
  }

  /**
   * Stop processing jobs.
   * Jobs already running are not interrupted.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;

    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    this.emitter.removeAllListeners();

    logger.info('JobQueue stopped');
  }

  /**
   * Close the database connection.
   * Should be called after stop().
   */
  close(): void {
    this.db.close();
    logger.debug('JobQueue database closed');
  }

  // ===========================================================================
  // Inspection
  // ===========================================================================

  /**
   * Get a single job by ID (any queue).
   */
  getJob(id: string): JobRecord | null {
    return this.db.prepare<[string], JobRecord>('SELECT * FROM jobs WHERE id = ?').get(id) ?? null;
  }

  // ===========================================================================
  // Internal Processing
  // ===========================================================================

  /**
   * Attempt to process pending jobs up to the concurrency limit.
   */
  private tryProcess(): void {
    if (!this.running) {
      return;
    }

    while (this.processing < this.concurrency) {
      const job = this.claimNextJob();
      if (!job) break;

      this.processing++;
      void this.processJob(job).finally(() => {
        this.processing--;
        this.emitter.emit('job:completed');
      });
    }
  }

  /**
   * Claim the next available job of this queue, oldest first.
   * Uses a single UPDATE with RETURNING to atomically find and claim a job.
   */
  private claimNextJob(): JobRecord | null {
    const job = this.db
      .prepare<[number, string], JobRecord>(
        `
      UPDATE jobs
      SET status = 'processing', started_at = ?, attempts = attempts + 1
      WHERE id = (
        SELECT id FROM jobs
        WHERE queue = ? AND status = 'pending'
        ORDER BY created_at ASC, rowid ASC
        LIMIT 1
      )
      RETURNING *
    `
      )
      .get(Date.now(), this.queueName);

    return job ?? null;
  }

  /**
   * Process a single job, failing it when the handler exceeds its timeout.
   *
   * On timeout the job is marked failed at once and the handler's signal is
   * aborted. The concurrency slot stays taken until the handler settles, so
   * a stale benchmark never runs next to the next one.
   */
  private async processJob(job: JobRecord): Promise<void> {
    const handler = this.handlers.get(job.type);

    if (!handler) {
      this.markFailed(job, new Error(`No handler registered for job type: ${job.type}`));
      return;
    }

    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new Error(`Job exceeded timeout of ${job.timeout_seconds}s`)),
      job.timeout_seconds * 1000
    );
    const timeout = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), {
        once: true,
      });
    });

    let running: Promise<void> | null = null;
    try {
      const payload: unknown = JSON.parse(job.payload);
      logger.debug({ jobId: job.id, type: job.type }, 'Processing job');
      running = handler(payload, { jobId: job.id, queue: job.queue, signal: controller.signal });
      await Promise.race([running, timeout]);
      this.markCompleted(job.id);
      logger.info({ jobId: job.id, type: job.type }, 'Job completed');
    } catch (error) {
      this.markFailed(job, error instanceof Error ? error : new Error(String(error)));
    } finally {
      clearTimeout(timer);
    }

    if (running && controller.signal.aborted) {
      const [outcome] = await Promise.allSettled([running]);
      logger.debug({ jobId: job.id, outcome: outcome.status }, 'Timed-out job handler settled');
    }
  }

  private markCompleted(id: string): void {
    this.db
      .prepare(
        `
      UPDATE jobs
      SET status = 'completed', completed_at = ?
      WHERE id = ?
    `
      )
      .run(Date.now(), id);
  }

  private markFailed(job: JobRecord, error: Error): void {
    this.db
      .prepare(
        `
      UPDATE jobs
      SET status = 'failed', last_error = ?, completed_at = ?
      WHERE id = ?
    `
      )
      .run(error.message, Date.now(), job.id);
    logger.error({ jobId: job.id, type: job.type, error: error.message }, 'Job failed');
  }
}
