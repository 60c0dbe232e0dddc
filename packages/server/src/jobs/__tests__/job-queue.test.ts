import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { JobQueue, JOB_STATUS } from '../job-queue.js';

describe('JobQueue', () => {
  let jobQueue: JobQueue;

  beforeEach(() => {
    jobQueue = new JobQueue(':memory:');
  });

  afterEach(async () => {
    vi.useRealTimers();
    await jobQueue.stop();
    jobQueue.close();
  });

  // ===========================================================================
  // Enqueue Tests
  // ===========================================================================

  describe('enqueue', () => {
    it('should add job with pending status', () => {
      const { id } = jobQueue.enqueue('test:job', { foo: 'bar' });
      const job = jobQueue.getJob(id);

      expect(job).not.toBeNull();
      expect(job?.status).toBe(JOB_STATUS.PENDING);
      expect(job?.type).toBe('test:job');
      expect(job?.queue).toBe('default');
      expect(JSON.parse(job?.payload ?? '{}')).toEqual({ foo: 'bar' });
    });

    it('should generate unique job IDs', () => {
      const first = jobQueue.enqueue('test:job', { n: 1 });
      const second = jobQueue.enqueue('test:job', { n: 2 });

      expect(first.id).not.toBe(second.id);
    });

    it('should report the enqueue time in ISO 8601', () => {
      const enqueued = jobQueue.enqueue('test:job', {});
      const job = jobQueue.getJob(enqueued.id);

      expect(enqueued.enqueuedAt).toBe(new Date(job?.created_at ?? 0).toISOString());
    });

    it('should default to the queue timeout', () => {
      const { id } = jobQueue.enqueue('test:job', {});
      const job = jobQueue.getJob(id);

      expect(job?.timeout_seconds).toBe(1800);
      expect(job?.attempts).toBe(0);
    });

    it('should respect the timeout option', () => {
      const { id } = jobQueue.enqueue('test:job', {}, { timeoutSeconds: 60 });

      expect(jobQueue.getJob(id)?.timeout_seconds).toBe(60);
    });
  });

  // ===========================================================================
  // Processing Tests
  // ===========================================================================

  describe('processing', () => {
    it('should pass payload and context to handler', async () => {
      const received: unknown[] = [];
      jobQueue.registerHandler('test:job', async (payload, context) => {
        received.push(payload, context);
      });

      const { id } = jobQueue.enqueue('test:job', { value: 42 });
      await jobQueue.start();

      await vi.waitFor(() => expect(received).toHaveLength(2));
      expect(received).toEqual([
        { value: 42 },
        { jobId: id, queue: 'default', signal: expect.any(AbortSignal) },
      ]);
    });

    it('should mark job as completed after successful processing', async () => {
      jobQueue.registerHandler('test:job', async () => {});

      const { id } = jobQueue.enqueue('test:job', {});
      await jobQueue.start();

      await vi.waitFor(() => expect(jobQueue.getJob(id)?.status).toBe(JOB_STATUS.COMPLETED));
      expect(jobQueue.getJob(id)?.completed_at).not.toBeNull();
    });

    it('should process jobs in FIFO order', async () => {
      const processed: number[] = [];
      jobQueue.registerHandler('test:job', async (payload) => {
        if (typeof payload === 'number') {
          processed.push(payload);
        }
      });

      jobQueue.enqueue('test:job', 1);
      jobQueue.enqueue('test:job', 2);
      jobQueue.enqueue('test:job', 3);
      await jobQueue.start();

      await vi.waitFor(() => expect(processed).toHaveLength(3));
      expect(processed).toEqual([1, 2, 3]);
    });

    it('should process jobs enqueued while running', async () => {
      const processed: unknown[] = [];
      jobQueue.registerHandler('test:job', async (payload) => {
        processed.push(payload);
      });

      await jobQueue.start();
      jobQueue.enqueue('test:job', 'late');

      await vi.waitFor(() => expect(processed).toEqual(['late']));
    });

    it('should respect concurrency limit', async () => {
      await jobQueue.stop();
      jobQueue.close();
      jobQueue = new JobQueue(':memory:', { concurrency: 2 });

      let concurrent = 0;
      let maxConcurrent = 0;
      let done = 0;

      jobQueue.registerHandler('test:job', async () => {
        concurrent++;
        maxConcurrent = Math.max(maxConcurrent, concurrent);
        await new Promise((resolve) => setTimeout(resolve, 20));
        concurrent--;
        done++;
      });

      for (let i = 0; i < 4; i++) {
        jobQueue.enqueue('test:job', {});
      }
      await jobQueue.start();

      await vi.waitFor(() => expect(done).toBe(4));
      expect(maxConcurrent).toBe(2);
    });
  });

  // ===========================================================================
  // Failure Tests
  // ===========================================================================

  describe('failures', () => {
    it('should mark job as failed after a single attempt', async () => {
      let attempts = 0;
      jobQueue.registerHandler('test:job', async () => {
        attempts++;
        throw new Error('No BENCHMARK_TIMING= line found');
      });

      const { id } = jobQueue.enqueue('test:job', {});
      await jobQueue.start();

      await vi.waitFor(() => expect(jobQueue.getJob(id)?.status).toBe(JOB_STATUS.FAILED));
      const job = jobQueue.getJob(id);
      expect(attempts).toBe(1);
      expect(job?.attempts).toBe(1);
      expect(job?.last_error).toBe('No BENCHMARK_TIMING= line found');
      expect(job?.completed_at).not.toBeNull();
    });

    it('should fail jobs without a registered handler', async () => {
      const { id } = jobQueue.enqueue('unknown:job', {});
      await jobQueue.start();

      await vi.waitFor(() => expect(jobQueue.getJob(id)?.status).toBe(JOB_STATUS.FAILED));
      expect(jobQueue.getJob(id)?.last_error).toBe('No handler registered for job type: unknown:job');
    });

    it('should fail a job that exceeds its timeout', async () => {
      vi.useFakeTimers();
      jobQueue.registerHandler('test:job', () => new Promise<void>(() => {}));

      const { id } = jobQueue.enqueue('test:job', {}, { timeoutSeconds: 1 });
      await jobQueue.start();
      expect(jobQueue.getJob(id)?.status).toBe(JOB_STATUS.PROCESSING);

      await vi.advanceTimersByTimeAsync(1000);

      await vi.waitFor(() => expect(jobQueue.getJob(id)?.status).toBe(JOB_STATUS.FAILED));
      expect(jobQueue.getJob(id)?.last_error).toBe('Job exceeded timeout of 1s');
    });

    it('should abort a timed-out handler and keep its slot until it settles', async () => {
      vi.useFakeTimers();
      const signals: AbortSignal[] = [];
      const started: unknown[] = [];
      let concurrent = 0;
      let maxConcurrent = 0;
      jobQueue.registerHandler('test:job', async (payload, context) => {
        started.push(payload);
        signals.push(context.signal);
        concurrent++;
        maxConcurrent = Math.max(maxConcurrent, concurrent);
        await new Promise((resolve) => setTimeout(resolve, 1500));
        concurrent--;
      });

      const first = jobQueue.enqueue('test:job', 'first', { timeoutSeconds: 1 });
      const second = jobQueue.enqueue('test:job', 'second', { timeoutSeconds: 1 });
      await jobQueue.start();
      expect(started).toEqual(['first']);

      await vi.advanceTimersByTimeAsync(1000);

      await vi.waitFor(() => expect(jobQueue.getJob(first.id)?.status).toBe(JOB_STATUS.FAILED));
      expect(jobQueue.getJob(first.id)?.last_error).toBe('Job exceeded timeout of 1s');
      expect(signals[0].aborted).toBe(true);
      expect(jobQueue.getJob(second.id)?.status).toBe(JOB_STATUS.PENDING);
      expect(started).toEqual(['first']);

      await vi.advanceTimersByTimeAsync(500);

      await vi.waitFor(() => expect(started).toEqual(['first', 'second']));
      expect(jobQueue.getJob(second.id)?.status).toBe(JOB_STATUS.PROCESSING);

      await vi.advanceTimersByTimeAsync(1500);

      await vi.waitFor(() => expect(jobQueue.getJob(second.id)?.status).toBe(JOB_STATUS.FAILED));
      expect(maxConcurrent).toBe(1);
    });

    it('should keep a completed result when the handler finishes in time', async () => {
      vi.useFakeTimers();
      const signals: AbortSignal[] = [];
      jobQueue.registerHandler('test:job', async (_payload, context) => {
        signals.push(context.signal);
        await new Promise((resolve) => setTimeout(resolve, 500));
      });

      const { id } = jobQueue.enqueue('test:job', {}, { timeoutSeconds: 1 });
      await jobQueue.start();
      await vi.advanceTimersByTimeAsync(500);
      await vi.waitFor(() => expect(jobQueue.getJob(id)?.status).toBe(JOB_STATUS.COMPLETED));

      await vi.advanceTimersByTimeAsync(1000);

      expect(jobQueue.getJob(id)?.status).toBe(JOB_STATUS.COMPLETED);
      expect(jobQueue.getJob(id)?.attempts).toBe(1);
      expect(signals).toHaveLength(1);
      expect(signals[0].aborted).toBe(false);
    });
  });

  // ===========================================================================
  // Inspection Tests
  // ===========================================================================

  describe('getJob', () => {
    it('should return null for non-existent id', () => {
      expect(jobQueue.getJob('non-existent')).toBeNull();
    });
  });

});

// =============================================================================
// Shared file Tests
// =============================================================================

describe('JobQueue on a shared file', () => {
  let tempDir: string;
  let dbPath: string;
  const queues: JobQueue[] = [];

  function openQueue(options?: ConstructorParameters<typeof JobQueue>[1]): JobQueue {
    const queue = new JobQueue(dbPath, options);
    queues.push(queue);
    return queue;
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'job-queue-'));
    dbPath = path.join(tempDir, 'queue.db');
  });

  afterEach(async () => {
    for (const queue of queues.splice(0)) {
      await queue.stop();
      queue.close();
    }
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should pick up jobs another process enqueued when polling', async () => {
    const consumer = openQueue({ pollIntervalMs: 20 });
    const processed: unknown[] = [];
    consumer.registerHandler('test:job', async (payload) => {
      processed.push(payload);
    });
    await consumer.start();

    const producer = openQueue();
    producer.enqueue('test:job', { from: 'producer' });
    producer.close();
    queues.splice(queues.indexOf(producer), 1);

    await vi.waitFor(() => expect(processed).toEqual([{ from: 'producer' }]));
  });

  it('should only consume jobs of its own queue', async () => {
    const other = openQueue({ queueName: 'other' });
    const { id } = other.enqueue('test:job', {});

    const consumer = openQueue({ pollIntervalMs: 20 });
    let processed = false;
    consumer.registerHandler('test:job', async () => {
      processed = true;
    });
    await consumer.start();
    await new Promise((resolve) => setTimeout(resolve, 100));

    expect(processed).toBe(false);
    expect(consumer.getJob(id)).toMatchObject({
      queue: 'other',
      status: JOB_STATUS.PENDING,
      attempts: 0,
    });
  });

  it('should create the directory of a queue file that does not exist yet', () => {
    dbPath = path.join(tempDir, 'state', 'queues', 'queue.db');

    const queue = openQueue();
    const { id } = queue.enqueue('test:job', {});

    expect(fs.existsSync(dbPath)).toBe(true);
    expect(queue.getJob(id)?.status).toBe(JOB_STATUS.PENDING);
  });

  it('should recover jobs left processing by a crashed worker', async () => {
    const crashed = openQueue();
    let release: () => void = () => {};
    crashed.registerHandler('test:job', () => new Promise<void>((resolve) => {
      release = resolve;
    }));
    const { id } = crashed.enqueue('test:job', {});
    await crashed.start();
    await crashed.stop();
    expect(crashed.getJob(id)?.status).toBe(JOB_STATUS.PROCESSING);

    const restarted = openQueue();
    let processed = false;
    restarted.registerHandler('test:job', async () => {
      processed = true;
    });
    await restarted.start();

    await vi.waitFor(() => expect(restarted.getJob(id)?.status).toBe(JOB_STATUS.COMPLETED));
    expect(processed).toBe(true);

    release();
    await new Promise((resolve) => setTimeout(resolve, 10));
  });
});
