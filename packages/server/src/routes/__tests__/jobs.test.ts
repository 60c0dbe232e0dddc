import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Hono } from 'hono';
import type { AppBindings } from '../../app-context.js';
import {
  cleanupTestEnvironment,
  createTestApp,
  readJobHandle,
  setupTestEnvironment,
  type TestEnvironment,
} from '../../__tests__/test-utils.js';

describe('Jobs API', () => {
  let env: TestEnvironment;
  let app: Hono<AppBindings>;

  beforeEach(() => {
    env = setupTestEnvironment();
    app = createTestApp(env, { remoteAddress: '127.0.0.1' });
  });

  afterEach(() => {
    cleanupTestEnvironment(env);
  });

  describe('GET /jobs/:id', () => {
    it('should return the status of a dispatched job', async () => {
      const triggered = await app.request('/zeek?branch=master&build=file:///tmp/b.tgz', {
        method: 'POST',
      });
      const handle = await readJobHandle(triggered);

      const res = await app.request(`/jobs/${handle.id}`);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        id: handle.id,
        type: 'benchmark:zeek',
        queue: 'default',
        status: 'pending',
        attempts: 0,
        lastError: null,
        enqueuedAt: handle.enqueued_at,
        startedAt: null,
        completedAt: null,
      });
    });

    it('should return 404 for an unknown job', async () => {
      const res = await app.request('/jobs/non-existent');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Job not found', code: 'NotFound' });
    });
  });

  describe('GET /health', () => {
    it('should report ok', async () => {
      const res = await app.request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ok' });
    });
  });
});
