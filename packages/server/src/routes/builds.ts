import { Hono } from 'hono';
import type { Context } from 'hono';
import { BENCHMARK_KINDS, type BenchmarkKind } from '@benchmark-gateway/shared';
import { jobTypeForKind } from '../jobs/index.js';
import type { AppBindings } from '../app-context.js';

/** Header carrying the hex HMAC-SHA256 request signature */
export const HMAC_HEADER = 'Zeek-HMAC';
/** Header carrying the signature's issuance time in Unix seconds */
export const HMAC_TIMESTAMP_HEADER = 'Zeek-HMAC-Timestamp';

/**
 * Admit a build trigger and enqueue it for the worker.
 * Admission errors propagate to the onError handler.
 */
function triggerBuild(kind: BenchmarkKind) {
  return async (c: Context<AppBindings>) => {
    const { gateway, dispatcher } = c.get('appContext');

    const request = await gateway.admit({
      path: c.req.path,
      query: c.req.query(),
      hmac: c.req.header(HMAC_HEADER),
      hmacTimestamp: c.req.header(HMAC_TIMESTAMP_HEADER),
      remoteAddress: c.get('remoteAddress'),
    });

    const job = await dispatcher.dispatch(jobTypeForKind(kind), request);

    return c.json({
      job: {
        id: job.id,
        enqueued_at: job.enqueuedAt,
      },
    });
  };
}

const builds = new Hono<AppBindings>();

for (const kind of BENCHMARK_KINDS) {
  builds.post(`/${kind}`, triggerBuild(kind));
}

export { builds };
