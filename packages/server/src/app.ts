import { Hono } from 'hono';
import type { Context } from 'hono';
import { getConnInfo } from '@hono/node-server/conninfo';
import { pinoLogger } from 'hono-pino';
import { builds } from './routes/builds.js';
import { jobs } from './routes/jobs.js';
import { onApiError } from './lib/error-handler.js';
import { rootLogger } from './lib/logger.js';
import type { AppBindings, AppContext } from './app-context.js';

export interface CreateAppOptions {
  /**
   * Resolve the caller's network address.
   * Default: the socket's remote address via @hono/node-server
   */
  resolveRemoteAddress?: (c: Context<AppBindings>) => string | undefined;
}

function socketRemoteAddress(c: Context<AppBindings>): string | undefined {
  return getConnInfo(c).remote.address;
}

/**
 * Create the HTTP application for an application context.
 */
export function createApp(appContext: AppContext, options?: CreateAppOptions): Hono<AppBindings> {
  const resolveRemoteAddress = options?.resolveRemoteAddress ?? socketRemoteAddress;

  const app = new Hono<AppBindings>();

  // Global error handler
  app.onError(onApiError);

  // HTTP request logging middleware
  app.use(
    '*',
    pinoLogger({
      pino: rootLogger.child({ service: 'http' }),
    })
  );

  app.use('*', async (c, next) => {
    c.set('appContext', appContext);
    c.set('remoteAddress', resolveRemoteAddress(c));
    await next();
  });

  // Health check
  app.get('/health', (c) => {
    return c.json({ status: 'ok' });
  });

  app.route('/', builds);
  app.route('/jobs', jobs);

  return app;
}
