import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { createAppContext } from './app-context.js';
import { serverConfig } from './lib/server-config.js';
import { getQueueDbPath } from './lib/config.js';
import { createLogger } from './lib/logger.js';

const logger = createLogger('server');

// Log server PID on startup for debugging
logger.info({ pid: process.pid }, 'Server process starting');

// Global error handlers to log crashes before process exits
process.on('uncaughtException', (error) => {
  logger.fatal({ pid: process.pid, err: error }, 'Uncaught Exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ pid: process.pid, reason }, 'Unhandled Rejection');
  process.exit(1);
});

const appContext = createAppContext({
  hmacKey: serverConfig.HMAC_KEY,
  allowedBuildUrls: serverConfig.ALLOWED_BUILD_URLS,
  queueDbPath: getQueueDbPath(),
  queueName: serverConfig.QUEUE_NAME,
  defaultTimeoutSeconds: serverConfig.QUEUE_DEFAULT_TIMEOUT,
});

const app = createApp(appContext);

const PORT = Number(serverConfig.PORT);

logger.info(
  { port: PORT, env: serverConfig.NODE_ENV ?? 'development', pid: process.pid },
  'Server starting'
);

const server = serve(
  {
    fetch: app.fetch,
    port: PORT,
    hostname: serverConfig.HOST,
  },
  (info) => {
    logger.info({ port: info.port, host: serverConfig.HOST }, 'Server listening');
  }
);

function shutdown(signal: NodeJS.Signals): void {
  logger.info({ pid: process.pid, signal }, 'Server received shutdown signal');
  server.close(() => process.exit(0));
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
