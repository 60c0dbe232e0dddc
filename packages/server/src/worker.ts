import { createWorkerContext, shutdownWorkerContext } from './app-context.js';
import { ScriptBenchmarkRunner } from './services/benchmark/benchmark-runner.js';
import { loadBenchmarkConfig } from './lib/benchmark-config.js';
import { serverConfig } from './lib/server-config.js';
import { getBenchmarkConfigPath, getQueueDbPath, getResultsDbPath } from './lib/config.js';
import { createLogger } from './lib/logger.js';

const logger = createLogger('worker');

logger.info({ pid: process.pid }, 'Worker process starting');

process.on('uncaughtException', (error) => {
  logger.fatal({ pid: process.pid, err: error }, 'Uncaught Exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ pid: process.pid, reason }, 'Unhandled Rejection');
  process.exit(1);
});

async function main(): Promise<void> {
  if (!serverConfig.BENCHMARK_RUNNER) {
    throw new Error('BENCHMARK_RUNNER is not set');
  }

  const context = await createWorkerContext({
    queueDbPath: getQueueDbPath(),
    queueName: serverConfig.QUEUE_NAME,
    resultsDbPath: getResultsDbPath(),
    concurrency: serverConfig.WORKER_CONCURRENCY,
    runner: new ScriptBenchmarkRunner(serverConfig.BENCHMARK_RUNNER),
    tests: loadBenchmarkConfig(getBenchmarkConfigPath()),
  });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ pid: process.pid, signal }, 'Worker received shutdown signal');
    await shutdownWorkerContext(context);
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: error }, 'Error during worker shutdown');
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to initialize worker');
  process.exit(1);
});
