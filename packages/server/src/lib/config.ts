import * as path from 'path';
import * as os from 'os';
import { serverConfig } from './server-config.js';

/**
 * Get the data directory for benchmark-gateway.
 * Can be overridden with BENCHMARK_GATEWAY_HOME environment variable.
 * Default: ~/.benchmark-gateway
 */
export function getConfigDir(): string {
  return process.env.BENCHMARK_GATEWAY_HOME || path.join(os.homedir(), '.benchmark-gateway');
}

/**
 * Get the job queue database path.
 * Structure: ~/.benchmark-gateway/queue.db
 */
export function getQueueDbPath(): string {
  return serverConfig.QUEUE_DB_PATH || path.join(getConfigDir(), 'queue.db');
}

/**
 * Get the result store database path.
 * Structure: ~/.benchmark-gateway/results.db
 */
export function getResultsDbPath(): string {
  return serverConfig.RESULTS_DB_PATH || path.join(getConfigDir(), 'results.db');
}

/**
 * Get the benchmark test configuration path.
 * Structure: ~/.benchmark-gateway/benchmarks.json
 */
export function getBenchmarkConfigPath(): string {
  return serverConfig.BENCHMARK_CONFIG || path.join(getConfigDir(), 'benchmarks.json');
}
