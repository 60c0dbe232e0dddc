/**
 * Centralized server-specific environment configuration.
 *
 * All environment variables read by the gateway and the worker are defined
 * here. Core classes never read the environment themselves; app-context.ts
 * passes these values in at construction time.
 */
export const serverConfig = {
  /** Server's environment mode (development/production/test) */
  NODE_ENV: process.env.NODE_ENV,
  /** Server's port binding */
  PORT: process.env.PORT || '8080',
  /** Server's host binding (defaults to localhost for security) */
  HOST: process.env.HOST || 'localhost',
  /** Log level (trace, debug, info, warn, error, fatal, silent) */
  LOG_LEVEL: process.env.LOG_LEVEL,
  /** Shared secret for Zeek-HMAC request signatures */
  HMAC_KEY: process.env.HMAC_KEY || '',
  /**
   * Trusted build artifact URL prefixes.
   * Format: comma-separated list (e.g., "https://ci.example.org/,https://builds.example.org/")
   */
  ALLOWED_BUILD_URLS: parseList(process.env.ALLOWED_BUILD_URLS),
  /** Queue name builds are enqueued on and the worker consumes */
  QUEUE_NAME: process.env.QUEUE_NAME || 'default',
  /** Seconds a benchmark job may run before the worker fails it */
  QUEUE_DEFAULT_TIMEOUT: parseInt(process.env.QUEUE_DEFAULT_TIMEOUT || '1800', 10),
  /** SQLite file backing the job queue (default: <config dir>/queue.db) */
  QUEUE_DB_PATH: process.env.QUEUE_DB_PATH,
  /** SQLite file backing the result store (default: <config dir>/results.db) */
  RESULTS_DB_PATH: process.env.RESULTS_DB_PATH,
  /** JSON file listing the benchmark tests per kind */
  BENCHMARK_CONFIG: process.env.BENCHMARK_CONFIG,
  /** Executable the worker runs for each benchmark test */
  BENCHMARK_RUNNER: process.env.BENCHMARK_RUNNER || '',
  /** Number of jobs the worker processes at once */
  WORKER_CONCURRENCY: parseInt(process.env.WORKER_CONCURRENCY || '1', 10),
} as const;

function parseList(envValue: string | undefined): readonly string[] {
  if (!envValue) {
    return [];
  }
  return envValue.split(',').map(p => p.trim()).filter(p => p.length > 0);
}

/** Type for server configuration */
export type ServerConfig = typeof serverConfig;
