import * as fs from 'fs';
import * as v from 'valibot';
import { TestDefinitionSchema, type BenchmarkKind, type TestDefinition } from '@benchmark-gateway/shared';
import { parseOrThrow } from './validation.js';
import { createLogger } from './logger.js';

const logger = createLogger('benchmark-config');

/**
 * Benchmark tests per kind, as read from the benchmark config JSON file.
 */
export const BenchmarkConfigSchema = v.object({
  zeek: v.optional(v.array(TestDefinitionSchema), []),
  broker: v.optional(v.array(TestDefinitionSchema), []),
});

export type BenchmarkConfig = Record<BenchmarkKind, TestDefinition[]>;

/**
 * Read and validate the benchmark config file.
 * @throws ValidationError if the file content does not match the schema
 */
export function loadBenchmarkConfig(configPath: string): BenchmarkConfig {
  const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  const config = parseOrThrow(BenchmarkConfigSchema, raw);
  logger.info(
    { configPath, zeek: config.zeek.length, broker: config.broker.length },
    'Benchmark config loaded'
  );
  return config;
}
