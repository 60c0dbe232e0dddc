// Benchmark schemas
export {
  TriggerQuerySchema,
  BuildRequestSchema,
  TestDefinitionSchema,
  sanitizedBranchPattern,
  normalizedBranchPattern,
  type TriggerQuery,
  type BuildRequest,
  type TestDefinition,
} from './benchmark.js';
