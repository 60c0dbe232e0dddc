import * as v from 'valibot';

/**
 * Sanitized branch names: lowercase ASCII letters and digits only.
 */
export const sanitizedBranchPattern = /^[a-z0-9]+$/;

/**
 * Normalized branch names: sanitized branch plus a uniqueness suffix,
 * `-{issued}-{now}` for remote builds and `-local-{now}` for local ones.
 */
export const normalizedBranchPattern = /^[a-z0-9]+-(?:local|\d+)-\d+$/;

function requiredArgument(name: string) {
  const message = `${name} argument required`;
  return v.pipe(v.optional(v.string(message), ''), v.minLength(1, message));
}

/**
 * Query arguments of a build trigger (POST /zeek, POST /broker).
 * `build_hash` is only required for remote builds, which the
 * authenticator enforces.
 */
export const TriggerQuerySchema = v.object({
  branch: requiredArgument('Branch'),
  build: requiredArgument('Build'),
  build_hash: v.optional(v.string(), ''),
  commit: v.optional(v.string(), ''),
});

/**
 * An admitted build request as carried in the job queue payload.
 */
export const BuildRequestSchema = v.object({
  buildUrl: v.pipe(v.string(), v.minLength(1, 'Build URL is required')),
  buildHash: v.string(),
  originalBranch: v.pipe(
    v.string(),
    v.regex(sanitizedBranchPattern, 'Original branch must be lowercase alphanumeric')
  ),
  normalizedBranch: v.pipe(
    v.string(),
    v.regex(normalizedBranchPattern, 'Normalized branch is missing its uniqueness suffix')
  ),
  commit: v.string(),
  remote: v.boolean(),
});

/**
 * A named benchmark test and the number of timing lines it reports.
 */
export const TestDefinitionSchema = v.object({
  testId: v.pipe(v.string(), v.minLength(1, 'Test ID is required')),
  runs: v.pipe(
    v.number(),
    v.integer('Runs must be an integer'),
    v.minValue(1, 'Runs must be at least 1')
  ),
});

export type TriggerQuery = v.InferOutput<typeof TriggerQuerySchema>;
export type BuildRequest = v.InferOutput<typeof BuildRequestSchema>;
export type TestDefinition = v.InferOutput<typeof TestDefinitionSchema>;
