/**
 * Job type constants and payload definitions.
 *
 * All job types used in the system are defined here for consistency
 * and to provide a single reference for available background jobs.
 */
import type { BenchmarkKind, BuildRequest } from '@benchmark-gateway/shared';

/**
 * Available job types in the system.
 */
export const JOB_TYPES = {
  /**
   * Build and benchmark Zeek for an admitted build request.
   * Payload: BenchmarkJobPayload
   */
  ZEEK_BENCHMARK: 'benchmark:zeek',

  /**
   * Build and benchmark Broker for an admitted build request.
   * Payload: BenchmarkJobPayload
   */
  BROKER_BENCHMARK: 'benchmark:broker',
} as const;

/**
 * Type representing all available job type values.
 */
export type JobType = (typeof JOB_TYPES)[keyof typeof JOB_TYPES];

/**
 * Payload of benchmark jobs: the admitted build request as is.
 */
export type BenchmarkJobPayload = BuildRequest;

/**
 * Job type for a benchmark kind.
 */
export function jobTypeForKind(kind: BenchmarkKind): JobType {
  return kind === 'zeek' ? JOB_TYPES.ZEEK_BENCHMARK : JOB_TYPES.BROKER_BENCHMARK;
}
