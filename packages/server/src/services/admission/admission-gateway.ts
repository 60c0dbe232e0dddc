import * as v from 'valibot';
import { TriggerQuerySchema, type BuildRequest } from '@benchmark-gateway/shared';
import { ValidationError } from '../../lib/errors.js';
import { createLogger } from '../../lib/logger.js';
import type { RequestAuthenticator } from './request-authenticator.js';
import type { NormalizeContext, RequestNormalizer } from './request-normalizer.js';

const logger = createLogger('admission-gateway');

const LOCAL_BUILD_PREFIX = 'file://';
const LOOPBACK_ADDRESSES = new Set(['127.0.0.1', '::1', '::ffff:127.0.0.1']);

/**
 * A raw inbound build trigger.
 */
export interface InboundTrigger {
  /** Request path, covered by the HMAC signature */
  path: string;
  /** Query arguments as received */
  query: Record<string, string | undefined>;
  /** Zeek-HMAC header */
  hmac: string | undefined;
  /** Zeek-HMAC-Timestamp header */
  hmacTimestamp: string | undefined;
  /** Caller's network address */
  remoteAddress: string | undefined;
}

export interface AdmissionGatewayOptions {
  /** Trusted build artifact URL prefixes */
  allowedBuildUrls: readonly string[];
  authenticator: RequestAuthenticator;
  normalizer: RequestNormalizer;
}

export function isLoopbackAddress(address: string | undefined): boolean {
  return address !== undefined && LOOPBACK_ADDRESSES.has(address);
}

/**
 * Decides whether an inbound build trigger is admitted and produces the
 * canonical build request. Queues nothing.
 */
export class AdmissionGateway {
  private readonly allowedBuildUrls: readonly string[];
  private readonly authenticator: RequestAuthenticator;
  private readonly normalizer: RequestNormalizer;

  constructor(options: AdmissionGatewayOptions) {
    this.allowedBuildUrls = options.allowedBuildUrls;
    this.authenticator = options.authenticator;
    this.normalizer = options.normalizer;
  }

  isAllowedBuildUrl(url: string): boolean {
    return this.allowedBuildUrls.some((allowed) => url.startsWith(allowed));
  }

  /**
   * @throws ValidationError for missing arguments or an untrusted build origin;
   * authentication and branch errors propagate unchanged
   */
  async admit(trigger: InboundTrigger): Promise<BuildRequest> {
    const result = v.safeParse(TriggerQuerySchema, trigger.query);
    if (!result.success) {
      throw new ValidationError(result.issues[0].message);
    }
    const query = result.output;

    let context: NormalizeContext;
    if (this.isAllowedBuildUrl(query.build)) {
      const issuedAt = this.authenticator.authenticate({
        path: trigger.path,
        timestamp: trigger.hmacTimestamp,
        digest: trigger.hmac,
        buildHash: query.build_hash,
      });
      context = { remote: true, issuedAt };
    } else if (query.build.startsWith(LOCAL_BUILD_PREFIX) && isLoopbackAddress(trigger.remoteAddress)) {
      context = { remote: false };
    } else {
      logger.warn(
        { build: query.build, remoteAddress: trigger.remoteAddress },
        'Rejected build from untrusted origin'
      );
      throw new ValidationError('Invalid build URL');
    }

    const { originalBranch, normalizedBranch } = await this.normalizer.normalize(
      query.branch,
      context
    );

    const request: BuildRequest = {
      buildUrl: query.build,
      buildHash: query.build_hash,
      originalBranch,
      normalizedBranch,
      commit: query.commit,
      remote: context.remote,
    };

    logger.info(
      { normalizedBranch: request.normalizedBranch, remote: request.remote },
      'Build request admitted'
    );
    return request;
  }
}
