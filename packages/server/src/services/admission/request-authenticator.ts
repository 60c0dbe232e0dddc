import { createHmac, timingSafeEqual } from 'node:crypto';
import { AuthExpiredError, AuthInvalidError, AuthMissingError } from '../../lib/errors.js';
import { createLogger } from '../../lib/logger.js';

const logger = createLogger('request-authenticator');

/** Signed requests are accepted this many seconds either side of now */
export const HMAC_WINDOW_SECONDS = 15 * 60;

/**
 * Values a signed trigger carries. Missing headers or arguments are
 * undefined or empty.
 */
export interface SignedRequest {
  /** Request path the signature covers (e.g. "/zeek") */
  path: string;
  /** Zeek-HMAC-Timestamp header, Unix seconds */
  timestamp: string | undefined;
  /** Zeek-HMAC header, hex digest */
  digest: string | undefined;
  /** build_hash argument, hash of the build artifact */
  buildHash: string | undefined;
}

export interface RequestAuthenticatorOptions {
  hmacKey: string;
  /** Current time in milliseconds. Default: Date.now */
  now?: () => number;
}

/**
 * Compute the hex HMAC-SHA256 digest a caller signs a trigger with.
 */
export function computeRequestDigest(
  hmacKey: string,
  path: string,
  timestamp: number,
  buildHash: string
): string {
  return createHmac('sha256', hmacKey)
    .update(`${path}-${timestamp}-${buildHash}\n`)
    .digest('hex');
}

/**
 * Verifies time-boxed HMAC signatures on remote build triggers.
 *
 * Replay inside the window is not prevented (no nonce tracking).
 */
export class RequestAuthenticator {
  private readonly hmacKey: string;
  private readonly now: () => number;

  constructor(options: RequestAuthenticatorOptions) {
    this.hmacKey = options.hmacKey;
    this.now = options.now ?? Date.now;
  }

  /**
   * @returns The authenticated issuance timestamp (Unix seconds)
   * @throws AuthMissingError, AuthExpiredError or AuthInvalidError
   */
  authenticate(request: SignedRequest): number {
    if (!request.digest) {
      throw new AuthMissingError('HMAC header missing from request');
    }

    const timestamp = parseTimestamp(request.timestamp);
    if (timestamp === null) {
      throw new AuthMissingError('HMAC timestamp missing from request');
    }

    if (!request.buildHash) {
      throw new AuthMissingError('Build hash argument required');
    }

    const nowSeconds = Math.floor(this.now() / 1000);
    if (Math.abs(nowSeconds - timestamp) > HMAC_WINDOW_SECONDS) {
      throw new AuthExpiredError();
    }

    if (!this.hmacKey) {
      logger.warn('HMAC key not configured, rejecting signed request');
      throw new AuthInvalidError();
    }

    const localDigest = computeRequestDigest(this.hmacKey, request.path, timestamp, request.buildHash);
    if (!digestsMatch(request.digest, localDigest)) {
      logger.error(
        { path: request.path, requestDigest: request.digest, localDigest },
        'HMAC digest from request did not match local digest'
      );
      throw new AuthInvalidError();
    }

    return timestamp;
  }
}

function parseTimestamp(value: string | undefined): number | null {
  if (!value || !/^\d+$/.test(value)) {
    return null;
  }
  const timestamp = parseInt(value, 10);
  return timestamp > 0 ? timestamp : null;
}

function digestsMatch(supplied: string, expected: string): boolean {
  const suppliedBuffer = Buffer.from(supplied);
  const expectedBuffer = Buffer.from(expected);

  if (suppliedBuffer.length !== expectedBuffer.length) {
    return false;
  }

  return timingSafeEqual(suppliedBuffer, expectedBuffer);
}
