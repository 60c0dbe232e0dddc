/**
 * Build admission: HMAC authentication, branch normalization and the
 * gateway composing both.
 */
export {
  AdmissionGateway,
  isLoopbackAddress,
  type InboundTrigger,
  type AdmissionGatewayOptions,
} from './admission-gateway.js';
export {
  RequestAuthenticator,
  computeRequestDigest,
  HMAC_WINDOW_SECONDS,
  type SignedRequest,
  type RequestAuthenticatorOptions,
} from './request-authenticator.js';
export {
  RequestNormalizer,
  type NormalizeContext,
  type NormalizedBranch,
  type RequestNormalizerOptions,
} from './request-normalizer.js';
export { GitRefNameValidator, type RefNameValidator } from './ref-name-validator.js';
