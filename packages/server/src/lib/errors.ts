/**
 * Error codes reported to callers alongside the message.
 */
export type ErrorCode =
  | 'BadRequest'
  | 'InvalidBranch'
  | 'AuthMissing'
  | 'AuthExpired'
  | 'AuthInvalid'
  | 'NotFound'
  | 'InternalError';

/**
 * Base class for API errors
 */
export class ApiError extends Error {
  public readonly statusCode: 400 | 403 | 404 | 500;
  public readonly code: ErrorCode;

  constructor(message: string, statusCode: 400 | 403 | 404 | 500, code: ErrorCode) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
  }
}

/**
 * 400 Bad Request - Missing arguments, untrusted build origin
 */
export class ValidationError extends ApiError {
  constructor(message: string, code: 'BadRequest' | 'InvalidBranch' = 'BadRequest') {
    super(message, 400, code);
    this.name = 'ValidationError';
  }
}

/**
 * 400 Bad Request - Branch name rejected by the normalizer
 */
export class InvalidBranchError extends ValidationError {
  constructor(message: string = 'Invalid branch name') {
    super(message, 'InvalidBranch');
    this.name = 'InvalidBranchError';
  }
}

/**
 * 403 Forbidden - Base class for request authentication failures
 */
export class ForbiddenError extends ApiError {
  constructor(message: string, code: 'AuthMissing' | 'AuthExpired' | 'AuthInvalid') {
    super(message, 403, code);
    this.name = 'ForbiddenError';
  }
}

/**
 * Signature, timestamp or build hash not provided
 */
export class AuthMissingError extends ForbiddenError {
  constructor(message: string) {
    super(message, 'AuthMissing');
    this.name = 'AuthMissingError';
  }
}

/**
 * Signature timestamp outside the accepted window
 */
export class AuthExpiredError extends ForbiddenError {
  constructor(message: string = 'HMAC timestamp is outside of the valid range') {
    super(message, 'AuthExpired');
    this.name = 'AuthExpiredError';
  }
}

/**
 * Signature provided but does not match
 */
export class AuthInvalidError extends ForbiddenError {
  constructor(message: string = 'HMAC validation failed') {
    super(message, 'AuthInvalid');
    this.name = 'AuthInvalidError';
  }
}

/**
 * 404 Not Found - Resource not found
 */
export class NotFoundError extends ApiError {
  constructor(resource: string) {
    super(`${resource} not found`, 404, 'NotFound');
    this.name = 'NotFoundError';
  }
}

/**
 * Benchmark output did not contain the expected timing lines.
 * Raised on the worker side; fails the job.
 */
export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}
