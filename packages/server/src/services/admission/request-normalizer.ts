import { InvalidBranchError } from '../../lib/errors.js';
import type { RefNameValidator } from './ref-name-validator.js';

/**
 * Build context the uniqueness suffix is derived from.
 * Remote builds carry the authenticated HMAC issuance timestamp.
 */
export type NormalizeContext =
  | { remote: true; issuedAt: number }
  | { remote: false };

export interface NormalizedBranch {
  /** Branch with everything but ASCII letters and digits removed, lowercased */
  originalBranch: string;
  /** originalBranch plus the uniqueness suffix */
  normalizedBranch: string;
}

export interface RequestNormalizerOptions {
  validator: RefNameValidator;
  /** Current time in milliseconds. Default: Date.now */
  now?: () => number;
}

/**
 * Turns a user-supplied branch name into a name that is safe as a path and
 * container-name component and unique per admitted request.
 */
export class RequestNormalizer {
  private readonly validator: RefNameValidator;
  private readonly now: () => number;
  /** Last `now` second handed out; suffixes never repeat within a process */
  private lastIssued = 0;

  constructor(options: RequestNormalizerOptions) {
    this.validator = options.validator;
    this.now = options.now ?? Date.now;
  }

  /**
   * @throws InvalidBranchError for semicolons, names the validator rejects,
   * or names with no alphanumeric characters
   */
  async normalize(branch: string, context: NormalizeContext): Promise<NormalizedBranch> {
    if (branch.includes(';')) {
      throw new InvalidBranchError();
    }

    if (!(await this.validator.isValidBranchName(branch))) {
      throw new InvalidBranchError();
    }

    // Stricter than the ref-name rules: the value ends up in paths and
    // container names, and Docker requires lowercase.
    const originalBranch = branch.replace(/[^A-Za-z0-9]/g, '').toLowerCase();
    if (!originalBranch) {
      throw new InvalidBranchError();
    }

    const issued = this.nextSecond();
    const suffix = context.remote ? `-${context.issuedAt}-${issued}` : `-local-${issued}`;

    return {
      originalBranch,
      normalizedBranch: originalBranch + suffix,
    };
  }

  private nextSecond(): number {
    const current = Math.max(Math.floor(this.now() / 1000), this.lastIssued + 1);
    this.lastIssued = current;
    return current;
  }
}
