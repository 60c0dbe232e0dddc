import { isValidBranchName } from '../../lib/git.js';

/**
 * Structural branch-name check, equivalent to a version-control system's
 * branch naming rules (no leading dot, no `..`, no control characters,
 * no trailing slash, ...).
 */
export interface RefNameValidator {
  isValidBranchName(branch: string): Promise<boolean>;
}

/**
 * Delegates to `git check-ref-format --branch`.
 */
export class GitRefNameValidator implements RefNameValidator {
  isValidBranchName(branch: string): Promise<boolean> {
    return isValidBranchName(branch);
  }
}
