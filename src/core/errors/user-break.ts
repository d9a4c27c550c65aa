// SPDX-License-Identifier: Apache-2.0

import {BranchworkError} from './branchwork-error.js';

export class UserBreak extends BranchworkError {
  /**
   * Create a custom error for user break scenarios
   *
   * @param message - break message
   */
  public constructor(message: string) {
    super(message);
  }
}
