// SPDX-License-Identifier: Apache-2.0

import {BranchworkError} from '../../../core/errors/branchwork-error.js';

export class ConfigurationError extends BranchworkError {
  public constructor(message: string, cause?: unknown, meta: Record<string, unknown> = {}) {
    super(message, cause, meta);
  }
}
