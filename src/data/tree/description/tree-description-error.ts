// SPDX-License-Identifier: Apache-2.0

import {TreeError} from '../tree-error.js';

export class TreeDescriptionError extends TreeError {
  /**
   * @param message - error message
   * @param location - JSON-path style location of the offending element, e.g. `$.branch[1]`
   * @param cause - source error (if any)
   */
  public constructor(
    message: string,
    public readonly location: string = '$',
    cause?: unknown,
  ) {
    super(message, cause, {location});
  }
}
