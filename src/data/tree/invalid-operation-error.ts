// SPDX-License-Identifier: Apache-2.0

import {TreeError} from './tree-error.js';

export class InvalidOperationError extends TreeError {
  /**
   * Raised when a child-management operation is requested on a node that cannot hold children.
   *
   * @param message - error message
   * @param operation - the rejected operation, e.g. `add`
   * @param nodeId - id of the node the operation was invoked on
   */
  public constructor(
    message: string,
    public readonly operation: string,
    nodeId?: string,
  ) {
    super(message, undefined, {operation, nodeId});
  }
}
