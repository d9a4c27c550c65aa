// SPDX-License-Identifier: Apache-2.0

import {TreeError} from './tree-error.js';

export class CycleDetectedError extends TreeError {
  /**
   * @param message - error message
   * @param containerId - id of the container that would have received the child
   * @param childId - id of the rejected child
   */
  public constructor(message: string, containerId: string, childId: string) {
    super(message, undefined, {containerId, childId});
  }
}
