// SPDX-License-Identifier: Apache-2.0

import {AbstractTreeNode} from './abstract-tree-node.js';
import {type LeafPayload} from './node.js';

export const LEAF_LABEL: string = 'Leaf';

/**
 * Terminal node of a tree. A leaf never holds children and exposes no child-management operations.
 */
export class LeafNode extends AbstractTreeNode {
  public readonly kind = 'leaf' as const;

  public constructor(public readonly payload?: LeafPayload) {
    super();
  }

  public execute(): string {
    return this.payload === undefined ? LEAF_LABEL : String(this.payload);
  }

  public isContainer(): boolean {
    return false;
  }

  public isLeaf(): boolean {
    return true;
  }
}
