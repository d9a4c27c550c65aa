// SPDX-License-Identifier: Apache-2.0

import {type Node, type TreeNode} from './node.js';
import {type ContainerNode} from './container-node.js';
import {InvalidOperationError} from './invalid-operation-error.js';
import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';

function requireContainer(node: TreeNode, operation: string): ContainerNode {
  if (!node) {
    throw new IllegalArgumentError('parent must not be null or undefined', node);
  }

  if (node.kind !== 'container') {
    throw new InvalidOperationError(`cannot ${operation} children on leaf node ${node.id}`, operation, node.id);
  }

  return node;
}

/**
 * Appends `child` to `parent`, re-parenting it if it already belongs to another container.
 *
 * @throws InvalidOperationError if `parent` is a leaf
 * @throws CycleDetectedError if `child` is `parent` or one of its ancestors
 */
export function add(parent: TreeNode, child: TreeNode): void {
  requireContainer(parent, 'add').add(child);
}

/**
 * Removes `child` from `parent`; a child that is not present is ignored.
 *
 * @throws InvalidOperationError if `parent` is a leaf
 */
export function remove(parent: TreeNode, child: TreeNode): boolean {
  return requireContainer(parent, 'remove').remove(child);
}

export function execute(node: TreeNode): string {
  if (!node) {
    throw new IllegalArgumentError('node must not be null or undefined', node);
  }

  return node.execute();
}

export function getParent(node: Node): ContainerNode | null {
  return node.parent;
}
