// SPDX-License-Identifier: Apache-2.0

import {type ContainerNode} from './container-node.js';
import {type LeafNode} from './leaf-node.js';

export type NodeKind = 'leaf' | 'container';

/**
 * Atomic value carried by a leaf. It is rendered with `String(payload)`.
 */
export type LeafPayload = string | number | boolean | bigint;

/**
 * The contract every member of a component tree satisfies.
 */
export interface Node {
  readonly id: string;
  readonly kind: NodeKind;
  readonly parent: ContainerNode | null;

  execute(): string;
  isContainer(): boolean;
  isLeaf(): boolean;
  isRoot(): boolean;
}

/**
 * Closed set of node variants. Narrow on `kind` to reach the container capability.
 */
export type TreeNode = LeafNode | ContainerNode;
