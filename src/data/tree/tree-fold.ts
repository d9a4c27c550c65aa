// SPDX-License-Identifier: Apache-2.0

import {type TreeNode} from './node.js';
import {type LeafNode} from './leaf-node.js';
import {type ContainerNode} from './container-node.js';

export const BRANCH_LABEL: string = 'Branch';
export const BRANCH_SEPARATOR: string = '+';

/**
 * Combines the values of a tree bottom-up. `container` receives the results of the children in insertion order.
 */
export interface TreeFolder<T> {
  leaf(node: LeafNode): T;
  container(node: ContainerNode, childResults: readonly T[]): T;
}

interface FoldFrame<T> {
  readonly container: ContainerNode;
  readonly children: readonly TreeNode[];
  readonly results: T[];
  next: number;
}

function frameFor<T>(container: ContainerNode): FoldFrame<T> {
  return {container, children: container.children, results: [], next: 0};
}

/**
 * Post-order fold driven by an explicit work stack, so the depth of the tree is not limited by the call stack.
 */
export function foldTree<T>(node: TreeNode, folder: TreeFolder<T>): T {
  if (node.kind === 'leaf') {
    return folder.leaf(node);
  }

  const stack: FoldFrame<T>[] = [frameFor<T>(node)];

  while (true) {
    const frame: FoldFrame<T> = stack[stack.length - 1];

    if (frame.next < frame.children.length) {
      const child: TreeNode = frame.children[frame.next];
      frame.next += 1;

      if (child.kind === 'leaf') {
        frame.results.push(folder.leaf(child));
      } else {
        stack.push(frameFor<T>(child));
      }
      continue;
    }

    stack.pop();
    const value: T = folder.container(frame.container, frame.results);
    if (stack.length === 0) {
      return value;
    }

    stack[stack.length - 1].results.push(value);
  }
}

export const RENDER_FOLDER: TreeFolder<string> = {
  leaf: (node: LeafNode): string => node.execute(),
  container: (_node: ContainerNode, childResults: readonly string[]): string =>
    `${BRANCH_LABEL}(${childResults.join(BRANCH_SEPARATOR)})`,
};

/**
 * Renders a tree using the grammar `Leaf | Branch(<node>{+<node>})`.
 */
export function renderTree(node: TreeNode): string {
  return foldTree(node, RENDER_FOLDER);
}

export function countNodes(node: TreeNode): number {
  return foldTree<number>(node, {
    leaf: () => 1,
    container: (_node, childResults) => childResults.reduce((sum, count) => sum + count, 1),
  });
}

/**
 * Number of edges on the longest downward path. A leaf or an empty container has height 0.
 */
export function treeHeight(node: TreeNode): number {
  return foldTree<number>(node, {
    leaf: () => 0,
    container: (_node, childResults) =>
      childResults.length === 0 ? 0 : 1 + childResults.reduce((highest, height) => Math.max(highest, height), 0),
  });
}

/**
 * Leaves in pre-order, left to right.
 */
export function collectLeaves(node: TreeNode): LeafNode[] {
  const leaves: LeafNode[] = [];
  const stack: TreeNode[] = [node];

  while (stack.length > 0) {
    const current: TreeNode | undefined = stack.pop();
    if (current === undefined) {
      break;
    }

    if (current.kind === 'leaf') {
      leaves.push(current);
    } else {
      const children: readonly TreeNode[] = current.children;
      for (let index = children.length - 1; index >= 0; index--) {
        stack.push(children[index]);
      }
    }
  }

  return leaves;
}
