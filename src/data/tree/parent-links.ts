// SPDX-License-Identifier: Apache-2.0

import {type ContainerNode} from './container-node.js';
import {type Node} from './node.js';

// child -> owning container. Both sides are weak: a child never keeps its container alive.
const parents: WeakMap<Node, WeakRef<ContainerNode>> = new WeakMap<Node, WeakRef<ContainerNode>>();

export function parentOf(node: Node): ContainerNode | null {
  return parents.get(node)?.deref() ?? null;
}

/** Only container mutation may call this. */
export function linkParent(child: Node, parent: ContainerNode): void {
  parents.set(child, new WeakRef(parent));
}

/** Only container mutation may call this. */
export function unlinkParent(child: Node): void {
  parents.delete(child);
}
