// SPDX-License-Identifier: Apache-2.0

import {ContainerNode} from './container-node.js';
import {LeafNode} from './leaf-node.js';
import {type LeafPayload} from './node.js';
import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';

/**
 * Assembles a tree top-down from a cursor that starts at a new root container.
 *
 * @example
 * ```typescript
 * const tree = TreeBuilder.create()
 *   .branch().leaf().leaf().end()
 *   .branch().leaf().end()
 *   .build();
 *
 * tree.execute(); // Branch(Branch(Leaf+Leaf)+Branch(Leaf))
 * ```
 */
export class TreeBuilder {
  private cursor: ContainerNode;

  private constructor(private readonly root: ContainerNode) {
    this.cursor = root;
  }

  public static create(): TreeBuilder {
    return new TreeBuilder(new ContainerNode());
  }

  public leaf(payload?: LeafPayload): this {
    this.cursor.add(new LeafNode(payload));
    return this;
  }

  /** Appends a container and moves the cursor into it. */
  public branch(): this {
    const branch: ContainerNode = new ContainerNode();
    this.cursor.add(branch);
    this.cursor = branch;
    return this;
  }

  /** Moves the cursor back to the enclosing container. */
  public end(): this {
    const parent: ContainerNode | null = this.cursor.parent;
    if (this.cursor === this.root || !parent) {
      throw new IllegalArgumentError('end() called at the root of the tree');
    }

    this.cursor = parent;
    return this;
  }

  public build(): ContainerNode {
    return this.root;
  }
}
