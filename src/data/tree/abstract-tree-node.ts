// SPDX-License-Identifier: Apache-2.0

import {v4 as uuidv4} from 'uuid';
import {type Node, type NodeKind} from './node.js';
import {type ContainerNode} from './container-node.js';
import {parentOf} from './parent-links.js';

export abstract class AbstractTreeNode implements Node {
  public readonly id: string = uuidv4();

  public abstract readonly kind: NodeKind;

  public abstract execute(): string;

  public abstract isContainer(): boolean;

  public abstract isLeaf(): boolean;

  /**
   * The container that currently owns this node, or `null` for a detached node.
   */
  public get parent(): ContainerNode | null {
    return parentOf(this);
  }

  public isRoot(): boolean {
    return this.parent === null;
  }

  /**
   * Owning containers from the nearest to the root.
   */
  public ancestors(): ContainerNode[] {
    const result: ContainerNode[] = [];

    let current: ContainerNode | null = this.parent;
    while (current) {
      result.push(current);
      current = current.parent;
    }

    return result;
  }

  public root(): ContainerNode | this {
    const ancestors: ContainerNode[] = this.ancestors();
    return ancestors.length > 0 ? ancestors[ancestors.length - 1] : this;
  }

  public depth(): number {
    return this.ancestors().length;
  }

  public isDescendantOf(container: ContainerNode): boolean {
    let current: ContainerNode | null = this.parent;
    while (current) {
      if (current === container) {
        return true;
      }
      current = current.parent;
    }

    return false;
  }

  /**
   * Child indexes leading from the root down to this node; empty for a root.
   */
  public path(): number[] {
    const segments: number[] = [];

    let node: Node = this;
    let parent: ContainerNode | null = node.parent;
    while (parent) {
      segments.push(parent.indexOf(node));
      node = parent;
      parent = node.parent;
    }

    return segments.reverse();
  }
}
