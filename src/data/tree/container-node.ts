// SPDX-License-Identifier: Apache-2.0

import {AbstractTreeNode} from './abstract-tree-node.js';
import {type Node, type TreeNode} from './node.js';
import {linkParent, unlinkParent} from './parent-links.js';
import {renderTree} from './tree-fold.js';
import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';
import {CycleDetectedError} from './cycle-detected-error.js';

/**
 * A node that owns an ordered list of children and aggregates their results.
 *
 * The children keep their insertion order. A node belongs to at most one container at a time: adding a node that
 * already has a parent moves it.
 */
export class ContainerNode extends AbstractTreeNode {
  public readonly kind = 'container' as const;

  private readonly _children: TreeNode[] = [];

  public constructor(children?: TreeNode[]) {
    super();

    if (children) {
      for (const child of children) {
        this.add(child);
      }
    }
  }

  /**
   * Appends `child` and makes this container its parent.
   *
   * @throws CycleDetectedError if `child` is this container or one of its ancestors
   */
  public add(child: TreeNode): void {
    if (!child) {
      throw new IllegalArgumentError('child must not be null or undefined', child);
    }

    if (child === this || (child.kind === 'container' && this.isDescendantOf(child))) {
      throw new CycleDetectedError(
        `cannot add container ${child.id} to ${this.id}: it is the same node or one of its ancestors`,
        this.id,
        child.id,
      );
    }

    const previous: ContainerNode | null = child.parent;
    if (previous) {
      previous.detach(child);
    }

    this._children.push(child);
    linkParent(child, this);
  }

  /**
   * Removes `child` and clears its parent. Does nothing when `child` is not a child of this container.
   *
   * @returns true if the child was removed
   */
  public remove(child: TreeNode): boolean {
    if (!child) {
      throw new IllegalArgumentError('child must not be null or undefined', child);
    }

    if (child.parent !== this) {
      return false;
    }

    this.detach(child);
    return true;
  }

  /**
   * Detaches every child. Each former child becomes a parentless root.
   */
  public clear(): void {
    for (const child of this._children) {
      unlinkParent(child);
    }

    this._children.length = 0;
  }

  public has(child: Node): boolean {
    return this.indexOf(child) >= 0;
  }

  public indexOf(child: Node): number {
    return this._children.findIndex(c => c === child);
  }

  public childAt(index: number): TreeNode | null {
    return this._children[index] ?? null;
  }

  /**
   * A snapshot of the children in insertion order.
   */
  public get children(): readonly TreeNode[] {
    return [...this._children];
  }

  public get size(): number {
    return this._children.length;
  }

  public execute(): string {
    return renderTree(this);
  }

  public isContainer(): boolean {
    return true;
  }

  public isLeaf(): boolean {
    return false;
  }

  private detach(child: TreeNode): void {
    const index: number = this._children.indexOf(child);
    if (index >= 0) {
      this._children.splice(index, 1);
    }

    unlinkParent(child);
  }
}
