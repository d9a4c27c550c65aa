// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {setImmediate as nextTurn} from 'node:timers/promises';
import {ContainerNode} from '../../../../src/data/tree/container-node.js';
import {LeafNode} from '../../../../src/data/tree/leaf-node.js';
import {CycleDetectedError} from '../../../../src/data/tree/cycle-detected-error.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';
import {type TreeNode} from '../../../../src/data/tree/node.js';

function leafOfDroppedContainer(): LeafNode {
  const leaf: LeafNode = new LeafNode('kept');
  new ContainerNode([new ContainerNode([leaf]), new LeafNode('sibling')]);
  return leaf;
}

describe('ContainerNode', () => {
  it('empty container should render as Branch()', () => {
    expect(new ContainerNode().execute()).to.equal('Branch()');
  });

  it('should report the container capability', () => {
    const container: ContainerNode = new ContainerNode();
    expect(container.kind).to.equal('container');
    expect(container.isContainer()).to.be.true;
    expect(container.isLeaf()).to.be.false;
    expect(container.isRoot()).to.be.true;
    expect(container.parent).to.be.null;
  });

  it('should join three leaves in insertion order', () => {
    const container: ContainerNode = new ContainerNode();
    container.add(new LeafNode());
    container.add(new LeafNode());
    container.add(new LeafNode());
    expect(container.execute()).to.equal('Branch(Leaf+Leaf+Leaf)');
  });

  it('should render nested containers', () => {
    const tree: ContainerNode = new ContainerNode([
      new ContainerNode([new LeafNode(), new LeafNode()]),
      new ContainerNode([new LeafNode()]),
    ]);
    expect(tree.execute()).to.equal('Branch(Branch(Leaf+Leaf)+Branch(Leaf))');
  });

  it('should render leaf payloads', () => {
    const container: ContainerNode = new ContainerNode([new LeafNode('a'), new LeafNode(1), new LeafNode(true)]);
    expect(container.execute()).to.equal('Branch(a+1+true)');
  });

  it('add should set the parent and remove should clear it', () => {
    const parent: ContainerNode = new ContainerNode();
    const leaf: LeafNode = new LeafNode();

    parent.add(leaf);
    expect(leaf.parent).to.equal(parent);
    expect(leaf.isRoot()).to.be.false;

    expect(parent.remove(leaf)).to.be.true;
    expect(leaf.parent).to.be.null;
    expect(parent.size).to.equal(0);
  });

  it('add should move a child that already has another parent', () => {
    const first: ContainerNode = new ContainerNode();
    const second: ContainerNode = new ContainerNode();
    const leaf: LeafNode = new LeafNode();

    first.add(leaf);
    second.add(leaf);

    expect(first.has(leaf)).to.be.false;
    expect(first.size).to.equal(0);
    expect(second.children).to.deep.equal([leaf]);
    expect(leaf.parent).to.equal(second);
  });

  it('adding a child to its current parent again should move it to the end', () => {
    const a: LeafNode = new LeafNode('a');
    const b: LeafNode = new LeafNode('b');
    const container: ContainerNode = new ContainerNode([a, b]);

    container.add(a);

    expect(container.children).to.deep.equal([b, a]);
    expect(container.execute()).to.equal('Branch(b+a)');
    expect(a.parent).to.equal(container);
  });

  it('removing a middle child should keep the order of the others', () => {
    const a: LeafNode = new LeafNode('a');
    const b: LeafNode = new LeafNode('b');
    const c: LeafNode = new LeafNode('c');
    const container: ContainerNode = new ContainerNode([a, b, c]);

    container.remove(b);

    expect(container.children).to.deep.equal([a, c]);
    expect(container.execute()).to.equal('Branch(a+c)');
  });

  it('removing a node that is not a child should change nothing', () => {
    const a: LeafNode = new LeafNode('a');
    const container: ContainerNode = new ContainerNode([a]);
    const other: ContainerNode = new ContainerNode();
    const stranger: LeafNode = new LeafNode('stranger');
    other.add(stranger);

    expect(container.remove(stranger)).to.be.false;
    expect(container.children).to.deep.equal([a]);
    expect(stranger.parent).to.equal(other);
  });

  it('should reject adding a container to itself', () => {
    const container: ContainerNode = new ContainerNode();
    expect(() => container.add(container)).to.throw(CycleDetectedError);
    expect(container.size).to.equal(0);
    expect(container.parent).to.be.null;
  });

  it('should reject adding an ancestor under one of its descendants and leave the tree unchanged', () => {
    const leaf: LeafNode = new LeafNode();
    const grandchild: ContainerNode = new ContainerNode([leaf]);
    const child: ContainerNode = new ContainerNode([grandchild]);
    const root: ContainerNode = new ContainerNode([child]);

    expect(() => grandchild.add(root)).to.throw(CycleDetectedError, 'one of its ancestors');

    expect(root.parent).to.be.null;
    expect(grandchild.children).to.deep.equal([leaf]);
    expect(root.execute()).to.equal('Branch(Branch(Branch(Leaf)))');
  });

  it('cycle error should carry the container and child ids', () => {
    const child: ContainerNode = new ContainerNode();
    const root: ContainerNode = new ContainerNode([child]);

    try {
      child.add(root);
      expect.fail('expected a CycleDetectedError');
    } catch (error) {
      expect(error).to.be.instanceOf(CycleDetectedError);
      if (error instanceof CycleDetectedError) {
        expect(error.meta).to.deep.equal({containerId: child.id, childId: root.id});
      }
    }
  });

  it('should allow moving a subtree sideways', () => {
    const moved: ContainerNode = new ContainerNode([new LeafNode('x')]);
    const left: ContainerNode = new ContainerNode([moved]);
    const right: ContainerNode = new ContainerNode();
    const root: ContainerNode = new ContainerNode([left, right]);

    right.add(moved);

    expect(root.execute()).to.equal('Branch(Branch()+Branch(Branch(x)))');
    expect(moved.parent).to.equal(right);
  });

  it('add with null child should throw error', () => {
    const container: ContainerNode = new ContainerNode();
    // @ts-expect-error - testing null argument
    expect(() => container.add(null)).to.throw(IllegalArgumentError, 'child must not be null or undefined');
  });

  it('remove with null child should throw error', () => {
    const container: ContainerNode = new ContainerNode();
    // @ts-expect-error - testing null argument
    expect(() => container.remove(null)).to.throw(IllegalArgumentError, 'child must not be null or undefined');
  });

  it('clear should detach every child', () => {
    const a: LeafNode = new LeafNode('a');
    const b: ContainerNode = new ContainerNode();
    const container: ContainerNode = new ContainerNode([a, b]);

    container.clear();

    expect(container.size).to.equal(0);
    expect(container.execute()).to.equal('Branch()');
    expect(a.parent).to.be.null;
    expect(b.parent).to.be.null;
  });

  it('children should be a snapshot', () => {
    const container: ContainerNode = new ContainerNode([new LeafNode()]);
    const children: readonly TreeNode[] = container.children;

    container.add(new LeafNode());

    expect(children).to.have.lengthOf(1);
    expect(container.size).to.equal(2);
  });

  it('should look up children by index', () => {
    const a: LeafNode = new LeafNode('a');
    const b: LeafNode = new LeafNode('b');
    const container: ContainerNode = new ContainerNode([a, b]);

    expect(container.childAt(1)).to.equal(b);
    expect(container.childAt(2)).to.be.null;
    expect(container.indexOf(a)).to.equal(0);
    expect(container.indexOf(new LeafNode())).to.equal(-1);
    expect(container.has(b)).to.be.true;
  });

  it('a child should not keep its container alive', async function () {
    if (typeof gc !== 'function') {
      this.skip();
      return;
    }

    const leaf: LeafNode = leafOfDroppedContainer();
    for (let attempt = 0; attempt < 5; attempt++) {
      await nextTurn();
      gc();
    }

    expect(leaf.parent).to.be.null;
    expect(leaf.isRoot()).to.be.true;
    expect(leaf.execute()).to.equal('kept');
  });
});
