// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {add, execute, getParent, remove} from '../../../../src/data/tree/tree-operations.js';
import {ContainerNode} from '../../../../src/data/tree/container-node.js';
import {LeafNode} from '../../../../src/data/tree/leaf-node.js';
import {InvalidOperationError} from '../../../../src/data/tree/invalid-operation-error.js';
import {CycleDetectedError} from '../../../../src/data/tree/cycle-detected-error.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';

describe('Tree operations', () => {
  it('execute on a single leaf should return Leaf', () => {
    expect(execute(new LeafNode())).to.equal('Leaf');
  });

  it('execute on an empty container should return Branch()', () => {
    expect(execute(new ContainerNode())).to.equal('Branch()');
  });

  it('should build and render the nested tree', () => {
    const branch1: ContainerNode = new ContainerNode();
    add(branch1, new LeafNode());
    add(branch1, new LeafNode());

    const branch2: ContainerNode = new ContainerNode();
    add(branch2, new LeafNode());

    const tree: ContainerNode = new ContainerNode();
    add(tree, branch1);
    add(tree, branch2);

    expect(execute(tree)).to.equal('Branch(Branch(Leaf+Leaf)+Branch(Leaf))');
    expect(execute(branch1)).to.equal('Branch(Leaf+Leaf)');
  });

  it('getParent should follow add and remove', () => {
    const parent: ContainerNode = new ContainerNode();
    const leaf: LeafNode = new LeafNode();

    add(parent, leaf);
    expect(getParent(leaf)).to.equal(parent);

    expect(remove(parent, leaf)).to.be.true;
    expect(getParent(leaf)).to.be.null;
  });

  it('add on a leaf should throw InvalidOperationError', () => {
    const leaf: LeafNode = new LeafNode();
    const child: LeafNode = new LeafNode();

    expect(() => add(leaf, child)).to.throw(InvalidOperationError, `cannot add children on leaf node ${leaf.id}`);
    expect(child.parent).to.be.null;
  });

  it('remove on a leaf should throw InvalidOperationError naming the operation', () => {
    const leaf: LeafNode = new LeafNode();

    try {
      remove(leaf, new LeafNode());
      expect.fail('expected an InvalidOperationError');
    } catch (error) {
      expect(error).to.be.instanceOf(InvalidOperationError);
      if (error instanceof InvalidOperationError) {
        expect(error.operation).to.equal('remove');
        expect(error.meta).to.deep.equal({operation: 'remove', nodeId: leaf.id});
      }
    }
  });

  it('remove of an absent child should return false', () => {
    const parent: ContainerNode = new ContainerNode([new LeafNode()]);
    expect(remove(parent, new LeafNode())).to.be.false;
    expect(execute(parent)).to.equal('Branch(Leaf)');
  });

  it('add should reject cycles', () => {
    const child: ContainerNode = new ContainerNode();
    const root: ContainerNode = new ContainerNode();
    add(root, child);

    expect(() => add(child, root)).to.throw(CycleDetectedError);
    expect(execute(root)).to.equal('Branch(Branch())');
  });

  it('add with null parent should throw error', () => {
    // @ts-expect-error - testing null argument
    expect(() => add(null, new LeafNode())).to.throw(IllegalArgumentError, 'parent must not be null or undefined');
  });

  it('execute with null node should throw error', () => {
    // @ts-expect-error - testing null argument
    expect(() => execute(null)).to.throw(IllegalArgumentError, 'node must not be null or undefined');
  });
});
