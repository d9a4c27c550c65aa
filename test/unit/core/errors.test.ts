// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {BranchworkError} from '../../../src/core/errors/branchwork-error.js';
import {IllegalArgumentError} from '../../../src/core/errors/illegal-argument-error.js';
import {InvalidOperationError} from '../../../src/data/tree/invalid-operation-error.js';
import {CycleDetectedError} from '../../../src/data/tree/cycle-detected-error.js';
import {TreeError} from '../../../src/data/tree/tree-error.js';

describe('Errors', () => {
  it('should construct correct BranchworkError', () => {
    const cause: Error = new Error('underlying');
    const error: BranchworkError = new BranchworkError('test', cause, {node: 'n1'});

    expect(error).to.be.instanceof(Error);
    expect(error.name).to.equal('BranchworkError');
    expect(error.message).to.equal('test');
    expect(error.cause).to.equal(cause);
    expect(error.meta).to.deep.equal({node: 'n1'});
    expect(error.stack).to.contain(`Caused by: ${cause.stack}`);
  });

  it('should construct BranchworkError without a cause', () => {
    const error: BranchworkError = new BranchworkError('test');

    expect(error.cause).to.be.undefined;
    expect(error.meta).to.deep.equal({});
    expect(error.stack).to.not.contain('Caused by:');
  });

  it('should construct correct IllegalArgumentError', () => {
    const error: IllegalArgumentError = new IllegalArgumentError('invalid argument', 'bad');

    expect(error).to.be.instanceof(BranchworkError);
    expect(error.name).to.equal('IllegalArgumentError');
    expect(error.meta).to.deep.equal({value: 'bad'});
  });

  it('tree errors should share a common base', () => {
    const invalid: InvalidOperationError = new InvalidOperationError('no children here', 'add', 'leaf-1');
    const cycle: CycleDetectedError = new CycleDetectedError('cycle', 'container-1', 'child-1');

    expect(invalid).to.be.instanceof(TreeError);
    expect(invalid.name).to.equal('InvalidOperationError');
    expect(invalid.meta).to.deep.equal({operation: 'add', nodeId: 'leaf-1'});
    expect(cycle).to.be.instanceof(TreeError);
    expect(cycle.name).to.equal('CycleDetectedError');
    expect(cycle.meta).to.deep.equal({containerId: 'container-1', childId: 'child-1'});
  });
});
