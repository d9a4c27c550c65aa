// SPDX-License-Identifier: Apache-2.0

export {type Node, type NodeKind, type LeafPayload, type TreeNode} from './node.js';
export {AbstractTreeNode} from './abstract-tree-node.js';
export {LeafNode, LEAF_LABEL} from './leaf-node.js';
export {ContainerNode} from './container-node.js';
export {
  type TreeFolder,
  foldTree,
  renderTree,
  countNodes,
  treeHeight,
  collectLeaves,
  RENDER_FOLDER,
  BRANCH_LABEL,
  BRANCH_SEPARATOR,
} from './tree-fold.js';
export {add, remove, execute, getParent} from './tree-operations.js';
export {TreeBuilder} from './tree-builder.js';
export {TreeError} from './tree-error.js';
export {InvalidOperationError} from './invalid-operation-error.js';
export {CycleDetectedError} from './cycle-detected-error.js';
export {TreeDescriptionError} from './description/tree-description-error.js';
