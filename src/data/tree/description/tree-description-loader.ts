// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import * as yaml from 'yaml';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {type BranchworkLogger} from '../../../core/logging/branchwork-logger.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';
import {TreeDescriptionError} from './tree-description-error.js';
import {ContainerNode} from '../container-node.js';
import {LeafNode} from '../leaf-node.js';
import {type LeafPayload, type TreeNode} from '../node.js';

const LEAF_KEY: string = 'leaf';
const BRANCH_KEY: string = 'branch';
const ROOT_LOCATION: string = '$';

interface BranchFrame {
  container: ContainerNode;
  items: unknown[];
  next: number;
}

type EnteredDescription = {kind: 'leaf'; leaf: LeafNode} | {kind: 'branch'; frame: BranchFrame};

/**
 * Builds trees from YAML or JSON descriptions.
 *
 * ```yaml
 * branch:
 *   - branch: [leaf, leaf]
 *   - branch:
 *       - leaf: 42
 * ```
 *
 * A description is the string `leaf`, a `{leaf: <scalar | null>}` mapping, or a `{branch: [<description>...]}`
 * mapping.
 */
@injectable()
export class TreeDescriptionLoader {
  private readonly logger: BranchworkLogger;

  public constructor(@inject(InjectTokens.BranchworkLogger) logger?: BranchworkLogger) {
    this.logger = patchInject(logger, InjectTokens.BranchworkLogger, this.constructor.name);
  }

  public loadFile(filePath: string): TreeNode {
    if (!filePath) {
      throw new IllegalArgumentError('filePath must not be null, undefined, or empty', filePath);
    }

    let text: string;
    try {
      text = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      throw new TreeDescriptionError(`failed to read tree description: ${filePath}`, ROOT_LOCATION, error);
    }

    this.logger.debug(`loading tree description from ${filePath}`);
    return this.loadString(text);
  }

  /**
   * Parses YAML (and therefore JSON) text into a tree.
   */
  public loadString(text: string): TreeNode {
    let document: unknown;
    try {
      document = yaml.parse(text);
    } catch (error) {
      throw new TreeDescriptionError('tree description is not valid YAML or JSON', ROOT_LOCATION, error);
    }

    return this.parse(document);
  }

  public parse(document: unknown): TreeNode {
    const tree: TreeNode = this.build(document);
    this.logger.debug(`parsed tree description into ${tree.kind} ${tree.id}`);
    return tree;
  }

  /**
   * Depth-first walk over the document with an explicit stack. A container is attached to its parent only after all
   * of its own children, so every add happens on a parentless container.
   */
  private build(document: unknown): TreeNode {
    const stack: BranchFrame[] = [];

    const top: EnteredDescription = this.enter(document, () => TreeDescriptionLoader.locationOf(stack));
    if (top.kind === 'leaf') {
      return top.leaf;
    }

    stack.push(top.frame);
    while (stack.length > 0) {
      const frame: BranchFrame = stack[stack.length - 1];

      if (frame.next < frame.items.length) {
        const item: unknown = frame.items[frame.next++];
        const entered: EnteredDescription = this.enter(item, () => TreeDescriptionLoader.locationOf(stack));
        if (entered.kind === 'leaf') {
          frame.container.add(entered.leaf);
        } else {
          stack.push(entered.frame);
        }
        continue;
      }

      stack.pop();
      if (stack.length > 0) {
        stack[stack.length - 1].container.add(frame.container);
      }
    }

    return top.frame.container;
  }

  /**
   * Checks the shape of one description. Locations are only rendered when an error is raised.
   */
  private enter(document: unknown, location: () => string): EnteredDescription {
    if (document === LEAF_KEY) {
      return {kind: 'leaf', leaf: new LeafNode()};
    }

    if (typeof document !== 'object' || document === null || Array.isArray(document)) {
      throw this.grammarError(location());
    }

    const entries: [string, unknown][] = Object.entries(document);
    if (entries.length !== 1) {
      throw this.grammarError(location());
    }

    const [key, value] = entries[0];
    if (key === LEAF_KEY) {
      return {kind: 'leaf', leaf: new LeafNode(this.parsePayload(value, location))};
    }

    if (key === BRANCH_KEY) {
      if (!Array.isArray(value)) {
        const at: string = location();
        throw new TreeDescriptionError(`${at}.${BRANCH_KEY} must be a list of descriptions`, at);
      }

      const items: unknown[] = value;
      return {kind: 'branch', frame: {container: new ContainerNode(), items, next: 0}};
    }

    throw this.grammarError(location());
  }

  private parsePayload(value: unknown, location: () => string): LeafPayload | undefined {
    if (value === null || value === undefined) {
      return undefined;
    }

    if (
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean' ||
      typeof value === 'bigint'
    ) {
      return value;
    }

    const at: string = `${location()}.${LEAF_KEY}`;
    throw new TreeDescriptionError(`${at} must be a scalar`, at);
  }

  /** `$` followed by one `.branch[i]` per open frame, `i` being the item that frame is visiting. */
  private static locationOf(stack: readonly BranchFrame[]): string {
    return ROOT_LOCATION + stack.map(frame => `.${BRANCH_KEY}[${frame.next - 1}]`).join('');
  }

  private grammarError(location: string): TreeDescriptionError {
    return new TreeDescriptionError(
      `${location}: expected '${LEAF_KEY}', {${LEAF_KEY}: <scalar>} or {${BRANCH_KEY}: [...]}`,
      location,
    );
  }
}
