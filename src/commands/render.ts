// SPDX-License-Identifier: Apache-2.0

import {type CommandModule} from 'yargs';
import {BaseCommand, type Options} from './base.js';
import {BranchworkError} from '../core/errors/branchwork-error.js';
import {type TreeDescriptionLoader} from '../data/tree/description/tree-description-loader.js';
import {type TreeNode} from '../data/tree/node.js';
import {execute} from '../data/tree/tree-operations.js';
import {BRANCH_LABEL} from '../data/tree/tree-fold.js';

export interface RenderArguments {
  file: string;
  outline: boolean;
}

export interface RenderOptions extends Options {
  loader: TreeDescriptionLoader;
}

const OUTLINE_INDENT: string = '  ';

export class RenderCommand extends BaseCommand {
  public static readonly COMMAND_NAME: string = 'render';

  private readonly loader: TreeDescriptionLoader;

  public constructor(options: RenderOptions) {
    super(options);
    if (!options.loader) {
      throw new BranchworkError('An instance of TreeDescriptionLoader is required');
    }

    this.loader = options.loader;
  }

  public render(file: string, outline: boolean = false): boolean {
    const tree: TreeNode = this.loader.loadFile(file);
    this.logger.debug(`rendering tree ${tree.id} loaded from ${file}`);

    this.logger.showUser(`RESULT: ${execute(tree)}`);
    if (outline) {
      this.logger.showList('Tree outline', RenderCommand.outlineOf(tree));
    }

    return true;
  }

  /**
   * One line per node in pre-order, indented by depth. Containers show their child count.
   */
  public static outlineOf(root: TreeNode): string[] {
    const lines: string[] = [];
    const stack: {node: TreeNode; depth: number}[] = [{node: root, depth: 0}];

    while (stack.length > 0) {
      const entry: {node: TreeNode; depth: number} | undefined = stack.pop();
      if (!entry) {
        break;
      }

      const {node, depth} = entry;
      const indent: string = OUTLINE_INDENT.repeat(depth);
      if (node.kind === 'leaf') {
        lines.push(`${indent}${node.execute()}`);
        continue;
      }

      lines.push(`${indent}${BRANCH_LABEL} [${node.size}]`);
      const children: readonly TreeNode[] = node.children;
      for (let index = children.length - 1; index >= 0; index--) {
        stack.push({node: children[index], depth: depth + 1});
      }
    }

    return lines;
  }

  public getCommandDefinition(): CommandModule<{}, RenderArguments> {
    return {
      command: `${RenderCommand.COMMAND_NAME} <file>`,
      describe: 'Render the tree described by a YAML or JSON file',
      builder: y =>
        y
          .positional('file', {
            describe: 'Path of the tree description',
            type: 'string',
            demandOption: true,
          })
          .option('outline', {
            describe: 'Also print an indented outline of the tree',
            alias: 'o',
            type: 'boolean',
            default: false,
          }),
      handler: async argv => {
        await this.runHandler(RenderCommand.COMMAND_NAME, () => this.render(argv.file, argv.outline));
      },
    };
  }
}
