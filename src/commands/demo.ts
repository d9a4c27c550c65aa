// SPDX-License-Identifier: Apache-2.0

import {type CommandModule} from 'yargs';
import {BaseCommand} from './base.js';
import {LeafNode} from '../data/tree/leaf-node.js';
import {ContainerNode} from '../data/tree/container-node.js';
import {add, execute} from '../data/tree/tree-operations.js';
import {type TreeNode} from '../data/tree/node.js';

/**
 * Walks a client through a single leaf and a small composite tree, treating both the same way.
 */
export class DemoCommand extends BaseCommand {
  public static readonly COMMAND_NAME: string = 'demo';

  public run(): boolean {
    const simple: LeafNode = new LeafNode();
    this.logger.showUser("Client: I've got a simple component:");
    this.runClient(simple);

    const branch1: ContainerNode = new ContainerNode();
    add(branch1, new LeafNode());
    add(branch1, new LeafNode());

    const branch2: ContainerNode = new ContainerNode();
    add(branch2, new LeafNode());

    const tree: ContainerNode = new ContainerNode();
    add(tree, branch1);
    add(tree, branch2);

    this.logger.showUser("Client: Now I've got a composite tree:");
    this.runClient(tree);

    return true;
  }

  public getCommandDefinition(): CommandModule {
    return {
      command: DemoCommand.COMMAND_NAME,
      describe: 'Render a single leaf and a small composite tree',
      handler: async () => {
        await this.runHandler(DemoCommand.COMMAND_NAME, () => this.run());
      },
    };
  }

  private runClient(component: TreeNode): void {
    this.logger.showUser(`RESULT: ${execute(component)}`);
    this.logger.showUser('');
  }
}
