// SPDX-License-Identifier: Apache-2.0

import {type BranchworkLogger} from '../core/logging/branchwork-logger.js';
import {BranchworkError} from '../core/errors/branchwork-error.js';

export interface Options {
  logger: BranchworkLogger;
}

export abstract class BaseCommand {
  protected readonly logger: BranchworkLogger;

  public constructor(options: Options) {
    if (!options || !options.logger) {
      throw new BranchworkError('An instance of BranchworkLogger is required');
    }
    this.logger = options.logger;
  }

  /**
   * Runs a command action with start and finish logging. An action that returns false fails the command.
   */
  protected async runHandler(command: string, action: () => boolean | Promise<boolean>): Promise<void> {
    this.logger.info(`==== Running '${command}' ===`);

    let result: boolean;
    try {
      result = await action();
    } catch (error) {
      throw new BranchworkError(`Error running ${command}: ${error instanceof Error ? error.message : error}`, error);
    }

    if (!result) {
      throw new BranchworkError(`${command} failed, expected returned value to be true`);
    }

    this.logger.info(`==== Finished running '${command}' ====`);
  }
}
