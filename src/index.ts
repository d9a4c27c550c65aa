// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';
import 'dotenv/config';
import 'reflect-metadata';
import {container} from 'tsyringe-neo';

import {Flags as flags} from './commands/flags.js';
import {type Options} from './commands/base.js';
import {DemoCommand} from './commands/demo.js';
import {RenderCommand, type RenderOptions} from './commands/render.js';
import {type BranchworkLogger} from './core/logging/branchwork-logger.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {type TreeDescriptionLoader} from './data/tree/description/tree-description-loader.js';
import {BranchworkError} from './core/errors/branchwork-error.js';
import {UserBreak} from './core/errors/user-break.js';
import {SilentBreak} from './core/errors/silent-break.js';
import {getBranchworkVersion} from '../version.js';

const VERSION_FLAGS: string[] = ['-version', '--version', '-v', '--v'];

export async function main(argv: string[], context?: {logger?: BranchworkLogger}): Promise<void> {
  try {
    Container.getInstance().init();
  } catch (error) {
    console.error(`Error initializing container: ${error instanceof Error ? error.message : error}`, error);
    throw new BranchworkError('Error initializing container', error);
  }

  const logger: BranchworkLogger = container.resolve<BranchworkLogger>(InjectTokens.BranchworkLogger);

  if (context) {
    // save the logger so that branchwork.ts can use it to report completion
    context.logger = logger;
  }

  logger.debug('Initializing Branchwork CLI');
  if (argv.length >= 3 && VERSION_FLAGS.includes(argv[2])) {
    logger.showUser(chalk.cyan('\n******************************* Branchwork ***************************************'));
    logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(getBranchworkVersion()));
    logger.showUser(chalk.cyan('**********************************************************************************'));
    throw new UserBreak('displayed version information, exiting');
  }

  const options: Options = {logger};
  const renderOptions: RenderOptions = {
    ...options,
    loader: container.resolve<TreeDescriptionLoader>(InjectTokens.TreeDescriptionLoader),
  };

  logger.debug('Initializing commands');
  const rootCmd = yargs(hideBin(argv))
    .scriptName('branchwork')
    .usage('Usage:\n  branchwork <command> [options]')
    .alias('h', 'help')
    .version(false)
    .command(new DemoCommand(options).getCommandDefinition())
    .command(new RenderCommand(renderOptions).getCommandDefinition())
    .strict()
    .demandCommand(1, 'Select a command')
    .middleware(argv_ => {
      if (argv_[flags.devMode.name] === true) {
        logger.setDevMode(true);
      }
    })
    .fail((message, error, y) => {
      if (error) {
        throw error;
      }

      logger.showUser(message);
      y.showHelp();
      throw new SilentBreak(`invalid command line: ${message}`);
    });

  logger.debug('Setting up flags');
  flags.setCommandFlags(rootCmd, flags.devMode);

  logger.debug('Parsing root command (executing the commands)');
  await rootCmd.parseAsync();
}
