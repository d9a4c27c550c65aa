// SPDX-License-Identifier: Apache-2.0

import {container, Lifecycle} from 'tsyringe-neo';
import {type BranchworkLogger} from '../logging/branchwork-logger.js';
import {BranchworkWinstonLogger} from '../logging/branchwork-winston-logger.js';
import * as constants from '../constants.js';
import {InjectTokens} from './inject-tokens.js';
import {ErrorHandler} from '../error-handler.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {type ConfigAccessor} from '../../data/configuration/api/config-accessor.js';
import {EnvironmentConfig} from '../../data/configuration/impl/environment-config.js';
import {TreeDescriptionLoader} from '../../data/tree/description/tree-description-loader.js';

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance: Container | null = null;
  private static isInitialized: boolean = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param config - configuration source, defaults to the BRANCHWORK_* environment variables
   * @param testLogger - a test logger to use, if provided
   */
  public init(
    config: ConfigAccessor = new EnvironmentConfig(constants.ENVIRONMENT_PREFIX),
    testLogger?: BranchworkLogger,
  ): void {
    if (Container.isInitialized) {
      container.resolve<BranchworkLogger>(InjectTokens.BranchworkLogger).debug('Container already initialized');
      return;
    }

    const homeDirectory: string = config.asString(constants.CONFIG_KEY_HOME) ?? constants.DEFAULT_HOME_DIR;
    const logLevel: string = config.asString(constants.CONFIG_KEY_LOG_LEVEL) ?? constants.DEFAULT_LOG_LEVEL;
    const developmentMode: boolean = config.asBoolean(constants.CONFIG_KEY_DEV_MODE) ?? false;

    container.register(InjectTokens.ConfigAccessor, {useValue: config});

    // BranchworkLogger
    container.register(InjectTokens.LogLevel, {useValue: logLevel});
    container.register(InjectTokens.DevelopmentMode, {useValue: developmentMode});
    container.register(InjectTokens.LogsDirectory, {
      useValue: PathEx.join(homeDirectory, constants.LOGS_DIR_NAME),
    });
    if (testLogger) {
      container.registerInstance(InjectTokens.BranchworkLogger, testLogger);
      container.resolve<BranchworkLogger>(InjectTokens.BranchworkLogger).debug('Using test logger');
    } else {
      container.register(
        InjectTokens.BranchworkLogger,
        {useClass: BranchworkWinstonLogger},
        {lifecycle: Lifecycle.Singleton},
      );
      container.resolve<BranchworkLogger>(InjectTokens.BranchworkLogger).debug('Using default logger');
    }

    container.register(InjectTokens.ErrorHandler, {useClass: ErrorHandler}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.TreeDescriptionLoader,
      {useClass: TreeDescriptionLoader},
      {lifecycle: Lifecycle.Singleton},
    );

    Container.isInitialized = true;
  }

  /**
   * clears the container and initializes it again, useful for testing
   * @param config - configuration source, defaults to the BRANCHWORK_* environment variables
   * @param testLogger - a test logger to use, if provided
   */
  public reset(config?: ConfigAccessor, testLogger?: BranchworkLogger): void {
    if (Container.instance && Container.isInitialized) {
      container.resolve<BranchworkLogger>(InjectTokens.BranchworkLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(config, testLogger);
  }
}
