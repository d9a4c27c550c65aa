// SPDX-License-Identifier: Apache-2.0

import os from 'node:os';
import {PathEx} from '../business/utils/path-ex.js';

export const ENVIRONMENT_PREFIX: string = 'BRANCHWORK';

export const DEFAULT_HOME_DIR: string = PathEx.join(os.homedir(), '.branchwork');
export const LOGS_DIR_NAME: string = 'logs';
export const LOG_FILE_NAME: string = 'branchwork.log';
export const DEFAULT_LOG_LEVEL: string = 'debug';

// configuration keys, see EnvironmentConfig for the variable naming
export const CONFIG_KEY_HOME: string = 'home';
export const CONFIG_KEY_LOG_LEVEL: string = 'log.level';
export const CONFIG_KEY_DEV_MODE: string = 'dev.mode';
