#!/usr/bin/env node
// SPDX-License-Identifier: Apache-2.0

import sourceMapSupport from 'source-map-support';
sourceMapSupport.install(); // Enable source maps for error stack traces
import * as branchwork from './src/index.js';
import {type BranchworkLogger} from './src/core/logging/branchwork-logger.js';
import {InjectTokens} from './src/core/dependency-injection/inject-tokens.js';
import {container} from 'tsyringe-neo';
import {type ErrorHandler} from './src/core/error-handler.js';
import {BranchworkError} from './src/core/errors/branchwork-error.js';

const context: {logger?: BranchworkLogger} = {};

process.on('unhandledRejection', reason => {
  context.logger?.showUserError(new BranchworkError(`Unhandled Rejection, reason: ${JSON.stringify(reason)}`, reason));
});

await branchwork
  .main(process.argv, context)
  .then(() => {
    context.logger?.info('Branchwork CLI completed, via entrypoint');
  })
  .catch((error: unknown) => {
    const errorHandler: ErrorHandler = container.resolve<ErrorHandler>(InjectTokens.ErrorHandler);
    process.exitCode = errorHandler.handle(error);
  });
