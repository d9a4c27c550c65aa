// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type BranchworkLogger} from './logging/branchwork-logger.js';
import {UserBreak} from './errors/user-break.js';
import {SilentBreak} from './errors/silent-break.js';
import {BranchworkError} from './errors/branchwork-error.js';

@injectable()
export class ErrorHandler {
  private readonly logger: BranchworkLogger;

  public constructor(@inject(InjectTokens.BranchworkLogger) logger?: BranchworkLogger) {
    this.logger = patchInject(logger, InjectTokens.BranchworkLogger, this.constructor.name);
  }

  /**
   * Reports the error to the user and the log.
   *
   * @returns the process exit code: 0 for a user or silent break, 1 otherwise
   */
  public handle(error: unknown): number {
    const breakError: UserBreak | SilentBreak | false = this.extractBreak(error);
    if (breakError instanceof UserBreak) {
      this.handleUserBreak(breakError);
      return 0;
    }

    if (breakError instanceof SilentBreak) {
      this.handleSilentBreak(breakError);
      return 0;
    }

    this.handleError(error instanceof Error ? error : new BranchworkError(String(error)));
    return 1;
  }

  private handleUserBreak(userBreak: UserBreak): void {
    this.logger.showUser(userBreak.message);
  }

  private handleSilentBreak(silentBreak: SilentBreak): void {
    this.logger.info(silentBreak.message);
  }

  private handleError(error: Error): void {
    this.logger.showUserError(error);
  }

  /**
   * Recursively checks if an error is or is caused by a UserBreak
   * Returns the UserBreak or SilentBreak if found, otherwise false
   */
  private extractBreak(error: unknown): UserBreak | SilentBreak | false {
    if (error instanceof UserBreak || error instanceof SilentBreak) {
      return error;
    }
    if (error instanceof Error && error.cause) {
      return this.extractBreak(error.cause);
    }
    return false;
  }
}
