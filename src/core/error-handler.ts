// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type GrapheneLogger} from './logging/graphene-logger.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {UserBreak} from './errors/user-break.js';

/**
 * Last stop for errors raised by a command: reports them to the operator and sets the exit code.
 */
@injectable()
export class ErrorHandler {
  private readonly logger: GrapheneLogger;

  public constructor(@inject(InjectTokens.GrapheneLogger) logger?: GrapheneLogger) {
    this.logger = patchInject(logger, InjectTokens.GrapheneLogger, this.constructor.name);
  }

  public handle(error: unknown): void {
    const userBreak: UserBreak | undefined = this.extractUserBreak(error);
    if (userBreak) {
      this.logger.showUser(userBreak.message);
      process.exitCode = 0;
      return;
    }

    this.logger.showUserError(error);
    process.exitCode = 1;
  }

  /** A UserBreak may arrive wrapped by the task list or by yargs */
  private extractUserBreak(error: unknown): UserBreak | undefined {
    let current: unknown = error;
    while (current instanceof Error) {
      if (current instanceof UserBreak) {
        return current;
      }
      current = current.cause;
    }
    return undefined;
  }
}
