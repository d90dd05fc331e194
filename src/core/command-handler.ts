// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {Listr, type ListrBaseClassOptions, type ListrRendererValue} from 'listr2';
import {type GrapheneLogger} from './logging/graphene-logger.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {GrapheneError} from './errors/graphene-error.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {type ArgvStruct, type GrapheneListrTask} from '../types/index.js';

@injectable()
export class CommandHandler {
  protected readonly logger: GrapheneLogger;

  public constructor(@inject(InjectTokens.GrapheneLogger) logger?: GrapheneLogger) {
    this.logger = patchInject(logger, InjectTokens.GrapheneLogger, this.constructor.name);
  }

  /**
   * Runs the tasks of one command as a single listr2 task list.
   *
   * @returns the context the tasks filled in
   * @throws GrapheneError as raised by a task, anything else wrapped in a GrapheneError prefixed with errorString
   */
  public async commandAction<T extends object>(
    argv: ArgvStruct,
    actionTasks: GrapheneListrTask<T>[],
    options: ListrBaseClassOptions<unknown, ListrRendererValue, ListrRendererValue>,
    errorString: string,
    commandName?: string,
  ): Promise<T> {
    const name: string = commandName ?? argv._.slice(0, 1).join(' ');
    this.logger.debug(`running task list of '${name}'`);

    const tasks: Listr<T, ListrRendererValue, ListrRendererValue> = new Listr<
      T,
      ListrRendererValue,
      ListrRendererValue
    >(actionTasks, {...options, ctx: undefined});
    try {
      return await tasks.run();
    } catch (error) {
      if (error instanceof GrapheneError) {
        throw error;
      }
      throw new GrapheneError(
        `${errorString}: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
  }
}
