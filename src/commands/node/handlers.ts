// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import * as constants from '../../core/constants.js';
import {CommandHandler} from '../../core/command-handler.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {type NodeCommandTasks} from './tasks.js';
import {type ArgvStruct} from '../../types/index.js';
import {type NodeCommandContext} from './config-interfaces/node-command-context.js';

@injectable()
export class NodeCommandHandlers extends CommandHandler {
  private readonly tasks: NodeCommandTasks;

  public constructor(@inject(InjectTokens.NodeCommandTasks) tasks?: NodeCommandTasks) {
    super();
    this.tasks = patchInject(tasks, InjectTokens.NodeCommandTasks, this.constructor.name);
  }

  public async init(argv: ArgvStruct): Promise<boolean> {
    await this.commandAction<NodeCommandContext>(
      argv,
      [this.tasks.initialize(argv), this.tasks.verifyDocker(), this.tasks.bootstrapKeys()],
      constants.LISTR_DEFAULT_OPTIONS.DEFAULT,
      'Error generating node keys',
      'init',
    );
    return true;
  }

  public async showNodeId(argv: ArgvStruct): Promise<boolean> {
    await this.commandAction<NodeCommandContext>(
      argv,
      [this.tasks.initialize(argv), this.tasks.verifyDocker(), this.tasks.showNodeId()],
      constants.LISTR_DEFAULT_OPTIONS.DEFAULT,
      'Error reading node id',
      'show-node-id',
    );
    return true;
  }

  public async showValidator(argv: ArgvStruct): Promise<boolean> {
    await this.commandAction<NodeCommandContext>(
      argv,
      [this.tasks.initialize(argv), this.tasks.verifyDocker(), this.tasks.showValidator()],
      constants.LISTR_DEFAULT_OPTIONS.DEFAULT,
      'Error reading validator information',
      'show-validator',
    );
    return true;
  }
}
