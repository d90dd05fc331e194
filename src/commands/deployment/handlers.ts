// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import * as constants from '../../core/constants.js';
import {CommandHandler} from '../../core/command-handler.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {type DeploymentCommandTasks} from './tasks.js';
import {type ArgvStruct} from '../../types/index.js';
import {type LifecycleAction} from '../../core/model/lifecycle-action.js';
import {type DeploymentCommandContext} from './config-interfaces/deployment-command-context.js';

@injectable()
export class DeploymentCommandHandlers extends CommandHandler {
  private readonly tasks: DeploymentCommandTasks;

  public constructor(@inject(InjectTokens.DeploymentCommandTasks) tasks?: DeploymentCommandTasks) {
    super();
    this.tasks = patchInject(tasks, InjectTokens.DeploymentCommandTasks, this.constructor.name);
  }

  public async deploy(argv: ArgvStruct): Promise<boolean> {
    return this.runAction(argv, 'deploy', 'Error deploying service groups');
  }

  public async stop(argv: ArgvStruct): Promise<boolean> {
    return this.runAction(argv, 'stop', 'Error stopping service groups');
  }

  public async restart(argv: ArgvStruct): Promise<boolean> {
    return this.runAction(argv, 'restart', 'Error restarting service groups');
  }

  public async clean(argv: ArgvStruct): Promise<boolean> {
    return this.runAction(argv, 'clean', 'Error cleaning service groups');
  }

  public async validate(argv: ArgvStruct): Promise<boolean> {
    return this.runAction(argv, 'validate', 'Error validating compose configuration');
  }

  public async status(argv: ArgvStruct): Promise<boolean> {
    return this.runAction(argv, 'status', 'Error reading deployment status');
  }

  private async runAction(argv: ArgvStruct, action: LifecycleAction, errorString: string): Promise<boolean> {
    await this.commandAction<DeploymentCommandContext>(
      argv,
      this.tasks.actionTasks(argv, action),
      constants.LISTR_DEFAULT_OPTIONS.DEFAULT,
      errorString,
      action,
    );
    return true;
  }
}
