// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type CommandDefinition} from '../types/index.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {type NodeCommandDefinition} from './command-definitions/node-command-definition.js';
import {type DeploymentCommandDefinition} from './command-definitions/deployment-command-definition.js';

/**
 * Return a list of Yargs command builder to be exposed through CLI
 * @returns an array of Yargs command builder
 */
@injectable()
export class Commands {
  private readonly node: NodeCommandDefinition;
  private readonly deployment: DeploymentCommandDefinition;

  public constructor(
    @inject(InjectTokens.NodeCommandDefinition) node?: NodeCommandDefinition,
    @inject(InjectTokens.DeploymentCommandDefinition) deployment?: DeploymentCommandDefinition,
  ) {
    this.node = patchInject(node, InjectTokens.NodeCommandDefinition, this.constructor.name);
    this.deployment = patchInject(deployment, InjectTokens.DeploymentCommandDefinition, this.constructor.name);
  }

  public getCommandDefinitions(): CommandDefinition[] {
    return [...this.node.getCommandDefinitions(), ...this.deployment.getCommandDefinitions()];
  }
}
