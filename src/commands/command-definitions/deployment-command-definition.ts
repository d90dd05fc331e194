// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {BaseCommandDefinition} from './base-command-definition.js';
import {CommandBuilder, Subcommand} from '../../core/command-path-builders/command-builder.js';
import {type DeploymentCommandHandlers} from '../deployment/handlers.js';
import {type CommandDefinition} from '../../types/index.js';
import {type GrapheneLogger} from '../../core/logging/graphene-logger.js';
import {type CommandFlag} from '../../types/flag-types.js';
import * as DeploymentFlags from '../deployment/flags.js';

@injectable()
export class DeploymentCommandDefinition extends BaseCommandDefinition {
  private readonly logger: GrapheneLogger;
  private readonly handlers: DeploymentCommandHandlers;

  public constructor(
    @inject(InjectTokens.GrapheneLogger) logger?: GrapheneLogger,
    @inject(InjectTokens.DeploymentCommandHandlers) handlers?: DeploymentCommandHandlers,
  ) {
    super();
    this.logger = patchInject(logger, InjectTokens.GrapheneLogger, this.constructor.name);
    this.handlers = patchInject(handlers, InjectTokens.DeploymentCommandHandlers, this.constructor.name);
  }

  public getCommandDefinitions(): CommandDefinition[] {
    const positionals: CommandFlag[] = DeploymentFlags.POSITIONALS;

    return new CommandBuilder(this.logger)
      .addSubcommand(
        new Subcommand(
          'deploy',
          'Start the validator group, then the sentry group',
          this.handlers.deploy.bind(this.handlers),
          DeploymentFlags.DEPLOY_FLAGS,
          positionals,
        ),
      )
      .addSubcommand(
        new Subcommand(
          'stop',
          'Stop both service groups',
          this.handlers.stop.bind(this.handlers),
          DeploymentFlags.STOP_FLAGS,
          positionals,
        ),
      )
      .addSubcommand(
        new Subcommand(
          'restart',
          'Stop both service groups, then deploy them again',
          this.handlers.restart.bind(this.handlers),
          DeploymentFlags.DEPLOY_FLAGS,
          positionals,
        ),
      )
      .addSubcommand(
        new Subcommand(
          'clean',
          'Stop both service groups and remove their volumes',
          this.handlers.clean.bind(this.handlers),
          DeploymentFlags.CLEAN_FLAGS,
          positionals,
        ),
      )
      .addSubcommand(
        new Subcommand(
          'validate',
          'Check the compose configuration of both service groups',
          this.handlers.validate.bind(this.handlers),
          DeploymentFlags.VALIDATE_FLAGS,
          positionals,
        ),
      )
      .addSubcommand(
        new Subcommand(
          'status',
          'Show whether each service group is running, stopped or absent',
          this.handlers.status.bind(this.handlers),
          DeploymentFlags.STATUS_FLAGS,
          positionals,
        ),
      )
      .build();
  }
}
