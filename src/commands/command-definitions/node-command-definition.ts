// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {BaseCommandDefinition} from './base-command-definition.js';
import {CommandBuilder, Subcommand} from '../../core/command-path-builders/command-builder.js';
import {type NodeCommandHandlers} from '../node/handlers.js';
import {type CommandDefinition} from '../../types/index.js';
import {type GrapheneLogger} from '../../core/logging/graphene-logger.js';
import * as NodeFlags from '../node/flags.js';

@injectable()
export class NodeCommandDefinition extends BaseCommandDefinition {
  private readonly logger: GrapheneLogger;
  private readonly handlers: NodeCommandHandlers;

  public constructor(
    @inject(InjectTokens.GrapheneLogger) logger?: GrapheneLogger,
    @inject(InjectTokens.NodeCommandHandlers) handlers?: NodeCommandHandlers,
  ) {
    super();
    this.logger = patchInject(logger, InjectTokens.GrapheneLogger, this.constructor.name);
    this.handlers = patchInject(handlers, InjectTokens.NodeCommandHandlers, this.constructor.name);
  }

  public static readonly INIT_COMMAND: string = 'init';
  public static readonly SHOW_NODE_ID_COMMAND: string = 'show-node-id';
  public static readonly SHOW_VALIDATOR_COMMAND: string = 'show-validator';

  public getCommandDefinitions(): CommandDefinition[] {
    return new CommandBuilder(this.logger)
      .addSubcommand(
        new Subcommand(
          NodeCommandDefinition.INIT_COMMAND,
          'Generate the keys of a consensus node and print them for safe keeping',
          this.handlers.init.bind(this.handlers),
          NodeFlags.INIT_FLAGS,
          NodeFlags.POSITIONALS,
        ),
      )
      .addSubcommand(
        new Subcommand(
          NodeCommandDefinition.SHOW_NODE_ID_COMMAND,
          'Print the peer id of an initialized node',
          this.handlers.showNodeId.bind(this.handlers),
          NodeFlags.SHOW_FLAGS,
          NodeFlags.POSITIONALS,
        ),
      )
      .addSubcommand(
        new Subcommand(
          NodeCommandDefinition.SHOW_VALIDATOR_COMMAND,
          'Print the validator information of an initialized node',
          this.handlers.showValidator.bind(this.handlers),
          NodeFlags.SHOW_FLAGS,
          NodeFlags.POSITIONALS,
        ),
      )
      .build();
  }
}
