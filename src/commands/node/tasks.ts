// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import chalk from 'chalk';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {type GrapheneLogger} from '../../core/logging/graphene-logger.js';
import {type InvocationConfigBuilder} from '../../core/invocation-config-builder.js';
import {type KeyBootstrapper} from '../../core/identity/key-bootstrapper.js';
import {type ToolingVerifier} from '../../core/deployment/tooling-verifier.js';
import {ConfigurationError} from '../../core/errors/configuration-error.js';
import {type BootstrapOutcome} from '../../core/model/bootstrap-outcome.js';
import {type ArgvStruct, type GrapheneListrTask} from '../../types/index.js';
import {type NodeCommandContext} from './config-interfaces/node-command-context.js';

@injectable()
export class NodeCommandTasks {
  private readonly configBuilder: InvocationConfigBuilder;
  private readonly keyBootstrapper: KeyBootstrapper;
  private readonly toolingVerifier: ToolingVerifier;
  private readonly logger: GrapheneLogger;

  public constructor(
    @inject(InjectTokens.InvocationConfigBuilder) configBuilder?: InvocationConfigBuilder,
    @inject(InjectTokens.KeyBootstrapper) keyBootstrapper?: KeyBootstrapper,
    @inject(InjectTokens.ToolingVerifier) toolingVerifier?: ToolingVerifier,
    @inject(InjectTokens.GrapheneLogger) logger?: GrapheneLogger,
  ) {
    this.configBuilder = patchInject(configBuilder, InjectTokens.InvocationConfigBuilder, this.constructor.name);
    this.keyBootstrapper = patchInject(keyBootstrapper, InjectTokens.KeyBootstrapper, this.constructor.name);
    this.toolingVerifier = patchInject(toolingVerifier, InjectTokens.ToolingVerifier, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.GrapheneLogger, this.constructor.name);
  }

  public initialize(argv: ArgvStruct): GrapheneListrTask<NodeCommandContext> {
    return {
      title: 'Initialize',
      task: (context_, task): void => {
        context_.config = this.configBuilder.build(argv);
        task.title += `: ${context_.config.environment} ${context_.config.nodeType}`;
      },
    };
  }

  public verifyDocker(): GrapheneListrTask<NodeCommandContext> {
    return {
      title: 'Check docker',
      task: async (): Promise<void> => {
        await this.toolingVerifier.verifyDocker();
      },
    };
  }

  /**
   * Generates the node identity. A node that already has keys is an error unless --force is given.
   */
  public bootstrapKeys(): GrapheneListrTask<NodeCommandContext> {
    return {
      title: 'Generate node keys',
      task: async (context_, task): Promise<void> => {
        const outcome: BootstrapOutcome = await this.keyBootstrapper.bootstrap(context_.config);
        context_.outcome = outcome;

        switch (outcome.status) {
          case 'created': {
            task.title += ` - ${chalk.green('created')}`;
            return;
          }
          case 'already-initialized': {
            throw new ConfigurationError(
              `The ${outcome.nodeType} node is already initialized in ${outcome.configDirectory}, ` +
                'use --force to generate new keys',
              outcome.configDirectory,
            );
          }
          case 'failed': {
            this.logger.debug({step: outcome.error.step}, 'node key generation failed');
            throw outcome.error;
          }
        }
      },
    };
  }

  public showNodeId(): GrapheneListrTask<NodeCommandContext> {
    return {
      title: 'Read node id',
      task: async (context_): Promise<void> => {
        context_.peerId = await this.keyBootstrapper.showNodeId(context_.config);
      },
    };
  }

  public showValidator(): GrapheneListrTask<NodeCommandContext> {
    return {
      title: 'Read validator information',
      task: async (context_): Promise<void> => {
        context_.validatorLines = await this.keyBootstrapper.showValidator(context_.config);
      },
    };
  }
}
