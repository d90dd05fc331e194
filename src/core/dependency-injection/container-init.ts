// SPDX-License-Identifier: Apache-2.0

import {container} from 'tsyringe-neo';
import * as constants from '../constants.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {InjectTokens} from './inject-tokens.js';
import {SingletonContainer} from './singleton-container.js';
import {ValueContainer} from './value-container.js';
import {type GrapheneLogger} from '../logging/graphene-logger.js';
import {GraphenePinoLogger} from '../logging/graphene-pino-logger.js';
import {ErrorHandler} from '../error-handler.js';
import {Middlewares} from '../middlewares.js';
import {ShellRunner} from '../shell-runner.js';
import {DefaultDockerClient} from '../../integration/docker/impl/default-docker-client.js';
import {DefaultComposeClientBuilder} from '../../integration/docker/impl/default-compose-client-builder.js';
import {ToolingVerifier} from '../deployment/tooling-verifier.js';
import {ConfigResolver} from '../deployment/config-resolver.js';
import {NetworkProvisioner} from '../deployment/network-provisioner.js';
import {GitLfsSynchronizer} from '../deployment/git-lfs-synchronizer.js';
import {ServiceGroupRunner} from '../deployment/service-group-runner.js';
import {LifecycleController} from '../deployment/lifecycle-controller.js';
import {KeyMaterialCodec} from '../identity/key-material-codec.js';
import {KeyMaterialPresenter} from '../identity/key-material-presenter.js';
import {KeyBootstrapper} from '../identity/key-bootstrapper.js';
import {InvocationConfigBuilder} from '../invocation-config-builder.js';
import {NodeCommandTasks} from '../../commands/node/tasks.js';
import {NodeCommandHandlers} from '../../commands/node/handlers.js';
import {DeploymentCommandTasks} from '../../commands/deployment/tasks.js';
import {DeploymentCommandHandlers} from '../../commands/deployment/handlers.js';
import {NodeCommandDefinition} from '../../commands/command-definitions/node-command-definition.js';
import {DeploymentCommandDefinition} from '../../commands/command-definitions/deployment-command-definition.js';
import {Commands} from '../../commands/commands.js';

export type InstanceOverrides = Map<symbol, SingletonContainer | ValueContainer>;

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance?: Container;
  private static isInitialized: boolean = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param homeDirectory - the home directory to use, defaults to constants.GRAPHENE_HOME_DIR
   * @param logLevel - the log level to use, defaults to 'debug'
   * @param developmentMode - if true, show full stack traces in error messages
   * @param overrides - instances to use instead of the default implementations
   */
  public init(
    homeDirectory: string = constants.GRAPHENE_HOME_DIR,
    logLevel: string = 'debug',
    developmentMode: boolean = false,
    overrides: InstanceOverrides = new Map<symbol, SingletonContainer | ValueContainer>(),
  ): void {
    if (Container.isInitialized) {
      container.resolve<GrapheneLogger>(InjectTokens.GrapheneLogger).debug('Container already initialized');
      return;
    }

    const singletonContainers: SingletonContainer[] = [
      new SingletonContainer(InjectTokens.GrapheneLogger, GraphenePinoLogger),
      new SingletonContainer(InjectTokens.ErrorHandler, ErrorHandler),
      new SingletonContainer(InjectTokens.Middlewares, Middlewares),
      new SingletonContainer(InjectTokens.ShellRunner, ShellRunner),
      new SingletonContainer(InjectTokens.DockerClient, DefaultDockerClient),
      new SingletonContainer(InjectTokens.ComposeClientBuilder, DefaultComposeClientBuilder),
      new SingletonContainer(InjectTokens.ToolingVerifier, ToolingVerifier),
      new SingletonContainer(InjectTokens.ConfigResolver, ConfigResolver),
      new SingletonContainer(InjectTokens.NetworkProvisioner, NetworkProvisioner),
      new SingletonContainer(InjectTokens.GitLfsSynchronizer, GitLfsSynchronizer),
      new SingletonContainer(InjectTokens.ServiceGroupRunner, ServiceGroupRunner),
      new SingletonContainer(InjectTokens.LifecycleController, LifecycleController),
      new SingletonContainer(InjectTokens.KeyMaterialCodec, KeyMaterialCodec),
      new SingletonContainer(InjectTokens.KeyMaterialPresenter, KeyMaterialPresenter),
      new SingletonContainer(InjectTokens.KeyBootstrapper, KeyBootstrapper),
      new SingletonContainer(InjectTokens.InvocationConfigBuilder, InvocationConfigBuilder),
      new SingletonContainer(InjectTokens.NodeCommandTasks, NodeCommandTasks),
      new SingletonContainer(InjectTokens.NodeCommandHandlers, NodeCommandHandlers),
      new SingletonContainer(InjectTokens.DeploymentCommandTasks, DeploymentCommandTasks),
      new SingletonContainer(InjectTokens.DeploymentCommandHandlers, DeploymentCommandHandlers),
      new SingletonContainer(InjectTokens.NodeCommandDefinition, NodeCommandDefinition),
      new SingletonContainer(InjectTokens.DeploymentCommandDefinition, DeploymentCommandDefinition),
      new SingletonContainer(InjectTokens.Commands, Commands),
    ];

    const valueContainers: ValueContainer[] = [
      new ValueContainer(InjectTokens.LogLevel, logLevel),
      new ValueContainer(InjectTokens.DevelopmentMode, developmentMode),
      new ValueContainer(InjectTokens.LogsDirectory, PathEx.join(homeDirectory, 'logs')),
      new ValueContainer(InjectTokens.DockerExecutable, constants.DOCKER),
    ];

    for (const [token, override] of overrides) {
      if (override instanceof SingletonContainer) {
        container.register(token, {useClass: override.useClass}, {lifecycle: override.lifecycle});
      } else if (override instanceof ValueContainer) {
        container.register(override.token, {useValue: override.useValue});
      }
    }

    for (const value of valueContainers) {
      if (!overrides.get(value.token)) {
        container.register(value.token, {useValue: value.useValue});
      }
    }

    for (const singleton of singletonContainers) {
      if (!overrides.get(singleton.token)) {
        container.register(singleton.token, {useClass: singleton.useClass}, {lifecycle: singleton.lifecycle});
      }
    }

    container.resolve<GrapheneLogger>(InjectTokens.GrapheneLogger).debug('Container initialized');
    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   * @param homeDirectory - the home directory to use, defaults to constants.GRAPHENE_HOME_DIR
   * @param logLevel - the log level to use, defaults to 'debug'
   * @param developmentMode - if true, show full stack traces in error messages
   * @param overrides - instances to use instead of the default implementations
   */
  public reset(
    homeDirectory?: string,
    logLevel?: string,
    developmentMode?: boolean,
    overrides?: InstanceOverrides,
  ): void {
    if (Container.instance && Container.isInitialized) {
      container.resolve<GrapheneLogger>(InjectTokens.GrapheneLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(homeDirectory, logLevel, developmentMode, overrides);
  }
}
