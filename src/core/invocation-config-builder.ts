// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {type GrapheneLogger} from './logging/graphene-logger.js';
import {ConfigurationError} from './errors/configuration-error.js';
import {PathEx} from '../business/utils/path-ex.js';
import {Templates} from './templates.js';
import {Flags as flags} from '../commands/flags.js';
import {type ArgvStruct} from '../types/index.js';
import {type CommandFlag} from '../types/flag-types.js';
import {DEFAULT_ENVIRONMENT, type Environment, isEnvironment} from './model/environment.js';
import {DEFAULT_NODE_TYPE, isNodeType, type NodeType} from './model/node-type.js';
import {type InvocationConfig} from './model/invocation-config.js';

/**
 * Turns parsed command line arguments into the immutable InvocationConfig.
 */
@injectable()
export class InvocationConfigBuilder {
  private readonly logger: GrapheneLogger;

  public constructor(@inject(InjectTokens.GrapheneLogger) logger?: GrapheneLogger) {
    this.logger = patchInject(logger, InjectTokens.GrapheneLogger, this.constructor.name);
  }

  /**
   * @param argv - arguments as parsed by yargs
   * @param workingDirectory - used as the project root when --root-dir is not given
   * @throws ConfigurationError on an unknown environment or node type
   */
  public build(argv: ArgvStruct, workingDirectory: string = process.cwd()): InvocationConfig {
    const environmentValue: unknown = argv[flags.environment.name] ?? DEFAULT_ENVIRONMENT;
    if (!isEnvironment(environmentValue)) {
      throw new ConfigurationError(`Invalid environment: ${String(environmentValue)}`, flags.environment.name);
    }
    const environment: Environment = environmentValue;

    const nodeTypeValue: unknown = argv[flags.nodeType.name] ?? DEFAULT_NODE_TYPE;
    if (!isNodeType(nodeTypeValue)) {
      throw new ConfigurationError(`Invalid node type: ${String(nodeTypeValue)}`, flags.nodeType.name);
    }
    const nodeType: NodeType = nodeTypeValue;

    const rootValue: unknown = argv[flags.rootDirectory.name];
    const rootDirectory: string =
      typeof rootValue === 'string' && rootValue.trim() !== ''
        ? PathEx.resolve(workingDirectory, rootValue)
        : PathEx.resolve(workingDirectory);

    const config: InvocationConfig = {
      rootDirectory,
      environment,
      nodeType,
      networkName: Templates.renderNetworkName(environment),
      deploymentId: Templates.renderDeploymentId(environment),
      nodeImage: Templates.renderNodeImage(environment),
      build: InvocationConfigBuilder.booleanFlag(argv, flags.build),
      gitLfs: InvocationConfigBuilder.booleanFlag(argv, flags.gitLfs),
      showLogs: InvocationConfigBuilder.booleanFlag(argv, flags.logs),
      skipNetwork: InvocationConfigBuilder.booleanFlag(argv, flags.skipNetwork),
      failFast: InvocationConfigBuilder.booleanFlag(argv, flags.failFast),
      force: InvocationConfigBuilder.booleanFlag(argv, flags.force),
      quiet: InvocationConfigBuilder.booleanFlag(argv, flags.quiet),
    };

    this.logger.debug({config}, 'invocation config built');
    return Object.freeze(config);
  }

  private static booleanFlag(argv: ArgvStruct, flag: CommandFlag): boolean {
    const value: unknown = argv[flag.name];
    if (typeof value === 'boolean') {
      return value;
    }
    return flag.definition.defaultValue === true;
  }
}
