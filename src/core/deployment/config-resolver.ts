// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type GrapheneLogger} from '../logging/graphene-logger.js';
import {ConfigurationError} from '../errors/configuration-error.js';
import {Templates} from '../templates.js';
import {type InvocationConfig} from '../model/invocation-config.js';
import {SERVICE_ROLES, type ServiceGroup, type ServiceRole} from '../model/service-group.js';

export interface ResolvedConfiguration {
  readonly environmentDirectory: string;
  /** in declared order: validator group, then sentry group */
  readonly groups: readonly ServiceGroup[];
  /** set when the optional local override file exists */
  readonly localOverrideEnvFile?: string;
}

type Requirement = {readonly path: string; readonly kind: 'directory' | 'file'; readonly description: string};

/**
 * Resolves the compose and env files of an environment. Only probes the filesystem.
 */
@injectable()
export class ConfigResolver {
  private readonly logger: GrapheneLogger;

  public constructor(@inject(InjectTokens.GrapheneLogger) logger?: GrapheneLogger) {
    this.logger = patchInject(logger, InjectTokens.GrapheneLogger, this.constructor.name);
  }

  /**
   * @throws ConfigurationError naming the first missing directory or file
   */
  public resolve(config: InvocationConfig): ResolvedConfiguration {
    const {rootDirectory, environment} = config;
    const environmentDirectory: string = Templates.renderEnvironmentDirectory(rootDirectory, environment);
    const servicesDirectory: string = Templates.renderServicesDirectory(rootDirectory);

    const requirements: Requirement[] = [
      {path: environmentDirectory, kind: 'directory', description: `environment config directory`},
      {path: servicesDirectory, kind: 'directory', description: 'services directory'},
      ...SERVICE_ROLES.map(
        (role): Requirement => ({
          path: Templates.renderComposeFile(rootDirectory, role),
          kind: 'file',
          description: `${role} compose file`,
        }),
      ),
      {path: Templates.renderCommonEnvFile(rootDirectory, environment), kind: 'file', description: 'common env file'},
      ...SERVICE_ROLES.map(
        (role): Requirement => ({
          path: Templates.renderRoleEnvFile(rootDirectory, environment, role),
          kind: 'file',
          description: `${role} env file`,
        }),
      ),
    ];

    for (const requirement of requirements) {
      this.require(requirement);
    }

    const localOverride: string = Templates.renderLocalOverrideEnvFile(rootDirectory, environment);
    const localOverrideEnvFile: string | undefined = ConfigResolver.isFile(localOverride) ? localOverride : undefined;
    if (localOverrideEnvFile) {
      this.logger.debug(`using local override env file ${localOverrideEnvFile}`);
    }

    const groups: ServiceGroup[] = SERVICE_ROLES.map(
      (role: ServiceRole): ServiceGroup => ({
        name: Templates.renderServiceGroupName(role),
        role,
        composeFile: Templates.renderComposeFile(rootDirectory, role),
        envFiles: [
          Templates.renderCommonEnvFile(rootDirectory, environment),
          Templates.renderRoleEnvFile(rootDirectory, environment, role),
          ...(localOverrideEnvFile ? [localOverrideEnvFile] : []),
        ],
        projectName: Templates.renderProjectName(environment, role),
      }),
    );

    return {environmentDirectory, groups, localOverrideEnvFile};
  }

  private require(requirement: Requirement): void {
    const present: boolean =
      requirement.kind === 'directory'
        ? ConfigResolver.isDirectory(requirement.path)
        : ConfigResolver.isFile(requirement.path);
    if (!present) {
      throw new ConfigurationError(`Missing ${requirement.description}: ${requirement.path}`, requirement.path);
    }
    this.logger.debug(`found ${requirement.description} ${requirement.path}`);
  }

  private static isDirectory(path: string): boolean {
    return fs.statSync(path, {throwIfNoEntry: false})?.isDirectory() ?? false;
  }

  private static isFile(path: string): boolean {
    return fs.statSync(path, {throwIfNoEntry: false})?.isFile() ?? false;
  }
}
