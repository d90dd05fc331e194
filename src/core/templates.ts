// SPDX-License-Identifier: Apache-2.0

import * as constants from './constants.js';
import {PathEx} from '../business/utils/path-ex.js';
import {type Environment} from './model/environment.js';
import {type NodeType} from './model/node-type.js';
import {type ServiceGroupName, type ServiceRole} from './model/service-group.js';

export class Templates {
  /** The live network keeps the historical unsuffixed name */
  public static renderNetworkName(environment: Environment): string {
    return environment === 'live' ? constants.NETWORK_NAME_PREFIX : `${constants.NETWORK_NAME_PREFIX}-${environment}`;
  }

  public static renderDeploymentId(environment: Environment): string {
    return `${constants.DEPLOYMENT_ID_PREFIX}_${environment}`;
  }

  public static renderProjectName(environment: Environment, role: ServiceRole): string {
    return `${Templates.renderDeploymentId(environment)}_${role}`;
  }

  public static renderServiceGroupName(role: ServiceRole): ServiceGroupName {
    return `${role}-group`;
  }

  public static renderNodeImage(environment: Environment): string {
    return `${constants.NODE_IMAGE_REPOSITORY}:${environment}`;
  }

  public static renderOneShotContainerName(operation: string): string {
    return `${constants.NODE_TOOL_NAME}_${operation}`;
  }

  public static renderEnvironmentDirectory(rootDirectory: string, environment: Environment): string {
    return PathEx.join(rootDirectory, constants.CONFIG_ENV_DIR, environment);
  }

  public static renderServicesDirectory(rootDirectory: string): string {
    return PathEx.join(rootDirectory, constants.SERVICES_DIR);
  }

  public static renderComposeFile(rootDirectory: string, role: ServiceRole): string {
    return PathEx.join(Templates.renderServicesDirectory(rootDirectory), `docker.compose.${role}.yml`);
  }

  public static renderCommonEnvFile(rootDirectory: string, environment: Environment): string {
    return PathEx.join(Templates.renderEnvironmentDirectory(rootDirectory, environment), constants.COMMON_ENV_FILE);
  }

  public static renderRoleEnvFile(rootDirectory: string, environment: Environment, role: ServiceRole): string {
    return PathEx.join(Templates.renderEnvironmentDirectory(rootDirectory, environment), `.env.${role}`);
  }

  public static renderLocalOverrideEnvFile(rootDirectory: string, environment: Environment): string {
    return PathEx.join(
      Templates.renderEnvironmentDirectory(rootDirectory, environment),
      constants.LOCAL_OVERRIDE_ENV_FILE,
    );
  }

  public static renderNodeDirectory(rootDirectory: string, environment: Environment, nodeType: NodeType): string {
    return PathEx.join(rootDirectory, constants.VOLUMES_DIR, environment, constants.NODE_TOOL_NAME, nodeType);
  }

  public static renderNodeConfigDirectory(rootDirectory: string, environment: Environment, nodeType: NodeType): string {
    return PathEx.join(Templates.renderNodeDirectory(rootDirectory, environment, nodeType), 'config');
  }

  public static renderNodeDataDirectory(rootDirectory: string, environment: Environment, nodeType: NodeType): string {
    return PathEx.join(Templates.renderNodeDirectory(rootDirectory, environment, nodeType), 'data');
  }

  public static renderNodeImageDockerfile(rootDirectory: string): string {
    return PathEx.join(rootDirectory, constants.NODE_IMAGE_DOCKERFILE);
  }
}
