// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type GrapheneLogger} from '../logging/graphene-logger.js';
import {type DockerClient} from '../../integration/docker/docker-client.js';
import {ToolingError} from '../errors/tooling-error.js';
import {type InvocationConfig} from '../model/invocation-config.js';
import {type NetworkOutcome} from '../model/network-outcome.js';

/**
 * Makes sure the external network both service groups attach to exists.
 */
@injectable()
export class NetworkProvisioner {
  private readonly docker: DockerClient;
  private readonly logger: GrapheneLogger;

  public constructor(
    @inject(InjectTokens.DockerClient) docker?: DockerClient,
    @inject(InjectTokens.GrapheneLogger) logger?: GrapheneLogger,
  ) {
    this.docker = patchInject(docker, InjectTokens.DockerClient, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.GrapheneLogger, this.constructor.name);
  }

  /**
   * @throws ToolingError if the network is missing and cannot be created
   */
  public async ensure(config: InvocationConfig): Promise<NetworkOutcome> {
    if (config.skipNetwork) {
      this.logger.debug(`skipping network ${config.networkName}`);
      return 'skipped';
    }

    if (await this.docker.networkExists(config.networkName)) {
      this.logger.debug(`network ${config.networkName} already exists`);
      return 'exists';
    }

    try {
      await this.docker.createNetwork(config.networkName);
    } catch (error) {
      throw new ToolingError(
        `Failed to create network ${config.networkName}`,
        error instanceof Error ? error : undefined,
        {networkName: config.networkName},
      );
    }
    this.logger.info(`created network ${config.networkName}`);
    return 'created';
  }
}
