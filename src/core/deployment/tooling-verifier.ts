// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type GrapheneLogger} from '../logging/graphene-logger.js';
import {type DockerClient} from '../../integration/docker/docker-client.js';
import {type ComposeClient} from '../../integration/docker/compose-client.js';
import {type ComposeClientBuilder} from '../../integration/docker/compose-client-builder.js';
import {ToolingError} from '../errors/tooling-error.js';

/**
 * Checks the container runtime before any command touches it.
 */
@injectable()
export class ToolingVerifier {
  private readonly docker: DockerClient;
  private readonly composeClientBuilder: ComposeClientBuilder;
  private readonly logger: GrapheneLogger;
  private compose?: ComposeClient;

  public constructor(
    @inject(InjectTokens.DockerClient) docker?: DockerClient,
    @inject(InjectTokens.ComposeClientBuilder) composeClientBuilder?: ComposeClientBuilder,
    @inject(InjectTokens.GrapheneLogger) logger?: GrapheneLogger,
  ) {
    this.docker = patchInject(docker, InjectTokens.DockerClient, this.constructor.name);
    this.composeClientBuilder = patchInject(
      composeClientBuilder,
      InjectTokens.ComposeClientBuilder,
      this.constructor.name,
    );
    this.logger = patchInject(logger, InjectTokens.GrapheneLogger, this.constructor.name);
  }

  /**
   * @throws ToolingError if docker is not installed or its daemon does not answer
   */
  public async verifyDocker(): Promise<void> {
    try {
      await this.docker.info();
    } catch (error) {
      throw new ToolingError(
        'Docker is not available. Install docker and make sure the daemon is running.',
        error instanceof Error ? error : undefined,
      );
    }
    this.logger.debug('docker daemon is reachable');
  }

  /**
   * Detects the compose flavour once per process and checks its version.
   * @throws ToolingError if no usable compose is installed
   */
  public async composeClient(): Promise<ComposeClient> {
    if (this.compose) {
      return this.compose;
    }

    try {
      this.compose = await this.composeClientBuilder.build();
    } catch (error) {
      if (error instanceof ToolingError) {
        throw error;
      }
      throw new ToolingError('Docker Compose is not available.', error instanceof Error ? error : undefined);
    }
    return this.compose;
  }
}
