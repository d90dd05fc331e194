// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type ComposeClientBuilder} from '../compose-client-builder.js';
import {type ComposeClient} from '../compose-client.js';
import {DefaultComposeClient} from './default-compose-client.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {type GrapheneLogger} from '../../../core/logging/graphene-logger.js';
import {ToolingError} from '../../../core/errors/tooling-error.js';
import * as constants from '../../../core/constants.js';

@injectable()
export class DefaultComposeClientBuilder implements ComposeClientBuilder {
  private readonly dockerExecutable: string;
  private readonly logger: GrapheneLogger;

  public constructor(
    @inject(InjectTokens.DockerExecutable) dockerExecutable?: string,
    @inject(InjectTokens.GrapheneLogger) logger?: GrapheneLogger,
  ) {
    this.dockerExecutable = patchInject(dockerExecutable, InjectTokens.DockerExecutable, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.GrapheneLogger, this.constructor.name);
  }

  /**
   * Prefers the compose plugin and falls back to the standalone executable.
   */
  public async build(): Promise<ComposeClient> {
    const candidates: DefaultComposeClient[] = [
      new DefaultComposeClient(this.dockerExecutable, [constants.COMPOSE_SUBCOMMAND]),
      new DefaultComposeClient(constants.DOCKER_COMPOSE),
    ];

    const failures: string[] = [];
    for (const client of candidates) {
      try {
        await client.version();
      } catch (error) {
        const message: string = error instanceof Error ? error.message : String(error);
        this.logger.debug(`compose not usable through '${client.invocation}': ${message}`);
        failures.push(`${client.invocation}: ${message}`);
        continue;
      }

      await client.checkVersion();
      this.logger.debug(`using compose through '${client.invocation}'`);
      return client;
    }

    throw new ToolingError(
      `neither '${candidates.map((client): string => client.invocation).join("' nor '")}' is available`,
      undefined,
      {failures},
    );
  }
}
