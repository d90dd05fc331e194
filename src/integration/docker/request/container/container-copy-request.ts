// SPDX-License-Identifier: Apache-2.0

import {type DockerRequest} from '../docker-request.js';
import {type DockerExecutionBuilder} from '../../execution/docker-execution-builder.js';

/**
 * Copies a file out of a (possibly stopped) container.
 */
export class ContainerCopyRequest implements DockerRequest {
  public constructor(
    private readonly containerName: string,
    private readonly containerPath: string,
    private readonly destinationPath: string,
  ) {
    if (!containerName) {
      throw new Error('containerName must not be null');
    }
  }

  public apply(builder: DockerExecutionBuilder): void {
    builder
      .subcommands('cp')
      .positional(`${this.containerName}:${this.containerPath}`)
      .positional(this.destinationPath);
  }
}
