// SPDX-License-Identifier: Apache-2.0

import {type DockerRequest} from '../docker-request.js';
import {type DockerExecutionBuilder} from '../../execution/docker-execution-builder.js';

export class ContainerRemoveRequest implements DockerRequest {
  public constructor(private readonly containerName: string) {
    if (!containerName) {
      throw new Error('containerName must not be null');
    }
  }

  public apply(builder: DockerExecutionBuilder): void {
    builder.subcommands('rm').flag('force').positional(this.containerName);
  }
}
