// SPDX-License-Identifier: Apache-2.0

import {type DockerRequest} from '../docker-request.js';
import {type DockerExecutionBuilder} from '../../execution/docker-execution-builder.js';

export class NetworkCreateRequest implements DockerRequest {
  public constructor(private readonly networkName: string) {
    if (!networkName) {
      throw new Error('networkName must not be null');
    }
  }

  public apply(builder: DockerExecutionBuilder): void {
    builder.subcommands('network', 'create').positional(this.networkName);
  }
}
