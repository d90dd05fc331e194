// SPDX-License-Identifier: Apache-2.0

import {type DockerRequest} from '../docker-request.js';
import {type DockerExecutionBuilder} from '../../execution/docker-execution-builder.js';
import {type ContainerRunOptions} from '../../model/container-run/container-run-options.js';

/**
 * A request to run a container in the foreground until its command exits.
 */
export class ContainerRunRequest implements DockerRequest {
  public constructor(private readonly options: ContainerRunOptions) {
    if (!options) {
      throw new Error('options must not be null');
    }
  }

  public apply(builder: DockerExecutionBuilder): void {
    builder.subcommands('run');
    this.options.apply(builder);
  }
}
