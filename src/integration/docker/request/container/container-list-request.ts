// SPDX-License-Identifier: Apache-2.0

import {type DockerRequest} from '../docker-request.js';
import {type DockerExecutionBuilder} from '../../execution/docker-execution-builder.js';

/**
 * Lists containers in every state, one JSON document per line.
 */
export class ContainerListRequest implements DockerRequest {
  public constructor(private readonly filters: readonly string[] = []) {}

  public apply(builder: DockerExecutionBuilder): void {
    builder
      .subcommands('ps')
      .flag('all')
      .optionsWithMultipleValues('filter', this.filters)
      .argument('format', '{{json .}}');
  }
}
