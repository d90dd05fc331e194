// SPDX-License-Identifier: Apache-2.0

import {type DockerRequest} from '../docker-request.js';
import {type DockerExecutionBuilder} from '../../execution/docker-execution-builder.js';
import {type ComposeProject} from '../../model/compose-project.js';

export class ComposePsRequest implements DockerRequest {
  public constructor(private readonly project: ComposeProject) {}

  public apply(builder: DockerExecutionBuilder): void {
    this.project.apply(builder);
    builder.subcommands('ps');
  }
}
