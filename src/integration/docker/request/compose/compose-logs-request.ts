// SPDX-License-Identifier: Apache-2.0

import {type DockerRequest} from '../docker-request.js';
import {type DockerExecutionBuilder} from '../../execution/docker-execution-builder.js';
import {type ComposeProject} from '../../model/compose-project.js';

export class ComposeLogsRequest implements DockerRequest {
  public constructor(
    private readonly project: ComposeProject,
    private readonly tail: number,
  ) {
    if (!Number.isInteger(tail) || tail < 0) {
      throw new Error('tail must be a non-negative integer');
    }
  }

  public apply(builder: DockerExecutionBuilder): void {
    this.project.apply(builder);
    builder.subcommands('logs').argument('tail', String(this.tail));
  }
}
