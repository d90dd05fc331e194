// SPDX-License-Identifier: Apache-2.0

import {type DockerRequest} from '../docker-request.js';
import {type DockerExecutionBuilder} from '../../execution/docker-execution-builder.js';
import {type ComposeProject} from '../../model/compose-project.js';

/**
 * Starts the project detached, rebuilding images first when asked to.
 */
export class ComposeUpRequest implements DockerRequest {
  public constructor(
    private readonly project: ComposeProject,
    private readonly build: boolean,
  ) {}

  public apply(builder: DockerExecutionBuilder): void {
    this.project.apply(builder);
    builder.subcommands('up').flag('detach');
    if (this.build) {
      builder.flag('build');
    }
  }
}
