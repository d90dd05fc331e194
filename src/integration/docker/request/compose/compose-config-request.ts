// SPDX-License-Identifier: Apache-2.0

import {type DockerRequest} from '../docker-request.js';
import {type DockerExecutionBuilder} from '../../execution/docker-execution-builder.js';
import {type ComposeProject} from '../../model/compose-project.js';

/**
 * Renders the merged project model, which fails on an invalid compose file or unresolved variable.
 */
export class ComposeConfigRequest implements DockerRequest {
  public constructor(private readonly project: ComposeProject) {}

  public apply(builder: DockerExecutionBuilder): void {
    this.project.apply(builder);
    builder.subcommands('config');
  }
}
