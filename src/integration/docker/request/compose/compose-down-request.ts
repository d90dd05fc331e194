// SPDX-License-Identifier: Apache-2.0

import {type DockerRequest} from '../docker-request.js';
import {type DockerExecutionBuilder} from '../../execution/docker-execution-builder.js';
import {type ComposeProject} from '../../model/compose-project.js';

export interface ComposeDownOptions {
  /** also remove named and anonymous volumes */
  readonly volumes: boolean;
  readonly removeOrphans: boolean;
}

export class ComposeDownRequest implements DockerRequest {
  public constructor(
    private readonly project: ComposeProject,
    private readonly options: ComposeDownOptions,
  ) {}

  public apply(builder: DockerExecutionBuilder): void {
    this.project.apply(builder);
    builder.subcommands('down');
    if (this.options.volumes) {
      builder.flag('volumes');
    }
    if (this.options.removeOrphans) {
      builder.flag('remove-orphans');
    }
  }
}
