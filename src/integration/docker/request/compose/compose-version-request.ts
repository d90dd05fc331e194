// SPDX-License-Identifier: Apache-2.0

import {type DockerRequest} from '../docker-request.js';
import {type DockerExecutionBuilder} from '../../execution/docker-execution-builder.js';

export class ComposeVersionRequest implements DockerRequest {
  public apply(builder: DockerExecutionBuilder): void {
    builder.subcommands('version').flag('short');
  }
}
