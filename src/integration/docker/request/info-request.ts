// SPDX-License-Identifier: Apache-2.0

import {type DockerRequest} from './docker-request.js';
import {type DockerExecutionBuilder} from '../execution/docker-execution-builder.js';

/**
 * Asks the daemon for its version; fails when the daemon cannot be reached.
 */
export class InfoRequest implements DockerRequest {
  public apply(builder: DockerExecutionBuilder): void {
    builder.subcommands('info').argument('format', '{{.ServerVersion}}');
  }
}
