// SPDX-License-Identifier: Apache-2.0

import {type DockerExecutionBuilder} from '../execution/docker-execution-builder.js';

/**
 * One docker or compose sub-command, applied onto an execution builder.
 */
export interface DockerRequest {
  apply(builder: DockerExecutionBuilder): void;
}
