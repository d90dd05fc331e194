// SPDX-License-Identifier: Apache-2.0

import {type DockerExecutionBuilder} from '../execution/docker-execution-builder.js';

export interface Options {
  apply(builder: DockerExecutionBuilder): void;
}
