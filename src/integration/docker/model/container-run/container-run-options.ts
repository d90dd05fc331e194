// SPDX-License-Identifier: Apache-2.0

import {type Options} from '../../request/options.js';
import {type DockerExecutionBuilder} from '../../execution/docker-execution-builder.js';

/**
 * Options for the `docker run` command.
 */
export class ContainerRunOptions implements Options {
  public constructor(
    public readonly image: string,
    public readonly name?: string,
    public readonly volumes: readonly string[] = [],
    public readonly command: readonly string[] = [],
  ) {
    if (!image) {
      throw new Error('image must not be null');
    }
  }

  public apply(builder: DockerExecutionBuilder): void {
    if (this.name) {
      builder.argument('name', this.name);
    }
    builder.optionsWithMultipleValues('volume', this.volumes).positional(this.image);
    for (const token of this.command) {
      builder.positional(token);
    }
  }
}
