// SPDX-License-Identifier: Apache-2.0

import {type Options} from '../../request/options.js';
import {type DockerExecutionBuilder} from '../../execution/docker-execution-builder.js';

/**
 * Options for the `docker build` command.
 */
export class ImageBuildOptions implements Options {
  public constructor(
    public readonly tag: string,
    public readonly dockerfile: string,
    public readonly context: string,
  ) {
    if (!tag) {
      throw new Error('tag must not be null');
    }
    if (!context) {
      throw new Error('context must not be null');
    }
  }

  public apply(builder: DockerExecutionBuilder): void {
    builder.argument('tag', this.tag).argument('file', this.dockerfile).positional(this.context);
  }
}
