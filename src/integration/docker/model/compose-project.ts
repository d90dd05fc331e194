// SPDX-License-Identifier: Apache-2.0

import {type Options} from '../request/options.js';
import {type DockerExecutionBuilder} from '../execution/docker-execution-builder.js';

/**
 * The global compose options that select one project: its file, its layered env files and its name.
 */
export class ComposeProject implements Options {
  public constructor(
    public readonly composeFile: string,
    public readonly envFiles: readonly string[],
    public readonly projectName: string,
  ) {
    if (!composeFile) {
      throw new Error('composeFile must not be null');
    }
    if (!projectName) {
      throw new Error('projectName must not be null');
    }
  }

  public apply(builder: DockerExecutionBuilder): void {
    builder
      .argument('file', this.composeFile)
      .optionsWithMultipleValues('env-file', this.envFiles)
      .argument('project-name', this.projectName);
  }
}
