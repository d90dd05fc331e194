// SPDX-License-Identifier: Apache-2.0

import {type DockerRequest} from '../docker-request.js';
import {type DockerExecutionBuilder} from '../../execution/docker-execution-builder.js';
import {type ImageBuildOptions} from '../../model/image-build/image-build-options.js';

/**
 * A request to build an image from a Dockerfile.
 */
export class ImageBuildRequest implements DockerRequest {
  public constructor(private readonly options: ImageBuildOptions) {}

  public apply(builder: DockerExecutionBuilder): void {
    builder.subcommands('build');
    this.options.apply(builder);
  }
}
