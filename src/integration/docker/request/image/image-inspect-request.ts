// SPDX-License-Identifier: Apache-2.0

import {type DockerRequest} from '../docker-request.js';
import {type DockerExecutionBuilder} from '../../execution/docker-execution-builder.js';

export class ImageInspectRequest implements DockerRequest {
  public constructor(private readonly image: string) {
    if (!image) {
      throw new Error('image must not be null');
    }
  }

  public apply(builder: DockerExecutionBuilder): void {
    builder.subcommands('image', 'inspect').argument('format', '{{.Id}}').positional(this.image);
  }
}
