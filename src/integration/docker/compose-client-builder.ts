// SPDX-License-Identifier: Apache-2.0

import {type ComposeClient} from './compose-client.js';

/**
 * ComposeClientBuilder is used to construct instances of ComposeClient.
 *
 * @implNote The build() method detects which compose flavour is installed and verifies its version.
 * @see ComposeClient
 */
export interface ComposeClientBuilder {
  /**
   * @throws ToolingError if no compose executable answers
   * @throws ComposeVersionRequirementException if the compose version does not meet the required version
   */
  build(): Promise<ComposeClient>;
}
