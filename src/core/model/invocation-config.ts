// SPDX-License-Identifier: Apache-2.0

import {type Environment} from './environment.js';
import {type NodeType} from './node-type.js';

/**
 * Everything a single command invocation needs to know, built once from the command line and handed to every
 * component explicitly.
 */
export interface InvocationConfig {
  readonly rootDirectory: string;
  readonly environment: Environment;
  readonly nodeType: NodeType;
  readonly networkName: string;
  readonly deploymentId: string;
  readonly nodeImage: string;
  readonly build: boolean;
  readonly gitLfs: boolean;
  readonly showLogs: boolean;
  readonly skipNetwork: boolean;
  readonly failFast: boolean;
  readonly force: boolean;
  readonly quiet: boolean;
}
