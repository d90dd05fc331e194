// SPDX-License-Identifier: Apache-2.0

import {type SemVer} from 'semver';
import {type ComposeProject} from './model/compose-project.js';
import {type ExecutionResult} from './model/execution-result.js';
import {type ComposeDownOptions} from './request/compose/compose-down-request.js';

/**
 * A bridge to either the compose plugin (`docker compose`) or the standalone `docker-compose` executable.
 *
 * Project commands report their exit status instead of throwing, since callers decide per action whether a
 * failure matters.
 */
export interface ComposeClient {
  /**
   * The executable and any sub-command that selects compose, e.g. `docker compose`.
   */
  readonly invocation: string;

  version(): Promise<SemVer>;

  /**
   * @throws ComposeVersionRequirementException if the compose version is lower than the supported minimum
   */
  checkVersion(): Promise<void>;

  up(project: ComposeProject, build: boolean): Promise<ExecutionResult>;

  down(project: ComposeProject, options: ComposeDownOptions): Promise<ExecutionResult>;

  config(project: ComposeProject): Promise<ExecutionResult>;

  ps(project: ComposeProject): Promise<ExecutionResult>;

  logs(project: ComposeProject, tail: number): Promise<ExecutionResult>;
}
