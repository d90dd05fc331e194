// SPDX-License-Identifier: Apache-2.0

import {type DeploymentError} from '../errors/deployment-error.js';
import {type DeploymentState} from './deployment-state.js';
import {type GroupAction} from './lifecycle-action.js';
import {type ServiceGroupName} from './service-group.js';

export type GroupStatus = 'succeeded' | 'failed' | 'skipped';

export type RunnerAction = GroupAction | 'logs';

export interface GroupResult {
  readonly group: ServiceGroupName;
  readonly action: RunnerAction;
  readonly status: GroupStatus;
  /** output of the last compose command run for the group, one entry per line */
  readonly output: readonly string[];
  readonly state?: DeploymentState;
  readonly error?: DeploymentError;
}

export interface LifecycleOutcome {
  readonly succeeded: boolean;
  readonly results: readonly GroupResult[];
  /** recent log lines per group, collected after a successful deploy when asked for */
  readonly logs?: readonly GroupResult[];
}
