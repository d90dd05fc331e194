// SPDX-License-Identifier: Apache-2.0

import {type InvocationConfig} from '../../../core/model/invocation-config.js';
import {type LifecyclePlan} from '../../../core/model/lifecycle-action.js';
import {type ResolvedConfiguration} from '../../../core/deployment/config-resolver.js';
import {type NetworkOutcome} from '../../../core/model/network-outcome.js';
import {type GitLfsOutcome} from '../../../core/model/git-lfs-outcome.js';
import {type GroupResult, type LifecycleOutcome} from '../../../core/model/group-result.js';

export interface DeploymentCommandContext {
  config: InvocationConfig;
  plan: LifecyclePlan;
  resolved: ResolvedConfiguration;
  gitLfs?: GitLfsOutcome;
  network?: NetworkOutcome;
  /** one entry per pass of the plan, in plan order */
  passResults: GroupResult[][];
  outcome?: LifecycleOutcome;
}
