// SPDX-License-Identifier: Apache-2.0

export const LIFECYCLE_ACTIONS = ['validate', 'stop', 'clean', 'restart', 'deploy', 'status'] as const;

export type LifecycleAction = (typeof LIFECYCLE_ACTIONS)[number];

/** What the runner can do to a single service group in one pass */
export type GroupAction = 'validate' | 'stop' | 'clean' | 'deploy' | 'status';

export interface LifecyclePass {
  readonly action: GroupAction;
  /** failures in a tolerant pass never fail the overall action */
  readonly tolerant: boolean;
}

export interface LifecyclePlan {
  readonly action: LifecycleAction;
  readonly passes: readonly LifecyclePass[];
  readonly provisionNetwork: boolean;
}

