// SPDX-License-Identifier: Apache-2.0

/** Observed from the container runtime on every query */
export type DeploymentState = 'absent' | 'running' | 'stopped';
