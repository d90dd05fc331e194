// SPDX-License-Identifier: Apache-2.0

export type NetworkOutcome = 'created' | 'exists' | 'skipped';
