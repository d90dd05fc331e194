// SPDX-License-Identifier: Apache-2.0

export type GitLfsOutcome = 'pulled' | 'skipped' | 'unavailable' | 'not-a-repository' | 'failed';
