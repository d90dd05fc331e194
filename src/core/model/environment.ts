// SPDX-License-Identifier: Apache-2.0

export const ENVIRONMENTS = ['local', 'test', 'live'] as const;

export type Environment = (typeof ENVIRONMENTS)[number];

export const DEFAULT_ENVIRONMENT: Environment = 'local';

export function isEnvironment(value: unknown): value is Environment {
  return typeof value === 'string' && ENVIRONMENTS.some((environment): boolean => environment === value);
}
