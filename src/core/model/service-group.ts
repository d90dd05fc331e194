// SPDX-License-Identifier: Apache-2.0

/** Declared order is the order in which every lifecycle pass visits the groups */
export const SERVICE_ROLES = ['validator', 'sentry'] as const;

export type ServiceRole = (typeof SERVICE_ROLES)[number];

export type ServiceGroupName = `${ServiceRole}-group`;

/**
 * One independently composed set of services.
 *
 * Env files are layered: the common file first, then the role file, then the optional local override. Later files
 * win when they define the same variable.
 */
export interface ServiceGroup {
  readonly name: ServiceGroupName;
  readonly role: ServiceRole;
  readonly composeFile: string;
  readonly envFiles: readonly string[];
  readonly projectName: string;
}
