// SPDX-License-Identifier: Apache-2.0

export const NODE_TYPES = ['validator', 'full', 'seed'] as const;

/** Role a node plays in the consensus network; only validators sign blocks */
export type NodeType = (typeof NODE_TYPES)[number];

export const DEFAULT_NODE_TYPE: NodeType = 'validator';

export function isNodeType(value: unknown): value is NodeType {
  return typeof value === 'string' && NODE_TYPES.some((nodeType): boolean => nodeType === value);
}
