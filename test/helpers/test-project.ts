// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import os from 'node:os';
import {PathEx} from '../../src/business/utils/path-ex.js';
import {Templates} from '../../src/core/templates.js';
import {type Environment} from '../../src/core/model/environment.js';
import {type NodeType} from '../../src/core/model/node-type.js';
import {type InvocationConfig} from '../../src/core/model/invocation-config.js';

export function createTemporaryRoot(): string {
  return fs.mkdtempSync(PathEx.join(os.tmpdir(), 'graphene-test-'));
}

export function removeTemporaryRoot(rootDirectory: string): void {
  fs.rmSync(rootDirectory, {recursive: true, force: true});
}

/**
 * Writes the compose and env files an environment needs; `omit` leaves out the listed paths, relative to the root.
 */
export function writeDeploymentFiles(
  rootDirectory: string,
  environment: Environment,
  options: {omit?: string[]; localOverride?: boolean} = {},
): void {
  const files: string[] = [
    PathEx.join('services', 'docker.compose.validator.yml'),
    PathEx.join('services', 'docker.compose.sentry.yml'),
    PathEx.join('config', 'env', environment, '.env.common'),
    PathEx.join('config', 'env', environment, '.env.validator'),
    PathEx.join('config', 'env', environment, '.env.sentry'),
  ];
  if (options.localOverride) {
    files.push(PathEx.join('config', 'env', environment, '.env.local'));
  }

  const omitted: Set<string> = new Set((options.omit ?? []).map((file): string => PathEx.join(file)));
  for (const file of files) {
    if (omitted.has(file)) {
      continue;
    }
    const target: string = PathEx.join(rootDirectory, file);
    fs.mkdirSync(PathEx.join(target, '..'), {recursive: true});
    fs.writeFileSync(target, file.endsWith('.yml') ? 'services: {}\n' : 'CHAIN_ID=graphene-test\n');
  }
}

export function testInvocationConfig(
  rootDirectory: string,
  overrides: Partial<InvocationConfig> & {environment?: Environment; nodeType?: NodeType} = {},
): InvocationConfig {
  const environment: Environment = overrides.environment ?? 'local';
  return {
    rootDirectory,
    environment,
    nodeType: 'validator',
    networkName: Templates.renderNetworkName(environment),
    deploymentId: Templates.renderDeploymentId(environment),
    nodeImage: Templates.renderNodeImage(environment),
    build: true,
    gitLfs: true,
    showLogs: false,
    skipNetwork: false,
    failFast: false,
    force: false,
    quiet: true,
    ...overrides,
  };
}
