// SPDX-License-Identifier: Apache-2.0

import {fileURLToPath} from 'node:url';
import path from 'node:path';
import fs from 'node:fs';
import {PathEx} from './src/business/utils/path-ex.js';

/**
 * This file should only contain versions for dependencies and the function to get the Graphene version.
 */

// several --env-file flags on one compose invocation need at least this release
export const COMPOSE_VERSION: string = '2.17.0';

export function getGrapheneVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }

  const __filename: string = fileURLToPath(import.meta.url);
  const __dirname: string = path.dirname(__filename);

  // next to the sources when run through tsx, one level up when run from dist/
  for (const candidate of [PathEx.resolve(__dirname, 'package.json'), PathEx.resolve(__dirname, '..', 'package.json')]) {
    if (fs.existsSync(candidate)) {
      const packageJson: unknown = JSON.parse(fs.readFileSync(candidate, 'utf8'));
      if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
        return String(packageJson.version);
      }
    }
  }

  return '0.0.0';
}
