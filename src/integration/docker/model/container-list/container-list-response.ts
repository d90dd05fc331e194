// SPDX-License-Identifier: Apache-2.0

import {ContainerSummary} from './container-summary.js';

/**
 * Parses `docker ps --format '{{json .}}'` output, one JSON document per line.
 */
export class ContainerListResponse {
  private readonly _containers: ContainerSummary[] = [];

  public constructor(rawOutput: string) {
    for (const line of rawOutput.split(/\r?\n/)) {
      if (!line.trim()) {
        continue;
      }
      const parsed: unknown = JSON.parse(line);
      if (typeof parsed !== 'object' || parsed === null) {
        throw new Error(`unexpected container entry: ${line}`);
      }
      const name: unknown = 'Names' in parsed ? parsed.Names : undefined;
      const state: unknown = 'State' in parsed ? parsed.State : undefined;
      if (typeof name !== 'string' || typeof state !== 'string') {
        throw new TypeError(`container entry without name or state: ${line}`);
      }
      this._containers.push(new ContainerSummary(name, state));
    }
  }

  public get containers(): ContainerSummary[] {
    return this._containers;
  }
}
