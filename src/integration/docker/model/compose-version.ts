// SPDX-License-Identifier: Apache-2.0

import {SemVer} from 'semver';

export class ComposeVersion {
  private readonly _version: SemVer;

  public constructor(response: string) {
    // `docker compose version --short` prints "2.29.1", older standalone builds print "v2.17.3" or a banner
    const match: RegExpMatchArray | null = response.match(/v?(\d+\.\d+\.\d+)/);
    if (!match) {
      throw new Error(`unrecognized compose version output: ${response}`);
    }
    this._version = new SemVer(match[1]);
  }

  public getVersion(): SemVer {
    return this._version;
  }
}
