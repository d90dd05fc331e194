// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';

/**
 * Path helpers that always hand back normalized paths.
 */
export class PathEx {
  private constructor() {}

  public static join(...paths: string[]): string {
    return path.normalize(path.join(...paths));
  }

  public static resolve(...paths: string[]): string {
    return path.resolve(...paths);
  }

  /**
   * Returns the final segment of a path, used when reporting which file failed.
   */
  public static basename(filePath: string): string {
    return path.basename(filePath);
  }
}
