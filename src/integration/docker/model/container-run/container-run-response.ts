// SPDX-License-Identifier: Apache-2.0

export class ContainerRunResponse {
  private readonly _lines: string[];

  public constructor(rawOutput: string) {
    this._lines = rawOutput.split(/\r?\n/).filter((line): boolean => line.trim() !== '');
  }

  public get lines(): string[] {
    return this._lines;
  }

  /**
   * The last non-empty line, which is where the node tool prints its answer after any log noise.
   */
  public get lastLine(): string | undefined {
    return this._lines.at(-1)?.trim();
  }
}
