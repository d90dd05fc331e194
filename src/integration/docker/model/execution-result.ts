// SPDX-License-Identifier: Apache-2.0

/**
 * Exit code and captured output of a finished process.
 */
export class ExecutionResult {
  public constructor(
    public readonly exitCode: number,
    public readonly standardOutput: string,
    public readonly standardError: string,
    /** the command line that produced this result */
    public readonly commandLine: string = '',
  ) {}

  public get succeeded(): boolean {
    return this.exitCode === 0;
  }

  /**
   * Non-empty output lines, standard output first.
   */
  public outputLines(): string[] {
    return [...this.standardOutput.split(/\r?\n/), ...this.standardError.split(/\r?\n/)].filter(
      (line): boolean => line.trim() !== '',
    );
  }
}
