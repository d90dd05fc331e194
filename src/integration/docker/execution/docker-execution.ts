// SPDX-License-Identifier: Apache-2.0

import {spawn, type SpawnOptions} from 'node:child_process';
import {type EventEmitter} from 'node:events';
import {type Readable} from 'node:stream';
import {DockerExecutionException} from '../errors/docker-execution-exception.js';
import {ExecutionResult} from '../model/execution-result.js';

/**
 * The parts of a spawned child process an execution listens to.
 */
export interface ProcessHandle extends EventEmitter {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
}

export type ProcessLauncher = (command: string, arguments_: string[], options: SpawnOptions) => ProcessHandle;

/**
 * Exit code used when the executable could not be started at all.
 */
export const LAUNCH_FAILURE_EXIT_CODE: number = 127;

/**
 * Represents the execution of a docker command and is responsible for parsing the response.
 *
 * The process is started on construction and its output is captured from then on.
 */
export class DockerExecution {
  private static readonly MSG_DESERIALIZATION_ERROR: string =
    'Failed to deserialize the output into the specified class: %s';

  private rawOutput: string = '';
  private rawErrOutput: string = '';
  private exitCodeValue: number | null = null;
  private readonly completion: Promise<ExecutionResult>;

  /**
   * Creates a new DockerExecution instance.
   * @param command the executable followed by its arguments
   * @param launcher starts the process
   */
  public constructor(
    private readonly command: string[],
    launcher: ProcessLauncher = spawn,
  ) {
    const [executable, ...arguments_] = command;
    if (!executable) {
      throw new Error('command must not be empty');
    }

    const options: SpawnOptions = {stdio: ['ignore', 'pipe', 'pipe']};

    this.completion = new Promise<ExecutionResult>((resolve): void => {
      const child: ProcessHandle = launcher(executable, arguments_, options);
      child.stdout?.on('data', (data: Buffer | string): void => {
        this.rawOutput += data.toString();
      });
      child.stderr?.on('data', (data: Buffer | string): void => {
        this.rawErrOutput += data.toString();
      });

      child.once('error', (error: Error): void => {
        this.rawErrOutput += `${error.message}\n`;
        this.exitCodeValue = LAUNCH_FAILURE_EXIT_CODE;
        resolve(this.result());
      });

      child.once('close', (code: number | null): void => {
        if (this.exitCodeValue === null) {
          this.exitCodeValue = code ?? 1;
        }
        resolve(this.result());
      });
    });
  }

  /**
   * The command line as it would be typed in a shell, used in logs and error messages.
   */
  public commandLine(): string {
    return this.command.join(' ');
  }

  /**
   * Waits for the process to complete, whatever its exit code.
   */
  public async exitStatus(): Promise<ExecutionResult> {
    return this.completion;
  }

  /**
   * Waits for the process to complete.
   * @throws DockerExecutionException if the process exits with a non-zero code
   */
  public async waitFor(): Promise<void> {
    const result: ExecutionResult = await this.completion;
    if (!result.succeeded) {
      throw new DockerExecutionException(
        result.exitCode,
        `Process exited with code ${result.exitCode}: ${this.commandLine()}`,
        result.standardOutput,
        result.standardError,
      );
    }
  }

  /**
   * Gets the exit code of the process.
   * @returns The exit code or null if the process hasn't completed
   */
  public exitCode(): number | null {
    return this.exitCodeValue;
  }

  /**
   * Gets the standard output of the process.
   * @returns non-empty lines joined with a newline
   */
  public standardOutput(): string {
    return DockerExecution.lines(this.rawOutput);
  }

  public standardError(): string {
    return DockerExecution.lines(this.rawErrOutput);
  }

  /**
   * Gets the response as a parsed object, built from the standard output of a successful run.
   * @param responseClass The class to parse the response into
   */
  public async responseAs<T>(responseClass: new (output: string) => T): Promise<T> {
    await this.waitFor();

    try {
      return new responseClass(this.standardOutput());
    } catch (error) {
      throw new DockerExecutionException(
        0,
        DockerExecution.MSG_DESERIALIZATION_ERROR.replace('%s', responseClass.name),
        this.standardOutput(),
        this.standardError(),
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Executes the command and waits for completion.
   */
  public async call(): Promise<void> {
    await this.waitFor();
  }

  private static lines(raw: string): string {
    return raw
      .split(/\r?\n/)
      .map((line): string => line.trimEnd())
      .filter((line): boolean => line.trim() !== '')
      .join('\n');
  }

  private result(): ExecutionResult {
    return new ExecutionResult(
      this.exitCodeValue ?? 1,
      this.standardOutput(),
      this.standardError(),
      this.commandLine(),
    );
  }
}
