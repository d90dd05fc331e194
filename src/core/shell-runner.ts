// SPDX-License-Identifier: Apache-2.0

import {spawn, type SpawnOptions} from 'node:child_process';
import {inject, injectable} from 'tsyringe-neo';
import {type GrapheneLogger} from './logging/graphene-logger.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {type ProcessHandle} from '../integration/docker/execution/docker-execution.js';

@injectable()
export class ShellRunner {
  private readonly logger: GrapheneLogger;

  public constructor(@inject(InjectTokens.GrapheneLogger) logger?: GrapheneLogger) {
    this.logger = patchInject(logger, InjectTokens.GrapheneLogger, this.constructor.name);
  }

  /**
   * Runs a command without a shell and resolves with the non-empty lines it printed on stdout.
   * @param cwd - working directory of the command, the current one when omitted
   * @throws Error when the command cannot be started or exits with a non-zero code
   */
  public async run(command: string, arguments_: string[] = [], cwd?: string): Promise<string[]> {
    const message: string = `Executing command: '${command}' ${arguments_.join(' ')}`;
    const callStack: string | undefined = new Error(message).stack; // reported instead of the handler's stack
    this.logger.debug(message);

    return new Promise<string[]>((resolve, reject): void => {
      const child: ProcessHandle = this.launch(command, arguments_, {cwd, stdio: ['ignore', 'pipe', 'pipe']});

      const output: string[] = [];
      child.stdout?.on('data', (data: Buffer | string): void => {
        ShellRunner.collect(data, output);
      });

      const errorOutput: string[] = [];
      child.stderr?.on('data', (data: Buffer | string): void => {
        ShellRunner.collect(data, errorOutput);
      });

      let settled: boolean = false;

      child.once('error', (error: Error): void => {
        settled = true;
        this.logger.error(`Failed to start: '${command}'`, {error: {message: error.message}});
        reject(new Error(`Failed to start command '${command}': ${error.message}`));
      });

      child.once('close', (code: number | null): void => {
        if (settled) {
          return;
        }
        settled = true;

        if (code !== 0) {
          const error: Error = new Error(
            `Command exit with error code ${code}, [command: '${command}'], [message: '${errorOutput.join('\n')}']`,
          );
          if (callStack) {
            error.stack = callStack;
          }

          this.logger.error(`Error executing: '${command}'`, {
            commandExitCode: code,
            commandOutput: output,
            errOutput: errorOutput,
          });
          reject(error);
          return;
        }

        this.logger.debug(
          `Finished executing: '${command}', ${JSON.stringify({commandExitCode: code, commandOutput: output})}`,
        );
        resolve(output);
      });
    });
  }

  protected launch(command: string, arguments_: string[], options: SpawnOptions): ProcessHandle {
    return spawn(command, arguments_, options);
  }

  private static collect(data: Buffer | string, lines: string[]): void {
    for (const item of data.toString().split(/\r?\n/)) {
      if (item.trim()) {
        lines.push(item.trim());
      }
    }
  }
}
