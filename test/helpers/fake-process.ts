// SPDX-License-Identifier: Apache-2.0

import {EventEmitter} from 'node:events';
import {PassThrough} from 'node:stream';
import {type ProcessHandle, type ProcessLauncher} from '../../src/integration/docker/execution/docker-execution.js';

export interface ScriptedRun {
  exitCode: number;
  stdout?: string;
  stderr?: string;
  /** emit a spawn error instead of output */
  launchError?: Error;
}

export class FakeProcess extends EventEmitter implements ProcessHandle {
  public readonly stdout: PassThrough = new PassThrough();
  public readonly stderr: PassThrough = new PassThrough();
}

/**
 * A launcher that plays back the given run and records every command line it was asked to start.
 */
export function scriptedLauncher(run: ScriptedRun, calls: string[][] = []): ProcessLauncher {
  return (command: string, arguments_: string[]): ProcessHandle => {
    calls.push([command, ...arguments_]);
    const child: FakeProcess = new FakeProcess();

    setImmediate((): void => {
      if (run.launchError) {
        child.emit('error', run.launchError);
        return;
      }
      if (run.stdout) {
        child.stdout.write(run.stdout);
      }
      if (run.stderr) {
        child.stderr.write(run.stderr);
      }
      child.stdout.end();
      child.stderr.end();
      setImmediate((): void => {
        child.emit('close', run.exitCode);
      });
    });

    return child;
  };
}
