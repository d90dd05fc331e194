// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import {RecordingLogger} from '../../helpers/recording-logger.js';
import {ScriptedShellRunner} from '../../helpers/scripted-shell-runner.js';

describe('ShellRunner', (): void => {
  let runner: ScriptedShellRunner;

  beforeEach((): void => {
    runner = new ScriptedShellRunner(new RecordingLogger());
  });

  it('should resolve with the trimmed non-empty stdout lines', async (): Promise<void> => {
    runner.script('git lfs version', {exitCode: 0, stdout: 'git-lfs/3.4.0\n\n  extra  \n'});

    const output: string[] = await runner.run('git', ['lfs', 'version'], '/work');

    expect(output).to.deep.equal(['git-lfs/3.4.0', 'extra']);
    expect(runner.calls).to.deep.equal(['git lfs version']);
    expect(runner.workingDirectories).to.deep.equal(['/work']);
  });

  it('should reject with the exit code and stderr of a failed command', async (): Promise<void> => {
    runner.script('git lfs pull', {exitCode: 2, stderr: 'batch request failed\n'});

    try {
      await runner.run('git', ['lfs', 'pull']);
      expect.fail('Should have thrown an error');
    } catch (error) {
      expect(error).to.be.instanceOf(Error);
      if (error instanceof Error) {
        expect(error.message).to.equal(
          "Command exit with error code 2, [command: 'git'], [message: 'batch request failed']",
        );
      }
    }
  });

  it('should reject when the command cannot be started', async (): Promise<void> => {
    runner.script('git lfs version', {exitCode: 0, launchError: new Error('spawn git ENOENT')});

    try {
      await runner.run('git', ['lfs', 'version']);
      expect.fail('Should have thrown an error');
    } catch (error) {
      expect(error).to.be.instanceOf(Error);
      if (error instanceof Error) {
        expect(error.message).to.equal("Failed to start command 'git': spawn git ENOENT");
      }
    }
  });
});
