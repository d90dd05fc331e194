// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import {GitLfsSynchronizer} from '../../../../src/core/deployment/git-lfs-synchronizer.js';
import {type GitLfsOutcome} from '../../../../src/core/model/git-lfs-outcome.js';
import {RecordingLogger} from '../../../helpers/recording-logger.js';
import {ScriptedShellRunner} from '../../../helpers/scripted-shell-runner.js';
import {testInvocationConfig} from '../../../helpers/test-project.js';

describe('GitLfsSynchronizer', (): void => {
  let logger: RecordingLogger;
  let shell: ScriptedShellRunner;
  let synchronizer: GitLfsSynchronizer;

  beforeEach((): void => {
    logger = new RecordingLogger();
    shell = new ScriptedShellRunner(logger);
    synchronizer = new GitLfsSynchronizer(shell, logger);
  });

  it('should install the hooks and pull inside the project root', async (): Promise<void> => {
    const outcome: GitLfsOutcome = await synchronizer.pull(testInvocationConfig('/work'));

    expect(outcome).to.equal('pulled');
    expect(shell.calls).to.deep.equal(['git lfs version', 'git rev-parse --git-dir', 'git lfs install', 'git lfs pull']);
    expect(shell.workingDirectories).to.deep.equal(['/work', '/work', '/work', '/work']);
  });

  it('should run nothing when disabled', async (): Promise<void> => {
    const outcome: GitLfsOutcome = await synchronizer.pull(testInvocationConfig('/work', {gitLfs: false}));

    expect(outcome).to.equal('skipped');
    expect(shell.calls).to.be.empty;
    expect(logger.messages('info')).to.deep.equal(['Skipping Git LFS operations']);
  });

  it('should warn and go on when git-lfs is missing', async (): Promise<void> => {
    shell.script('git lfs version', {exitCode: 1, stderr: "git: 'lfs' is not a git command."});

    const outcome: GitLfsOutcome = await synchronizer.pull(testInvocationConfig('/work'));

    expect(outcome).to.equal('unavailable');
    expect(shell.calls).to.deep.equal(['git lfs version']);
    expect(logger.messages('warn')).to.deep.equal(['git-lfs is not installed, skipping the pull of large files']);
  });

  it('should not pull outside a git repository', async (): Promise<void> => {
    shell.script('git rev-parse --git-dir', {exitCode: 128, stderr: 'fatal: not a git repository'});

    const outcome: GitLfsOutcome = await synchronizer.pull(testInvocationConfig('/work'));

    expect(outcome).to.equal('not-a-repository');
    expect(shell.calls).to.deep.equal(['git lfs version', 'git rev-parse --git-dir']);
  });

  it('should report a failed pull without throwing', async (): Promise<void> => {
    shell.script('git lfs pull', {exitCode: 2, stderr: 'batch request failed'});

    const outcome: GitLfsOutcome = await synchronizer.pull(testInvocationConfig('/work'));

    expect(outcome).to.equal('failed');
    expect(logger.messages('warn')).to.deep.equal([
      "Git LFS pull failed, continuing anyway: Command exit with error code 2, [command: 'git'], [message: 'batch request failed']",
    ]);
  });
});
