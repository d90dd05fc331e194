// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type GrapheneLogger} from '../logging/graphene-logger.js';
import * as constants from '../constants.js';
import {type ShellRunner} from '../shell-runner.js';
import {type InvocationConfig} from '../model/invocation-config.js';
import {type GitLfsOutcome} from '../model/git-lfs-outcome.js';

/**
 * Fetches the large files (genesis documents, snapshots) a project root keeps in Git LFS before services start.
 *
 * Never throws: a missing git-lfs, a root outside a repository or a failed pull is logged and deployment goes on
 * with whatever is checked out.
 */
@injectable()
export class GitLfsSynchronizer {
  private readonly shellRunner: ShellRunner;
  private readonly logger: GrapheneLogger;

  public constructor(
    @inject(InjectTokens.ShellRunner) shellRunner?: ShellRunner,
    @inject(InjectTokens.GrapheneLogger) logger?: GrapheneLogger,
  ) {
    this.shellRunner = patchInject(shellRunner, InjectTokens.ShellRunner, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.GrapheneLogger, this.constructor.name);
  }

  public async pull(config: InvocationConfig): Promise<GitLfsOutcome> {
    if (!config.gitLfs) {
      this.logger.info('Skipping Git LFS operations');
      return 'skipped';
    }

    const root: string = config.rootDirectory;
    if (!(await this.succeeds(['lfs', 'version'], root))) {
      this.logger.warn('git-lfs is not installed, skipping the pull of large files');
      return 'unavailable';
    }

    if (!(await this.succeeds(['rev-parse', '--git-dir'], root))) {
      this.logger.info(`${root} is not a git repository, skipping Git LFS operations`);
      return 'not-a-repository';
    }

    try {
      await this.shellRunner.run(constants.GIT, ['lfs', 'install'], root);
      await this.shellRunner.run(constants.GIT, ['lfs', 'pull'], root);
    } catch (error) {
      this.logger.warn(`Git LFS pull failed, continuing anyway: ${GitLfsSynchronizer.describe(error)}`);
      return 'failed';
    }

    this.logger.info(`pulled Git LFS objects in ${root}`);
    return 'pulled';
  }

  private async succeeds(arguments_: string[], cwd: string): Promise<boolean> {
    try {
      await this.shellRunner.run(constants.GIT, arguments_, cwd);
      return true;
    } catch (error) {
      this.logger.debug(`git ${arguments_.join(' ')} failed: ${GitLfsSynchronizer.describe(error)}`);
      return false;
    }
  }

  private static describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
