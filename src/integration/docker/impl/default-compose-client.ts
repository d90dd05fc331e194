// SPDX-License-Identifier: Apache-2.0

import {lt, SemVer} from 'semver';
import {type ComposeClient} from '../compose-client.js';
import {type ComposeProject} from '../model/compose-project.js';
import {type ExecutionResult} from '../model/execution-result.js';
import {ComposeVersion} from '../model/compose-version.js';
import {type DockerRequest} from '../request/docker-request.js';
import {DockerExecutionBuilder} from '../execution/docker-execution-builder.js';
import {type DockerExecution} from '../execution/docker-execution.js';
import {ComposeVersionRequest} from '../request/compose/compose-version-request.js';
import {ComposeUpRequest} from '../request/compose/compose-up-request.js';
import {ComposeDownRequest, type ComposeDownOptions} from '../request/compose/compose-down-request.js';
import {ComposeConfigRequest} from '../request/compose/compose-config-request.js';
import {ComposePsRequest} from '../request/compose/compose-ps-request.js';
import {ComposeLogsRequest} from '../request/compose/compose-logs-request.js';
import {ComposeVersionRequirementException} from '../errors/compose-version-requirement-exception.js';
import {COMPOSE_VERSION} from '../../../../version.js';

export class DefaultComposeClient implements ComposeClient {
  private static minimumVersion: SemVer = new SemVer(COMPOSE_VERSION);

  /**
   * @param executable `docker` for the plugin, `docker-compose` for the standalone build
   * @param subcommands tokens between the executable and the compose arguments, `compose` for the plugin
   */
  public constructor(
    private readonly executable: string,
    private readonly subcommands: readonly string[] = [],
  ) {
    if (!executable || !executable.trim()) {
      throw new Error('executable must not be blank');
    }
  }

  public get invocation(): string {
    return [this.executable, ...this.subcommands].join(' ');
  }

  public async checkVersion(): Promise<void> {
    const version: SemVer = await this.version();
    if (lt(version, DefaultComposeClient.minimumVersion)) {
      throw new ComposeVersionRequirementException(
        `The compose CLI version ${version} is lower than the minimum required version ${DefaultComposeClient.minimumVersion}.`,
      );
    }
  }

  public async version(): Promise<SemVer> {
    const result: ComposeVersion = await this.execute(new ComposeVersionRequest()).responseAs(ComposeVersion);
    return result.getVersion();
  }

  public async up(project: ComposeProject, build: boolean): Promise<ExecutionResult> {
    return this.execute(new ComposeUpRequest(project, build)).exitStatus();
  }

  public async down(project: ComposeProject, options: ComposeDownOptions): Promise<ExecutionResult> {
    return this.execute(new ComposeDownRequest(project, options)).exitStatus();
  }

  public async config(project: ComposeProject): Promise<ExecutionResult> {
    return this.execute(new ComposeConfigRequest(project)).exitStatus();
  }

  public async ps(project: ComposeProject): Promise<ExecutionResult> {
    return this.execute(new ComposePsRequest(project)).exitStatus();
  }

  public async logs(project: ComposeProject, tail: number): Promise<ExecutionResult> {
    return this.execute(new ComposeLogsRequest(project, tail)).exitStatus();
  }

  private execute(request: DockerRequest): DockerExecution {
    const builder: DockerExecutionBuilder = new DockerExecutionBuilder();
    builder.executable(this.executable);
    if (this.subcommands.length > 0) {
      builder.subcommands(...this.subcommands);
    }
    request.apply(builder);
    return builder.build();
  }
}
