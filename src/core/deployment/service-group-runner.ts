// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import * as yaml from 'yaml';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type GrapheneLogger} from '../logging/graphene-logger.js';
import * as constants from '../constants.js';
import {DeploymentError} from '../errors/deployment-error.js';
import {type DockerClient} from '../../integration/docker/docker-client.js';
import {type ComposeClient} from '../../integration/docker/compose-client.js';
import {ComposeProject} from '../../integration/docker/model/compose-project.js';
import {type ExecutionResult} from '../../integration/docker/model/execution-result.js';
import {type ContainerSummary} from '../../integration/docker/model/container-list/container-summary.js';
import {type ToolingVerifier} from './tooling-verifier.js';
import {type InvocationConfig} from '../model/invocation-config.js';
import {type ServiceGroup} from '../model/service-group.js';
import {type GroupAction} from '../model/lifecycle-action.js';
import {type GroupResult, type RunnerAction} from '../model/group-result.js';
import {type DeploymentState} from '../model/deployment-state.js';

/**
 * Runs compose against one service group. Compose failures are reported in the returned GroupResult, never thrown.
 */
@injectable()
export class ServiceGroupRunner {
  private readonly docker: DockerClient;
  private readonly toolingVerifier: ToolingVerifier;
  private readonly logger: GrapheneLogger;

  public constructor(
    @inject(InjectTokens.DockerClient) docker?: DockerClient,
    @inject(InjectTokens.ToolingVerifier) toolingVerifier?: ToolingVerifier,
    @inject(InjectTokens.GrapheneLogger) logger?: GrapheneLogger,
  ) {
    this.docker = patchInject(docker, InjectTokens.DockerClient, this.constructor.name);
    this.toolingVerifier = patchInject(toolingVerifier, InjectTokens.ToolingVerifier, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.GrapheneLogger, this.constructor.name);
  }

  public async run(action: GroupAction, group: ServiceGroup, config: InvocationConfig): Promise<GroupResult> {
    switch (action) {
      case 'deploy': {
        return this.deploy(group, config);
      }
      case 'stop': {
        return this.stop(group);
      }
      case 'clean': {
        return this.clean(group);
      }
      case 'validate': {
        return this.validate(group);
      }
      case 'status': {
        return this.status(group);
      }
    }
  }

  /**
   * Tears down leftovers of a previous run, then starts the group detached.
   */
  public async deploy(group: ServiceGroup, config: InvocationConfig): Promise<GroupResult> {
    const compose: ComposeClient = await this.toolingVerifier.composeClient();
    const project: ComposeProject = ServiceGroupRunner.project(group);

    const down: ExecutionResult = await compose.down(project, {volumes: false, removeOrphans: true});
    if (!down.succeeded) {
      this.logger.debug(`ignoring failed teardown of ${group.name} before deploy: exit code ${down.exitCode}`);
    }

    const up: ExecutionResult = await compose.up(project, config.build);
    if (!up.succeeded) {
      return this.failed(group, 'deploy', up, `failed to start ${group.name}`);
    }

    const ps: ExecutionResult = await compose.ps(project);
    return this.succeeded(group, 'deploy', ps.outputLines());
  }

  public async stop(group: ServiceGroup): Promise<GroupResult> {
    const compose: ComposeClient = await this.toolingVerifier.composeClient();
    const down: ExecutionResult = await compose.down(ServiceGroupRunner.project(group), {
      volumes: false,
      removeOrphans: true,
    });
    if (!down.succeeded) {
      return this.failed(group, 'stop', down, `failed to stop ${group.name}`);
    }
    return this.succeeded(group, 'stop', down.outputLines());
  }

  /**
   * Stops the group, then removes its volumes as long as nothing of the project is still running.
   */
  public async clean(group: ServiceGroup): Promise<GroupResult> {
    const compose: ComposeClient = await this.toolingVerifier.composeClient();
    const project: ComposeProject = ServiceGroupRunner.project(group);

    const down: ExecutionResult = await compose.down(project, {volumes: false, removeOrphans: true});
    if (!down.succeeded) {
      this.logger.warn(`stopping ${group.name} before clean exited with code ${down.exitCode}`);
    }

    let state: DeploymentState;
    try {
      state = await this.state(group);
    } catch (error) {
      return {
        group: group.name,
        action: 'clean',
        status: 'failed',
        output: [],
        error: new DeploymentError(
          `could not determine the state of ${group.name}, volumes kept`,
          group.name,
          'docker ps',
          error instanceof Error ? error : undefined,
        ),
      };
    }

    if (state === 'running') {
      return {
        group: group.name,
        action: 'clean',
        status: 'failed',
        output: down.outputLines(),
        state,
        error: new DeploymentError(
          `${group.name} still has running containers, volumes kept`,
          group.name,
          down.commandLine,
        ),
      };
    }

    const purge: ExecutionResult = await compose.down(project, {volumes: true, removeOrphans: true});
    if (!purge.succeeded) {
      return this.failed(group, 'clean', purge, `failed to remove volumes of ${group.name}`);
    }
    return {...this.succeeded(group, 'clean', purge.outputLines()), state: 'absent'};
  }

  public async validate(group: ServiceGroup): Promise<GroupResult> {
    const compose: ComposeClient = await this.toolingVerifier.composeClient();
    const config: ExecutionResult = await compose.config(ServiceGroupRunner.project(group));
    if (!config.succeeded) {
      return this.failed(
        group,
        'validate',
        config,
        `compose configuration of ${group.name} is invalid`,
        constants.VALIDATE_OUTPUT_MAX_LINES,
      );
    }
    const services: string[] = this.serviceNames(group, config.standardOutput);
    this.logger.debug(`compose configuration of ${group.name} is valid`);
    return this.succeeded(
      group,
      'validate',
      services.map((service): string => `service ${service}`),
    );
  }

  public async status(group: ServiceGroup): Promise<GroupResult> {
    const compose: ComposeClient = await this.toolingVerifier.composeClient();
    let state: DeploymentState;
    try {
      state = await this.state(group);
    } catch (error) {
      return {
        group: group.name,
        action: 'status',
        status: 'failed',
        output: [],
        error: new DeploymentError(
          `could not determine the state of ${group.name}`,
          group.name,
          'docker ps',
          error instanceof Error ? error : undefined,
        ),
      };
    }

    const ps: ExecutionResult = await compose.ps(ServiceGroupRunner.project(group));
    return {...this.succeeded(group, 'status', ps.outputLines()), state};
  }

  public async logs(group: ServiceGroup, tail: number = constants.DEFAULT_LOG_TAIL): Promise<GroupResult> {
    const compose: ComposeClient = await this.toolingVerifier.composeClient();
    const logs: ExecutionResult = await compose.logs(ServiceGroupRunner.project(group), tail);
    if (!logs.succeeded) {
      return this.failed(group, 'logs', logs, `failed to read logs of ${group.name}`);
    }
    return this.succeeded(group, 'logs', logs.outputLines());
  }

  /**
   * Observes the group's containers through the compose project label.
   */
  public async state(group: ServiceGroup): Promise<DeploymentState> {
    const containers: ContainerSummary[] = await this.docker.listContainers([
      `label=${constants.COMPOSE_PROJECT_LABEL}=${group.projectName}`,
    ]);
    if (containers.length === 0) {
      return 'absent';
    }
    return containers.some((container): boolean => container.running) ? 'running' : 'stopped';
  }

  /**
   * Names of the services in the resolved compose document printed by `compose config`.
   */
  private serviceNames(group: ServiceGroup, document: string): string[] {
    let parsed: unknown;
    try {
      parsed = yaml.parse(document);
    } catch (error) {
      this.logger.debug(`could not read the resolved configuration of ${group.name}`, error);
      return [];
    }
    if (typeof parsed !== 'object' || parsed === null || !('services' in parsed)) {
      return [];
    }
    const services: unknown = parsed.services;
    return typeof services === 'object' && services !== null ? Object.keys(services) : [];
  }

  private static project(group: ServiceGroup): ComposeProject {
    return new ComposeProject(group.composeFile, group.envFiles, group.projectName);
  }

  private succeeded(group: ServiceGroup, action: RunnerAction, output: string[]): GroupResult {
    return {group: group.name, action, status: 'succeeded', output};
  }

  private failed(
    group: ServiceGroup,
    action: RunnerAction,
    result: ExecutionResult,
    message: string,
    maxLines?: number,
  ): GroupResult {
    const output: string[] = maxLines === undefined ? result.outputLines() : result.outputLines().slice(0, maxLines);
    const error: DeploymentError = new DeploymentError(
      `${message} (exit code ${result.exitCode})`,
      group.name,
      result.commandLine,
    );
    this.logger.error({group: group.name, command: result.commandLine, output}, error.message);
    return {group: group.name, action, status: 'failed', output, error};
  }
}
