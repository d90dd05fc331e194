// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type DockerClient} from '../docker-client.js';
import {type DockerRequest} from '../request/docker-request.js';
import {DockerExecutionBuilder} from '../execution/docker-execution-builder.js';
import {type DockerExecution} from '../execution/docker-execution.js';
import {type ExecutionResult} from '../model/execution-result.js';
import {InfoRequest} from '../request/info-request.js';
import {ImageInspectRequest} from '../request/image/image-inspect-request.js';
import {ImageBuildRequest} from '../request/image/image-build-request.js';
import {type ImageBuildOptions} from '../model/image-build/image-build-options.js';
import {NetworkInspectRequest} from '../request/network/network-inspect-request.js';
import {NetworkCreateRequest} from '../request/network/network-create-request.js';
import {ContainerRunRequest} from '../request/container/container-run-request.js';
import {type ContainerRunOptions} from '../model/container-run/container-run-options.js';
import {ContainerRunResponse} from '../model/container-run/container-run-response.js';
import {ContainerCopyRequest} from '../request/container/container-copy-request.js';
import {ContainerRemoveRequest} from '../request/container/container-remove-request.js';
import {ContainerListRequest} from '../request/container/container-list-request.js';
import {ContainerListResponse} from '../model/container-list/container-list-response.js';
import {type ContainerSummary} from '../model/container-list/container-summary.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';

@injectable()
export class DefaultDockerClient implements DockerClient {
  private readonly executable: string;

  public constructor(@inject(InjectTokens.DockerExecutable) executable?: string) {
    this.executable = patchInject(executable, InjectTokens.DockerExecutable, this.constructor.name);
    if (!this.executable.trim()) {
      throw new Error('executable must not be blank');
    }
  }

  public async info(): Promise<void> {
    await this.execute(new InfoRequest()).call();
  }

  public async imageExists(image: string): Promise<boolean> {
    const result: ExecutionResult = await this.execute(new ImageInspectRequest(image)).exitStatus();
    return result.succeeded;
  }

  public async buildImage(options: ImageBuildOptions): Promise<void> {
    await this.execute(new ImageBuildRequest(options)).call();
  }

  public async networkExists(networkName: string): Promise<boolean> {
    const result: ExecutionResult = await this.execute(new NetworkInspectRequest(networkName)).exitStatus();
    return result.succeeded;
  }

  public async createNetwork(networkName: string): Promise<void> {
    await this.execute(new NetworkCreateRequest(networkName)).call();
  }

  public async runContainer(options: ContainerRunOptions): Promise<ContainerRunResponse> {
    return this.execute(new ContainerRunRequest(options)).responseAs(ContainerRunResponse);
  }

  public async copyFromContainer(containerName: string, containerPath: string, destinationPath: string): Promise<void> {
    await this.execute(new ContainerCopyRequest(containerName, containerPath, destinationPath)).call();
  }

  public async removeContainer(containerName: string): Promise<void> {
    await this.execute(new ContainerRemoveRequest(containerName)).call();
  }

  public async listContainers(filters: readonly string[] = []): Promise<ContainerSummary[]> {
    const response: ContainerListResponse = await this.execute(new ContainerListRequest(filters)).responseAs(
      ContainerListResponse,
    );
    return response.containers;
  }

  private execute(request: DockerRequest): DockerExecution {
    const builder: DockerExecutionBuilder = new DockerExecutionBuilder();
    builder.executable(this.executable);
    request.apply(builder);
    return builder.build();
  }
}
