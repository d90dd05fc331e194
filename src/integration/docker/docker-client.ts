// SPDX-License-Identifier: Apache-2.0

import {type ContainerRunOptions} from './model/container-run/container-run-options.js';
import {type ContainerRunResponse} from './model/container-run/container-run-response.js';
import {type ContainerSummary} from './model/container-list/container-summary.js';
import {type ImageBuildOptions} from './model/image-build/image-build-options.js';

/**
 * The DockerClient is a bridge between TypeScript and the docker CLI. Each method maps onto one docker
 * sub-command; failures surface as DockerExecutionException.
 */
export interface DockerClient {
  /**
   * Verifies the daemon answers.
   * @throws DockerExecutionException if the daemon cannot be reached
   */
  info(): Promise<void>;

  imageExists(image: string): Promise<boolean>;

  buildImage(options: ImageBuildOptions): Promise<void>;

  networkExists(networkName: string): Promise<boolean>;

  createNetwork(networkName: string): Promise<void>;

  /**
   * Runs a container in the foreground and returns its standard output once it exits.
   */
  runContainer(options: ContainerRunOptions): Promise<ContainerRunResponse>;

  copyFromContainer(containerName: string, containerPath: string, destinationPath: string): Promise<void>;

  /**
   * Removes a container whatever its state.
   */
  removeContainer(containerName: string): Promise<void>;

  /**
   * Lists containers in every state.
   * @param filters values for `--filter`, e.g. `label=com.docker.compose.project=demo`
   */
  listContainers(filters?: readonly string[]): Promise<ContainerSummary[]>;
}
