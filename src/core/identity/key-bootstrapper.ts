// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type GrapheneLogger} from '../logging/graphene-logger.js';
import * as constants from '../constants.js';
import {Templates} from '../templates.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {BootstrapError} from '../errors/bootstrap-error.js';
import {ConfigurationError} from '../errors/configuration-error.js';
import {ToolingError} from '../errors/tooling-error.js';
import {type DockerClient} from '../../integration/docker/docker-client.js';
import {ImageBuildOptions} from '../../integration/docker/model/image-build/image-build-options.js';
import {ContainerRunOptionsBuilder} from '../../integration/docker/model/container-run/container-run-options-builder.js';
import {type ContainerRunResponse} from '../../integration/docker/model/container-run/container-run-response.js';
import {type KeyMaterialCodec} from './key-material-codec.js';
import {type KeyMaterialPresenter} from './key-material-presenter.js';
import {type InvocationConfig} from '../model/invocation-config.js';
import {type KeyMaterial, type ValidatorIdentity} from '../model/key-material.js';
import {type BootstrapCreated, type BootstrapOutcome} from '../model/bootstrap-outcome.js';

export interface NodePaths {
  readonly configDirectory: string;
  readonly dataDirectory: string;
  readonly nodeKeyFile: string;
  readonly privValidatorKeyFile: string;
  readonly privValidatorStateFile: string;
}

/**
 * Generates the identity of a consensus node inside throwaway containers of the node image and hands the key
 * material to the operator.
 */
@injectable()
export class KeyBootstrapper {
  private static readonly INIT_OPERATION: string = 'init';
  private static readonly SHOW_NODE_ID_OPERATION: string = 'show-node-id';
  private static readonly SHOW_VALIDATOR_OPERATION: string = 'show-validator';

  private readonly docker: DockerClient;
  private readonly codec: KeyMaterialCodec;
  private readonly presenter: KeyMaterialPresenter;
  private readonly logger: GrapheneLogger;

  public constructor(
    @inject(InjectTokens.DockerClient) docker?: DockerClient,
    @inject(InjectTokens.KeyMaterialCodec) codec?: KeyMaterialCodec,
    @inject(InjectTokens.KeyMaterialPresenter) presenter?: KeyMaterialPresenter,
    @inject(InjectTokens.GrapheneLogger) logger?: GrapheneLogger,
  ) {
    this.docker = patchInject(docker, InjectTokens.DockerClient, this.constructor.name);
    this.codec = patchInject(codec, InjectTokens.KeyMaterialCodec, this.constructor.name);
    this.presenter = patchInject(presenter, InjectTokens.KeyMaterialPresenter, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.GrapheneLogger, this.constructor.name);
  }

  public static paths(config: InvocationConfig): NodePaths {
    const configDirectory: string = Templates.renderNodeConfigDirectory(
      config.rootDirectory,
      config.environment,
      config.nodeType,
    );
    const dataDirectory: string = Templates.renderNodeDataDirectory(
      config.rootDirectory,
      config.environment,
      config.nodeType,
    );
    return {
      configDirectory,
      dataDirectory,
      nodeKeyFile: PathEx.join(configDirectory, constants.NODE_KEY_FILE),
      privValidatorKeyFile: PathEx.join(configDirectory, constants.PRIV_VALIDATOR_KEY_FILE),
      privValidatorStateFile: PathEx.join(dataDirectory, constants.PRIV_VALIDATOR_STATE_FILE),
    };
  }

  /**
   * A node counts as initialized once either key file was written or the node has signing state.
   */
  public isInitialized(config: InvocationConfig): boolean {
    const paths: NodePaths = KeyBootstrapper.paths(config);
    return [paths.nodeKeyFile, paths.privValidatorKeyFile, paths.privValidatorStateFile].some((file): boolean =>
      fs.existsSync(file),
    );
  }

  /**
   * Generates fresh keys, presents them and, for a validator, removes them from disk again.
   * Never throws; any failure is returned as a `failed` outcome.
   */
  public async bootstrap(config: InvocationConfig): Promise<BootstrapOutcome> {
    const paths: NodePaths = KeyBootstrapper.paths(config);

    if (!config.force && this.isInitialized(config)) {
      this.logger.info(`node ${config.nodeType} in ${config.environment} is already initialized`);
      return {status: 'already-initialized', nodeType: config.nodeType, configDirectory: paths.configDirectory};
    }

    const written: string[] = [];
    if (!fs.existsSync(paths.privValidatorStateFile)) {
      written.push(paths.privValidatorStateFile);
    }

    try {
      await this.step('ensure-image', (): Promise<void> => this.ensureImage(config));
      const material: KeyMaterial = await this.step(
        'init',
        (): Promise<KeyMaterial> => this.initialize(config, paths, written),
      );
      const peerId: string = await this.step('show-node-id', (): Promise<string> => this.readNodeId(config, paths));

      const validator: ValidatorIdentity | undefined =
        config.nodeType === 'validator' ? this.codec.validatorIdentity(material.privValidatorKey) : undefined;

      const created: BootstrapCreated = {
        status: 'created',
        nodeType: config.nodeType,
        encoded: this.codec.encode(material),
        peerId,
        validator,
      };

      this.presenter.presentCreated(created);

      if (validator) {
        await this.step('purge', async (): Promise<void> => {
          fs.rmSync(paths.configDirectory, {recursive: true, force: true});
        });
        this.logger.info(`removed validator keys from ${paths.configDirectory}`);
      }

      return created;
    } catch (error) {
      const bootstrapError: BootstrapError =
        error instanceof BootstrapError
          ? error
          : new BootstrapError('Node identity generation failed', 'unknown', error instanceof Error ? error : undefined);
      this.logger.error(bootstrapError);
      this.discard(written);
      return {status: 'failed', nodeType: config.nodeType, error: bootstrapError};
    }
  }

  /**
   * Prints the peer id of an initialized node.
   * @throws ConfigurationError if the key files are missing
   */
  public async showNodeId(config: InvocationConfig): Promise<string> {
    const paths: NodePaths = this.requireKeyFiles(config);
    try {
      await this.ensureImage(config);
      const peerId: string = await this.readNodeId(config, paths);
      this.presenter.presentNodeId(config.nodeType, peerId);
      return peerId;
    } catch (error) {
      throw this.toolingFailure(KeyBootstrapper.SHOW_NODE_ID_OPERATION, error);
    }
  }

  /**
   * Prints the validator information the node tool reports for an initialized node.
   * @throws ConfigurationError if the key files are missing
   */
  public async showValidator(config: InvocationConfig): Promise<string[]> {
    const paths: NodePaths = this.requireKeyFiles(config);
    try {
      await this.ensureImage(config);
      const response: ContainerRunResponse = await this.runDisplayContainer(
        config,
        paths,
        KeyBootstrapper.SHOW_VALIDATOR_OPERATION,
      );
      this.presenter.presentValidator(config.nodeType, response.lines);
      return response.lines;
    } catch (error) {
      throw this.toolingFailure(KeyBootstrapper.SHOW_VALIDATOR_OPERATION, error);
    }
  }

  private async ensureImage(config: InvocationConfig): Promise<void> {
    if (await this.docker.imageExists(config.nodeImage)) {
      this.logger.debug(`image ${config.nodeImage} already exists, skipping build`);
      return;
    }

    this.logger.info(`building image ${config.nodeImage}`);
    await this.docker.buildImage(
      new ImageBuildOptions(
        config.nodeImage,
        Templates.renderNodeImageDockerfile(config.rootDirectory),
        config.rootDirectory,
      ),
    );
  }

  /**
   * @param written collects every key file copied out of the container
   */
  private async initialize(config: InvocationConfig, paths: NodePaths, written: string[]): Promise<KeyMaterial> {
    fs.mkdirSync(paths.configDirectory, {recursive: true});
    fs.mkdirSync(paths.dataDirectory, {recursive: true});

    const containerName: string = Templates.renderOneShotContainerName(KeyBootstrapper.INIT_OPERATION);
    await this.withOneShotContainer(containerName, async (): Promise<void> => {
      await this.docker.runContainer(
        ContainerRunOptionsBuilder.builder()
          .name(containerName)
          .volume(paths.dataDirectory, constants.CONTAINER_DATA_DIR)
          .image(config.nodeImage)
          .command(KeyBootstrapper.INIT_OPERATION, config.nodeType)
          .build(),
      );

      for (const [fileName, destination] of [
        [constants.NODE_KEY_FILE, paths.nodeKeyFile],
        [constants.PRIV_VALIDATOR_KEY_FILE, paths.privValidatorKeyFile],
      ]) {
        written.push(destination);
        await this.docker.copyFromContainer(
          containerName,
          `${constants.CONTAINER_CONFIG_DIR}/${fileName}`,
          destination,
        );
        fs.chmodSync(destination, constants.KEY_FILE_MODE);
      }
    });

    return {
      nodeKey: fs.readFileSync(paths.nodeKeyFile, 'utf8'),
      privValidatorKey: fs.readFileSync(paths.privValidatorKeyFile, 'utf8'),
    };
  }

  private async readNodeId(config: InvocationConfig, paths: NodePaths): Promise<string> {
    const response: ContainerRunResponse = await this.runDisplayContainer(
      config,
      paths,
      KeyBootstrapper.SHOW_NODE_ID_OPERATION,
    );
    const peerId: string | undefined = response.lastLine;
    if (!peerId) {
      throw new BootstrapError('The node tool printed no node id', 'show-node-id');
    }
    return peerId;
  }

  private async runDisplayContainer(
    config: InvocationConfig,
    paths: NodePaths,
    operation: string,
  ): Promise<ContainerRunResponse> {
    const containerName: string = Templates.renderOneShotContainerName(operation);
    return this.withOneShotContainer(
      containerName,
      (): Promise<ContainerRunResponse> =>
        this.docker.runContainer(
          ContainerRunOptionsBuilder.builder()
            .name(containerName)
            .volume(paths.dataDirectory, constants.CONTAINER_DATA_DIR)
            .volume(paths.nodeKeyFile, `${constants.CONTAINER_CONFIG_DIR}/${constants.NODE_KEY_FILE}`, true)
            .volume(
              paths.privValidatorKeyFile,
              `${constants.CONTAINER_CONFIG_DIR}/${constants.PRIV_VALIDATOR_KEY_FILE}`,
              true,
            )
            .image(config.nodeImage)
            .command(operation)
            .build(),
        ),
    );
  }

  /**
   * Runs `body` against a named container that exists only for its duration. A stale container of the same name
   * is removed first and the container is removed again on every exit path.
   */
  private async withOneShotContainer<T>(containerName: string, body: () => Promise<T>): Promise<T> {
    await this.removeContainer(containerName, 'stale');
    try {
      return await body();
    } finally {
      await this.removeContainer(containerName, 'one-shot');
    }
  }

  private async removeContainer(containerName: string, kind: 'stale' | 'one-shot'): Promise<void> {
    try {
      await this.docker.removeContainer(containerName);
    } catch (error) {
      const message: string = error instanceof Error ? error.message : String(error);
      if (kind === 'stale') {
        this.logger.debug(`no stale container ${containerName} to remove: ${message}`);
      } else {
        this.logger.warn(`failed to remove container ${containerName}: ${message}`);
      }
    }
  }

  /**
   * Removes the files a failed run left behind so the node does not count as initialized.
   */
  private discard(files: readonly string[]): void {
    for (const file of files) {
      if (fs.existsSync(file)) {
        fs.rmSync(file, {force: true});
        this.logger.debug(`removed ${file} after a failed bootstrap`);
      }
    }
  }

  private requireKeyFiles(config: InvocationConfig): NodePaths {
    const paths: NodePaths = KeyBootstrapper.paths(config);
    for (const file of [paths.nodeKeyFile, paths.privValidatorKeyFile]) {
      if (!fs.existsSync(file)) {
        throw new ConfigurationError(
          `Missing key file ${file}. Run 'graphene init ${config.environment} ${config.nodeType}' first.`,
          file,
        );
      }
    }
    return paths;
  }

  private async step<T>(name: string, body: () => Promise<T>): Promise<T> {
    try {
      this.logger.debug(`bootstrap step ${name}`);
      return await body();
    } catch (error) {
      if (error instanceof BootstrapError) {
        throw error;
      }
      throw new BootstrapError(
        `Node identity generation failed at step '${name}'`,
        name,
        error instanceof Error ? error : undefined,
      );
    }
  }

  private toolingFailure(operation: string, error: unknown): Error {
    if (error instanceof BootstrapError) {
      return error;
    }
    return new ToolingError(`Failed to run ${operation}`, error instanceof Error ? error : undefined);
  }
}
