// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {DockerExecutionBuilder} from '../../../../../src/integration/docker/execution/docker-execution-builder.js';
import {type DockerRequest} from '../../../../../src/integration/docker/request/docker-request.js';
import {InfoRequest} from '../../../../../src/integration/docker/request/info-request.js';
import {ImageInspectRequest} from '../../../../../src/integration/docker/request/image/image-inspect-request.js';
import {ImageBuildRequest} from '../../../../../src/integration/docker/request/image/image-build-request.js';
import {ImageBuildOptions} from '../../../../../src/integration/docker/model/image-build/image-build-options.js';
import {NetworkInspectRequest} from '../../../../../src/integration/docker/request/network/network-inspect-request.js';
import {NetworkCreateRequest} from '../../../../../src/integration/docker/request/network/network-create-request.js';
import {ContainerRunRequest} from '../../../../../src/integration/docker/request/container/container-run-request.js';
import {ContainerRunOptionsBuilder} from '../../../../../src/integration/docker/model/container-run/container-run-options-builder.js';
import {ContainerCopyRequest} from '../../../../../src/integration/docker/request/container/container-copy-request.js';
import {ContainerRemoveRequest} from '../../../../../src/integration/docker/request/container/container-remove-request.js';
import {ContainerListRequest} from '../../../../../src/integration/docker/request/container/container-list-request.js';

function tokens(request: DockerRequest): string[] {
  const builder: DockerExecutionBuilder = new DockerExecutionBuilder().executable('docker');
  request.apply(builder);
  return builder.buildCommand();
}

describe('docker requests', (): void => {
  it('should ask the daemon for its server version', (): void => {
    expect(tokens(new InfoRequest())).to.deep.equal(['docker', 'info', '--format', '{{.ServerVersion}}']);
  });

  it('should inspect an image by reference', (): void => {
    expect(tokens(new ImageInspectRequest('graphene/tendermint:local'))).to.deep.equal([
      'docker',
      'image',
      'inspect',
      '--format',
      '{{.Id}}',
      'graphene/tendermint:local',
    ]);
  });

  it('should build an image with a tag and a Dockerfile', (): void => {
    const options: ImageBuildOptions = new ImageBuildOptions(
      'graphene/tendermint:local',
      '/work/docker/tendermint/Dockerfile',
      '/work',
    );

    expect(tokens(new ImageBuildRequest(options))).to.deep.equal([
      'docker',
      'build',
      '--tag',
      'graphene/tendermint:local',
      '--file',
      '/work/docker/tendermint/Dockerfile',
      '/work',
    ]);
  });

  it('should inspect and create networks', (): void => {
    expect(tokens(new NetworkInspectRequest('graphene-net-test'))).to.deep.equal([
      'docker',
      'network',
      'inspect',
      '--format',
      '{{.Name}}',
      'graphene-net-test',
    ]);
    expect(tokens(new NetworkCreateRequest('graphene-net-test'))).to.deep.equal([
      'docker',
      'network',
      'create',
      'graphene-net-test',
    ]);
  });

  it('should run a named container with its mounts before the image and its command after it', (): void => {
    const request: ContainerRunRequest = new ContainerRunRequest(
      ContainerRunOptionsBuilder.builder()
        .image('graphene/tendermint:local')
        .name('tendermint_init')
        .volume('/work/config', '/tendermint/config')
        .volume('/work/keys', '/keys', true)
        .command('init', 'validator')
        .build(),
    );

    expect(tokens(request)).to.deep.equal([
      'docker',
      'run',
      '--name',
      'tendermint_init',
      '--volume',
      '/work/config:/tendermint/config',
      '--volume',
      '/work/keys:/keys:ro',
      'graphene/tendermint:local',
      'init',
      'validator',
    ]);
  });

  it('should copy a file out of a container', (): void => {
    expect(
      tokens(new ContainerCopyRequest('tendermint_init', '/tendermint/config/node_key.json', '/work/node_key.json')),
    ).to.deep.equal(['docker', 'cp', 'tendermint_init:/tendermint/config/node_key.json', '/work/node_key.json']);
  });

  it('should force remove a container', (): void => {
    expect(tokens(new ContainerRemoveRequest('tendermint_init'))).to.deep.equal([
      'docker',
      'rm',
      '--force',
      'tendermint_init',
    ]);
  });

  it('should list containers in every state as JSON lines', (): void => {
    expect(tokens(new ContainerListRequest(['label=com.docker.compose.project=demo']))).to.deep.equal([
      'docker',
      'ps',
      '--all',
      '--filter',
      'label=com.docker.compose.project=demo',
      '--format',
      '{{json .}}',
    ]);
  });

  it('should reject blank names', (): void => {
    expect((): ContainerRemoveRequest => new ContainerRemoveRequest('')).to.throw('containerName must not be null');
    expect((): NetworkCreateRequest => new NetworkCreateRequest('')).to.throw('networkName must not be null');
    expect((): ImageInspectRequest => new ImageInspectRequest('')).to.throw('image must not be null');
  });
});
