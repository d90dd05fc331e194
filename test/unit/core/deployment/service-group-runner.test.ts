// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import {ServiceGroupRunner} from '../../../../src/core/deployment/service-group-runner.js';
import {ToolingVerifier} from '../../../../src/core/deployment/tooling-verifier.js';
import {ContainerSummary} from '../../../../src/integration/docker/model/container-list/container-summary.js';
import {type ServiceGroup} from '../../../../src/core/model/service-group.js';
import {type GroupResult} from '../../../../src/core/model/group-result.js';
import {FakeDockerClient} from '../../../helpers/fake-docker-client.js';
import {FakeComposeClient, FakeComposeClientBuilder} from '../../../helpers/fake-compose-client.js';
import {RecordingLogger} from '../../../helpers/recording-logger.js';
import {testInvocationConfig} from '../../../helpers/test-project.js';

const PROJECT: string = 'graphene_deployment_local_validator';

const GROUP: ServiceGroup = {
  name: 'validator-group',
  role: 'validator',
  composeFile: '/work/services/docker.compose.validator.yml',
  envFiles: ['/work/config/env/local/.env.common', '/work/config/env/local/.env.validator'],
  projectName: PROJECT,
};

describe('ServiceGroupRunner', (): void => {
  let docker: FakeDockerClient;
  let compose: FakeComposeClient;
  let logger: RecordingLogger;
  let runner: ServiceGroupRunner;

  beforeEach((): void => {
    docker = new FakeDockerClient();
    compose = new FakeComposeClient();
    logger = new RecordingLogger();
    runner = new ServiceGroupRunner(
      docker,
      new ToolingVerifier(docker, new FakeComposeClientBuilder(compose), logger),
      logger,
    );
  });

  describe('deploy', (): void => {
    it('should tear down leftovers, start detached and report the running services', async (): Promise<void> => {
      compose.script('ps', PROJECT, {exitCode: 0, stdout: 'validator-1   Up 2 seconds'});

      const result: GroupResult = await runner.run('deploy', GROUP, testInvocationConfig('/work'));

      expect(compose.calls).to.deep.equal([
        `down ${PROJECT} --remove-orphans`,
        `up ${PROJECT} --build`,
        `ps ${PROJECT}`,
      ]);
      expect(result).to.deep.equal({
        group: 'validator-group',
        action: 'deploy',
        status: 'succeeded',
        output: ['validator-1   Up 2 seconds'],
      });
    });

    it('should start without rebuilding when build is off', async (): Promise<void> => {
      await runner.deploy(GROUP, testInvocationConfig('/work', {build: false}));

      expect(compose.calls[1]).to.equal(`up ${PROJECT}`);
    });

    it('should ignore a failed teardown', async (): Promise<void> => {
      compose.script('down', PROJECT, {exitCode: 1, stderr: 'no such project'});

      const result: GroupResult = await runner.deploy(GROUP, testInvocationConfig('/work'));

      expect(result.status).to.equal('succeeded');
    });

    it('should report a failed start with the command line', async (): Promise<void> => {
      compose.script('up', PROJECT, {exitCode: 1, stderr: 'pull access denied for graphene/tendermint'});

      const result: GroupResult = await runner.deploy(GROUP, testInvocationConfig('/work'));

      expect(result.status).to.equal('failed');
      expect(result.output).to.deep.equal(['pull access denied for graphene/tendermint']);
      expect(result.error?.message).to.equal('failed to start validator-group (exit code 1)');
      expect(result.error?.group).to.equal('validator-group');
      expect(result.error?.command).to.equal(`up ${PROJECT} --build`);
      expect(compose.calls).to.have.lengthOf(2);
    });
  });

  describe('stop', (): void => {
    it('should bring the project down without removing volumes', async (): Promise<void> => {
      const result: GroupResult = await runner.run('stop', GROUP, testInvocationConfig('/work'));

      expect(compose.calls).to.deep.equal([`down ${PROJECT} --remove-orphans`]);
      expect(result.status).to.equal('succeeded');
    });

    it('should report a failed stop', async (): Promise<void> => {
      compose.script('down', PROJECT, {exitCode: 2});

      const result: GroupResult = await runner.stop(GROUP);

      expect(result.error?.message).to.equal('failed to stop validator-group (exit code 2)');
    });
  });

  describe('clean', (): void => {
    it('should stop first and remove volumes once nothing runs', async (): Promise<void> => {
      const result: GroupResult = await runner.run('clean', GROUP, testInvocationConfig('/work'));

      expect(compose.calls).to.deep.equal([
        `down ${PROJECT} --remove-orphans`,
        `down ${PROJECT} --volumes --remove-orphans`,
      ]);
      expect(docker.calls).to.deep.equal([`ps label=com.docker.compose.project=${PROJECT}`]);
      expect(result.status).to.equal('succeeded');
      expect(result.state).to.equal('absent');
    });

    it('should keep the volumes while containers are still running', async (): Promise<void> => {
      docker.containers = [new ContainerSummary('validator-1', 'running')];

      const result: GroupResult = await runner.clean(GROUP);

      expect(compose.calls).to.deep.equal([`down ${PROJECT} --remove-orphans`]);
      expect(result.status).to.equal('failed');
      expect(result.state).to.equal('running');
      expect(result.error?.message).to.equal('validator-group still has running containers, volumes kept');
    });

    it('should keep the volumes when the state cannot be read', async (): Promise<void> => {
      docker.failWith('listContainers');

      const result: GroupResult = await runner.clean(GROUP);

      expect(result.status).to.equal('failed');
      expect(result.error?.message).to.equal('could not determine the state of validator-group, volumes kept');
      expect(compose.calls).to.have.lengthOf(1);
    });

    it('should report a failed volume removal', async (): Promise<void> => {
      compose.script('down', PROJECT, {exitCode: 0}, {exitCode: 1, stderr: 'volume is in use'});

      const result: GroupResult = await runner.clean(GROUP);

      expect(result.error?.message).to.equal('failed to remove volumes of validator-group (exit code 1)');
      expect(result.output).to.deep.equal(['volume is in use']);
    });
  });

  describe('validate', (): void => {
    it('should list the services of the resolved configuration', async (): Promise<void> => {
      compose.script('config', PROJECT, {
        exitCode: 0,
        stdout: [
          'name: graphene_deployment_local_validator',
          'services:',
          '  validator:',
          '    image: graphene/tendermint:local',
          '  exporter:',
          '    image: prom/node-exporter',
          '',
        ].join('\n'),
      });

      const result: GroupResult = await runner.run('validate', GROUP, testInvocationConfig('/work'));

      expect(result.status).to.equal('succeeded');
      expect(result.output).to.deep.equal(['service validator', 'service exporter']);
    });

    it('should report no services for output that is not a compose document', async (): Promise<void> => {
      compose.script('config', PROJECT, {exitCode: 0, stdout: 'just text'});

      const result: GroupResult = await runner.validate(GROUP);

      expect(result.status).to.equal('succeeded');
      expect(result.output).to.deep.equal([]);
    });

    it('should keep at most twenty lines of a failure', async (): Promise<void> => {
      const lines: string[] = Array.from({length: 25}, (_, index): string => `error line ${index + 1}`);
      compose.script('config', PROJECT, {exitCode: 15, stderr: lines.join('\n')});

      const result: GroupResult = await runner.validate(GROUP);

      expect(result.status).to.equal('failed');
      expect(result.output).to.deep.equal(lines.slice(0, 20));
      expect(result.error?.message).to.equal('compose configuration of validator-group is invalid (exit code 15)');
    });
  });

  describe('status', (): void => {
    it('should report stopped when containers exist but none runs', async (): Promise<void> => {
      docker.containers = [new ContainerSummary('validator-1', 'exited')];
      compose.script('ps', PROJECT, {exitCode: 0, stdout: 'NAME  STATUS'});

      const result: GroupResult = await runner.run('status', GROUP, testInvocationConfig('/work'));

      expect(result).to.deep.equal({
        group: 'validator-group',
        action: 'status',
        status: 'succeeded',
        output: ['NAME  STATUS'],
        state: 'stopped',
      });
    });

    it('should report absent when the project has no containers', async (): Promise<void> => {
      expect(await runner.state(GROUP)).to.equal('absent');
    });

    it('should fail when the state cannot be read', async (): Promise<void> => {
      docker.failWith('listContainers');

      const result: GroupResult = await runner.status(GROUP);

      expect(result.status).to.equal('failed');
      expect(result.error?.message).to.equal('could not determine the state of validator-group');
      expect(compose.calls).to.be.empty;
    });
  });

  describe('logs', (): void => {
    it('should tail the project logs', async (): Promise<void> => {
      compose.script('logs', PROJECT, {exitCode: 0, stdout: 'validator-1  | committed block 12'});

      const result: GroupResult = await runner.logs(GROUP, 10);

      expect(compose.calls).to.deep.equal([`logs ${PROJECT} --tail 10`]);
      expect(result.action).to.equal('logs');
      expect(result.output).to.deep.equal(['validator-1  | committed block 12']);
    });
  });
});
