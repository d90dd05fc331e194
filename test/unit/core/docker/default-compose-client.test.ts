// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import Sinon from 'sinon';
import {DockerExecutionBuilder} from '../../../../src/integration/docker/execution/docker-execution-builder.js';
import {DockerExecution} from '../../../../src/integration/docker/execution/docker-execution.js';
import {DefaultComposeClient} from '../../../../src/integration/docker/impl/default-compose-client.js';
import {DefaultComposeClientBuilder} from '../../../../src/integration/docker/impl/default-compose-client-builder.js';
import {ComposeProject} from '../../../../src/integration/docker/model/compose-project.js';
import {type ExecutionResult} from '../../../../src/integration/docker/model/execution-result.js';
import {type ComposeClient} from '../../../../src/integration/docker/compose-client.js';
import {ComposeVersionRequirementException} from '../../../../src/integration/docker/errors/compose-version-requirement-exception.js';
import {ToolingError} from '../../../../src/core/errors/tooling-error.js';
import {scriptedLauncher, type ScriptedRun} from '../../../helpers/fake-process.js';
import {RecordingLogger} from '../../../helpers/recording-logger.js';

const PROJECT: ComposeProject = new ComposeProject(
  'services/docker.compose.validator.yml',
  ['.env.common'],
  'graphene_deployment_local_validator',
);

describe('compose clients', (): void => {
  let commands: string[][];
  let runs: ScriptedRun[];

  beforeEach((): void => {
    commands = [];
    runs = [];
    Sinon.stub(DockerExecutionBuilder.prototype, 'build').callsFake(function (
      this: DockerExecutionBuilder,
    ): DockerExecution {
      const command: string[] = this.buildCommand();
      commands.push(command);
      return new DockerExecution(command, scriptedLauncher(runs.shift() ?? {exitCode: 0}));
    });
  });

  afterEach((): void => {
    Sinon.restore();
  });

  describe('DefaultComposeClient', (): void => {
    it('should prefix project commands with the plugin sub-command', async (): Promise<void> => {
      const client: DefaultComposeClient = new DefaultComposeClient('docker', ['compose']);

      const result: ExecutionResult = await client.up(PROJECT, false);

      expect(result.succeeded).to.be.true;
      expect(client.invocation).to.equal('docker compose');
      expect(commands[0]).to.deep.equal([
        'docker',
        'compose',
        '--file',
        'services/docker.compose.validator.yml',
        '--env-file',
        '.env.common',
        '--project-name',
        'graphene_deployment_local_validator',
        'up',
        '--detach',
      ]);
    });

    it('should return a failed status instead of throwing', async (): Promise<void> => {
      runs.push({exitCode: 1, stderr: 'service "validator" refers to undefined network\n'});
      const client: DefaultComposeClient = new DefaultComposeClient('docker-compose');

      const result: ExecutionResult = await client.config(PROJECT);

      expect(result.exitCode).to.equal(1);
      expect(result.standardError).to.equal('service "validator" refers to undefined network');
      expect(commands[0]?.[0]).to.equal('docker-compose');
    });

    it('should accept a version at the minimum', async (): Promise<void> => {
      runs.push({exitCode: 0, stdout: '2.17.0\n'});
      const client: DefaultComposeClient = new DefaultComposeClient('docker', ['compose']);

      await client.checkVersion();

      expect(commands[0]).to.deep.equal(['docker', 'compose', 'version', '--short']);
    });

    it('should reject a version below the minimum', async (): Promise<void> => {
      runs.push({exitCode: 0, stdout: '1.29.2\n'});
      const client: DefaultComposeClient = new DefaultComposeClient('docker-compose');

      try {
        await client.checkVersion();
        expect.fail('Should have thrown an error');
      } catch (error) {
        expect(error).to.be.instanceOf(ComposeVersionRequirementException);
        if (error instanceof Error) {
          expect(error.message).to.equal(
            'The compose CLI version 1.29.2 is lower than the minimum required version 2.17.0.',
          );
        }
      }
    });
  });

  describe('DefaultComposeClientBuilder', (): void => {
    it('should prefer the compose plugin', async (): Promise<void> => {
      runs.push({exitCode: 0, stdout: '2.29.1\n'}, {exitCode: 0, stdout: '2.29.1\n'});
      const builder: DefaultComposeClientBuilder = new DefaultComposeClientBuilder('docker', new RecordingLogger());

      const client: ComposeClient = await builder.build();

      expect(client.invocation).to.equal('docker compose');
    });

    it('should fall back to the standalone executable', async (): Promise<void> => {
      runs.push(
        {exitCode: 1, stderr: "docker: 'compose' is not a docker command.\n"},
        {exitCode: 0, stdout: '2.20.0\n'},
        {exitCode: 0, stdout: '2.20.0\n'},
      );
      const logger: RecordingLogger = new RecordingLogger();
      const builder: DefaultComposeClientBuilder = new DefaultComposeClientBuilder('docker', logger);

      const client: ComposeClient = await builder.build();

      expect(client.invocation).to.equal('docker-compose');
      expect(commands.map((command): string => command[0] ?? '')).to.deep.equal([
        'docker',
        'docker-compose',
        'docker-compose',
      ]);
      expect(logger.messages('debug')).to.include("using compose through 'docker-compose'");
    });

    it('should fail when neither flavour answers', async (): Promise<void> => {
      runs.push({exitCode: 1}, {exitCode: 0, launchError: new Error('spawn docker-compose ENOENT')});
      const builder: DefaultComposeClientBuilder = new DefaultComposeClientBuilder('docker', new RecordingLogger());

      try {
        await builder.build();
        expect.fail('Should have thrown an error');
      } catch (error) {
        expect(error).to.be.instanceOf(ToolingError);
        if (error instanceof Error) {
          expect(error.message).to.equal("neither 'docker compose' nor 'docker-compose' is available");
        }
      }
    });
  });
});
