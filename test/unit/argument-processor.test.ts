// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {after, afterEach, before, beforeEach, describe, it} from 'mocha';
import Sinon from 'sinon';
import {container} from 'tsyringe-neo';
import {Container} from '../../src/core/dependency-injection/container-init.js';
import {ArgumentProcessor} from '../../src/argument-processor.js';
import {ConfigurationError} from '../../src/core/errors/configuration-error.js';
import {InjectTokens} from '../../src/core/dependency-injection/inject-tokens.js';
import {type GrapheneLogger} from '../../src/core/logging/graphene-logger.js';
import {createTemporaryRoot} from '../helpers/test-project.js';

describe('ArgumentProcessor', (): void => {
  before((): void => {
    Container.getInstance().reset(createTemporaryRoot(), 'debug', false);
  });

  after(async (): Promise<void> => {
    await container.resolve<GrapheneLogger>(InjectTokens.GrapheneLogger).close();
  });

  beforeEach((): void => {
    Sinon.stub(console, 'log');
    Sinon.stub(console, 'error');
  });

  afterEach((): void => {
    Sinon.restore();
    process.exitCode = undefined;
  });

  async function expectRejected(argv: string[]): Promise<ConfigurationError> {
    try {
      await ArgumentProcessor.process(argv);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return error;
      }
      throw error;
    }
    expect.fail('Should have thrown an error');
  }

  it('should reject an unknown environment before running the command', async (): Promise<void> => {
    const error: ConfigurationError = await expectRejected(['node', 'graphene', 'deploy', 'staging']);

    expect(error.message).to.include('Argument: environment, Given: "staging"');
    expect(process.exitCode).to.equal(1);
  });

  it('should reject an unknown node type', async (): Promise<void> => {
    const error: ConfigurationError = await expectRejected(['node', 'graphene', 'init', 'local', 'archive']);

    expect(error.message).to.include('Argument: node-type, Given: "archive"');
  });

  it('should require a command', async (): Promise<void> => {
    const error: ConfigurationError = await expectRejected(['node', 'graphene']);

    expect(error.message).to.equal('Select a command');
  });
});
