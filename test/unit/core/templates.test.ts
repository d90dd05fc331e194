// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {Templates} from '../../../src/core/templates.js';
import {PathEx} from '../../../src/business/utils/path-ex.js';

describe('Templates', (): void => {
  it('should keep the live network name unsuffixed', (): void => {
    expect(Templates.renderNetworkName('live')).to.equal('graphene-net');
    expect(Templates.renderNetworkName('test')).to.equal('graphene-net-test');
    expect(Templates.renderNetworkName('local')).to.equal('graphene-net-local');
  });

  it('should derive project names from the deployment id and role', (): void => {
    expect(Templates.renderDeploymentId('test')).to.equal('graphene_deployment_test');
    expect(Templates.renderProjectName('test', 'sentry')).to.equal('graphene_deployment_test_sentry');
    expect(Templates.renderServiceGroupName('validator')).to.equal('validator-group');
  });

  it('should tag the node image with the environment', (): void => {
    expect(Templates.renderNodeImage('local')).to.equal('graphene/tendermint:local');
    expect(Templates.renderOneShotContainerName('init')).to.equal('tendermint_init');
  });

  it('should lay out the deployment files under the root', (): void => {
    expect(Templates.renderComposeFile('/work', 'validator')).to.equal(
      PathEx.join('/work', 'services', 'docker.compose.validator.yml'),
    );
    expect(Templates.renderRoleEnvFile('/work', 'live', 'sentry')).to.equal(
      PathEx.join('/work', 'config', 'env', 'live', '.env.sentry'),
    );
    expect(Templates.renderLocalOverrideEnvFile('/work', 'live')).to.equal(
      PathEx.join('/work', 'config', 'env', 'live', '.env.local'),
    );
    expect(Templates.renderNodeConfigDirectory('/work', 'test', 'seed')).to.equal(
      PathEx.join('/work', 'volumes', 'test', 'tendermint', 'seed', 'config'),
    );
  });
});
