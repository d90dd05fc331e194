// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {KeyMaterialCodec} from '../../../../src/core/identity/key-material-codec.js';
import {BootstrapError} from '../../../../src/core/errors/bootstrap-error.js';
import {type EncodedKeyMaterial, type ValidatorIdentity} from '../../../../src/core/model/key-material.js';

const PRIV_VALIDATOR_KEY: string = JSON.stringify({
  address: 'AB'.repeat(20),
  pub_key: {type: 'tendermint/PubKeyEd25519', value: 'dGVzdC1wdWJsaWMta2V5'},
  priv_key: {type: 'tendermint/PrivKeyEd25519', value: 'test-secret'},
});

describe('KeyMaterialCodec', (): void => {
  const codec: KeyMaterialCodec = new KeyMaterialCodec();

  it('should encode each document as single-line base64', (): void => {
    const nodeKey: string = '{\n  "priv_key": {"value": "test-secret"}\n}\n';

    const encoded: EncodedKeyMaterial = codec.encode({nodeKey, privValidatorKey: PRIV_VALIDATOR_KEY});

    expect(encoded.nodeKeyJson).to.equal(Buffer.from(nodeKey, 'utf8').toString('base64'));
    expect(encoded.nodeKeyJson).not.to.include('\n');
    expect(Buffer.from(encoded.privValidatorKeyJson, 'base64').toString('utf8')).to.equal(PRIV_VALIDATOR_KEY);
  });

  it('should read the validator address in lowercase and the public key', (): void => {
    const identity: ValidatorIdentity = codec.validatorIdentity(PRIV_VALIDATOR_KEY);

    expect(identity).to.deep.equal({address: 'ab'.repeat(20), publicKey: 'dGVzdC1wdWJsaWMta2V5'});
    expect(KeyMaterialCodec.formatAddress(identity.address)).to.match(/^0x[\da-f]{40}$/);
  });

  it('should reject a document that is not JSON', (): void => {
    try {
      codec.validatorIdentity('not json');
      expect.fail('Should have thrown an error');
    } catch (error) {
      expect(error).to.be.instanceOf(BootstrapError);
      if (error instanceof BootstrapError) {
        expect(error.message).to.equal('priv_validator_key.json is not valid JSON');
        expect(error.step).to.equal('derive-address');
      }
    }
  });

  it('should reject an address of the wrong length', (): void => {
    expect((): ValidatorIdentity => codec.validatorIdentity(JSON.stringify({address: 'ABCD'}))).to.throw(
      'priv_validator_key.json has no valid address',
    );
  });

  it('should reject a document without a public key', (): void => {
    expect((): ValidatorIdentity =>
      codec.validatorIdentity(JSON.stringify({address: 'AB'.repeat(20), pub_key: {}})),
    ).to.throw('priv_validator_key.json has no public key value');
  });
});
