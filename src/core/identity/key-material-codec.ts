// SPDX-License-Identifier: Apache-2.0

import {Base64} from 'js-base64';
import {injectable} from 'tsyringe-neo';
import {BootstrapError} from '../errors/bootstrap-error.js';
import {type EncodedKeyMaterial, type KeyMaterial, type ValidatorIdentity} from '../model/key-material.js';

const VALIDATOR_ADDRESS_PATTERN: RegExp = /^[\da-f]{40}$/;

/**
 * Transport encoding of key documents and derivation of the validator identity.
 */
@injectable()
export class KeyMaterialCodec {
  /**
   * Encodes both documents as single-line base64, byte for byte.
   */
  public encode(material: KeyMaterial): EncodedKeyMaterial {
    return {
      nodeKeyJson: Base64.encode(material.nodeKey),
      privValidatorKeyJson: Base64.encode(material.privValidatorKey),
    };
  }

  /**
   * Reads the validator address and public key from a `priv_validator_key.json` document.
   * @throws BootstrapError if the document is not JSON or lacks either field
   */
  public validatorIdentity(privValidatorKey: string): ValidatorIdentity {
    let document: unknown;
    try {
      document = JSON.parse(privValidatorKey);
    } catch (error) {
      throw new BootstrapError(
        'priv_validator_key.json is not valid JSON',
        'derive-address',
        error instanceof Error ? error : undefined,
      );
    }

    if (typeof document !== 'object' || document === null) {
      throw new BootstrapError('priv_validator_key.json is not a JSON object', 'derive-address');
    }

    const address: unknown = 'address' in document ? document.address : undefined;
    if (typeof address !== 'string' || !VALIDATOR_ADDRESS_PATTERN.test(address.toLowerCase())) {
      throw new BootstrapError('priv_validator_key.json has no valid address', 'derive-address');
    }

    const publicKeyDocument: unknown = 'pub_key' in document ? document.pub_key : undefined;
    const publicKey: unknown =
      typeof publicKeyDocument === 'object' && publicKeyDocument !== null && 'value' in publicKeyDocument
        ? publicKeyDocument.value
        : undefined;
    if (typeof publicKey !== 'string' || !publicKey) {
      throw new BootstrapError('priv_validator_key.json has no public key value', 'derive-address');
    }

    return {address: address.toLowerCase(), publicKey};
  }

  public static formatAddress(address: string): string {
    return `0x${address}`;
  }
}
