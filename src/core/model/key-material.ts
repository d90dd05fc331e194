// SPDX-License-Identifier: Apache-2.0

/** The two key documents exactly as the node tool wrote them */
export interface KeyMaterial {
  readonly nodeKey: string;
  readonly privValidatorKey: string;
}

/** Single-line base64 forms, suitable for environment variables */
export interface EncodedKeyMaterial {
  readonly nodeKeyJson: string;
  readonly privValidatorKeyJson: string;
}

export interface ValidatorIdentity {
  /** lowercase hex, without prefix */
  readonly address: string;
  /** base64 public key value */
  readonly publicKey: string;
}
