// SPDX-License-Identifier: Apache-2.0

import {type BootstrapError} from '../errors/bootstrap-error.js';
import {type EncodedKeyMaterial, type ValidatorIdentity} from './key-material.js';
import {type NodeType} from './node-type.js';

export interface BootstrapCreated {
  readonly status: 'created';
  readonly nodeType: NodeType;
  readonly encoded: EncodedKeyMaterial;
  readonly peerId: string;
  readonly validator?: ValidatorIdentity;
}

export interface BootstrapAlreadyInitialized {
  readonly status: 'already-initialized';
  readonly nodeType: NodeType;
  readonly configDirectory: string;
}

export interface BootstrapFailed {
  readonly status: 'failed';
  readonly nodeType: NodeType;
  readonly error: BootstrapError;
}

export type BootstrapOutcome = BootstrapCreated | BootstrapAlreadyInitialized | BootstrapFailed;
