// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type GrapheneLogger} from '../logging/graphene-logger.js';
import {MessageLevel} from '../logging/message-level.js';
import * as constants from '../constants.js';
import {KeyMaterialCodec} from './key-material-codec.js';
import {type BootstrapCreated} from '../model/bootstrap-outcome.js';
import {type NodeType} from '../model/node-type.js';

/**
 * Shows freshly generated identities to the operator. Key material is printed through message groups, which
 * never reach the log files.
 */
@injectable()
export class KeyMaterialPresenter {
  private readonly logger: GrapheneLogger;

  public constructor(@inject(InjectTokens.GrapheneLogger) logger?: GrapheneLogger) {
    this.logger = patchInject(logger, InjectTokens.GrapheneLogger, this.constructor.name);
  }

  public presentCreated(created: BootstrapCreated): void {
    this.logger.addMessageGroup(constants.NODE_KEYS_MESSAGE_GROUP, 'Save these keys in a safe place');
    this.logger.addMessageGroupMessage(
      constants.NODE_KEYS_MESSAGE_GROUP,
      `${constants.NODE_KEY_ENV_VARIABLE}=${created.encoded.nodeKeyJson}`,
    );
    this.logger.addMessageGroupMessage(
      constants.NODE_KEYS_MESSAGE_GROUP,
      `${constants.PRIV_VALIDATOR_KEY_ENV_VARIABLE}=${created.encoded.privValidatorKeyJson}`,
    );
    this.logger.showMessageGroup(constants.NODE_KEYS_MESSAGE_GROUP);

    if (!created.validator) {
      this.presentNodeId(created.nodeType, created.peerId);
      return;
    }

    const address: string = KeyMaterialCodec.formatAddress(created.validator.address);
    this.logger.addMessageGroup(constants.VALIDATOR_INFO_MESSAGE_GROUP, `Validator address ${address}`);
    for (const line of [
      'Start your validator node before submitting a stake transaction.',
      'Stake to this validator address on the Graphene chain to avoid slashing.',
      `Address: ${address}`,
      `Public key (base64): ${created.validator.publicKey}`,
      `Node ID: ${created.peerId}`,
    ]) {
      this.logger.addMessageGroupMessage(constants.VALIDATOR_INFO_MESSAGE_GROUP, line);
    }
    this.logger.showMessageGroup(constants.VALIDATOR_INFO_MESSAGE_GROUP, MessageLevel.WARN);
    this.logger.showUser(
      chalk.yellow(
        'Provide this information to the whitelisting authority so the validator address is added to the seed nodes of the network.',
      ),
    );
  }

  public presentNodeId(nodeType: NodeType, peerId: string): void {
    this.logger.showUser(`${chalk.cyan(`Node ID (${nodeType}):`)} ${peerId}`);
  }

  public presentValidator(nodeType: NodeType, lines: readonly string[]): void {
    this.logger.showList(`Validator info (${nodeType})`, [...lines]);
  }
}
