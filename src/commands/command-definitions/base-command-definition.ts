// SPDX-License-Identifier: Apache-2.0

import {type CommandDefinition} from '../../types/index.js';

export abstract class BaseCommandDefinition {
  public abstract getCommandDefinitions(): CommandDefinition[];
}
