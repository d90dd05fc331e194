// SPDX-License-Identifier: Apache-2.0

import {Flags as flags} from '../flags.js';
import {type CommandFlag, type CommandFlags} from '../../types/flag-types.js';

export const POSITIONALS: CommandFlag[] = [flags.environment, flags.nodeType];

export const INIT_FLAGS: CommandFlags = {
  optional: [flags.rootDirectory, flags.force, flags.quiet],
};

export const SHOW_FLAGS: CommandFlags = {
  optional: [flags.rootDirectory, flags.quiet],
};
