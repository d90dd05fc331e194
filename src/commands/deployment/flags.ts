// SPDX-License-Identifier: Apache-2.0

import {Flags as flags} from '../flags.js';
import {type CommandFlag, type CommandFlags} from '../../types/flag-types.js';

/** node-type is accepted for a uniform command line but has no effect on deployment actions */
export const POSITIONALS: CommandFlag[] = [flags.environment, flags.nodeType];

export const DEPLOY_FLAGS: CommandFlags = {
  optional: [
    flags.rootDirectory,
    flags.build,
    flags.gitLfs,
    flags.logs,
    flags.skipNetwork,
    flags.failFast,
    flags.quiet,
  ],
};

export const STOP_FLAGS: CommandFlags = {
  optional: [flags.rootDirectory, flags.quiet],
};

export const CLEAN_FLAGS: CommandFlags = {
  optional: [flags.rootDirectory, flags.force, flags.quiet],
};

export const VALIDATE_FLAGS: CommandFlags = {
  optional: [flags.rootDirectory, flags.failFast, flags.quiet],
};

export const STATUS_FLAGS: CommandFlags = STOP_FLAGS;
