// SPDX-License-Identifier: Apache-2.0

import {type AnyYargs} from '../types/index.js';
import {type CommandFlag} from '../types/flag-types.js';
import {DEFAULT_ENVIRONMENT, ENVIRONMENTS} from '../core/model/environment.js';
import {DEFAULT_NODE_TYPE, NODE_TYPES} from '../core/model/node-type.js';

export class Flags {
  public static readonly environment: CommandFlag = {
    name: 'environment',
    definition: {
      describe: 'Target environment',
      defaultValue: DEFAULT_ENVIRONMENT,
      type: 'string',
      choices: ENVIRONMENTS,
    },
  };

  public static readonly nodeType: CommandFlag = {
    name: 'node-type',
    definition: {
      describe: 'Kind of consensus node',
      defaultValue: DEFAULT_NODE_TYPE,
      type: 'string',
      choices: NODE_TYPES,
    },
  };

  public static readonly rootDirectory: CommandFlag = {
    name: 'root-dir',
    definition: {
      describe: 'Project root holding config/, services/, docker/ and volumes/ (defaults to the working directory)',
      type: 'string',
    },
  };

  public static readonly build: CommandFlag = {
    name: 'build',
    definition: {
      describe: 'Build images while starting services, use --no-build to skip',
      defaultValue: true,
      type: 'boolean',
    },
  };

  public static readonly gitLfs: CommandFlag = {
    name: 'git-lfs',
    definition: {
      describe: 'Pull Git LFS objects of the project root before deploying, use --no-git-lfs to skip',
      defaultValue: true,
      type: 'boolean',
    },
  };

  public static readonly logs: CommandFlag = {
    name: 'logs',
    definition: {
      describe: 'Show the latest service logs after a successful deploy',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly skipNetwork: CommandFlag = {
    name: 'skip-network',
    definition: {
      describe: 'Do not create the docker network',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly failFast: CommandFlag = {
    name: 'fail-fast',
    definition: {
      describe: 'Skip the remaining service groups after the first failure',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly force: CommandFlag = {
    name: 'force',
    definition: {
      describe: 'Overwrite existing node keys, or skip the clean confirmation',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly quiet: CommandFlag = {
    name: 'quiet',
    definition: {
      describe: 'Quiet mode, do not prompt for confirmation',
      defaultValue: false,
      alias: 'q',
      type: 'boolean',
    },
  };

  public static readonly devMode: CommandFlag = {
    name: 'dev',
    definition: {
      describe: 'Enable developer mode',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly logLevel: CommandFlag = {
    name: 'log-level',
    definition: {
      describe: 'Log file level',
      defaultValue: 'info',
      type: 'string',
      choices: ['error', 'warn', 'info', 'debug', 'trace'],
    },
  };

  /** Declares the positional arguments of a command in the order they appear in its command string */
  public static setPositionals(y: AnyYargs, ...positionals: CommandFlag[]): void {
    for (const flag of positionals) {
      y.positional(flag.name, {
        describe: flag.definition.describe,
        type: flag.definition.type,
        choices: flag.definition.choices,
        default: flag.definition.defaultValue,
      });
    }
  }

  public static setOptionalCommandFlags(y: AnyYargs, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      y.option(flag.name, {
        describe: flag.definition.describe,
        alias: flag.definition.alias,
        type: flag.definition.type,
        choices: flag.definition.choices,
        default: flag.definition.defaultValue,
      });
    }
  }

  /** Renders the positional part of a yargs command string, e.g. `[environment] [node-type]` */
  public static positionalUsage(...positionals: CommandFlag[]): string {
    return positionals.map((flag): string => `[${flag.name}]`).join(' ');
  }
}
