// SPDX-License-Identifier: Apache-2.0

export type FlagValueType = 'string' | 'boolean' | 'number';

export interface CommandFlagDefinition {
  describe: string;
  defaultValue?: string | boolean | number;
  alias?: string;
  type: FlagValueType;
  choices?: readonly string[];
}

export interface CommandFlag {
  name: string;
  definition: CommandFlagDefinition;
}

export interface CommandFlags {
  optional: CommandFlag[];
}
