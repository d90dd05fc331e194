// SPDX-License-Identifier: Apache-2.0

import {
  type ListrGetRendererClassFromValue,
  type ListrRendererValue,
  type ListrTask,
} from 'listr2';
import {type Argv} from 'yargs';

// NOTE: DO NOT add any Graphene imports in this file to avoid circular dependencies

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T> = new (...arguments_: any[]) => T;

export type AnyYargs = Argv;

/**
 * Parsed command line as handed to command handlers by yargs
 */
export interface ArgvStruct {
  _: (string | number)[];
  $0?: string;
  [flag: string]: unknown;
}

export interface CommandDefinition {
  command: string;
  desc: string;
  builder: (yargs: AnyYargs) => AnyYargs;
  handler: (argv: ArgvStruct) => Promise<void>;
}

export type GrapheneListrRenderer = ListrGetRendererClassFromValue<ListrRendererValue>;

export type GrapheneListrTask<T> = ListrTask<T, GrapheneListrRenderer, GrapheneListrRenderer>;
