// SPDX-License-Identifier: Apache-2.0

import {GrapheneError} from '../errors/graphene-error.js';
import {type AnyYargs, type ArgvStruct, type CommandDefinition} from '../../types/index.js';
import {type GrapheneLogger} from '../logging/graphene-logger.js';
import {type CommandFlag, type CommandFlags} from '../../types/flag-types.js';
import {Flags as flags} from '../../commands/flags.js';

export type CommandHandlerCallback = (argv: ArgvStruct) => Promise<boolean>;

export class Subcommand {
  public constructor(
    public readonly name: string,
    public readonly description: string,
    public readonly commandHandler: CommandHandlerCallback,
    public readonly flags: CommandFlags,
    public readonly positionals: CommandFlag[] = [],
  ) {}
}

/**
 * Builds top level yargs commands of the form `<name> [positional]...` that share one logger.
 */
export class CommandBuilder {
  private readonly subcommands: Subcommand[] = [];

  public constructor(private readonly logger: GrapheneLogger) {}

  public addSubcommand(subcommand: Subcommand): CommandBuilder {
    this.subcommands.push(subcommand);
    return this;
  }

  public build(): CommandDefinition[] {
    const logger: GrapheneLogger = this.logger;

    return this.subcommands.map((subcommand): CommandDefinition => {
      const usage: string = flags.positionalUsage(...subcommand.positionals);
      return {
        command: usage ? `${subcommand.name} ${usage}` : subcommand.name,
        desc: subcommand.description,
        builder: (y: AnyYargs): AnyYargs => {
          flags.setPositionals(y, ...subcommand.positionals);
          flags.setOptionalCommandFlags(y, ...subcommand.flags.optional);
          return y;
        },
        handler: async (argv: ArgvStruct): Promise<void> => {
          logger.info(`==== Running '${subcommand.name}' ===`);

          const response: boolean = await subcommand.commandHandler(argv);

          logger.info(`==== Finished running '${subcommand.name}' ====`);

          if (!response) {
            throw new GrapheneError(`Error running ${subcommand.name}, expected return value to be true`);
          }
        },
      };
    });
  }
}
