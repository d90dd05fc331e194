// SPDX-License-Identifier: Apache-2.0

import yargs, {type Argv} from 'yargs';
import {hideBin} from 'yargs/helpers';
import {container} from 'tsyringe-neo';
import {GrapheneError} from './core/errors/graphene-error.js';
import {ConfigurationError} from './core/errors/configuration-error.js';
import {Flags as flags} from './commands/flags.js';
import {type Middlewares} from './core/middlewares.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {type GrapheneLogger} from './core/logging/graphene-logger.js';
import {type Commands} from './commands/commands.js';
import {type CommandDefinition} from './types/index.js';
import {getGrapheneVersion} from '../version.js';

export class ArgumentProcessor {
  public static async process(argv: string[]): Promise<unknown> {
    const logger: GrapheneLogger = container.resolve<GrapheneLogger>(InjectTokens.GrapheneLogger);
    const middlewares: Middlewares = container.resolve<Middlewares>(InjectTokens.Middlewares);
    const commands: Commands = container.resolve<Commands>(InjectTokens.Commands);

    logger.debug('Initializing commands');
    const rootCmd: Argv = yargs(hideBin(argv))
      .scriptName('graphene')
      .usage('Usage:\n  graphene <command> [environment] [node-type] [options]')
      .alias('h', 'help')
      .alias('v', 'version')
      .version(getGrapheneVersion());

    for (const definition of commands.getCommandDefinitions()) {
      ArgumentProcessor.register(rootCmd, definition);
    }

    rootCmd.strict().demandCommand(1, 'Select a command');

    rootCmd.middleware(
      [middlewares.setLoggerDevFlag(), middlewares.displayHeader()],
      false, // applyBeforeValidate is false as otherwise middleware is called twice
    );

    // Expand the terminal width to the maximum available
    rootCmd.wrap(null);

    rootCmd.fail((message: string | undefined, error: Error | undefined): void => {
      if (error) {
        throw error instanceof GrapheneError ? error : new GrapheneError(error.message, error);
      }

      // validation failures from yargs: unknown argument, invalid choice, missing command
      logger.showUser(message ?? 'Invalid command line');
      rootCmd.showHelp();
      // Set exit code but don't exit immediately - allows I/O buffers to flush
      process.exitCode = 1;
      throw new ConfigurationError(message ?? 'Invalid command line');
    });

    logger.debug('Setting up flags');
    // set root level flags
    flags.setOptionalCommandFlags(rootCmd, flags.devMode, flags.logLevel);
    logger.debug('Parsing root command (executing the commands)');
    return rootCmd.parseAsync();
  }

  private static register(rootCmd: Argv, definition: CommandDefinition): void {
    rootCmd.command(definition.command, definition.desc, definition.builder, definition.handler);
  }
}
