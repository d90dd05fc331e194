// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import 'dotenv/config';
// eslint-disable-next-line n/no-extraneous-import
import 'reflect-metadata';
import {container} from 'tsyringe-neo';
import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';

import * as constants from './core/constants.js';
import {type GrapheneLogger} from './core/logging/graphene-logger.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {GrapheneError} from './core/errors/graphene-error.js';
import {UserBreak} from './core/errors/user-break.js';
import {Flags as flags} from './commands/flags.js';
import {getGrapheneVersion} from '../version.js';
import {ArgumentProcessor} from './argument-processor.js';

interface LoggingOptions {
  logLevel: string;
  developmentMode: boolean;
}

/**
 * The log level has to be known before the logger is created, so it is read ahead of the full parse.
 */
function readLoggingOptions(argv: string[]): LoggingOptions {
  const parsed: Record<string, unknown> = yargs(hideBin(argv))
    .help(false)
    .version(false)
    .option(flags.logLevel.name, {type: 'string'})
    .option(flags.devMode.name, {type: 'boolean'})
    .parseSync();

  const logLevel: unknown = parsed[flags.logLevel.name];
  return {
    logLevel: typeof logLevel === 'string' && logLevel !== '' ? logLevel : constants.GRAPHENE_LOG_LEVEL,
    developmentMode: parsed[flags.devMode.name] === true,
  };
}

export async function main(argv: string[], context?: {logger?: GrapheneLogger}): Promise<unknown> {
  const options: LoggingOptions = readLoggingOptions(argv);

  try {
    Container.getInstance().init(constants.GRAPHENE_HOME_DIR, options.logLevel, options.developmentMode);
  } catch (error) {
    console.error(`Error initializing container: ${error instanceof Error ? error.message : String(error)}`, error);
    throw new GrapheneError('Error initializing container', error instanceof Error ? error : undefined);
  }

  const logger: GrapheneLogger = container.resolve<GrapheneLogger>(InjectTokens.GrapheneLogger);

  if (context) {
    // save the logger so that graphene.ts can use it after the command finished
    context.logger = logger;
  }
  process.on('unhandledRejection', (reason: unknown): void => {
    logger.showUserError(
      new GrapheneError(`Unhandled Rejection: ${String(reason)}`, reason instanceof Error ? reason : undefined),
    );
  });
  process.on('uncaughtException', (error: Error, origin: string): void => {
    logger.showUserError(new GrapheneError(`Uncaught Exception: ${error.message}, origin: ${origin}`, error));
  });

  logger.debug('Initializing Graphene CLI');
  if (argv.length >= 3 && ['-version', '--version', '-v', '--v'].includes(argv[2] ?? '')) {
    logger.showUser(chalk.cyan('\n******************************* Graphene *****************************************'));
    logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(getGrapheneVersion()));
    logger.showUser(chalk.cyan('**********************************************************************************'));
    throw new UserBreak('displayed version information, exiting');
  }

  return ArgumentProcessor.process(argv);
}
