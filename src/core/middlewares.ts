// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {Flags as flags} from '../commands/flags.js';
import {type GrapheneLogger} from './logging/graphene-logger.js';
import {type ArgvStruct} from '../types/index.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {getGrapheneVersion} from '../../version.js';

@injectable()
export class Middlewares {
  private readonly logger: GrapheneLogger;

  public constructor(@inject(InjectTokens.GrapheneLogger) logger?: GrapheneLogger) {
    this.logger = patchInject(logger, InjectTokens.GrapheneLogger, this.constructor.name);
  }

  public setLoggerDevFlag(): (argv: ArgvStruct) => void {
    const logger: GrapheneLogger = this.logger;

    return (argv: ArgvStruct): void => {
      if (argv[flags.devMode.name] === true) {
        logger.debug('Setting logger dev flag');
        logger.setDevMode(true);
      }
    };
  }

  /**
   * Starts a new trace id for the command and prints the command header unless --quiet is given.
   */
  public displayHeader(): (argv: ArgvStruct) => void {
    const logger: GrapheneLogger = this.logger;

    return (argv: ArgvStruct): void => {
      logger.nextTraceId();

      const commandData: string = argv._.join(' ');
      logger.debug({argv}, `processing command '${commandData}'`);

      if (argv[flags.quiet.name] === true) {
        return;
      }

      const environment: unknown = argv[flags.environment.name];
      logger.showUser(chalk.cyan('\n******************************* Graphene *****************************************'));
      logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(getGrapheneVersion()));
      logger.showUser(chalk.cyan('Environment\t\t:'), chalk.yellow(String(environment ?? 'local')));
      logger.showUser(chalk.cyan('Current Command\t\t:'), chalk.yellow(commandData));
      logger.showUser(chalk.cyan('**********************************************************************************'));
    };
  }
}
