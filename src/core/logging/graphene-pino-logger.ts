// SPDX-License-Identifier: Apache-2.0

import pino, {type Logger as PinoLogger, type TransportTargetOptions} from 'pino';
import {mkdirSync} from 'node:fs';
import {v4 as uuidv4} from 'uuid';
// eslint-disable-next-line unicorn/import-style
import * as util from 'node:util';
import chalk, {type ChalkInstance} from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {type GrapheneLogger} from './graphene-logger.js';
import {GrapheneError} from '../errors/graphene-error.js';
import {MessageLevel} from './message-level.js';

type PinoLevel = 'info' | 'warn' | 'error' | 'debug';

/**
 * Pino-based implementation of the GrapheneLogger interface.
 *
 * Emits two files under the logs directory:
 *  - graphene.ndjson : newline-delimited JSON (authoritative)
 *  - graphene.log    : pretty human-readable
 */
@injectable()
export class GraphenePinoLogger implements GrapheneLogger {
  protected readonly pinoLogger: PinoLogger;
  private readonly transport: pino.ThreadStream;
  private closed: boolean = false;
  private traceId?: string;
  private developmentMode: boolean;
  private readonly messageGroupMap: Map<string, string[]> = new Map();
  private readonly MINOR_LINE_SEPARATOR: string =
    '-------------------------------------------------------------------------------';

  /**
   * @param logLevel - the log level to use (fatal|error|warn|info|debug|trace)
   * @param developmentMode - if true, show full stack traces in error messages
   * @param logsDirectory - where the log files are written
   */
  public constructor(
    @inject(InjectTokens.LogLevel) logLevel?: string,
    @inject(InjectTokens.DevelopmentMode) developmentMode?: boolean,
    @inject(InjectTokens.LogsDirectory) logsDirectory?: string,
  ) {
    const level: string = patchInject(logLevel, InjectTokens.LogLevel, this.constructor.name) ?? 'info';
    this.developmentMode = patchInject(developmentMode, InjectTokens.DevelopmentMode, this.constructor.name);
    const directory: string = patchInject(logsDirectory, InjectTokens.LogsDirectory, this.constructor.name);

    this.nextTraceId();

    // pino-pretty does not create missing directories
    mkdirSync(directory, {recursive: true});

    const ndjsonTarget: TransportTargetOptions = {
      target: 'pino/file',
      level,
      options: {destination: PathEx.join(directory, 'graphene.ndjson')},
    };

    const prettyTarget: TransportTargetOptions = {
      target: 'pino-pretty',
      level,
      options: {
        destination: PathEx.join(directory, 'graphene.log'),
        translateTime: 'HH:MM:ss.l',
        colorize: false,
        messageKey: 'msg',
        messageFormat: '{msg} [traceId="{traceId}"]',
        ignore: 'pid,hostname,traceId',
        colorizeObjects: false,
        crlf: false,
        hideObject: false,
      },
    };

    this.transport = pino.transport({targets: [ndjsonTarget, prettyTarget]});

    this.pinoLogger = pino(
      {
        level,
        mixin: (): {traceId?: string} => (this.traceId ? {traceId: this.traceId} : {}),
        // key documents and their transport encodings must never reach the log files
        redact: {
          paths: [
            '*.privateKey',
            '*.priv_key',
            '*.nodeKeyJson',
            '*.privValidatorKeyJson',
            '*.NODE_KEY_JSON',
            '*.PRIV_VALIDATOR_KEY_JSON',
          ],
          remove: true,
        },
      },
      this.transport,
    );
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await new Promise<void>((resolve): void => {
      this.transport.once('close', (): void => resolve());
      this.transport.end();
    });
  }

  public setDevMode(developmentMode: boolean): void {
    this.debug(`dev mode logging: ${developmentMode}`);
    this.developmentMode = developmentMode;
  }

  public nextTraceId(): void {
    this.traceId = uuidv4();
  }

  public prepMeta(meta: Record<string, unknown> = {}): Record<string, unknown> {
    meta.traceId = this.traceId;
    return meta;
  }

  public showUser(message: unknown, ...arguments_: unknown[]): void {
    const formatted: string = util.format(message, ...arguments_);
    console.log(formatted);
    this.info(formatted);
  }

  public showUserError(error: unknown): void {
    const stack: {message: string; stacktrace?: string}[] = [];
    let current: unknown = error;
    let depth: number = 0;
    while (current && depth < 10) {
      if (current instanceof Error) {
        stack.push({message: current.message, stacktrace: current.stack});
        current = current.cause;
      } else {
        stack.push({message: String(current)});
        current = undefined;
      }
      depth += 1;
    }

    console.log(chalk.red('*********************************** ERROR *****************************************'));
    if (this.developmentMode) {
      let prefix: string = '';
      let indent: string = '';
      for (const s of stack) {
        console.log(indent + prefix + chalk.yellow(s.message));
        if (s.stacktrace) {
          const formatted: string = s.stacktrace
            .split('\n')
            .filter((l): boolean => !l.includes('node:internal'))
            .join('\n')
            .trim();
          console.log(indent + chalk.gray(formatted) + '\n');
        }
        indent += '  ';
        prefix = 'Caused by: ';
      }
    } else {
      const lines: string[] = (stack[0]?.message ?? String(error)).split('\n');
      for (const line of lines) {
        console.log(chalk.yellow(line));
      }
    }
    console.log(chalk.red('***********************************************************************************'));

    this.toPino('error', error, []);
  }

  public error(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('error', message, arguments_);
  }

  public warn(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('warn', message, arguments_);
  }

  public info(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('info', message, arguments_);
  }

  public debug(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('debug', message, arguments_);
  }

  public showList(title: string, items: string[] = []): boolean {
    this.showUser(chalk.green(`\n *** ${title} ***`));
    this.showUser(chalk.green(this.MINOR_LINE_SEPARATOR));
    if (items.length > 0) {
      for (const name of items) {
        this.showUser(chalk.cyan(` - ${name}`));
      }
    } else {
      this.showUser(chalk.blue('[ None ]'));
    }

    this.showUser('\n');
    return true;
  }

  public addMessageGroup(key: string, title: string): void {
    if (this.messageGroupMap.has(key)) {
      this.warn(`Message group with key "${key}" already exists. Skipping.`);
      return;
    }
    this.messageGroupMap.set(key, [`${title}:`]);
    this.debug(`Added message group "${title}" with key "${key}".`);
  }

  public addMessageGroupMessage(key: string, message: string): void {
    const messages: string[] | undefined = this.messageGroupMap.get(key);
    if (!messages) {
      throw new GrapheneError(`Message group with key "${key}" does not exist.`);
    }
    messages.push(message);
  }

  public showMessageGroup(key: string, messageLevel: MessageLevel = MessageLevel.INFO): void {
    const messages: string[] | undefined = this.messageGroupMap.get(key);
    if (!messages) {
      this.warn(`Message group with key "${key}" does not exist.`);
      return;
    }

    let titleColor: ChalkInstance;
    let textColor: ChalkInstance;
    switch (messageLevel) {
      case MessageLevel.ERROR: {
        titleColor = chalk.red;
        textColor = chalk.red;
        break;
      }
      case MessageLevel.WARN: {
        titleColor = chalk.yellow;
        textColor = chalk.yellow;
        break;
      }
      default: {
        titleColor = chalk.green;
        textColor = chalk.cyan;
        break;
      }
    }

    // message groups may hold key material, so they go to the console only
    console.log(titleColor(`\n *** ${messages[0]} ***`));
    console.log(titleColor(this.MINOR_LINE_SEPARATOR));
    for (let index: number = 1; index < messages.length; index++) {
      console.log(textColor(` - ${messages[index]}`));
    }
    console.log(titleColor(this.MINOR_LINE_SEPARATOR));
    this.messageGroupMap.delete(key);
    this.debug(`Displayed message group "${key}".`);
  }

  public getMessageGroupKeys(): string[] {
    return [...this.messageGroupMap.keys()];
  }

  private toPino(level: PinoLevel, message: unknown, arguments_: unknown[]): void {
    const meta: Record<string, unknown> = this.prepMeta({});

    if (message instanceof Error) {
      this.pinoLogger[level]({...meta, err: message}, message.message ?? 'Error');
      return;
    }

    if (message && typeof message === 'object') {
      const object: Record<string, unknown> = {...meta, ...message};
      if (arguments_.length > 0) {
        this.pinoLogger[level](object, util.format('%s', ...arguments_));
      } else {
        this.pinoLogger[level](object);
      }
      return;
    }

    this.pinoLogger[level](meta, util.format(message, ...arguments_));
  }
}
