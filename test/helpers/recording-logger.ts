// SPDX-License-Identifier: Apache-2.0

import util from 'node:util';
import {type GrapheneLogger} from '../../src/core/logging/graphene-logger.js';
import {MessageLevel} from '../../src/core/logging/message-level.js';

export interface LogEntry {
  level: 'error' | 'warn' | 'info' | 'debug' | 'user';
  message: string;
}

/**
 * Keeps every message in memory instead of writing log files or to the console.
 */
export class RecordingLogger implements GrapheneLogger {
  public readonly entries: LogEntry[] = [];
  public readonly userErrors: unknown[] = [];
  public readonly shownGroups: {key: string; title: string; messages: string[]; level: MessageLevel}[] = [];
  public developmentMode: boolean = false;
  public traceIds: number = 0;
  public closed: boolean = false;

  private readonly messageGroups: Map<string, {title: string; messages: string[]}> = new Map();

  public setDevMode(developmentMode: boolean): void {
    this.developmentMode = developmentMode;
  }

  public nextTraceId(): void {
    this.traceIds += 1;
  }

  public prepMeta(meta: Record<string, unknown> = {}): Record<string, unknown> {
    return meta;
  }

  public showUser(message: unknown, ...arguments_: unknown[]): void {
    this.record('user', message, arguments_);
  }

  public async close(): Promise<void> {
    this.closed = true;
  }

  public showUserError(error: unknown): void {
    this.userErrors.push(error);
  }

  public error(message: unknown, ...arguments_: unknown[]): void {
    this.record('error', message, arguments_);
  }

  public warn(message: unknown, ...arguments_: unknown[]): void {
    this.record('warn', message, arguments_);
  }

  public info(message: unknown, ...arguments_: unknown[]): void {
    this.record('info', message, arguments_);
  }

  public debug(message: unknown, ...arguments_: unknown[]): void {
    this.record('debug', message, arguments_);
  }

  public showList(title: string, items: string[] = []): boolean {
    this.record('user', title, []);
    for (const item of items) {
      this.record('user', ` - ${item}`, []);
    }
    return true;
  }

  public addMessageGroup(key: string, title: string): void {
    this.messageGroups.set(key, {title, messages: []});
  }

  public addMessageGroupMessage(key: string, message: string): void {
    this.messageGroups.get(key)?.messages.push(message);
  }

  public showMessageGroup(key: string, messageLevel: MessageLevel = MessageLevel.INFO): void {
    const group: {title: string; messages: string[]} | undefined = this.messageGroups.get(key);
    if (group) {
      this.shownGroups.push({key, title: group.title, messages: [...group.messages], level: messageLevel});
    }
  }

  public getMessageGroupKeys(): string[] {
    return [...this.messageGroups.keys()];
  }

  public messages(level: LogEntry['level']): string[] {
    return this.entries.filter((entry): boolean => entry.level === level).map((entry): string => entry.message);
  }

  private record(level: LogEntry['level'], message: unknown, arguments_: unknown[]): void {
    const text: string = typeof message === 'string' ? util.format(message, ...arguments_) : util.inspect(message);
    this.entries.push({level, message: text});
  }
}
