// SPDX-License-Identifier: Apache-2.0

import {type MessageLevel} from './message-level.js';

export interface GrapheneLogger {
  setDevMode(developmentMode: boolean): void;

  nextTraceId(): void;

  prepMeta(meta?: Record<string, unknown>): Record<string, unknown>;

  /** Prints a message for the operator and mirrors it into the log file */
  showUser(message: unknown, ...arguments_: unknown[]): void;

  showUserError(error: unknown): void;

  error(message: unknown, ...arguments_: unknown[]): void;

  warn(message: unknown, ...arguments_: unknown[]): void;

  info(message: unknown, ...arguments_: unknown[]): void;

  debug(message: unknown, ...arguments_: unknown[]): void;

  showList(title: string, items?: string[]): boolean;

  addMessageGroup(key: string, title: string): void;

  addMessageGroupMessage(key: string, message: string): void;

  showMessageGroup(key: string, messageLevel?: MessageLevel): void;

  getMessageGroupKeys(): string[];

  /** Flushes pending records and releases the log destinations */
  close(): Promise<void>;
}
