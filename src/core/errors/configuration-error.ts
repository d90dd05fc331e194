// SPDX-License-Identifier: Apache-2.0

import {GrapheneError} from './graphene-error.js';

/**
 * Raised when a required file, directory or argument value is missing or invalid.
 * No side effect has been attempted when this error is thrown.
 */
export class ConfigurationError extends GrapheneError {
  public constructor(
    message: string,
    public readonly subject?: string,
    cause?: Error,
  ) {
    super(message, cause, subject ? {subject} : {});
  }
}
