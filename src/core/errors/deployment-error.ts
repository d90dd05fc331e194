// SPDX-License-Identifier: Apache-2.0

import {GrapheneError} from './graphene-error.js';

export class DeploymentError extends GrapheneError {
  /**
   * @param message error message
   * @param group the service group the failing command was run for
   * @param command the command line, so it can be reproduced manually
   * @param cause source error (if any)
   */
  public constructor(
    message: string,
    public readonly group: string,
    public readonly command: string,
    cause?: Error,
  ) {
    super(message, cause, {group, command});
  }
}
