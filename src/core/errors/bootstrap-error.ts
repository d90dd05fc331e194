// SPDX-License-Identifier: Apache-2.0

import {GrapheneError} from './graphene-error.js';

/**
 * Raised when any step of node identity generation fails. Key material produced by a failed
 * bootstrap must never be treated as a usable identity.
 */
export class BootstrapError extends GrapheneError {
  public constructor(
    message: string,
    public readonly step: string,
    cause?: Error,
  ) {
    super(message, cause, {step});
  }
}
