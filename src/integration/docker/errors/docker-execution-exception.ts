// SPDX-License-Identifier: Apache-2.0

import {GrapheneError} from '../../../core/errors/graphene-error.js';

/**
 * Exception thrown when the execution of the docker or compose executable fails.
 */
export class DockerExecutionException extends GrapheneError {
  /**
   * The default message to use when no message is provided
   */
  private static readonly DEFAULT_MESSAGE: string = 'Execution of the docker command failed with exit code: %d';

  /**
   * @param exitCode the non-zero exit code returned by the executable or the operating system
   * @param message error message, defaults to one naming the exit code
   * @param stdOut the standard output of the executable
   * @param stdErr the standard error of the executable
   * @param cause source error (if any)
   */
  public constructor(
    public readonly exitCode: number,
    message?: string,
    public readonly stdOut: string = '',
    public readonly stdErr: string = '',
    cause?: Error,
  ) {
    super(message || DockerExecutionException.DEFAULT_MESSAGE.replace('%d', String(exitCode)), cause, {
      exitCode,
    });
  }
}
