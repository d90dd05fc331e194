// SPDX-License-Identifier: Apache-2.0

import {container} from 'tsyringe-neo';
import {GrapheneError} from '../errors/graphene-error.js';

/**
 * Returns the injected parameter when the caller supplied one, otherwise resolves it from the container.
 * Classes constructed with `new` in tests pass their collaborators explicitly and never touch the container.
 *
 * @param parameter - the constructor parameter as received
 * @param token - the token the parameter is registered under
 * @param callingClassName - used in the error message when the token is not registered
 */
export function patchInject<T>(parameter: T | undefined | null, token: symbol, callingClassName: string): T {
  if (parameter !== undefined && parameter !== null) {
    return parameter;
  }

  if (!container.isRegistered(token, true)) {
    throw new GrapheneError(`${callingClassName}: no registration found for ${token.toString()}`);
  }

  return container.resolve<T>(token);
}
