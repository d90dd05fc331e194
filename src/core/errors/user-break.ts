// SPDX-License-Identifier: Apache-2.0

import {GrapheneError} from './graphene-error.js';

/**
 * Signals a deliberate stop requested by the operator, such as a declined confirmation.
 */
export class UserBreak extends GrapheneError {}
