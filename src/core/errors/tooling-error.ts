// SPDX-License-Identifier: Apache-2.0

import {GrapheneError} from './graphene-error.js';

/**
 * Raised when the container runtime or the compose tool is unavailable or unusable.
 */
export class ToolingError extends GrapheneError {}
