// SPDX-License-Identifier: Apache-2.0

import {ToolingError} from '../../../core/errors/tooling-error.js';

/**
 * An exception thrown when the compose executable does not meet the required version.
 */
export class ComposeVersionRequirementException extends ToolingError {}
