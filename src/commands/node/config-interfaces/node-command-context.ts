// SPDX-License-Identifier: Apache-2.0

import {type InvocationConfig} from '../../../core/model/invocation-config.js';
import {type BootstrapOutcome} from '../../../core/model/bootstrap-outcome.js';

export interface NodeCommandContext {
  config: InvocationConfig;
  outcome?: BootstrapOutcome;
  peerId?: string;
  validatorLines?: string[];
}
