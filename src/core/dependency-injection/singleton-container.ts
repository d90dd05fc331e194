// SPDX-License-Identifier: Apache-2.0

import {Lifecycle} from 'tsyringe-neo';
import {type Constructor} from '../../types/index.js';

export class SingletonContainer {
  public lifecycle: Lifecycle;

  public constructor(
    public token: symbol,
    public useClass: Constructor<unknown>,
  ) {
    this.lifecycle = Lifecycle.Singleton;
  }
}
