// SPDX-License-Identifier: Apache-2.0

import {ContainerRunOptions} from './container-run-options.js';

export class ContainerRunOptionsBuilder {
  private _image: string = '';
  private _name?: string;
  private readonly _volumes: string[] = [];
  private readonly _command: string[] = [];

  private constructor() {}

  public static builder(): ContainerRunOptionsBuilder {
    return new ContainerRunOptionsBuilder();
  }

  public image(image: string): ContainerRunOptionsBuilder {
    this._image = image;
    return this;
  }

  /**
   * Set the container name, so that later `cp` and `rm` calls can address it.
   */
  public name(name: string): ContainerRunOptionsBuilder {
    this._name = name;
    return this;
  }

  /**
   * Bind mount a host path.
   * @param hostPath absolute path on the host
   * @param containerPath absolute path inside the container
   * @param readOnly mount with `:ro`
   */
  public volume(hostPath: string, containerPath: string, readOnly: boolean = false): ContainerRunOptionsBuilder {
    this._volumes.push(`${hostPath}:${containerPath}${readOnly ? ':ro' : ''}`);
    return this;
  }

  /**
   * Arguments passed to the image entry point.
   */
  public command(...command: string[]): ContainerRunOptionsBuilder {
    this._command.push(...command);
    return this;
  }

  public build(): ContainerRunOptions {
    return new ContainerRunOptions(this._image, this._name, [...this._volumes], [...this._command]);
  }
}
