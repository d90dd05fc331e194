// SPDX-License-Identifier: Apache-2.0

export class ContainerSummary {
  public constructor(
    public readonly name: string,
    /** runtime state such as "running", "exited" or "created" */
    public readonly state: string,
  ) {}

  public get running(): boolean {
    return this.state === 'running';
  }
}
