// SPDX-License-Identifier: Apache-2.0

import {DockerExecution} from './docker-execution.js';

/**
 * A builder for creating a docker command execution.
 *
 * Unlike a plain argument list, tokens are emitted in the order they are added: compose takes its global options
 * (`--file`, `--env-file`, `--project-name`) before the sub-command, while sub-command options follow it.
 */
export class DockerExecutionBuilder {
  private static readonly NAME_MUST_NOT_BE_NULL: string = 'name must not be null';
  private static readonly VALUE_MUST_NOT_BE_NULL: string = 'value must not be null';

  /**
   * The docker or compose executable.
   */
  private dockerExecutable: string | undefined;

  /**
   * Every token after the executable, in the order it was added.
   */
  private readonly tokens: string[] = [];

  public executable(dockerExecutable: string): DockerExecutionBuilder {
    if (!dockerExecutable) {
      throw new Error('dockerExecutable must not be null');
    }
    this.dockerExecutable = dockerExecutable;
    return this;
  }

  /**
   * Adds the list of subcommands to the execution.
   * @param commands the list of subcommands to be added
   * @returns this builder
   */
  public subcommands(...commands: string[]): DockerExecutionBuilder {
    if (commands.length === 0) {
      throw new Error('commands must not be null');
    }
    this.tokens.push(...commands);
    return this;
  }

  /**
   * Adds a long option with its value, rendered as `--name value`.
   * @param name the name of the argument
   * @param value the value of the argument
   * @returns this builder
   */
  public argument(name: string, value: string): DockerExecutionBuilder {
    if (!name) {
      throw new Error(DockerExecutionBuilder.NAME_MUST_NOT_BE_NULL);
    }
    if (!value) {
      throw new Error(DockerExecutionBuilder.VALUE_MUST_NOT_BE_NULL);
    }
    this.tokens.push(`--${name}`, value);
    return this;
  }

  /**
   * Adds an option once per value.
   * @param name the name of the option
   * @param values the list of values for the option
   * @returns this builder
   */
  public optionsWithMultipleValues(name: string, values: readonly string[]): DockerExecutionBuilder {
    if (!name) {
      throw new Error(DockerExecutionBuilder.NAME_MUST_NOT_BE_NULL);
    }
    for (const value of values) {
      this.argument(name, value);
    }
    return this;
  }

  /**
   * Adds a positional argument to the execution.
   * @param value the value of the positional argument
   * @returns this builder
   */
  public positional(value: string): DockerExecutionBuilder {
    if (!value) {
      throw new Error(DockerExecutionBuilder.VALUE_MUST_NOT_BE_NULL);
    }
    this.tokens.push(value);
    return this;
  }

  /**
   * Adds a flag, rendered as `--flag`.
   * @param flag the flag to be added
   * @returns this builder
   */
  public flag(flag: string): DockerExecutionBuilder {
    if (!flag) {
      throw new Error('flag must not be null');
    }
    this.tokens.push(`--${flag}`);
    return this;
  }

  /**
   * Builds the DockerExecution instance, which starts the process.
   */
  public build(): DockerExecution {
    return new DockerExecution(this.buildCommand());
  }

  /**
   * Builds the command array for the execution.
   * @returns the executable followed by its arguments
   */
  public buildCommand(): string[] {
    if (!this.dockerExecutable) {
      throw new Error('executable must be set before building');
    }
    return [this.dockerExecutable, ...this.tokens];
  }
}
