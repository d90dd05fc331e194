// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  LogsDirectory: Symbol.for('LogsDirectory'),
  DockerExecutable: Symbol.for('DockerExecutable'),
  GrapheneLogger: Symbol.for('GrapheneLogger'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  Middlewares: Symbol.for('Middlewares'),
  ShellRunner: Symbol.for('ShellRunner'),
  DockerClient: Symbol.for('DockerClient'),
  ComposeClientBuilder: Symbol.for('ComposeClientBuilder'),
  ToolingVerifier: Symbol.for('ToolingVerifier'),
  ConfigResolver: Symbol.for('ConfigResolver'),
  NetworkProvisioner: Symbol.for('NetworkProvisioner'),
  GitLfsSynchronizer: Symbol.for('GitLfsSynchronizer'),
  KeyMaterialCodec: Symbol.for('KeyMaterialCodec'),
  KeyMaterialPresenter: Symbol.for('KeyMaterialPresenter'),
  KeyBootstrapper: Symbol.for('KeyBootstrapper'),
  ServiceGroupRunner: Symbol.for('ServiceGroupRunner'),
  LifecycleController: Symbol.for('LifecycleController'),
  InvocationConfigBuilder: Symbol.for('InvocationConfigBuilder'),
  NodeCommandTasks: Symbol.for('NodeCommandTasks'),
  NodeCommandHandlers: Symbol.for('NodeCommandHandlers'),
  DeploymentCommandTasks: Symbol.for('DeploymentCommandTasks'),
  DeploymentCommandHandlers: Symbol.for('DeploymentCommandHandlers'),
  NodeCommandDefinition: Symbol.for('NodeCommandDefinition'),
  DeploymentCommandDefinition: Symbol.for('DeploymentCommandDefinition'),
  Commands: Symbol.for('Commands'),
};
