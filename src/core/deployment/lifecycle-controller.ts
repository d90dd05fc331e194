// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type GrapheneLogger} from '../logging/graphene-logger.js';
import * as constants from '../constants.js';
import {type ConfigResolver, type ResolvedConfiguration} from './config-resolver.js';
import {type NetworkProvisioner} from './network-provisioner.js';
import {type ServiceGroupRunner} from './service-group-runner.js';
import {type ToolingVerifier} from './tooling-verifier.js';
import {type InvocationConfig} from '../model/invocation-config.js';
import {type LifecycleAction, type LifecyclePass, type LifecyclePlan} from '../model/lifecycle-action.js';
import {type ServiceGroup} from '../model/service-group.js';
import {type GroupResult, type LifecycleOutcome} from '../model/group-result.js';
import {type NetworkOutcome} from '../model/network-outcome.js';

/**
 * Drives a lifecycle action across both service groups: plan, resolve, provision, run every pass over the groups in
 * declared order and aggregate the results.
 */
@injectable()
export class LifecycleController {
  private readonly configResolver: ConfigResolver;
  private readonly networkProvisioner: NetworkProvisioner;
  private readonly runner: ServiceGroupRunner;
  private readonly toolingVerifier: ToolingVerifier;
  private readonly logger: GrapheneLogger;

  public constructor(
    @inject(InjectTokens.ConfigResolver) configResolver?: ConfigResolver,
    @inject(InjectTokens.NetworkProvisioner) networkProvisioner?: NetworkProvisioner,
    @inject(InjectTokens.ServiceGroupRunner) runner?: ServiceGroupRunner,
    @inject(InjectTokens.ToolingVerifier) toolingVerifier?: ToolingVerifier,
    @inject(InjectTokens.GrapheneLogger) logger?: GrapheneLogger,
  ) {
    this.configResolver = patchInject(configResolver, InjectTokens.ConfigResolver, this.constructor.name);
    this.networkProvisioner = patchInject(networkProvisioner, InjectTokens.NetworkProvisioner, this.constructor.name);
    this.runner = patchInject(runner, InjectTokens.ServiceGroupRunner, this.constructor.name);
    this.toolingVerifier = patchInject(toolingVerifier, InjectTokens.ToolingVerifier, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.GrapheneLogger, this.constructor.name);
  }

  public plan(action: LifecycleAction): LifecyclePlan {
    switch (action) {
      case 'validate': {
        return {action, passes: [{action: 'validate', tolerant: false}], provisionNetwork: false};
      }
      case 'stop': {
        return {action, passes: [{action: 'stop', tolerant: true}], provisionNetwork: false};
      }
      case 'clean': {
        return {action, passes: [{action: 'clean', tolerant: true}], provisionNetwork: false};
      }
      case 'restart': {
        return {
          action,
          passes: [
            {action: 'stop', tolerant: true},
            {action: 'deploy', tolerant: false},
          ],
          provisionNetwork: true,
        };
      }
      case 'deploy': {
        return {action, passes: [{action: 'deploy', tolerant: false}], provisionNetwork: true};
      }
      case 'status': {
        return {action, passes: [{action: 'status', tolerant: false}], provisionNetwork: false};
      }
    }
  }

  /**
   * @throws ConfigurationError before anything is started when a file is missing
   */
  public resolve(config: InvocationConfig): ResolvedConfiguration {
    return this.configResolver.resolve(config);
  }

  /**
   * @throws ToolingError when docker or compose cannot be used
   */
  public async verifyTooling(): Promise<void> {
    await this.toolingVerifier.verifyDocker();
    await this.toolingVerifier.composeClient();
  }

  /**
   * @returns undefined when the plan needs no network
   */
  public async provision(plan: LifecyclePlan, config: InvocationConfig): Promise<NetworkOutcome | undefined> {
    if (!plan.provisionNetwork) {
      return undefined;
    }
    return this.networkProvisioner.ensure(config);
  }

  /**
   * Runs one pass over the groups, one group at a time. A failing group does not stop its siblings unless the pass
   * is not tolerant and the invocation asks to fail fast.
   */
  public async runPass(
    pass: LifecyclePass,
    groups: readonly ServiceGroup[],
    config: InvocationConfig,
  ): Promise<GroupResult[]> {
    const results: GroupResult[] = [];
    let halted: boolean = false;

    for (const group of groups) {
      if (halted) {
        this.logger.info(`skipping ${pass.action} of ${group.name} after an earlier failure`);
        results.push({group: group.name, action: pass.action, status: 'skipped', output: []});
        continue;
      }

      this.logger.info(`${pass.action} ${group.name} (${group.projectName})`);
      const result: GroupResult = await this.runner.run(pass.action, group, config);
      results.push(result);

      if (result.status === 'failed') {
        if (pass.tolerant) {
          this.logger.warn(`${pass.action} of ${group.name} failed, continuing: ${result.error?.message}`);
        } else if (config.failFast) {
          halted = true;
        }
      }
    }

    return results;
  }

  public async showLogs(
    groups: readonly ServiceGroup[],
    tail: number = constants.DEFAULT_LOG_TAIL,
  ): Promise<GroupResult[]> {
    const results: GroupResult[] = [];
    for (const group of groups) {
      results.push(await this.runner.logs(group, tail));
    }
    return results;
  }

  /**
   * The action fails if and only if a group failed in a pass that is not tolerant.
   */
  public aggregate(plan: LifecyclePlan, passResults: readonly (readonly GroupResult[])[]): LifecycleOutcome {
    let succeeded: boolean = true;
    for (const [index, pass] of plan.passes.entries()) {
      const results: readonly GroupResult[] = passResults[index] ?? [];
      if (!pass.tolerant && results.some((result): boolean => result.status === 'failed')) {
        succeeded = false;
      }
    }
    return {succeeded, results: passResults.flat()};
  }

  public static deploys(plan: LifecyclePlan): boolean {
    return plan.passes.some((pass): boolean => pass.action === 'deploy');
  }
}
