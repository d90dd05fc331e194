// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import chalk from 'chalk';
import {ListrInquirerPromptAdapter} from '@listr2/prompt-adapter-inquirer';
import {confirm as confirmPrompt} from '@inquirer/prompts';
import * as constants from '../../core/constants.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {type GrapheneLogger} from '../../core/logging/graphene-logger.js';
import {MessageLevel} from '../../core/logging/message-level.js';
import {type InvocationConfigBuilder} from '../../core/invocation-config-builder.js';
import {LifecycleController} from '../../core/deployment/lifecycle-controller.js';
import {type GitLfsSynchronizer} from '../../core/deployment/git-lfs-synchronizer.js';
import {DeploymentError} from '../../core/errors/deployment-error.js';
import {UserBreak} from '../../core/errors/user-break.js';
import {type LifecycleAction, type LifecyclePass, type LifecyclePlan} from '../../core/model/lifecycle-action.js';
import {type GroupResult, type LifecycleOutcome} from '../../core/model/group-result.js';
import {type ArgvStruct, type GrapheneListrTask} from '../../types/index.js';
import {type DeploymentCommandContext} from './config-interfaces/deployment-command-context.js';

@injectable()
export class DeploymentCommandTasks {
  private readonly configBuilder: InvocationConfigBuilder;
  private readonly controller: LifecycleController;
  private readonly gitLfs: GitLfsSynchronizer;
  private readonly logger: GrapheneLogger;

  public constructor(
    @inject(InjectTokens.InvocationConfigBuilder) configBuilder?: InvocationConfigBuilder,
    @inject(InjectTokens.LifecycleController) controller?: LifecycleController,
    @inject(InjectTokens.GitLfsSynchronizer) gitLfs?: GitLfsSynchronizer,
    @inject(InjectTokens.GrapheneLogger) logger?: GrapheneLogger,
  ) {
    this.configBuilder = patchInject(configBuilder, InjectTokens.InvocationConfigBuilder, this.constructor.name);
    this.controller = patchInject(controller, InjectTokens.LifecycleController, this.constructor.name);
    this.gitLfs = patchInject(gitLfs, InjectTokens.GitLfsSynchronizer, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.GrapheneLogger, this.constructor.name);
  }

  /**
   * The full task list of a lifecycle action, in the order the tasks run.
   */
  public actionTasks(argv: ArgvStruct, action: LifecycleAction): GrapheneListrTask<DeploymentCommandContext>[] {
    const plan: LifecyclePlan = this.controller.plan(action);

    return [
      this.initialize(argv, plan),
      this.resolveConfiguration(),
      ...(action === 'clean' ? [this.confirmClean()] : []),
      this.verifyTooling(),
      this.pullLargeFiles(),
      this.provisionNetwork(),
      ...this.runPasses(plan),
      this.aggregate(),
      this.showLogs(),
      this.reportOutcome(),
    ];
  }

  public initialize(argv: ArgvStruct, plan: LifecyclePlan): GrapheneListrTask<DeploymentCommandContext> {
    return {
      title: 'Initialize',
      task: (context_, task): void => {
        context_.config = this.configBuilder.build(argv);
        context_.plan = plan;
        context_.passResults = [];
        task.title += `: ${plan.action} ${context_.config.deploymentId}`;
      },
    };
  }

  /**
   * Asks before volumes are removed, unless the operator already opted out with --quiet or --force.
   */
  public confirmClean(): GrapheneListrTask<DeploymentCommandContext> {
    return {
      title: 'Confirm removal of volumes',
      skip: (context_): boolean => context_.config.quiet || context_.config.force,
      task: async (context_, task): Promise<void> => {
        const confirmed: boolean = await task.prompt(ListrInquirerPromptAdapter).run(confirmPrompt, {
          default: false,
          message: `Remove the containers and volumes of ${context_.config.deploymentId}?`,
        });

        if (!confirmed) {
          throw new UserBreak('Aborted application by user prompt');
        }
      },
    };
  }

  public resolveConfiguration(): GrapheneListrTask<DeploymentCommandContext> {
    return {
      title: 'Resolve configuration',
      task: (context_, task): void => {
        context_.resolved = this.controller.resolve(context_.config);
        task.title += `: ${context_.resolved.environmentDirectory}`;
      },
    };
  }

  public verifyTooling(): GrapheneListrTask<DeploymentCommandContext> {
    return {
      title: 'Check docker and compose',
      task: async (): Promise<void> => {
        await this.controller.verifyTooling();
      },
    };
  }

  /**
   * Only actions that start services pull. A failed pull is reported in the title and never fails the command.
   */
  public pullLargeFiles(): GrapheneListrTask<DeploymentCommandContext> {
    return {
      title: 'Pull Git LFS objects',
      skip: (context_): boolean => !LifecycleController.deploys(context_.plan),
      task: async (context_, task): Promise<void> => {
        context_.gitLfs = await this.gitLfs.pull(context_.config);
        task.title += `: ${context_.gitLfs}`;
      },
    };
  }

  public provisionNetwork(): GrapheneListrTask<DeploymentCommandContext> {
    return {
      title: 'Ensure network',
      skip: (context_): boolean => !context_.plan.provisionNetwork,
      task: async (context_, task): Promise<void> => {
        context_.network = await this.controller.provision(context_.plan, context_.config);
        task.title += ` ${context_.config.networkName}: ${context_.network ?? 'skipped'}`;
      },
    };
  }

  /**
   * One task per pass. Failed groups are recorded, never thrown here, so that later passes and the summary run.
   */
  public runPasses(plan: LifecyclePlan): GrapheneListrTask<DeploymentCommandContext>[] {
    return plan.passes.map(
      (pass: LifecyclePass, index: number): GrapheneListrTask<DeploymentCommandContext> => ({
        title: `${DeploymentCommandTasks.capitalize(pass.action)} service groups`,
        task: async (context_, task): Promise<void> => {
          const results: GroupResult[] = await this.controller.runPass(pass, context_.resolved.groups, context_.config);
          context_.passResults[index] = results;
          task.title += `: ${results.map((result): string => DeploymentCommandTasks.describe(result)).join(', ')}`;
        },
      }),
    );
  }

  public aggregate(): GrapheneListrTask<DeploymentCommandContext> {
    return {
      title: 'Collect results',
      task: (context_): void => {
        context_.outcome = this.controller.aggregate(context_.plan, context_.passResults);
      },
    };
  }

  public showLogs(): GrapheneListrTask<DeploymentCommandContext> {
    return {
      title: 'Show service logs',
      skip: (context_): boolean =>
        !context_.config.showLogs || !LifecycleController.deploys(context_.plan) || !context_.outcome?.succeeded,
      task: async (context_): Promise<void> => {
        const logs: GroupResult[] = await this.controller.showLogs(context_.resolved.groups);
        if (context_.outcome) {
          context_.outcome = {...context_.outcome, logs};
        }
        for (const result of logs) {
          this.logger.showList(`Logs of ${result.group}`, [...result.output]);
        }
      },
    };
  }

  /**
   * Prints the per-group summary and fails the command when the action failed overall.
   */
  public reportOutcome(): GrapheneListrTask<DeploymentCommandContext> {
    return {
      title: 'Report',
      task: (context_): void => {
        const outcome: LifecycleOutcome | undefined = context_.outcome;
        if (!outcome) {
          return;
        }

        const key: string = constants.DEPLOYMENT_SUMMARY_MESSAGE_GROUP;
        this.logger.addMessageGroup(key, `${context_.plan.action} ${context_.config.deploymentId}`);
        for (const result of outcome.results) {
          this.logger.addMessageGroupMessage(key, DeploymentCommandTasks.describe(result));
          for (const line of result.output) {
            this.logger.addMessageGroupMessage(key, `  ${line}`);
          }
        }
        this.logger.showMessageGroup(key, outcome.succeeded ? MessageLevel.INFO : MessageLevel.ERROR);

        if (!outcome.succeeded) {
          throw DeploymentCommandTasks.failure(context_.plan, outcome);
        }
      },
    };
  }

  private static failure(plan: LifecyclePlan, outcome: LifecycleOutcome): DeploymentError {
    const tolerant: Set<string> = new Set(
      plan.passes.filter((pass): boolean => pass.tolerant).map((pass): string => pass.action),
    );
    const failed: GroupResult[] = outcome.results.filter(
      (result): boolean => result.status === 'failed' && !tolerant.has(result.action),
    );
    const groups: string = failed.map((result): string => result.group).join(', ');
    const first: GroupResult | undefined = failed[0];

    return new DeploymentError(
      `${plan.action} failed for ${groups}`,
      groups,
      first?.error?.command ?? '',
      first?.error,
    );
  }

  private static describe(result: GroupResult): string {
    const status: string =
      result.status === 'succeeded'
        ? chalk.green(result.status)
        : result.status === 'failed'
          ? chalk.red(result.status)
          : chalk.yellow(result.status);
    const state: string = result.state ? ` (${result.state})` : '';
    return `${result.group} ${status}${state}`;
  }

  private static capitalize(value: string): string {
    return value.charAt(0).toUpperCase() + value.slice(1);
  }
}
