/**
 * `ecs-rollout deploy` command
 */

import chalk from 'chalk';
import ora from 'ora';
import { AwsEcsCliClient } from '../../lib/aws-ecs-cli.js';
import type { ClusterAPI } from '../../lib/cluster-api.js';
import { UpdateAppliedButWaitFailedError, formatError } from '../../lib/errors.js';
import { extractActionableHint } from '../../lib/safe-error-handler.js';
import { ConsoleSink, StructuredLogger, type Logger } from '../../monitoring/structured-logger.js';
import { SpinnerSink } from '../utils/spinner-sink.js';
import {
  DeploymentOrchestrator,
  type DeploymentOutcome,
} from '../../deployment/orchestrator.js';
import type { TaskDefinitionLoader } from '../../task-definition/loader.js';
import type { DeployCommandOptions } from '../utils/args.js';

export interface DeployCommandDeps {
  api?: ClusterAPI;
  logger?: Logger;
  loadTaskDefinition?: TaskDefinitionLoader;
  pollIntervalMs?: number;
}

/**
 * Run one deployment and print a summary
 *
 * @returns Process exit code (0 on success, 1 on any failure)
 */
export async function handleDeployCommand(
  options: DeployCommandOptions,
  deps: DeployCommandDeps = {}
): Promise<number> {
  const { cluster, service } = options.config;
  // an injected logger owns the output; the spinner only runs on our own console
  const spinner = deps.logger ? undefined : ora();
  const logger =
    deps.logger ??
    new StructuredLogger({
      minLevel: options.logLevel,
      sink: spinner ? new SpinnerSink(new ConsoleSink(), spinner) : new ConsoleSink(),
    });
  const api = deps.api ?? new AwsEcsCliClient({ region: options.region, profile: options.profile });
  const orchestrator = new DeploymentOrchestrator(api, {
    logger,
    loadTaskDefinition: deps.loadTaskDefinition,
    pollIntervalMs: deps.pollIntervalMs,
    onWaitTransition: (_from, to) => {
      if (!spinner) {
        return;
      }
      switch (to) {
        case 'waiting':
          spinner.start(`Waiting for ${service}/${cluster} to become stable...`);
          break;
        case 'stable':
          spinner.succeed(`✅ ${service}/${cluster} is stable`);
          break;
        default:
          spinner.stop();
      }
    },
  });

  try {
    const outcome = await orchestrator.run(options.config);
    printDeploymentSummary(options, outcome);
    return 0;
  } catch (error) {
    printDeploymentFailure(error);
    return 1;
  }
}

function printDeploymentSummary(options: DeployCommandOptions, outcome: DeploymentOutcome): void {
  const { cluster, service } = options.config;
  console.log('\n' + chalk.bold.green('═'.repeat(60)));
  console.log(chalk.bold.green('✨ DEPLOYMENT SUCCESSFUL'));
  console.log(chalk.bold.green('═'.repeat(60)));
  console.log(chalk.green(`  Service: ${service}/${cluster}`));
  console.log(chalk.green(`  Task definition: ${outcome.taskDefinition}`));
  console.log(chalk.green(`  Duration: ${(outcome.durationMs / 1000).toFixed(1)}s\n`));
}

/**
 * One diagnostic line on stderr, then a hint when one applies
 */
function printDeploymentFailure(error: unknown): void {
  console.error(chalk.red(`❌ ${formatError(error)}`));
  if (error instanceof UpdateAppliedButWaitFailedError) {
    console.error(
      chalk.yellow(`   The service now references ${error.taskDefinition}; check its events before retrying.`)
    );
    return;
  }
  const hint = extractActionableHint(error);
  if (hint) {
    console.error(chalk.gray(`   ${hint}`));
  }
}
