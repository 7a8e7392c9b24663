/**
 * Deployment Orchestrator - Main Entry Point
 *
 * Runs one rolling deployment of an ECS service:
 * 1. Describe the service's current deployments
 * 2. Load the task definition document
 * 3. Register it as a new revision
 * 4. Point the service at that revision
 * 5. Wait until the service is stable, reporting status meanwhile
 *
 * Steps run strictly in order and the first failure ends the run; nothing
 * is retried. The configured timeout bounds the whole run.
 *
 * @example
 * ```typescript
 * const orchestrator = new DeploymentOrchestrator(new AwsEcsCliClient(), { logger });
 * const result = await orchestrator.run({
 *   cluster: 'default',
 *   service: 'web',
 *   taskDefinitionPath: 'ecs-task-def.json',
 *   timeoutMs: 300_000,
 * });
 * console.log(result.taskDefinition); // e.g. "web:42"
 * ```
 */

import type { ClusterAPI } from '../lib/cluster-api.js';
import { formatDeploymentEntry } from '../lib/cluster-api.js';
import {
  DeploymentError,
  ParseError,
  PlatformCallError,
  RegistrationConfirmationError,
  UpdateAppliedButWaitFailedError,
  formatError,
} from '../lib/errors.js';
import type { Logger } from '../monitoring/structured-logger.js';
import { loadTaskDefinition, type TaskDefinitionLoader } from '../task-definition/loader.js';
import { TaskDefinitionModel } from '../task-definition/model.js';
import type { DeployConfig, DeploymentEntry, DeploymentStatusSnapshot } from '../types.js';
import { abortable, createDeploymentContext, type DeploymentContext } from './context.js';
import { waitForStableService, type WaitState } from './stability-waiter.js';

export interface OrchestratorOptions {
  logger: Logger;
  /** Defaults to reading the document from disk with process.env substitution */
  loadTaskDefinition?: TaskDefinitionLoader;
  /** Status poll interval during the wait phase (default 10s) */
  pollIntervalMs?: number;
  onWaitTransition?: (from: WaitState, to: WaitState) => void;
}

/**
 * Result of a successful run
 */
export interface DeploymentOutcome {
  registered: TaskDefinitionModel;
  /** `family:revision` the service now runs */
  taskDefinition: string;
  /** Deployments reported before anything changed */
  before: DeploymentEntry[];
  /** Last status the reporter saw during the wait, if any poll completed */
  lastSnapshot?: DeploymentStatusSnapshot;
  durationMs: number;
}

function causeMessage(error: unknown): string {
  if (error instanceof PlatformCallError) {
    return error.diagnostics || error.message;
  }
  return formatError(error);
}

export class DeploymentOrchestrator {
  private readonly api: ClusterAPI;
  private readonly logger: Logger;
  private readonly load: TaskDefinitionLoader;
  private readonly pollIntervalMs?: number;
  private readonly onWaitTransition?: (from: WaitState, to: WaitState) => void;

  constructor(api: ClusterAPI, options: OrchestratorOptions) {
    this.api = api;
    this.logger = options.logger;
    this.load = options.loadTaskDefinition ?? ((path) => loadTaskDefinition(path));
    this.pollIntervalMs = options.pollIntervalMs;
    this.onWaitTransition = options.onWaitTransition;
  }

  /**
   * Execute one deployment run
   *
   * @throws {PlatformCallError} An ECS call failed before the service was updated
   * @throws {ParseError} The document or a response could not be decoded
   * @throws {TemplateError} The document references an unset must_env variable
   * @throws {RegistrationConfirmationError} Registration response did not confirm a revision
   * @throws {UpdateAppliedButWaitFailedError} Service updated but never became stable
   */
  async run(config: DeployConfig): Promise<DeploymentOutcome> {
    const context = createDeploymentContext({
      cluster: config.cluster,
      service: config.service,
      timeoutMs: config.timeoutMs,
    });
    const log = this.logger.child({ tag: context.tag });

    log.info('Starting deployment', context.deadline ? { deadline: context.deadline.toISOString() } : undefined);

    try {
      const before = await this.describeServiceDeployments(context, log);
      const definition = await this.loadTaskDefinition(config.taskDefinitionPath, log);
      const registered = await this.registerTaskDefinition(definition, context, log);
      const taskDefinition = await this.updateService(registered, context, log);
      const lastSnapshot = await this.waitServiceStable(taskDefinition, context, log);

      log.info('Service is stable now. Completed!');
      return {
        registered,
        taskDefinition,
        before,
        lastSnapshot,
        durationMs: context.elapsedMs(),
      };
    } finally {
      context.dispose();
    }
  }

  /**
   * Run one ECS call under the run's deadline, normalising failures to
   * PlatformCallError
   */
  private async callPlatform<T>(
    operation: string,
    context: DeploymentContext,
    call: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    try {
      return await abortable(call(context.signal), context.signal);
    } catch (error) {
      if (error instanceof DeploymentError) {
        throw error;
      }
      const timedOut = context.deadlineExceeded();
      throw new PlatformCallError(operation, timedOut ? 'deadline exceeded' : formatError(error), {
        timedOut,
        cause: error,
      });
    }
  }

  private async describeServiceDeployments(
    context: DeploymentContext,
    log: Logger
  ): Promise<DeploymentEntry[]> {
    const deployments = await this.callPlatform('describe-services', context, (signal) =>
      this.api.describeServiceDeployments(context.cluster, context.service, signal)
    );
    for (const entry of deployments) {
      log.info(formatDeploymentEntry(entry));
    }
    return deployments;
  }

  private async loadTaskDefinition(path: string, log: Logger): Promise<TaskDefinitionModel> {
    log.info(`Creating a new task definition by ${path}`);
    return this.load(path);
  }

  private async registerTaskDefinition(
    definition: TaskDefinitionModel,
    context: DeploymentContext,
    log: Logger
  ): Promise<TaskDefinitionModel> {
    log.info('Registering a new task definition...');

    let response: unknown;
    try {
      response = await this.callPlatform('register-task-definition', context, (signal) =>
        this.api.registerTaskDefinition(definition.toRegistrationInput(), signal)
      );
    } catch (error) {
      // the call went through; only its answer is unreadable
      if (error instanceof ParseError) {
        throw new RegistrationConfirmationError(definition.family, error.message, { cause: error });
      }
      throw error;
    }

    const registered = TaskDefinitionModel.fromRegistrationResponse(response, definition.family);
    if (registered.family !== definition.family) {
      throw new RegistrationConfirmationError(
        definition.family,
        `response names family ${registered.family}`
      );
    }

    log.info(`Task definition is registered ${registered.name()}`, {
      status: registered.status,
    });
    return registered;
  }

  /**
   * @returns The `family:revision` the service was moved to
   */
  private async updateService(
    registered: TaskDefinitionModel,
    context: DeploymentContext,
    log: Logger
  ): Promise<string> {
    const taskDefinition = registered.name();
    if (taskDefinition === undefined) {
      throw new RegistrationConfirmationError(registered.family, 'registered definition has no revision');
    }

    log.info(`Updating service to ${taskDefinition}...`);
    try {
      await this.callPlatform('update-service', context, (signal) =>
        this.api.updateService(context.cluster, context.service, taskDefinition, signal)
      );
    } catch (error) {
      const timedOut = error instanceof PlatformCallError && error.timedOut;
      throw new PlatformCallError(
        'update-service',
        `${taskDefinition} is registered but ${context.service} was not updated: ${causeMessage(error)}`,
        {
          diagnostics: error instanceof PlatformCallError ? error.diagnostics : undefined,
          timedOut,
          details: { taskDefinition },
          cause: error,
        }
      );
    }
    log.info('Service is updated');
    return taskDefinition;
  }

  private async waitServiceStable(
    taskDefinition: string,
    context: DeploymentContext,
    log: Logger
  ): Promise<DeploymentStatusSnapshot | undefined> {
    log.info('Waiting for service stable...(it will take a few minutes)');

    let lastSnapshot: DeploymentStatusSnapshot | undefined;
    const outcome = await waitForStableService(this.api, context, {
      logger: log,
      pollIntervalMs: this.pollIntervalMs,
      onTransition: this.onWaitTransition,
      onSnapshot: (snapshot) => {
        lastSnapshot = snapshot;
      },
    });

    if (outcome.state === 'stable') {
      return lastSnapshot;
    }

    const error = new UpdateAppliedButWaitFailedError({
      reason: outcome.state,
      cluster: context.cluster,
      service: context.service,
      taskDefinition,
      elapsedMs: outcome.elapsedMs,
      cause: outcome.state === 'wait-error' ? outcome.error : undefined,
    });
    log.debug('Service did not become stable', { taskDefinition, reason: outcome.state });
    throw error;
  }
}
