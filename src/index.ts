/**
 * ecs-rollout
 *
 * Rolling deployments for Amazon ECS services: register a task definition,
 * point the service at it, and wait until the service is stable.
 */

export { DeploymentOrchestrator } from './deployment/orchestrator.js';
export type { DeploymentOutcome, OrchestratorOptions } from './deployment/orchestrator.js';
export { StatusReporter, DEFAULT_POLL_INTERVAL_MS } from './deployment/status-reporter.js';
export { waitForStableService } from './deployment/stability-waiter.js';
export type { WaitOutcome, WaitState } from './deployment/stability-waiter.js';
export { createDeploymentContext } from './deployment/context.js';
export type { DeploymentContext } from './deployment/context.js';
export { TaskDefinitionModel } from './task-definition/model.js';
export { loadTaskDefinition } from './task-definition/loader.js';
export { renderTemplate } from './task-definition/template.js';
export { AwsEcsCliClient } from './lib/aws-ecs-cli.js';
export type { ClusterAPI } from './lib/cluster-api.js';
export {
  DeploymentError,
  PlatformCallError,
  ParseError,
  TemplateError,
  RegistrationConfirmationError,
  UpdateAppliedButWaitFailedError,
  formatError,
} from './lib/errors.js';
export { StructuredLogger, ConsoleSink, MemorySink } from './monitoring/structured-logger.js';
export type { Logger, LogSink, LogEntry, LogLevel } from './monitoring/structured-logger.js';
export type {
  DeployConfig,
  DeploymentEntry,
  DeploymentStatusSnapshot,
  RegisterTaskDefinitionInput,
  JsonObject,
  JsonValue,
} from './types.js';
