/**
 * Cluster API contract
 *
 * The four ECS operations a deployment run needs. Implementations report
 * failures as PlatformCallError (call failed) or ParseError (response
 * undecodable). Every call takes an optional AbortSignal; implementations
 * should stop work when it fires.
 */

import type { DeploymentEntry, RegisterTaskDefinitionInput } from '../types.js';

export interface ClusterAPI {
  /**
   * Deployments of a service, primary first. Empty when the service reports none.
   */
  describeServiceDeployments(
    cluster: string,
    service: string,
    signal?: AbortSignal
  ): Promise<DeploymentEntry[]>;

  /**
   * Register a new task definition revision
   *
   * @returns The raw platform response; callers decode it into a registered model
   */
  registerTaskDefinition(
    input: RegisterTaskDefinitionInput,
    signal?: AbortSignal
  ): Promise<unknown>;

  /**
   * Point a service at a task definition (`family:revision`)
   */
  updateService(
    cluster: string,
    service: string,
    taskDefinition: string,
    signal?: AbortSignal
  ): Promise<void>;

  /**
   * Resolve once the platform reports the service stable; reject when it
   * gives up (e.g. repeated task failures)
   */
  waitServicesStable(cluster: string, service: string, signal?: AbortSignal): Promise<void>;
}

/**
 * Shorten a task definition ARN to its `family:revision` name
 *
 * @example
 * shortTaskDefinitionName('arn:aws:ecs:us-east-1:123456789012:task-definition/app:3') // 'app:3'
 */
export function shortTaskDefinitionName(taskDefinition: string): string {
  const slash = taskDefinition.lastIndexOf('/');
  return slash >= 0 ? taskDefinition.slice(slash + 1) : taskDefinition;
}

/**
 * One log line per deployment entry
 *
 * @example
 * formatDeploymentEntry({ status: 'PRIMARY', taskDefinition: 'app:3', desiredCount: 2, runningCount: 1, pendingCount: 1 })
 * // 'PRIMARY app:3 desired:2 running:1 pending:1'
 */
export function formatDeploymentEntry(entry: DeploymentEntry): string {
  const line =
    `${entry.status.padEnd(7)} ${entry.taskDefinition}` +
    ` desired:${entry.desiredCount} running:${entry.runningCount} pending:${entry.pendingCount}`;
  return entry.rolloutState ? `${line} (${entry.rolloutState})` : line;
}
