/**
 * Shared types for ecs-rollout
 */

/**
 * JSON-compatible values. Container definitions, volumes and placement
 * constraints are carried as opaque JSON records: only ECS interprets them.
 */
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * Task networking modes accepted by ECS
 */
export type NetworkMode = 'bridge' | 'host' | 'awsvpc' | 'none';

/**
 * Inputs for a single deployment run
 */
export interface DeployConfig {
  cluster: string;
  service: string;
  taskDefinitionPath: string;
  /** Deadline for the whole run in milliseconds. 0 disables it. */
  timeoutMs: number;
}

/**
 * Parameter set of the register-task-definition call
 */
export interface RegisterTaskDefinitionInput {
  family: string;
  taskRoleArn?: string;
  networkMode?: NetworkMode;
  volumes: JsonObject[];
  placementConstraints: JsonObject[];
  containerDefinitions: JsonObject[];
}

/**
 * One deployment of an ECS service, as reported by describe-services
 */
export interface DeploymentEntry {
  id?: string;
  status: string;
  taskDefinition: string;
  desiredCount: number;
  runningCount: number;
  pendingCount: number;
  rolloutState?: string;
}

/**
 * Deployment status of a service at one point in time. Never persisted.
 */
export interface DeploymentStatusSnapshot {
  service: string;
  deployments: DeploymentEntry[];
  observedAt: Date;
}

/**
 * Terminal states of the wait-for-stable phase
 */
export type WaitFailureReason = 'timed-out' | 'wait-error';
