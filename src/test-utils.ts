/**
 * Shared test utilities for ecs-rollout
 */

import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import type { ClusterAPI } from './lib/cluster-api.js';
import { MemorySink, StructuredLogger } from './monitoring/structured-logger.js';
import type { DeploymentEntry, RegisterTaskDefinitionInput } from './types.js';

/**
 * Create a temporary directory for testing
 */
export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'ecs-rollout-test-'));
}

/**
 * Clean up a temporary directory
 */
export function cleanupTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Resolve once `predicate` holds; reject after `timeoutMs`
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 1_000): Promise<void> {
  const started = Date.now();
  while (!predicate()) {
    if (Date.now() - started > timeoutMs) {
      throw new Error(`condition not met within ${timeoutMs}ms`);
    }
    await delay(2);
  }
}

/**
 * A promise that never settles (a platform call that hangs)
 */
export function never<T>(): Promise<T> {
  return new Promise<T>(() => {});
}

/**
 * Logger writing to memory, at debug level
 */
export function createMemoryLogger(): { logger: StructuredLogger; sink: MemorySink } {
  const sink = new MemorySink();
  return { logger: new StructuredLogger({ minLevel: 'debug', sink }), sink };
}

export type ClusterOperation =
  | 'describeServiceDeployments'
  | 'registerTaskDefinition'
  | 'updateService'
  | 'waitServicesStable';

/**
 * In-memory ClusterAPI. Every call is recorded; behaviour is swapped per
 * test by replacing the `on*` handlers.
 */
export class FakeClusterApi implements ClusterAPI {
  readonly calls: ClusterOperation[] = [];
  readonly registeredInputs: RegisterTaskDefinitionInput[] = [];
  readonly updates: Array<{ cluster: string; service: string; taskDefinition: string }> = [];
  readonly signals: AbortSignal[] = [];
  revision = 7;

  deployments: DeploymentEntry[] = [
    {
      id: 'ecs-svc/1',
      status: 'PRIMARY',
      taskDefinition: 'app:6',
      desiredCount: 2,
      runningCount: 2,
      pendingCount: 0,
    },
  ];

  onDescribe: (signal?: AbortSignal) => Promise<DeploymentEntry[]> = async () => this.deployments;

  onRegister: (input: RegisterTaskDefinitionInput) => Promise<unknown> = async (input) => ({
    taskDefinition: {
      ...input,
      taskDefinitionArn: `arn:aws:ecs:us-east-1:000000000000:task-definition/${input.family}:${this.revision}`,
      revision: this.revision,
      status: 'ACTIVE',
    },
  });

  onUpdate: (taskDefinition: string) => Promise<void> = async () => {};

  onWait: (signal?: AbortSignal) => Promise<void> = async () => {};

  count(operation: ClusterOperation): number {
    return this.calls.filter((call) => call === operation).length;
  }

  private record(operation: ClusterOperation, signal?: AbortSignal): void {
    this.calls.push(operation);
    if (signal) {
      this.signals.push(signal);
    }
  }

  async describeServiceDeployments(
    _cluster: string,
    _service: string,
    signal?: AbortSignal
  ): Promise<DeploymentEntry[]> {
    this.record('describeServiceDeployments', signal);
    return this.onDescribe(signal);
  }

  async registerTaskDefinition(
    input: RegisterTaskDefinitionInput,
    signal?: AbortSignal
  ): Promise<unknown> {
    this.record('registerTaskDefinition', signal);
    this.registeredInputs.push(input);
    return this.onRegister(input);
  }

  async updateService(
    cluster: string,
    service: string,
    taskDefinition: string,
    signal?: AbortSignal
  ): Promise<void> {
    this.record('updateService', signal);
    this.updates.push({ cluster, service, taskDefinition });
    return this.onUpdate(taskDefinition);
  }

  async waitServicesStable(_cluster: string, _service: string, signal?: AbortSignal): Promise<void> {
    this.record('waitServicesStable', signal);
    return this.onWait(signal);
  }
}
