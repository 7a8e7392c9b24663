/**
 * ClusterAPI backed by the AWS CLI (`aws ecs ...`)
 *
 * Runs the CLI through execa with JSON output. Credentials and region come
 * from the usual AWS CLI resolution, optionally pinned with a profile/region.
 *
 * @example
 * ```typescript
 * const api = new AwsEcsCliClient({ region: 'eu-west-1', profile: 'deploy' });
 * const deployments = await api.describeServiceDeployments('default', 'web');
 * ```
 */

import { execa } from 'execa';
import { z } from 'zod';
import type { DeploymentEntry, RegisterTaskDefinitionInput } from '../types.js';
import { shortTaskDefinitionName, type ClusterAPI } from './cluster-api.js';
import { ParseError, PlatformCallError } from './errors.js';

/**
 * Outcome of one CLI invocation. Failures are reported, not thrown.
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode?: number;
  failed: boolean;
  timedOut: boolean;
  canceled: boolean;
}

export type CommandRunner = (
  file: string,
  args: readonly string[],
  options: { signal?: AbortSignal; env: Record<string, string> }
) => Promise<CommandResult>;

/**
 * Default runner: execa without throwing on non-zero exits
 */
export const execaRunner: CommandRunner = async (file, args, options) => {
  const result = await execa(file, args, {
    signal: options.signal,
    env: options.env,
    reject: false,
  });
  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode,
    failed: result.failed,
    timedOut: result.timedOut,
    canceled: result.isCanceled,
  };
};

export interface AwsEcsCliOptions {
  region?: string;
  profile?: string;
  /** AWS CLI executable (default: `aws`) */
  awsPath?: string;
  runner?: CommandRunner;
}

const deploymentSchema = z.object({
  id: z.string().optional(),
  status: z.string(),
  taskDefinition: z.string(),
  desiredCount: z.number().int().default(0),
  runningCount: z.number().int().default(0),
  pendingCount: z.number().int().default(0),
  rolloutState: z.string().optional(),
});

const describeServicesSchema = z.object({
  services: z
    .array(
      z.object({
        serviceName: z.string().optional(),
        deployments: z.array(deploymentSchema).default([]),
      })
    )
    .default([]),
  failures: z
    .array(
      z.object({
        arn: z.string().optional(),
        reason: z.string().optional(),
        detail: z.string().optional(),
      })
    )
    .default([]),
});

function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseError(source, `response is not valid JSON: ${message}`, { cause: error });
  }
}

export class AwsEcsCliClient implements ClusterAPI {
  private readonly region?: string;
  private readonly profile?: string;
  private readonly awsPath: string;
  private readonly runner: CommandRunner;

  constructor(options: AwsEcsCliOptions = {}) {
    this.region = options.region;
    this.profile = options.profile;
    this.awsPath = options.awsPath ?? 'aws';
    this.runner = options.runner ?? execaRunner;
  }

  /**
   * Run `aws ecs <subCommand> ...` and return its stdout
   *
   * @throws {PlatformCallError} On a non-zero exit, a missing CLI or an aborted call
   */
  private async ecs(
    subCommand: string[],
    args: string[],
    signal?: AbortSignal
  ): Promise<string> {
    const operation = subCommand.join(' ');
    const fullArgs = ['ecs', ...subCommand, ...args, '--output', 'json'];
    if (this.region) {
      fullArgs.push('--region', this.region);
    }

    const env: Record<string, string> = { AWS_PAGER: '' };
    if (this.profile) {
      env.AWS_PROFILE = this.profile;
    }

    const result = await this.runner(this.awsPath, fullArgs, { signal, env });
    if (!result.failed) {
      return result.stdout;
    }

    const diagnostics = result.stderr.trim();
    if (result.canceled || result.timedOut) {
      throw new PlatformCallError(operation, 'aborted before completion', {
        diagnostics,
        timedOut: true,
      });
    }
    if (result.exitCode === undefined) {
      throw new PlatformCallError(operation, `could not run ${this.awsPath}`, { diagnostics });
    }
    throw new PlatformCallError(operation, diagnostics || `exit code ${result.exitCode}`, {
      diagnostics,
      details: { exitCode: result.exitCode },
    });
  }

  async describeServiceDeployments(
    cluster: string,
    service: string,
    signal?: AbortSignal
  ): Promise<DeploymentEntry[]> {
    const stdout = await this.ecs(
      ['describe-services'],
      ['--cluster', cluster, '--services', service],
      signal
    );

    const parsed = describeServicesSchema.safeParse(parseJson(stdout, 'describe-services'));
    if (!parsed.success) {
      throw new ParseError('describe-services', 'unexpected response shape', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        cause: parsed.error,
      });
    }

    const { services, failures } = parsed.data;
    if (services.length === 0 && failures.length > 0) {
      const reasons = failures.map((failure) => failure.reason ?? 'unknown').join(', ');
      throw new PlatformCallError('describe-services', `service ${service} not found in ${cluster} (${reasons})`);
    }
    if (services.length === 0) {
      return [];
    }

    return services[0].deployments.map((deployment) => ({
      ...deployment,
      taskDefinition: shortTaskDefinitionName(deployment.taskDefinition),
    }));
  }

  async registerTaskDefinition(
    input: RegisterTaskDefinitionInput,
    signal?: AbortSignal
  ): Promise<unknown> {
    const args = ['--family', input.family];
    if (input.taskRoleArn) {
      args.push('--task-role-arn', input.taskRoleArn);
    }
    if (input.networkMode) {
      args.push('--network-mode', input.networkMode);
    }
    args.push(
      '--volumes', JSON.stringify(input.volumes),
      '--placement-constraints', JSON.stringify(input.placementConstraints),
      '--container-definitions', JSON.stringify(input.containerDefinitions)
    );

    const stdout = await this.ecs(['register-task-definition'], args, signal);
    return parseJson(stdout, 'register-task-definition');
  }

  async updateService(
    cluster: string,
    service: string,
    taskDefinition: string,
    signal?: AbortSignal
  ): Promise<void> {
    await this.ecs(
      ['update-service'],
      ['--cluster', cluster, '--service', service, '--task-definition', taskDefinition],
      signal
    );
  }

  async waitServicesStable(cluster: string, service: string, signal?: AbortSignal): Promise<void> {
    await this.ecs(['wait', 'services-stable'], ['--cluster', cluster, '--services', service], signal);
  }
}
