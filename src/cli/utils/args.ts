/**
 * Command-line argument parsing
 *
 * Flags take `--name=value` or `--name value`. The `deploy` command word is
 * optional since it is the only command.
 */

import { z } from 'zod';
import { MAX_TIMEOUT_MS } from '../../deployment/context.js';
import { ConfigurationError } from '../../lib/errors.js';
import { LOG_LEVELS, type LogLevel } from '../../monitoring/structured-logger.js';
import type { DeployConfig } from '../../types.js';

export const DEFAULT_TIMEOUT_SECONDS = 300;

export interface DeployCommandOptions {
  config: DeployConfig;
  region?: string;
  profile?: string;
  logLevel: LogLevel;
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'deploy'; options: DeployCommandOptions };

const VALUE_FLAGS = ['cluster', 'service', 'task-definition', 'timeout', 'region', 'profile', 'log-level'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(name: string): name is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === name);
}

const deployFlagsSchema = z.object({
  cluster: z.string({ required_error: '--cluster is required' }).trim().min(1, '--cluster must not be empty'),
  service: z.string({ required_error: '--service is required' }).trim().min(1, '--service must not be empty'),
  'task-definition': z
    .string({ required_error: '--task-definition is required' })
    .trim()
    .min(1, '--task-definition must not be empty'),
  timeout: z
    .string()
    .regex(/^\d+(\.\d+)?$/, '--timeout must be a non-negative number of seconds')
    .default(String(DEFAULT_TIMEOUT_SECONDS))
    .transform(Number)
    .refine((seconds) => Math.round(seconds * 1000) <= MAX_TIMEOUT_MS, {
      message: `--timeout must be at most ${Math.floor(MAX_TIMEOUT_MS / 1000)} seconds`,
    }),
  region: z.string().min(1).optional(),
  profile: z.string().min(1).optional(),
  'log-level': z.enum(LOG_LEVELS, {
    errorMap: () => ({ message: `--log-level must be one of: ${LOG_LEVELS.join(', ')}` }),
  }).default('info'),
});

/**
 * Parse CLI arguments (without the node/script prefix)
 *
 * @param env - Source of ECS_ROLLOUT_LOG_LEVEL
 * @throws {ConfigurationError} On unknown flags, missing values or invalid values
 */
export function parseCliArgs(
  args: string[],
  env: Readonly<Record<string, string | undefined>> = process.env
): CliCommand {
  if (args.includes('--help') || args.includes('-h')) {
    return { kind: 'help' };
  }
  if (args.includes('--version') || args.includes('-v')) {
    return { kind: 'version' };
  }

  const flags: Partial<Record<ValueFlag, string>> = {};
  const rest = args[0] === 'deploy' ? args.slice(1) : args;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === '--debug') {
      flags['log-level'] = 'debug';
      continue;
    }
    if (!arg.startsWith('--')) {
      throw new ConfigurationError(`Unexpected argument: ${arg}`);
    }

    const eq = arg.indexOf('=');
    const name = eq >= 0 ? arg.slice(2, eq) : arg.slice(2);
    if (!isValueFlag(name)) {
      throw new ConfigurationError(`Unknown flag: --${name}`);
    }

    if (eq >= 0) {
      flags[name] = arg.slice(eq + 1);
    } else {
      const value = rest[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new ConfigurationError(`Flag --${name} requires a value`);
      }
      flags[name] = value;
      i++;
    }
  }

  if (flags['log-level'] === undefined && env.ECS_ROLLOUT_LOG_LEVEL) {
    flags['log-level'] = env.ECS_ROLLOUT_LOG_LEVEL;
  }

  const parsed = deployFlagsSchema.safeParse(flags);
  if (!parsed.success) {
    const errors = parsed.error.issues.map((issue) => issue.message);
    throw new ConfigurationError(`Invalid arguments: ${errors.join('; ')}`, undefined, errors);
  }

  const data = parsed.data;
  return {
    kind: 'deploy',
    options: {
      config: {
        cluster: data.cluster,
        service: data.service,
        taskDefinitionPath: data['task-definition'],
        timeoutMs: Math.round(data.timeout * 1000),
      },
      region: data.region,
      profile: data.profile,
      logLevel: data['log-level'],
    },
  };
}
