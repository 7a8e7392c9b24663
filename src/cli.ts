#!/usr/bin/env node
/**
 * ecs-rollout CLI Entry Point
 * Rolling deployments for Amazon ECS services
 */

// Install global error handler first so nothing escapes without a message
import { installGlobalErrorHandler } from './lib/safe-error-handler.js';
installGlobalErrorHandler({
  exitOnError: true,
  verbose: process.env.DEBUG === 'true' || process.argv.includes('--debug'),
});

import chalk from 'chalk';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { handleDeployCommand } from './cli/commands/deploy.js';
import { parseCliArgs, DEFAULT_TIMEOUT_SECONDS, type CliCommand } from './cli/utils/args.js';
import { formatError } from './lib/errors.js';

async function cli(): Promise<void> {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(chalk.red(`❌ ${formatError(error)}`));
    console.error(chalk.gray('Run: ecs-rollout --help'));
    process.exit(1);
  }

  switch (command.kind) {
    case 'help':
      printHelpMessage();
      process.exit(0);
      break;

    case 'version':
      console.log(`ecs-rollout ${readVersion()}`);
      process.exit(0);
      break;

    case 'deploy':
      process.exit(await handleDeployCommand(command.options));
  }
}

/**
 * Read version from package.json (one level up from dist/ or src/)
 */
function readVersion(): string {
  try {
    const packageJsonPath = fileURLToPath(new URL('../package.json', import.meta.url));
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version);
    }
  } catch (error) {
    console.error(chalk.gray(`Could not read package.json: ${formatError(error)}`));
  }
  return '(version unknown)';
}

function printHelpMessage(): void {
  console.log(chalk.bold.cyan('\necs-rollout: rolling deployments for Amazon ECS services\n'));

  console.log(chalk.bold('USAGE'));
  console.log('  ecs-rollout [deploy] --cluster <name> --service <name> --task-definition <path> [options]\n');

  console.log(chalk.bold('REQUIRED'));
  console.log(chalk.green('  --cluster=NAME') + '           ECS cluster');
  console.log(chalk.green('  --service=NAME') + '           ECS service to update');
  console.log(chalk.green('  --task-definition=PATH') + '   Task definition document (JSON or YAML)\n');

  console.log(chalk.bold('OPTIONS'));
  console.log(chalk.green('  --timeout=SECONDS') + `        Deadline for the whole run (default: ${DEFAULT_TIMEOUT_SECONDS}, 0 disables)`);
  console.log(chalk.green('  --region=REGION') + '          AWS region');
  console.log(chalk.green('  --profile=PROFILE') + '        AWS CLI profile');
  console.log(chalk.green('  --log-level=LEVEL') + '        debug, info, warn, error, fatal (env: ECS_ROLLOUT_LOG_LEVEL)');
  console.log(chalk.green('  --debug') + '                  Same as --log-level=debug\n');

  console.log(chalk.bold('TEMPLATES'));
  console.log('  {{ env "NAME" "default" }}   Value of NAME, or the default');
  console.log('  {{ must_env "NAME" }}        Value of NAME; fails when unset\n');

  console.log(chalk.bold('QUICK REFERENCE'));
  console.log(chalk.gray('  -h, --help        Show this help'));
  console.log(chalk.gray('  -v, --version     Show version\n'));
}

// Start the CLI
cli().catch((error: unknown) => {
  console.error(chalk.red(`❌ Fatal error: ${formatError(error)}`));
  process.exit(1);
});
