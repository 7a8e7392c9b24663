/**
 * Safe Error Handler
 *
 * Formats errors without throwing (circular references, huge AWS CLI
 * output) and installs process-level handlers so an unexpected rejection
 * still ends the process with a readable message and a non-zero exit.
 *
 * @example
 * ```typescript
 * import { installGlobalErrorHandler } from './lib/safe-error-handler.js';
 *
 * // Install global handler (call once at CLI entry point)
 * installGlobalErrorHandler();
 * ```
 */

import util from 'util';
import chalk from 'chalk';
import { PlatformCallError } from './errors.js';

/**
 * Maximum lengths to prevent RangeError
 */
const MAX_STRING_LENGTH = 50000;
const MAX_STACK_LINES = 50;
const MAX_DEPTH = 5;

/**
 * Safely format an error object for display
 *
 * @returns Formatted error string (never throws)
 */
export function formatErrorSafely(
  error: unknown,
  options: {
    maxLength?: number;
    maxStackLines?: number;
    colorize?: boolean;
  } = {}
): string {
  const maxLength = options.maxLength ?? MAX_STRING_LENGTH;
  const maxStackLines = options.maxStackLines ?? MAX_STACK_LINES;
  const colorize = options.colorize ?? true;

  try {
    if (!(error instanceof Error)) {
      if (error && typeof error === 'object') {
        return util.inspect(error, { depth: MAX_DEPTH, maxStringLength: maxLength, breakLength: Infinity });
      }
      return String(error);
    }

    const parts: string[] = [];
    const label = `${error.name}:`;
    const message = error.message.length > maxLength
      ? error.message.substring(0, maxLength) + '... [truncated]'
      : error.message;
    parts.push(`${colorize ? chalk.red(label) : label} ${message}`);

    if (error.stack && maxStackLines > 0) {
      const stackLines = error.stack.split('\n').slice(1);
      const relevantLines = stackLines.slice(0, maxStackLines);
      if (stackLines.length > maxStackLines) {
        relevantLines.push(`... [${stackLines.length - maxStackLines} more lines]`);
      }
      parts.push(colorize ? chalk.dim(relevantLines.join('\n')) : relevantLines.join('\n'));
    }

    return parts.join('\n');
  } catch {
    return `[Error formatting failed: ${String(error)}]`;
  }
}

/**
 * Turn common AWS CLI failures into a short fix suggestion
 *
 * @returns A hint, or undefined when the error is not recognised
 */
export function extractActionableHint(error: unknown): string | undefined {
  if (!(error instanceof Error)) {
    return undefined;
  }

  const diagnostics = error instanceof PlatformCallError ? error.diagnostics : '';
  const combined = `${error.message} ${diagnostics}`.toLowerCase();

  if (combined.includes('could not run')) {
    return 'Install the AWS CLI v2 and make sure `aws` is on your PATH.';
  }
  if (combined.includes('unable to locate credentials') || combined.includes('expiredtoken')) {
    return 'Refresh your AWS credentials (aws sso login, or check AWS_PROFILE).';
  }
  if (combined.includes('accessdenied') || combined.includes('not authorized')) {
    return 'Your AWS identity lacks ECS permissions (ecs:DescribeServices, ecs:RegisterTaskDefinition, ecs:UpdateService, iam:PassRole).';
  }
  if (combined.includes('clusternotfound')) {
    return 'Check --cluster and --region.';
  }
  if (combined.includes('servicenotfound') || combined.includes('missing')) {
    return 'Check --service; it must already exist in the cluster.';
  }
  return undefined;
}

/**
 * Install global error handlers to catch unhandled rejections and exceptions
 *
 * Should be called once at the CLI entry point (src/cli.ts).
 */
export function installGlobalErrorHandler(options: {
  exitOnError?: boolean;
  verbose?: boolean;
} = {}): void {
  const exitOnError = options.exitOnError ?? true;
  const verbose = options.verbose ?? false;

  const report = (title: string, reason: unknown) => {
    console.error(chalk.red.bold(`\n${title}`));
    console.error(
      verbose
        ? formatErrorSafely(reason)
        : formatErrorSafely(reason, { maxStackLines: 0 })
    );
    if (exitOnError) {
      process.exit(1);
    }
  };

  process.on('unhandledRejection', (reason) => report('Unhandled promise rejection', reason));
  process.on('uncaughtException', (error) => report('Uncaught exception', error));
}
