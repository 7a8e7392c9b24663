/**
 * Error types for deployment runs
 *
 * Every fatal failure of a run surfaces as one of these. The class tells an
 * operator how far the run got:
 * - PlatformCallError: an ECS call failed (nothing after it ran)
 * - ParseError: a document or response could not be decoded
 * - RegistrationConfirmationError: a revision may exist that we cannot name
 * - UpdateAppliedButWaitFailedError: the service already points at the new revision
 */

import type { WaitFailureReason } from '../types.js';

/**
 * Base class for deployment failures
 */
export class DeploymentError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'DeploymentError';
  }
}

/**
 * Custom error class for configuration errors
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly validationErrors?: string[]
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * An external ECS call failed (non-zero exit, transport failure, deadline)
 */
export class PlatformCallError extends DeploymentError {
  readonly operation: string;
  readonly diagnostics: string;
  readonly timedOut: boolean;

  constructor(
    operation: string,
    message: string,
    options: {
      diagnostics?: string;
      timedOut?: boolean;
      details?: Record<string, unknown>;
      cause?: unknown;
    } = {}
  ) {
    super(
      `${operation} failed: ${message}`,
      'PLATFORM_CALL_FAILED',
      { operation, ...options.details },
      { cause: options.cause }
    );
    this.name = 'PlatformCallError';
    this.operation = operation;
    this.diagnostics = options.diagnostics ?? '';
    this.timedOut = options.timedOut ?? false;
  }
}

/**
 * A document or platform response could not be decoded
 */
export class ParseError extends DeploymentError {
  constructor(
    public readonly source: string,
    message: string,
    options: { issues?: string[]; cause?: unknown } = {}
  ) {
    super(
      `${source}: ${message}`,
      'PARSE_FAILED',
      options.issues ? { source, issues: options.issues } : { source },
      { cause: options.cause }
    );
    this.name = 'ParseError';
  }
}

/**
 * A template directive could not be resolved (e.g. must_env on an unset variable)
 */
export class TemplateError extends DeploymentError {
  constructor(message: string, public readonly variable?: string) {
    super(message, 'TEMPLATE_FAILED', variable ? { variable } : undefined);
    this.name = 'TemplateError';
  }
}

/**
 * register-task-definition returned success but its response did not name a
 * revision. A revision may now exist on the platform that nothing points at.
 */
export class RegistrationConfirmationError extends DeploymentError {
  constructor(
    public readonly family: string,
    message: string,
    options: { cause?: unknown } = {}
  ) {
    super(
      `Task definition ${family} was submitted but its registration could not be confirmed ` +
        `(a new revision may exist): ${message}`,
      'REGISTRATION_UNCONFIRMED',
      { family },
      { cause: options.cause }
    );
    this.name = 'RegistrationConfirmationError';
  }
}

/**
 * The service was updated to the new revision but never reached a stable state
 */
export class UpdateAppliedButWaitFailedError extends DeploymentError {
  readonly reason: WaitFailureReason;
  readonly taskDefinition: string;
  readonly elapsedMs: number;

  constructor(params: {
    reason: WaitFailureReason;
    cluster: string;
    service: string;
    taskDefinition: string;
    elapsedMs: number;
    cause?: unknown;
  }) {
    const seconds = Math.round(params.elapsedMs / 1000);
    const what =
      params.reason === 'timed-out'
        ? `did not become stable before the deadline (${seconds}s elapsed)`
        : `failed to become stable after ${seconds}s: ${describeCause(params.cause)}`;
    super(
      `Service ${params.service}/${params.cluster} was updated to ${params.taskDefinition} but ${what}`,
      'WAIT_FAILED',
      {
        reason: params.reason,
        cluster: params.cluster,
        service: params.service,
        taskDefinition: params.taskDefinition,
        elapsedMs: params.elapsedMs,
      },
      { cause: params.cause }
    );
    this.name = 'UpdateAppliedButWaitFailedError';
    this.reason = params.reason;
    this.taskDefinition = params.taskDefinition;
    this.elapsedMs = params.elapsedMs;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return cause === undefined ? 'unknown error' : String(cause);
}

/**
 * Formats an error for logging
 */
export function formatError(error: unknown): string {
  if (error instanceof DeploymentError) {
    return `[${error.code}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
