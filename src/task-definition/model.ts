/**
 * Task definition model
 *
 * In-memory form of an ECS task definition document. Container definitions,
 * volumes and placement constraints stay opaque JSON records; ECS validates
 * them, we only carry them through in order.
 *
 * A model read from a document is unregistered (revision 0, no name). The
 * registered model is a separate instance built from the register response.
 */

import { z } from 'zod';
import { ParseError, RegistrationConfirmationError } from '../lib/errors.js';
import type {
  JsonObject,
  JsonValue,
  NetworkMode,
  RegisterTaskDefinitionInput,
} from '../types.js';

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

const jsonObjectSchema = z.record(jsonValueSchema);

const recordListSchema = z
  .array(jsonObjectSchema)
  .nullish()
  .transform((value) => value ?? []);

/**
 * Fields of a task definition document (unknown keys are dropped)
 */
export const taskDefinitionSchema = z.object({
  family: z.string().trim().min(1, 'family must not be empty'),
  taskRoleArn: z
    .string()
    .nullish()
    .transform((value) => value || undefined),
  networkMode: z
    .enum(['bridge', 'host', 'awsvpc', 'none', ''])
    .nullish()
    .transform((value): NetworkMode | undefined => value || undefined),
  containerDefinitions: recordListSchema,
  volumes: recordListSchema,
  placementConstraints: recordListSchema,
  requiresAttributes: recordListSchema,
  revision: z.number().int().nonnegative().nullish(),
  status: z.string().nullish(),
});

export interface TaskDefinitionFields {
  family: string;
  taskRoleArn?: string;
  networkMode?: NetworkMode;
  containerDefinitions: JsonObject[];
  volumes: JsonObject[];
  placementConstraints: JsonObject[];
  requiresAttributes: JsonObject[];
  revision: number;
  status?: string;
}

/**
 * Accepts both `{ "taskDefinition": {...} }` (the shape ECS returns) and a
 * bare definition object
 */
export function unwrapTaskDefinition(raw: unknown): unknown {
  if (typeof raw === 'object' && raw !== null && 'taskDefinition' in raw) {
    return raw.taskDefinition;
  }
  return raw;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export class TaskDefinitionModel {
  readonly family: string;
  readonly taskRoleArn?: string;
  readonly networkMode?: NetworkMode;
  readonly containerDefinitions: readonly JsonObject[];
  readonly volumes: readonly JsonObject[];
  readonly placementConstraints: readonly JsonObject[];
  readonly requiresAttributes: readonly JsonObject[];
  /** 0 until registered */
  readonly revision: number;
  readonly status?: string;

  constructor(fields: TaskDefinitionFields) {
    this.family = fields.family;
    this.taskRoleArn = fields.taskRoleArn;
    this.networkMode = fields.networkMode;
    this.containerDefinitions = Object.freeze(structuredClone(fields.containerDefinitions));
    this.volumes = Object.freeze(structuredClone(fields.volumes));
    this.placementConstraints = Object.freeze(structuredClone(fields.placementConstraints));
    this.requiresAttributes = Object.freeze(structuredClone(fields.requiresAttributes));
    this.revision = fields.revision;
    this.status = fields.status;
    Object.freeze(this);
  }

  /**
   * Build an unregistered model from a parsed document. Any revision or
   * status in the document is ignored.
   *
   * @param source - Label used in error messages (usually the file path)
   * @throws {ParseError} If the document does not describe a task definition
   */
  static fromDocument(raw: unknown, source = 'task definition'): TaskDefinitionModel {
    const result = taskDefinitionSchema.safeParse(unwrapTaskDefinition(raw));
    if (!result.success) {
      const issues = formatIssues(result.error);
      throw new ParseError(source, `invalid task definition (${issues.join('; ')})`, {
        issues,
        cause: result.error,
      });
    }

    const { revision: _revision, status: _status, ...fields } = result.data;
    return new TaskDefinitionModel({ ...fields, revision: 0 });
  }

  /**
   * Build the registered model from a register-task-definition response
   *
   * @param submitted - Family we asked to register, for error reporting
   * @throws {RegistrationConfirmationError} If the response does not carry a revision
   */
  static fromRegistrationResponse(raw: unknown, submitted: string): TaskDefinitionModel {
    const result = taskDefinitionSchema.safeParse(unwrapTaskDefinition(raw));
    if (!result.success) {
      throw new RegistrationConfirmationError(submitted, formatIssues(result.error).join('; '), {
        cause: result.error,
      });
    }

    const { revision, status, ...fields } = result.data;
    if (!revision) {
      throw new RegistrationConfirmationError(submitted, 'response has no revision');
    }

    return new TaskDefinitionModel({ ...fields, revision, status: status ?? undefined });
  }

  isRegistered(): boolean {
    return this.revision > 0;
  }

  /**
   * `family:revision`, or undefined for an unregistered definition
   */
  name(): string | undefined {
    if (!this.isRegistered()) {
      return undefined;
    }
    return `${this.family}:${this.revision}`;
  }

  /**
   * Parameter set for register-task-definition. Sequence order is preserved.
   */
  toRegistrationInput(): RegisterTaskDefinitionInput {
    const input: RegisterTaskDefinitionInput = {
      family: this.family,
      volumes: structuredClone([...this.volumes]),
      placementConstraints: structuredClone([...this.placementConstraints]),
      containerDefinitions: structuredClone([...this.containerDefinitions]),
    };
    if (this.taskRoleArn) {
      input.taskRoleArn = this.taskRoleArn;
    }
    if (this.networkMode) {
      input.networkMode = this.networkMode;
    }
    return input;
  }
}
