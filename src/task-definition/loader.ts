/**
 * Reads a task definition document from disk: template substitution first,
 * then JSON or YAML parsing, then validation into a TaskDefinitionModel.
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';
import * as yaml from 'js-yaml';
import { ParseError } from '../lib/errors.js';
import { TaskDefinitionModel } from './model.js';
import { renderTemplate, type TemplateEnv } from './template.js';

export type TaskDefinitionLoader = (path: string) => Promise<TaskDefinitionModel>;

function isYamlPath(path: string): boolean {
  const ext = extname(path).toLowerCase();
  return ext === '.yml' || ext === '.yaml';
}

/**
 * Parse a rendered document. YAML for .yml/.yaml, JSON otherwise.
 *
 * @throws {ParseError} If the text is not valid JSON/YAML
 */
export function parseDocument(text: string, path: string): unknown {
  try {
    if (isYamlPath(path)) {
      return yaml.load(text, { filename: path, schema: yaml.CORE_SCHEMA });
    }
    return JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseError(path, `cannot parse document: ${message}`, { cause: error });
  }
}

/**
 * Load an unregistered task definition from `path`
 *
 * @throws {ParseError} File unreadable, malformed, or not a task definition
 * @throws {TemplateError} A must_env variable is unset
 */
export async function loadTaskDefinition(
  path: string,
  env: TemplateEnv = process.env
): Promise<TaskDefinitionModel> {
  let source: string;
  try {
    source = await readFile(path, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseError(path, `cannot read file: ${message}`, { cause: error });
  }

  const rendered = renderTemplate(source, env);
  return TaskDefinitionModel.fromDocument(parseDocument(rendered, path), path);
}
