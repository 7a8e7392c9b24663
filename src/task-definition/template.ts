/**
 * Environment-variable substitution for task definition documents
 *
 * Supported directives:
 *   {{ env "NAME" "default" }}  value of NAME, or the default when NAME is unset or empty
 *   {{ must_env "NAME" }}       value of NAME, fails when NAME is unset
 *
 * Arguments may be bare, quoted, JSON-escaped (\"NAME\") or backquoted.
 * Values are inserted verbatim.
 */

import { TemplateError } from '../lib/errors.js';

export type TemplateEnv = Readonly<Record<string, string | undefined>>;

const DIRECTIVE_PATTERN = /\{\{(.*?)\}\}/gs;
// \"json-escaped\" | "double" | 'single' | `raw` | bare
const TOKEN_PATTERN = /\s*(?:\\"([^"\\]*)\\"|"([^"]*)"|'([^']*)'|`([^`]*)`|([^\s"'`\\]+))/y;

/**
 * Split the inside of `{{ ... }}` into function name and arguments
 *
 * @throws {TemplateError} If any part of the directive is not a token
 */
function tokenize(body: string, directive: string): string[] {
  const text = body.trim();
  const tokens: string[] = [];
  let position = 0;
  while (position < text.length) {
    TOKEN_PATTERN.lastIndex = position;
    const match = TOKEN_PATTERN.exec(text);
    if (!match) {
      throw new TemplateError(`malformed template directive ${directive}`);
    }
    tokens.push(match[1] ?? match[2] ?? match[3] ?? match[4] ?? match[5] ?? '');
    position = TOKEN_PATTERN.lastIndex;
  }
  if (tokens.length === 0) {
    throw new TemplateError(`malformed template directive ${directive}`);
  }
  return tokens;
}

function resolveDirective(fn: string, args: string[], env: TemplateEnv): string {
  switch (fn) {
    case 'env': {
      if (args.length < 1 || args.length > 2) {
        throw new TemplateError(`env expects a variable name and an optional default, got ${args.length} arguments`);
      }
      const [name, fallback = ''] = args;
      const value = env[name];
      return value ? value : fallback;
    }
    case 'must_env': {
      if (args.length !== 1) {
        throw new TemplateError(`must_env expects exactly one variable name, got ${args.length} arguments`);
      }
      const [name] = args;
      const value = env[name];
      if (value === undefined) {
        throw new TemplateError(`environment variable ${name} is not defined`, name);
      }
      return value;
    }
    default:
      throw new TemplateError(`unknown template function "${fn}"`);
  }
}

/**
 * Replace every template directive in `text`
 *
 * @throws {TemplateError} On an unset must_env variable, an unknown function or a malformed directive
 */
export function renderTemplate(text: string, env: TemplateEnv = process.env): string {
  return text.replace(DIRECTIVE_PATTERN, (directive, body: string) => {
    const [fn, ...args] = tokenize(body, directive);
    return resolveDirective(fn, args, env);
  });
}
