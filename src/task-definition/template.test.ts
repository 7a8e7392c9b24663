import { describe, it } from 'node:test';
import assert from 'node:assert';
import { renderTemplate } from './template.js';
import { TemplateError } from '../lib/errors.js';

describe('renderTemplate', () => {
  const env = { IMAGE_TAG: 'v42', EMPTY: '', REGION: 'eu-west-1' };

  it('leaves text without directives unchanged', () => {
    const text = '{"family": "app", "cpu": "256"}';
    assert.strictEqual(renderTemplate(text, env), text);
  });

  it('substitutes env values', () => {
    assert.strictEqual(
      renderTemplate('"image": "nginx:{{ env "IMAGE_TAG" "latest" }}"', env),
      '"image": "nginx:v42"'
    );
  });

  it('uses the default when the variable is unset', () => {
    assert.strictEqual(renderTemplate('{{ env "MISSING" "latest" }}', env), 'latest');
  });

  it('uses the default when the variable is empty', () => {
    assert.strictEqual(renderTemplate('{{ env "EMPTY" "fallback" }}', env), 'fallback');
  });

  it('renders an unset variable without default as empty text', () => {
    assert.strictEqual(renderTemplate('[{{ env "MISSING" }}]', env), '[]');
  });

  it('accepts unquoted and single-quoted arguments', () => {
    assert.strictEqual(renderTemplate("{{env REGION 'us-east-1'}}", env), 'eu-west-1');
  });

  it('reads JSON-escaped arguments inside a JSON string', () => {
    assert.strictEqual(
      renderTemplate('{"image": "nginx:{{ must_env \\"IMAGE_TAG\\" }}"}', env),
      '{"image": "nginx:v42"}'
    );
    assert.strictEqual(renderTemplate('{{ env \\"MISSING\\" \\"latest\\" }}', env), 'latest');
  });

  it('reads backquoted arguments', () => {
    assert.strictEqual(renderTemplate('{{ env `REGION` `us-east-1` }}', env), 'eu-west-1');
  });

  it('fails on a directive with an unterminated argument', () => {
    assert.throws(
      () => renderTemplate('{{ must_env \\"IMAGE_TAG }}', env),
      (error: unknown) =>
        error instanceof TemplateError &&
        error.message === 'malformed template directive {{ must_env \\"IMAGE_TAG }}'
    );
  });

  it('fails on an empty directive', () => {
    assert.throws(() => renderTemplate('{{ }}', env), TemplateError);
  });

  it('substitutes must_env values', () => {
    assert.strictEqual(renderTemplate('{{ must_env "REGION" }}/{{ must_env "IMAGE_TAG" }}', env), 'eu-west-1/v42');
  });

  it('allows an empty must_env variable', () => {
    assert.strictEqual(renderTemplate('<{{ must_env "EMPTY" }}>', env), '<>');
  });

  it('fails on an unset must_env variable', () => {
    assert.throws(
      () => renderTemplate('{{ must_env "DB_PASSWORD" }}', env),
      (error: unknown) =>
        error instanceof TemplateError &&
        error.variable === 'DB_PASSWORD' &&
        error.message === 'environment variable DB_PASSWORD is not defined'
    );
  });

  it('fails on an unknown function', () => {
    assert.throws(
      () => renderTemplate('{{ file "x.json" }}', env),
      (error: unknown) => error instanceof TemplateError && error.message === 'unknown template function "file"'
    );
  });

  it('fails when env has no arguments', () => {
    assert.throws(() => renderTemplate('{{ env }}', env), TemplateError);
  });

  it('fails when must_env has a default', () => {
    assert.throws(() => renderTemplate('{{ must_env "REGION" "x" }}', env), TemplateError);
  });

  it('reads process.env by default', () => {
    process.env.ECS_ROLLOUT_TEMPLATE_TEST = 'from-process';
    try {
      assert.strictEqual(renderTemplate('{{ must_env "ECS_ROLLOUT_TEMPLATE_TEST" }}'), 'from-process');
    } finally {
      delete process.env.ECS_ROLLOUT_TEMPLATE_TEST;
    }
  });
});
