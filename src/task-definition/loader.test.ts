import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { loadTaskDefinition, parseDocument } from './loader.js';
import { ParseError, TemplateError } from '../lib/errors.js';
import { createTempDir, cleanupTempDir } from '../test-utils.js';

describe('loadTaskDefinition', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = createTempDir();
  });

  afterEach(() => {
    cleanupTempDir(tempDir);
  });

  function writeDocument(name: string, content: string): string {
    const path = join(tempDir, name);
    writeFileSync(path, content);
    return path;
  }

  it('loads a JSON document with substitutions', async () => {
    const path = writeDocument(
      'taskdef.json',
      JSON.stringify({
        taskDefinition: {
          family: 'app',
          networkMode: 'bridge',
          containerDefinitions: [{ name: 'web', image: 'nginx:{{ must_env "IMAGE_TAG" }}' }],
        },
      })
    );

    const model = await loadTaskDefinition(path, { IMAGE_TAG: '1.25' });

    assert.strictEqual(model.family, 'app');
    assert.strictEqual(model.networkMode, 'bridge');
    assert.deepStrictEqual(model.containerDefinitions, [{ name: 'web', image: 'nginx:1.25' }]);
    assert.strictEqual(model.isRegistered(), false);
  });

  it('loads a YAML document', async () => {
    const path = writeDocument(
      'taskdef.yml',
      [
        'family: {{ env "FAMILY" "worker" }}',
        'taskRoleArn: arn:aws:iam::000000000000:role/worker',
        'containerDefinitions:',
        '  - name: worker',
        '    image: busybox',
        '    memory: 128',
        'volumes:',
        '  - name: cache',
      ].join('\n')
    );

    const model = await loadTaskDefinition(path, {});

    assert.strictEqual(model.family, 'worker');
    assert.strictEqual(model.taskRoleArn, 'arn:aws:iam::000000000000:role/worker');
    assert.deepStrictEqual(model.containerDefinitions, [{ name: 'worker', image: 'busybox', memory: 128 }]);
    assert.deepStrictEqual(model.volumes, [{ name: 'cache' }]);
    assert.deepStrictEqual(model.placementConstraints, []);
  });

  it('fails before parsing when a must_env variable is unset', async () => {
    const path = writeDocument('taskdef.json', '{"family": "{{ must_env "FAMILY" }}"}');

    await assert.rejects(
      loadTaskDefinition(path, {}),
      (error: unknown) => error instanceof TemplateError && error.variable === 'FAMILY'
    );
  });

  it('fails on an unset must_env variable written inside a JSON string', async () => {
    const path = writeDocument(
      'taskdef.json',
      JSON.stringify({
        family: 'web',
        containerDefinitions: [{ name: 'web', image: 'example/web:{{ must_env "IMAGE_TAG" }}' }],
      })
    );

    await assert.rejects(
      loadTaskDefinition(path, {}),
      (error: unknown) =>
        error instanceof TemplateError &&
        error.variable === 'IMAGE_TAG' &&
        error.message === 'environment variable IMAGE_TAG is not defined'
    );
  });

  it('fails on malformed JSON', async () => {
    const path = writeDocument('taskdef.json', '{"family": ');

    await assert.rejects(
      loadTaskDefinition(path, {}),
      (error: unknown) =>
        error instanceof ParseError &&
        error.source === path &&
        error.message.startsWith(`${path}: cannot parse document: `)
    );
  });

  it('fails when the document is not a task definition', async () => {
    const path = writeDocument('taskdef.json', '{"containerDefinitions": []}');

    await assert.rejects(
      loadTaskDefinition(path, {}),
      (error: unknown) =>
        error instanceof ParseError && error.message.startsWith(`${path}: invalid task definition`)
    );
  });

  it('fails when the file does not exist', async () => {
    const path = join(tempDir, 'missing.json');

    await assert.rejects(
      loadTaskDefinition(path, {}),
      (error: unknown) =>
        error instanceof ParseError && error.message.startsWith(`${path}: cannot read file: `)
    );
  });
});

describe('parseDocument', () => {
  it('parses JSON for paths without a YAML extension', () => {
    assert.deepStrictEqual(parseDocument('{"family":"a"}', 'td.txt'), { family: 'a' });
  });

  it('parses YAML for .yaml paths regardless of case', () => {
    assert.deepStrictEqual(parseDocument('family: a\n', 'TD.YAML'), { family: 'a' });
  });

  it('rejects YAML text given a JSON path', () => {
    assert.throws(() => parseDocument('family: a\n', 'td.json'), ParseError);
  });
});
