import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { DeploymentOrchestrator } from './orchestrator.js';
import type { WaitState } from './stability-waiter.js';
import {
  ParseError,
  PlatformCallError,
  RegistrationConfirmationError,
  TemplateError,
  UpdateAppliedButWaitFailedError,
} from '../lib/errors.js';
import type { MemorySink } from '../monitoring/structured-logger.js';
import { TaskDefinitionModel } from '../task-definition/model.js';
import type { DeployConfig } from '../types.js';
import { FakeClusterApi, createMemoryLogger, delay, never } from '../test-utils.js';

const definition = TaskDefinitionModel.fromDocument({
  family: 'app',
  networkMode: 'bridge',
  containerDefinitions: [{ name: 'web', image: 'nginx:1.25', memory: 256 }],
});

const config: DeployConfig = {
  cluster: 'default',
  service: 'myService',
  taskDefinitionPath: 'ecs-task-def.json',
  timeoutMs: 5_000,
};

describe('DeploymentOrchestrator', () => {
  let api: FakeClusterApi;
  let sink: MemorySink;
  let orchestrator: DeploymentOrchestrator;
  let loads: string[];
  let transitions: Array<[WaitState, WaitState]>;

  beforeEach(() => {
    api = new FakeClusterApi();
    loads = [];
    transitions = [];
    const memory = createMemoryLogger();
    sink = memory.sink;
    orchestrator = new DeploymentOrchestrator(api, {
      logger: memory.logger,
      loadTaskDefinition: async (path) => {
        loads.push(path);
        return definition;
      },
      onWaitTransition: (from, to) => transitions.push([from, to]),
    });
  });

  describe('successful run', () => {
    it('runs every step in order and names the new revision', async () => {
      const outcome = await orchestrator.run(config);

      assert.strictEqual(outcome.taskDefinition, 'app:7');
      assert.strictEqual(outcome.registered.name(), 'app:7');
      assert.deepStrictEqual(outcome.before, api.deployments);
      assert.deepStrictEqual(api.calls, [
        'describeServiceDeployments',
        'registerTaskDefinition',
        'updateService',
        'waitServicesStable',
      ]);
      assert.deepStrictEqual(loads, ['ecs-task-def.json']);
    });

    it('registers the loaded definition and updates the service to it', async () => {
      await orchestrator.run(config);

      assert.deepStrictEqual(api.registeredInputs, [definition.toRegistrationInput()]);
      assert.deepStrictEqual(api.updates, [
        { cluster: 'default', service: 'myService', taskDefinition: 'app:7' },
      ]);
    });

    it('logs progress tagged with service and cluster', async () => {
      await orchestrator.run(config);

      assert.deepStrictEqual(sink.messages('info'), [
        'Starting deployment',
        'PRIMARY app:6 desired:2 running:2 pending:0',
        'Creating a new task definition by ecs-task-def.json',
        'Registering a new task definition...',
        'Task definition is registered app:7',
        'Updating service to app:7...',
        'Service is updated',
        'Waiting for service stable...(it will take a few minutes)',
        'Service is stable now. Completed!',
      ]);
      assert.ok(sink.entries.every((entry) => entry.context?.tag === 'myService/default'));
    });

    it('walks the wait phase from updated to stable', async () => {
      await orchestrator.run(config);

      assert.deepStrictEqual(transitions, [
        ['updated', 'waiting'],
        ['waiting', 'stable'],
      ]);
    });

    it('keeps the last status seen during the wait', async () => {
      const memory = createMemoryLogger();
      api.onWait = () => delay(60);
      const polling = new DeploymentOrchestrator(api, {
        logger: memory.logger,
        loadTaskDefinition: async () => definition,
        pollIntervalMs: 10,
      });

      const outcome = await polling.run(config);

      assert.strictEqual(outcome.lastSnapshot?.service, 'myService');
      assert.deepStrictEqual(outcome.lastSnapshot?.deployments, api.deployments);
    });

    it('runs without a deadline when the timeout is 0', async () => {
      const outcome = await orchestrator.run({ ...config, timeoutMs: 0 });

      assert.strictEqual(outcome.taskDefinition, 'app:7');
      assert.strictEqual(sink.entries[0].context?.deadline, undefined);
    });

    it('cancels the run scope once it returns', async () => {
      await orchestrator.run(config);

      assert.ok(api.signals.every((signal) => signal.aborted));
    });
  });

  describe('describe step', () => {
    it('ends the run when the service cannot be described', async () => {
      const failure = new PlatformCallError('describe-services', 'service myService not found in default (MISSING)');
      api.onDescribe = async () => {
        throw failure;
      };

      await assert.rejects(orchestrator.run(config), (error: unknown) => error === failure);
      assert.deepStrictEqual(api.calls, ['describeServiceDeployments']);
      assert.deepStrictEqual(loads, []);
    });

    it('wraps unexpected failures as platform call errors', async () => {
      api.onDescribe = async () => {
        throw new Error('socket hang up');
      };

      await assert.rejects(
        orchestrator.run(config),
        (error: unknown) =>
          error instanceof PlatformCallError &&
          error.operation === 'describe-services' &&
          error.message === 'describe-services failed: socket hang up' &&
          !error.timedOut
      );
    });

    it('reports a deadline that passes during the call', async () => {
      api.onDescribe = () => never();

      await assert.rejects(
        orchestrator.run({ ...config, timeoutMs: 30 }),
        (error: unknown) =>
          error instanceof PlatformCallError &&
          error.timedOut &&
          error.message === 'describe-services failed: deadline exceeded'
      );
      assert.deepStrictEqual(api.calls, ['describeServiceDeployments']);
    });
  });

  describe('load step', () => {
    it('passes loader errors through unchanged', async () => {
      const failure = new TemplateError('environment variable IMAGE_TAG is not defined', 'IMAGE_TAG');
      const failing = new DeploymentOrchestrator(api, {
        logger: createMemoryLogger().logger,
        loadTaskDefinition: async () => {
          throw failure;
        },
      });

      await assert.rejects(failing.run(config), (error: unknown) => error === failure);
      assert.deepStrictEqual(api.calls, ['describeServiceDeployments']);
    });
  });

  describe('register step', () => {
    it('does not update or wait when registration fails', async () => {
      const failure = new PlatformCallError('register-task-definition', 'ClientException');
      api.onRegister = async () => {
        throw failure;
      };

      await assert.rejects(orchestrator.run(config), (error: unknown) => error === failure);
      assert.strictEqual(api.count('updateService'), 0);
      assert.strictEqual(api.count('waitServicesStable'), 0);
    });

    it('reports a response without revision as unconfirmed', async () => {
      api.onRegister = async () => ({ taskDefinition: { family: 'app' } });

      await assert.rejects(
        orchestrator.run(config),
        (error: unknown) =>
          error instanceof RegistrationConfirmationError &&
          error.message ===
            'Task definition app was submitted but its registration could not be confirmed ' +
              '(a new revision may exist): response has no revision'
      );
      assert.strictEqual(api.count('updateService'), 0);
    });

    it('reports an unreadable response as unconfirmed', async () => {
      const parseFailure = new ParseError('register-task-definition', 'response is not valid JSON: Unexpected end of JSON input');
      api.onRegister = async () => {
        throw parseFailure;
      };

      await assert.rejects(
        orchestrator.run(config),
        (error: unknown) => error instanceof RegistrationConfirmationError && error.cause === parseFailure
      );
      assert.strictEqual(api.count('updateService'), 0);
    });

    it('reports a response for another family as unconfirmed', async () => {
      api.onRegister = async () => ({ taskDefinition: { family: 'other', revision: 3 } });

      await assert.rejects(
        orchestrator.run(config),
        (error: unknown) =>
          error instanceof RegistrationConfirmationError &&
          error.message.endsWith('response names family other')
      );
      assert.strictEqual(api.count('updateService'), 0);
    });
  });

  describe('update step', () => {
    it('names the registered revision when the update fails', async () => {
      api.onUpdate = async () => {
        throw new PlatformCallError('update-service', 'exit code 254', {
          diagnostics: 'An error occurred (ServiceNotActiveException): Service was not ACTIVE.',
        });
      };

      await assert.rejects(
        orchestrator.run(config),
        (error: unknown) =>
          error instanceof PlatformCallError &&
          error.message ===
            'update-service failed: app:7 is registered but myService was not updated: ' +
              'An error occurred (ServiceNotActiveException): Service was not ACTIVE.' &&
          error.details?.taskDefinition === 'app:7'
      );
      assert.strictEqual(api.count('waitServicesStable'), 0);
    });
  });

  describe('wait step', () => {
    it('fails with the revision when the service never becomes stable in time', async () => {
      api.onWait = () => never();

      await assert.rejects(
        orchestrator.run({ ...config, timeoutMs: 50 }),
        (error: unknown) =>
          error instanceof UpdateAppliedButWaitFailedError &&
          error.reason === 'timed-out' &&
          error.taskDefinition === 'app:7'
      );
      assert.ok(sink.messages('info').includes('Service is updated'));
      assert.deepStrictEqual(sink.messages('error'), []);
      assert.ok(sink.messages('debug').includes('Service did not become stable'));
      assert.deepStrictEqual(transitions, [
        ['updated', 'waiting'],
        ['waiting', 'timed-out'],
      ]);
    });

    it('fails with the revision when the platform gives up waiting', async () => {
      const failure = new PlatformCallError('wait services-stable', 'Waiter ServicesStable failed: Max attempts exceeded');
      api.onWait = async () => {
        throw failure;
      };

      await assert.rejects(
        orchestrator.run(config),
        (error: unknown) =>
          error instanceof UpdateAppliedButWaitFailedError &&
          error.reason === 'wait-error' &&
          error.cause === failure &&
          error.message.startsWith('Service myService/default was updated to app:7 but failed to become stable after')
      );
      assert.deepStrictEqual(api.updates.map((update) => update.taskDefinition), ['app:7']);
    });
  });
});
