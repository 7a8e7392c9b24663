/**
 * Wait-for-stable phase
 *
 * updated → waiting → stable | timed-out | wait-error
 *
 * While waiting, the blocking waitServicesStable call and a StatusReporter
 * run side by side under one cancellation scope. Whatever the terminal
 * state, the reporter is stopped and joined before this phase returns.
 */

import type { ClusterAPI } from '../lib/cluster-api.js';
import type { Logger } from '../monitoring/structured-logger.js';
import type { DeploymentStatusSnapshot } from '../types.js';
import { abortable, type DeploymentContext } from './context.js';
import { StatusReporter } from './status-reporter.js';

export type WaitState = 'updated' | 'waiting' | 'stable' | 'timed-out' | 'wait-error';

export type WaitOutcome =
  | { state: 'stable'; elapsedMs: number }
  | { state: 'timed-out'; elapsedMs: number }
  | { state: 'wait-error'; elapsedMs: number; error: unknown };

export interface StabilityWaiterOptions {
  logger: Logger;
  pollIntervalMs?: number;
  onTransition?: (from: WaitState, to: WaitState) => void;
  onSnapshot?: (snapshot: DeploymentStatusSnapshot) => void;
}

export async function waitForStableService(
  api: ClusterAPI,
  context: DeploymentContext,
  options: StabilityWaiterOptions
): Promise<WaitOutcome> {
  const { logger } = options;
  const transition = (from: WaitState, to: WaitState) => {
    logger.debug(`Wait phase: ${from} -> ${to}`);
    options.onTransition?.(from, to);
  };

  // child scope: aborted by the run's deadline, or by us on any terminal state
  const scope = new AbortController();
  const abortScope = () => scope.abort(context.signal.reason);
  if (context.signal.aborted) {
    abortScope();
  } else {
    context.signal.addEventListener('abort', abortScope, { once: true });
  }

  const reporter = new StatusReporter(api, {
    cluster: context.cluster,
    service: context.service,
    logger,
    intervalMs: options.pollIntervalMs,
    onSnapshot: options.onSnapshot,
  });

  transition('updated', 'waiting');
  reporter.start(scope.signal);

  let outcome: WaitOutcome;
  try {
    await abortable(
      api.waitServicesStable(context.cluster, context.service, scope.signal),
      scope.signal
    );
    outcome = { state: 'stable', elapsedMs: context.elapsedMs() };
  } catch (error) {
    outcome = context.deadlineExceeded()
      ? { state: 'timed-out', elapsedMs: context.elapsedMs() }
      : { state: 'wait-error', elapsedMs: context.elapsedMs(), error };
  } finally {
    context.signal.removeEventListener('abort', abortScope);
    scope.abort();
    await reporter.stop();
  }

  transition('waiting', outcome.state);
  return outcome;
}
