/**
 * Status Reporter
 *
 * Polls a service's deployments on a fixed interval while the orchestrator
 * waits for stability, and logs each entry for the operator. Best-effort: a
 * failed poll is logged and dropped, it never affects the run.
 *
 * @example
 * ```typescript
 * const reporter = new StatusReporter(api, { cluster: 'default', service: 'web', logger });
 * reporter.start();
 * await api.waitServicesStable('default', 'web');
 * await reporter.stop(); // no poll is issued after this point
 * ```
 */

import type { ClusterAPI } from '../lib/cluster-api.js';
import { formatDeploymentEntry } from '../lib/cluster-api.js';
import { formatError } from '../lib/errors.js';
import type { Logger } from '../monitoring/structured-logger.js';
import type { DeploymentStatusSnapshot } from '../types.js';
import { abortable } from './context.js';

export const DEFAULT_POLL_INTERVAL_MS = 10_000;

export interface StatusReporterOptions {
  cluster: string;
  service: string;
  logger: Logger;
  intervalMs?: number;
  onSnapshot?: (snapshot: DeploymentStatusSnapshot) => void;
}

export class StatusReporter {
  private readonly api: ClusterAPI;
  private readonly options: StatusReporterOptions;
  private readonly intervalMs: number;
  private readonly controller = new AbortController();
  private timer?: NodeJS.Timeout;
  private inFlight?: Promise<void>;
  private started = false;
  private polls = 0;

  constructor(api: ClusterAPI, options: StatusReporterOptions) {
    if (options.intervalMs !== undefined && options.intervalMs <= 0) {
      throw new RangeError(`intervalMs must be positive, got ${options.intervalMs}`);
    }
    this.api = api;
    this.options = options;
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  /** Number of polls issued so far */
  get pollCount(): number {
    return this.polls;
  }

  get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Begin polling. The first poll happens one interval from now.
   *
   * @param parent - Stops the reporter when it aborts
   */
  start(parent?: AbortSignal): void {
    if (this.started || this.stopped) {
      return;
    }
    this.started = true;

    if (parent) {
      if (parent.aborted) {
        this.cancel();
        return;
      }
      parent.addEventListener('abort', () => this.cancel(), {
        once: true,
        signal: this.controller.signal,
      });
    }

    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.timer.unref();
  }

  /**
   * Cancel polling and wait until any poll in flight has settled
   */
  async stop(): Promise<void> {
    this.cancel();
    await this.inFlight;
  }

  private cancel(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
  }

  private tick(): void {
    // a slow poll is not overlapped by the next one
    if (this.stopped || this.inFlight) {
      return;
    }
    this.inFlight = this.poll().finally(() => {
      this.inFlight = undefined;
    });
  }

  private async poll(): Promise<void> {
    const { cluster, service, logger, onSnapshot } = this.options;
    const signal = this.controller.signal;
    this.polls++;

    try {
      const deployments = await abortable(
        this.api.describeServiceDeployments(cluster, service, signal),
        signal
      );
      if (signal.aborted) {
        return;
      }

      for (const entry of deployments) {
        logger.info(formatDeploymentEntry(entry));
      }
      onSnapshot?.({ service, deployments, observedAt: new Date() });
    } catch (error) {
      if (signal.aborted) {
        return;
      }
      logger.warn(`Status poll failed: ${formatError(error)}`);
    }
  }
}
