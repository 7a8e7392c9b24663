/**
 * Deployment context: identifiers, deadline and cancellation for one run
 */

export interface DeploymentContext {
  readonly cluster: string;
  readonly service: string;
  readonly startedAt: Date;
  /** Absolute deadline, fixed at creation. Undefined when the run has none. */
  readonly deadline?: Date;
  /** Fires when the deadline passes or the context is disposed */
  readonly signal: AbortSignal;
  /** `service/cluster`, used to tag log lines */
  readonly tag: string;
  elapsedMs(): number;
  deadlineExceeded(): boolean;
  /** Cancel everything still running under this context. Idempotent. */
  dispose(): void;
}

/** Longest delay a Node timer can hold (2^31 - 1 ms) */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface ContextOptions {
  cluster: string;
  service: string;
  /** 0 disables the deadline; at most MAX_TIMEOUT_MS */
  timeoutMs: number;
  now?: () => number;
}

/**
 * Create the context for a run. The deadline timer keeps the process alive
 * until it fires or the context is disposed.
 */
export function createDeploymentContext(options: ContextOptions): DeploymentContext {
  const now = options.now ?? Date.now;
  const startedAtMs = now();
  const controller = new AbortController();
  let deadlineFired = false;
  let timer: NodeJS.Timeout | undefined;

  if (options.timeoutMs < 0 || !Number.isFinite(options.timeoutMs)) {
    throw new RangeError(`timeoutMs must be a non-negative number, got ${options.timeoutMs}`);
  }
  if (options.timeoutMs > MAX_TIMEOUT_MS) {
    throw new RangeError(`timeoutMs must be at most ${MAX_TIMEOUT_MS}, got ${options.timeoutMs}`);
  }

  const deadline = options.timeoutMs > 0 ? new Date(startedAtMs + options.timeoutMs) : undefined;
  if (deadline) {
    timer = setTimeout(() => {
      deadlineFired = true;
      controller.abort(new Error(`deadline of ${options.timeoutMs}ms exceeded`));
    }, options.timeoutMs);
  }

  return {
    cluster: options.cluster,
    service: options.service,
    startedAt: new Date(startedAtMs),
    deadline,
    signal: controller.signal,
    tag: `${options.service}/${options.cluster}`,
    elapsedMs: () => now() - startedAtMs,
    deadlineExceeded: () => deadlineFired,
    dispose: () => {
      if (timer) {
        clearTimeout(timer);
        timer = undefined;
      }
      if (!controller.signal.aborted) {
        controller.abort(new Error('deployment context disposed'));
      }
    },
  };
}

/**
 * Settle with `promise`, or reject with the signal's reason as soon as
 * `signal` aborts, whichever comes first. The underlying work is not killed;
 * callers pass the same signal to it when it supports cancellation.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}
