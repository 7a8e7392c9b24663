/**
 * Log sink that keeps a running spinner on the last terminal line while
 * log lines are printed above it
 */

import type { LogEntry, LogSink } from '../../monitoring/structured-logger.js';

/** The part of an ora spinner this sink drives */
export interface SpinnerLike {
  readonly isSpinning: boolean;
  clear(): unknown;
  render(): unknown;
}

export class SpinnerSink implements LogSink {
  constructor(
    private readonly inner: LogSink,
    private readonly spinner: SpinnerLike
  ) {}

  write(entry: LogEntry): void {
    if (!this.spinner.isSpinning) {
      this.inner.write(entry);
      return;
    }
    this.spinner.clear();
    this.inner.write(entry);
    this.spinner.render();
  }
}
