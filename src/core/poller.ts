/**
 * Queue poller
 *
 * Owns the current snapshot and the single pending auto-refresh timer.
 * A refresh only publishes if no later refresh has started since, and
 * only the latest refresh may re-arm the timer.
 */

import { JobView } from './job-view.js';
import { parseJobRecords } from './parser.js';
import { describeError } from './errors.js';
import type { Logger, StatusSource } from './types.js';

/** Default delay between the end of one refresh and the start of the next */
export const DEFAULT_REFRESH_INTERVAL_MS = 2000;

export type Snapshot = readonly JobView[];

export interface PollerOptions {
  source: StatusSource;
  intervalMs?: number;
  logger?: Logger;
  /** Called with each newly published snapshot */
  onUpdate?: (snapshot: Snapshot) => void;
  /** Called when a refresh fails; the previous snapshot stays current */
  onError?: (err: unknown) => void;
}

export class Poller {
  private readonly source: StatusSource;
  private readonly intervalMs: number;
  private readonly logger?: Logger;
  private readonly onUpdate?: (snapshot: Snapshot) => void;
  private readonly onError?: (err: unknown) => void;

  private snapshot: Snapshot = [];
  private timer: NodeJS.Timeout | null = null;
  private autoRefresh = false;
  private stopped = false;
  private requestSeq = 0;
  private inflight: Promise<void> = Promise.resolve();

  constructor(options: PollerOptions) {
    this.source = options.source;
    this.intervalMs = options.intervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
    this.logger = options.logger;
    this.onUpdate = options.onUpdate;
    this.onError = options.onError;
  }

  /** The most recently published snapshot */
  getSnapshot(): Snapshot {
    return this.snapshot;
  }

  /** Whether an auto-refresh is waiting to fire */
  isScheduled(): boolean {
    return this.timer !== null;
  }

  /**
   * Record the auto-refresh flag. Disabling cancels the pending timer;
   * enabling takes effect when the next refresh finishes.
   */
  setAutoRefresh(enabled: boolean): void {
    this.autoRefresh = enabled;
    if (!enabled) {
      this.cancelScheduled();
    }
  }

  /**
   * Poll the queue once and publish the result. Never rejects: failures
   * go to `onError` and leave the current snapshot in place.
   */
  refresh(): Promise<void> {
    if (this.stopped) return Promise.resolve();

    const request = ++this.requestSeq;
    this.cancelScheduled();
    this.inflight = this.poll(request);
    return this.inflight;
  }

  /** Resolves once the latest refresh has finished */
  idle(): Promise<void> {
    return this.inflight;
  }

  /** Cancel the pending timer and ignore any refresh still running */
  stop(): void {
    this.stopped = true;
    this.autoRefresh = false;
    this.cancelScheduled();
  }

  private async poll(request: number): Promise<void> {
    try {
      const output = await this.source.fetch();
      const snapshot = parseJobRecords(output).map((record) => new JobView(record));
      if (this.isCurrent(request)) {
        this.snapshot = snapshot;
        this.logger?.info(`Polled ${snapshot.length} job(s) from ${this.source.description}`);
        this.onUpdate?.(snapshot);
      }
    } catch (err) {
      if (this.isCurrent(request)) {
        this.logger?.error(`Refresh failed: ${describeError(err)}`);
        this.onError?.(err);
      }
    } finally {
      if (this.isCurrent(request) && this.autoRefresh) {
        this.schedule();
      }
    }
  }

  private isCurrent(request: number): boolean {
    return !this.stopped && request === this.requestSeq;
  }

  private schedule(): void {
    this.cancelScheduled();
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.refresh();
    }, this.intervalMs);
  }

  private cancelScheduled(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
