/**
 * Polling Coordinator
 *
 * Runs one update function on a fixed interval and keeps the latest result
 * for observers. A failed poll keeps the previous data and is retried on the
 * next tick; only {@link PollingCoordinator.firstRefresh} surfaces failure.
 */
import { UpdateFailedError, toError } from "./errors";
import { DEFAULT_SCAN_INTERVAL_S } from "./config";

export type RefreshOutcome<T> =
  | { ok: true; data: T }
  | { ok: false; error: UpdateFailedError };

export type RefreshListener<T> = (outcome: RefreshOutcome<T>) => void;

export interface PollingCoordinatorOptions<T> {
  /** Label used in log lines. */
  name: string;
  update: () => Promise<T>;
  /** Interval in seconds between polls (default: 30) */
  intervalSeconds?: number;
  /** Prepended to the message of a failed update, e.g. `"Local gateway error: "`. */
  errorPrefix?: string;
  /** Custom log function. Default: console.log. */
  logFn?: (message: string) => void;
}

export class PollingCoordinator<T> {
  readonly name: string;
  private readonly update: () => Promise<T>;
  private readonly intervalMs: number;
  private readonly errorPrefix: string;
  private readonly logFn: (message: string) => void;

  private latest: T | null = null;
  private failure: UpdateFailedError | null = null;
  private succeeded = false;
  private readonly listeners = new Set<RefreshListener<T>>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private inflight: Promise<RefreshOutcome<T>> | null = null;

  constructor(options: PollingCoordinatorOptions<T>) {
    this.name = options.name;
    this.update = options.update;
    this.intervalMs = (options.intervalSeconds ?? DEFAULT_SCAN_INTERVAL_S) * 1000;
    this.errorPrefix = options.errorPrefix ?? "";
    this.logFn = options.logFn ?? console.log;
  }

  /** Latest successful result; kept across failed polls. */
  get data(): T | null {
    return this.latest;
  }

  get lastError(): UpdateFailedError | null {
    return this.failure;
  }

  get lastUpdateSuccess(): boolean {
    return this.succeeded;
  }

  getIntervalMs(): number {
    return this.intervalMs;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Register for every refresh outcome. Returns the unsubscribe function.
   */
  subscribe(listener: RefreshListener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Initial poll during setup. Unlike timer-driven polls a failure rejects,
   * so the host can treat it as "not ready".
   */
  async firstRefresh(): Promise<T> {
    const outcome = await this.refresh();
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.data;
  }

  /**
   * Poll now. Never rejects; overlapping calls share the poll in progress.
   */
  refresh(): Promise<RefreshOutcome<T>> {
    if (!this.inflight) {
      this.inflight = this.runUpdate().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.refresh();
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async runUpdate(): Promise<RefreshOutcome<T>> {
    let outcome: RefreshOutcome<T>;
    try {
      const data = await this.update();
      if (this.failure) {
        this.logFn(`[COORD] ${this.name} recovered`);
      }
      this.latest = data;
      this.failure = null;
      this.succeeded = true;
      outcome = { ok: true, data };
    } catch (err) {
      const error =
        err instanceof UpdateFailedError
          ? err
          : new UpdateFailedError(`${this.errorPrefix}${toError(err).message}`, { cause: err });
      this.failure = error;
      this.succeeded = false;
      this.logFn(`[COORD] ${this.name} update failed: ${error.message}`);
      outcome = { ok: false, error };
    }

    this.notify(outcome);
    return outcome;
  }

  private notify(outcome: RefreshOutcome<T>): void {
    for (const listener of this.listeners) {
      try {
        listener(outcome);
      } catch (err) {
        this.logFn(`[COORD] ${this.name} listener threw: ${toError(err).message}`);
      }
    }
  }
}
