import { describeError, logger } from "../logger";

export type TimerCallback = () => void | Promise<void>;

type TimerEntry = {
  handle: ReturnType<typeof setTimeout>;
  dueAt: number;
};

/**
 * Keyed one-shot timers. Each (key, kind) pair holds at most one live timer:
 * starting a new one replaces the previous, and cancelling is always safe.
 */
export class TimerManager<K extends string = string> {
  private timers = new Map<string, TimerEntry>();

  constructor(private readonly name: string = "timers") {}

  start(key: string, kind: K, delayMs: number, callback: TimerCallback): void {
    this.cancel(key, kind);

    const id = this.timerId(key, kind);
    const safeDelay = Math.max(0, Math.floor(delayMs));
    const entry: TimerEntry = {
      dueAt: Date.now() + safeDelay,
      handle: setTimeout(() => {
        // A replaced timer must not remove its successor.
        if (this.timers.get(id) !== entry) {
          return;
        }
        this.timers.delete(id);
        this.dispatch(key, kind, callback);
      }, safeDelay),
    };
    this.timers.set(id, entry);
  }

  cancel(key: string, kind: K): boolean {
    const id = this.timerId(key, kind);
    const entry = this.timers.get(id);
    if (!entry) {
      return false;
    }
    clearTimeout(entry.handle);
    this.timers.delete(id);
    return true;
  }

  has(key: string, kind: K): boolean {
    return this.timers.has(this.timerId(key, kind));
  }

  /** Milliseconds until the (key, kind) timer fires, or null when none is pending. */
  remaining(key: string, kind: K): number | null {
    const entry = this.timers.get(this.timerId(key, kind));
    if (!entry) {
      return null;
    }
    return Math.max(0, entry.dueAt - Date.now());
  }

  cancelAll(key?: string): void {
    for (const [id, entry] of this.timers) {
      if (key !== undefined && !id.startsWith(`${key}\u0000`)) {
        continue;
      }
      clearTimeout(entry.handle);
      this.timers.delete(id);
    }
  }

  get size(): number {
    return this.timers.size;
  }

  private dispatch(key: string, kind: K, callback: TimerCallback): void {
    try {
      const result = callback();
      if (result instanceof Promise) {
        result.catch((error: unknown) => this.reportFailure(key, kind, error));
      }
    } catch (error) {
      this.reportFailure(key, kind, error);
    }
  }

  private reportFailure(key: string, kind: K, error: unknown): void {
    logger.error(
      {
        timers: this.name,
        key,
        kind,
        error: describeError(error),
      },
      "Timer callback failed",
    );
  }

  private timerId(key: string, kind: K): string {
    return `${key}\u0000${kind}`;
  }
}
