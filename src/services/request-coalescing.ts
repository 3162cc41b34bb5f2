/**
 * Request coalescing - share one upstream call among concurrent identical
 * requests. A key stays claimed while its call is in flight, or for
 * `windowMs` after it started, whichever ends first.
 *
 * The shared call runs under its own signal. Each waiter may leave early
 * through its own signal; the shared call is aborted only once every
 * waiter has left.
 */

interface PendingRequest<T> {
  promise: Promise<T>;
  timestamp: number;
  controller: AbortController;
  waiters: number;
}

export class RequestCoalescer<TResult> {
  private pending = new Map<string, PendingRequest<TResult>>();
  private windowMs: number;

  constructor(windowMs: number = Number.POSITIVE_INFINITY) {
    this.windowMs = windowMs;
  }

  /**
   * Run `fn` for `key`, or join the call already running for it. `signal`
   * withdraws this caller only.
   */
  execute(
    key: string,
    fn: (signal: AbortSignal) => Promise<TResult>,
    signal?: AbortSignal
  ): Promise<TResult> {
    const existing = this.pending.get(key);
    if (existing && Date.now() - existing.timestamp < this.windowMs) {
      return this.join(key, existing, signal);
    }

    const controller = new AbortController();
    const promise: Promise<TResult> = fn(controller.signal).finally(() => {
      if (this.pending.get(key)?.promise === promise) {
        this.pending.delete(key);
      }
    });

    const entry: PendingRequest<TResult> = { promise, timestamp: Date.now(), controller, waiters: 0 };
    this.pending.set(key, entry);
    return this.join(key, entry, signal);
  }

  private join(key: string, entry: PendingRequest<TResult>, signal?: AbortSignal): Promise<TResult> {
    entry.waiters++;

    if (!signal) {
      return new Promise<TResult>((resolve, reject) => {
        entry.promise.then(resolve, reject);
      });
    }

    const waiter: AbortSignal = signal;
    return new Promise<TResult>((resolve, reject) => {
      const onAbort = () => {
        this.leave(key, entry, waiter.reason);
        reject(waiter.reason);
      };

      entry.promise.then(
        value => {
          waiter.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          waiter.removeEventListener('abort', onAbort);
          reject(error);
        }
      );

      if (waiter.aborted) {
        onAbort();
      } else {
        waiter.addEventListener('abort', onAbort, { once: true });
      }
    });
  }

  private leave(key: string, entry: PendingRequest<TResult>, reason: unknown): void {
    entry.waiters--;
    if (entry.waiters > 0) return;

    entry.controller.abort(reason);
    if (this.pending.get(key) === entry) {
      this.pending.delete(key);
    }
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  clear(): void {
    this.pending.clear();
  }
}
