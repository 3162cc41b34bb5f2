/**
 * Cancellation scope for one Bedrock call: a deadline timer plus an optional
 * caller signal, merged into the signal handed to the SDK.
 */
export class CallScope {
  private controller = new AbortController();
  private timer: ReturnType<typeof setTimeout> | undefined;
  private unlink: () => void = () => {};
  private expired = false;

  constructor(readonly timeoutMs: number, parent?: AbortSignal) {
    if (parent?.aborted) {
      this.controller.abort(parent.reason);
      return;
    }

    if (parent) {
      const onAbort = () => this.controller.abort(parent.reason);
      parent.addEventListener('abort', onAbort, { once: true });
      this.unlink = () => parent.removeEventListener('abort', onAbort);
    }

    if (Number.isFinite(timeoutMs) && timeoutMs > 0) {
      this.timer = setTimeout(() => {
        this.expired = true;
        this.controller.abort(new Error(`Deadline of ${timeoutMs}ms exceeded`));
      }, timeoutMs);
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get timedOut(): boolean {
    return this.expired;
  }

  /** Stop the deadline; the caller's signal stays linked. */
  settle(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  /** Release timers and listeners once the call has finished. */
  dispose(): void {
    this.settle();
    this.unlink();
    this.unlink = () => {};
  }

  /** Dispose and abort whatever is still running under this scope. */
  close(): void {
    this.dispose();
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
  }
}
