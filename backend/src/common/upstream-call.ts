/**
 * Scope for one outbound HTTP exchange: a deadline plus an optional caller
 * signal (client disconnect) folded into a single AbortSignal.
 *
 * `release()` must run on every exit path; it clears the timer, detaches from
 * the caller signal and aborts whatever is still in flight.
 */
export class UpstreamCall {
  private readonly controller = new AbortController();
  private timer: ReturnType<typeof setTimeout> | undefined;
  private expired = false;

  private readonly onParentAbort = () => this.controller.abort();

  constructor(
    timeoutMs: number,
    private readonly parent?: AbortSignal,
  ) {
    if (parent?.aborted) {
      this.controller.abort();
    } else {
      parent?.addEventListener('abort', this.onParentAbort, { once: true });
    }

    this.timer = setTimeout(() => {
      this.expired = true;
      this.controller.abort();
    }, timeoutMs);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get timedOut(): boolean {
    return this.expired;
  }

  /** True when the caller went away, as opposed to the deadline expiring. */
  get cancelled(): boolean {
    return Boolean(this.parent?.aborted);
  }

  clearDeadline() {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  release() {
    this.clearDeadline();
    this.parent?.removeEventListener('abort', this.onParentAbort);
    this.controller.abort();
  }
}
