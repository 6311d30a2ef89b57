/**
 * Run-level deadline and abortable helpers.
 *
 * The run budget is one AbortSignal shared by every request of the run. Per
 * attempt timeouts are derived from it with linkedTimeout(), so an attempt
 * ends either when its own budget runs out (retryable) or when the run ends
 * (not retryable); callers tell the two apart with timedOut().
 */

/** Single top-level deadline for a pipeline run. */
export class RunDeadline {
  private readonly controller = new AbortController();
  private readonly timer: ReturnType<typeof setTimeout>;
  private readonly startedAt: number;

  constructor(readonly budgetMs: number, private readonly now: () => number = Date.now) {
    this.startedAt = now();
    this.timer = setTimeout(() => this.controller.abort(new Error('run budget exceeded')), budgetMs);
    this.timer.unref();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get expired(): boolean {
    return this.controller.signal.aborted;
  }

  elapsedMs(): number {
    return this.now() - this.startedAt;
  }

  remainingMs(): number {
    return Math.max(0, this.budgetMs - this.elapsedMs());
  }

  /** End the run early (used by tests and by callers handling SIGTERM). */
  expire(): void {
    this.controller.abort(new Error('run budget exceeded'));
  }

  dispose(): void {
    clearTimeout(this.timer);
  }
}

/** An AbortSignal that fires when the parent aborts or after `timeoutMs`. */
export interface LinkedTimeout {
  signal: AbortSignal;
  /** True when this signal fired because of its own timeout. */
  timedOut(): boolean;
  dispose(): void;
}

export function linkedTimeout(parent: AbortSignal | undefined, timeoutMs: number): LinkedTimeout {
  const controller = new AbortController();
  let fired = false;
  const timer = setTimeout(() => {
    fired = true;
    controller.abort(new Error(`attempt timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timer.unref();

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => fired && !(parent?.aborted ?? false),
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/** Sleep that rejects as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
