import { BrainError, DeadlineExceededError, TransientNetworkError } from '../errors.js';

// Abort reasons we raise ourselves are BrainErrors; a bare caller abort is
// reported as a missed deadline.
export function abortReason(signal: AbortSignal): BrainError {
  const reason: unknown = signal.reason;
  if (reason instanceof BrainError) return reason;
  return new DeadlineExceededError('Request aborted by caller');
}

export class Deadline {
  readonly expiresAt: number;
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;

  constructor(readonly budgetMs: number, private readonly parent?: AbortSignal) {
    this.expiresAt = Date.now() + budgetMs;
    this.timer = setTimeout(() => {
      this.controller.abort(new DeadlineExceededError(`Deadline of ${budgetMs}ms exceeded`));
    }, Math.max(0, budgetMs));
    this.timer.unref();

    if (parent?.aborted) {
      this.controller.abort(parent.reason);
    } else {
      parent?.addEventListener('abort', this.onParentAbort, { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  remaining(): number {
    if (this.controller.signal.aborted) return 0;
    return Math.max(0, this.expiresAt - Date.now());
  }

  expired(): boolean {
    return this.remaining() <= 0;
  }

  // Clamp a per-step timeout to what is left of the overall budget
  bound(ms: number): number {
    return Math.max(0, Math.min(ms, this.remaining()));
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.parent?.removeEventListener('abort', this.onParentAbort);
  }

  private readonly onParentAbort = (): void => {
    this.controller.abort(this.parent?.reason);
  };
}

// Runs one attempt under its own timeout, also cut short by the parent signal.
// Settles even when `fn` ignores its signal.
export async function withTimeout<T>(
  timeoutMs: number,
  parent: AbortSignal,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent.reason);
  const timer = setTimeout(() => {
    controller.abort(new TransientNetworkError(`Attempt timed out after ${timeoutMs}ms`));
  }, Math.max(0, timeoutMs));

  if (parent.aborted) {
    controller.abort(parent.reason);
  } else {
    parent.addEventListener('abort', onParentAbort, { once: true });
  }

  try {
    return await new Promise<T>((resolve, reject) => {
      const onAbort = () => reject(abortReason(controller.signal));
      if (controller.signal.aborted) {
        onAbort();
        return;
      }
      controller.signal.addEventListener('abort', onAbort, { once: true });
      fn(controller.signal).then(resolve, reject);
    });
  } finally {
    clearTimeout(timer);
    parent.removeEventListener('abort', onParentAbort);
  }
}
