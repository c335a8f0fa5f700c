import { CancelledError, GenerationError } from "./errors.js";

/**
 * Per-request timeout tied to an optional parent cancellation signal.
 * `signal` is handed to the provider; `race` makes a pending await settle as soon
 * as the deadline passes or the parent aborts, even if the provider ignores the signal.
 */
export class Deadline {
  private readonly controller = new AbortController();
  private readonly timer: ReturnType<typeof setTimeout>;
  private readonly waiters = new Set<(err: Error) => void>();
  private failure: Error | null = null;

  constructor(
    private readonly timeoutMs: number,
    private readonly parent?: AbortSignal,
  ) {
    this.timer = setTimeout(() => {
      this.fail(new GenerationError("Timeout", `Request timed out after ${this.timeoutMs}ms`));
    }, timeoutMs);

    if (parent?.aborted) {
      this.fail(new CancelledError());
    } else {
      parent?.addEventListener("abort", this.onParentAbort, { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  race<T>(work: Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      work.then(
        (value) => {
          this.waiters.delete(reject);
          resolve(value);
        },
        (err: unknown) => {
          this.waiters.delete(reject);
          // A provider aborted by us rejects with its own abort error; report ours instead.
          reject(this.failure ?? err);
        },
      );

      if (this.failure) {
        reject(this.failure);
      } else {
        this.waiters.add(reject);
      }
    });
  }

  /** Stops the timer and aborts the provider request if it is still running. */
  dispose(): void {
    clearTimeout(this.timer);
    this.parent?.removeEventListener("abort", this.onParentAbort);
    this.waiters.clear();
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
  }

  private readonly onParentAbort = (): void => {
    this.fail(new CancelledError());
  };

  private fail(err: Error): void {
    if (this.failure) return;
    this.failure = err;
    clearTimeout(this.timer);
    this.controller.abort(err);
    for (const reject of this.waiters) reject(err);
    this.waiters.clear();
  }
}

export async function withDeadline<T>(
  timeoutMs: number,
  parent: AbortSignal | undefined,
  run: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const deadline = new Deadline(timeoutMs, parent);
  try {
    return await deadline.race(run(deadline.signal));
  } finally {
    deadline.dispose();
  }
}
