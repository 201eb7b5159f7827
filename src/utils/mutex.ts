import { AuthError } from "~/utils/errors";

/**
 * Promise-chained mutual exclusion.
 *
 * Callers queue in arrival order; each critical section starts only after
 * the previous one settled, whether it resolved or rejected. A caller whose
 * signal aborts while it is still queued leaves the queue at once, and the
 * callers behind it keep their order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  /** Whether a critical section is running or queued */
  get locked(): boolean {
    return this.holders > 0;
  }

  async runExclusive<T>(
    fn: () => Promise<T> | T,
    signal?: AbortSignal,
  ): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.holders += 1;

    try {
      await waitForTurn(previous, signal);
      return await fn();
    } finally {
      this.holders -= 1;
      // An abandoned slot hands over only once its predecessor is done
      void previous.then(release);
    }
  }
}

function waitForTurn(turn: Promise<void>, signal?: AbortSignal): Promise<void> {
  if (!signal) {
    return turn;
  }
  if (signal.aborted) {
    return Promise.reject(abandoned(signal.reason));
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => reject(abandoned(signal.reason));
    signal.addEventListener("abort", onAbort, { once: true });
    turn.then(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, reject);
  });
}

function abandoned(cause: unknown): AuthError {
  return new AuthError({
    category: "CANCELLED",
    code: "UNKNOWN",
    message: "operation was cancelled while waiting for a pending refresh",
    cause,
  });
}
