import { TimeoutError } from '../error/timeoutError.js';

/** Abort signal scoped to a single request, plus the hook that tears it down. */
export interface RequestSignal {
  /** Signal handed to `fetch`; aborts on timeout or when a parent aborts. */
  signal: AbortSignal;
  /** Clears the timer and detaches from parent signals. Safe to call twice. */
  release: () => void;
}

/**
 * Creates an {@link AbortSignal} for one request that aborts:
 * - with a {@link TimeoutError} once `timeoutMs` elapses,
 * - with the parent's reason when any parent signal aborts.
 *
 * The caller must invoke `release` once the response body has been read,
 * otherwise the timer keeps the event loop alive until it fires.
 */
export function createRequestSignal(timeoutMs: number, parents: AbortSignal[] = []): RequestSignal {
  const controller = new AbortController();
  const listeners: Array<() => void> = [];

  const timer = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`, timeoutMs)),
    timeoutMs,
  );

  const release = () => {
    clearTimeout(timer);
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };

  controller.signal.addEventListener('abort', release, { once: true });

  for (const parent of parents) {
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }

    const abort = () => controller.abort(parent.reason);
    parent.addEventListener('abort', abort, { once: true });
    listeners.push(() => parent.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, release };
}
